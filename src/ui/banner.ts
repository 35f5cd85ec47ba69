// Startup banner

import chalk from 'chalk';

const TITLE = 'F O R G E L O O P';

export const TAGLINE = 'ForgeLoop – Spec-Driven Development Toolkit';

export function renderBanner(): string {
  const width = TAGLINE.length + 4;
  const pad = (text: string): string => {
    const left = Math.floor((width - text.length) / 2);
    return ' '.repeat(left) + text + ' '.repeat(width - text.length - left);
  };

  return [
    chalk.cyan(`╭${'─'.repeat(width)}╮`),
    chalk.cyan('│') + chalk.bold.cyanBright(pad(TITLE)) + chalk.cyan('│'),
    chalk.cyan('│') + chalk.italic.yellow(pad(TAGLINE)) + chalk.cyan('│'),
    chalk.cyan(`╰${'─'.repeat(width)}╯`),
    '',
  ].join('\n');
}
