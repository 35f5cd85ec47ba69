// Step tracker - ordered, keyed step state rendered as a tree

import chalk from 'chalk';
import type { Logger } from '../utils/logger.js';

export type StepStatus = 'pending' | 'running' | 'done' | 'error' | 'skipped';

export interface Step {
  key: string;
  label: string;
  status: StepStatus;
  detail: string;
}

export type RefreshCallback = () => void;

export interface StepTrackerOptions {
  /** Receives a debug trace when a transition creates a step nobody added */
  logger?: Logger;
}

/**
 * Invoke a display hook without letting its failure escape.
 * Returns false when the hook threw; the error itself is dropped.
 */
export function notifyBestEffort(callback: RefreshCallback | undefined): boolean {
  if (!callback) return true;
  try {
    callback();
    return true;
  } catch {
    return false;
  }
}

/**
 * Tracks named steps of a run and renders them as a tree.
 *
 * The tracker is a passive state holder: any transition is accepted in any
 * order, and transitioning an unknown key creates it with `label = key`.
 * Sequencing belongs to the caller.
 */
export class StepTracker {
  readonly title: string;
  private readonly items = new Map<string, Step>();
  private refreshCallback: RefreshCallback | undefined;
  private readonly logger: Logger | undefined;
  private dropped = 0;

  constructor(title: string, options: StepTrackerOptions = {}) {
    this.title = title;
    this.logger = options.logger;
  }

  /**
   * Attach the hook a live display uses to redraw after each change.
   * Replaces any previously attached hook.
   */
  attachRefresh(callback: RefreshCallback): void {
    this.refreshCallback = callback;
  }

  detachRefresh(): void {
    this.refreshCallback = undefined;
  }

  /** Number of refresh calls whose hook threw */
  get droppedRefreshes(): number {
    return this.dropped;
  }

  /** Register a pending step; a key that already exists keeps its position and state */
  add(key: string, label: string): void {
    if (!this.items.has(key)) {
      this.items.set(key, { key, label, status: 'pending', detail: '' });
    }
    this.refresh();
  }

  start(key: string, detail = ''): void {
    this.update(key, 'running', detail);
  }

  complete(key: string, detail = ''): void {
    this.update(key, 'done', detail);
  }

  error(key: string, detail = ''): void {
    this.update(key, 'error', detail);
  }

  skip(key: string, detail = ''): void {
    this.update(key, 'skipped', detail);
  }

  get(key: string): Readonly<Step> | undefined {
    const step = this.items.get(key);
    return step ? { ...step } : undefined;
  }

  steps(): ReadonlyArray<Readonly<Step>> {
    return Array.from(this.items.values(), (step) => ({ ...step }));
  }

  hasErrors(): boolean {
    return this.steps().some((step) => step.status === 'error');
  }

  render(): string {
    const lines = [chalk.cyan(this.title)];
    const all = Array.from(this.items.values());

    all.forEach((step, index) => {
      const guide = index === all.length - 1 ? '└── ' : '├── ';
      lines.push(chalk.gray(guide) + this.formatStep(step));
    });

    return lines.join('\n');
  }

  private update(key: string, status: StepStatus, detail: string): void {
    const step = this.items.get(key);
    if (step) {
      step.status = status;
      if (detail) {
        step.detail = detail;
      }
    } else {
      this.logger?.debug(`step "${key}" was not added before being marked ${status}; creating it`);
      this.items.set(key, { key, label: key, status, detail });
    }
    this.refresh();
  }

  private refresh(): void {
    if (!notifyBestEffort(this.refreshCallback)) {
      this.dropped += 1;
    }
  }

  private formatStep(step: Step): string {
    const detail = step.detail.trim();
    const symbol = this.statusSymbol(step.status);

    if (step.status === 'pending') {
      const text = detail ? `${step.label} (${detail})` : step.label;
      return `${symbol} ${chalk.gray(text)}`;
    }

    const label = chalk.white(step.label);
    return detail ? `${symbol} ${label} ${chalk.gray(`(${detail})`)}` : `${symbol} ${label}`;
  }

  private statusSymbol(status: StepStatus): string {
    switch (status) {
      case 'done':
        return chalk.green('●');
      case 'pending':
        return chalk.green.dim('○');
      case 'running':
        return chalk.cyan('○');
      case 'error':
        return chalk.red('●');
      case 'skipped':
        return chalk.yellow('○');
    }
  }
}
