/**
 * Live display - redraws a text frame in place on a terminal
 *
 * Refresh requests only mark the frame dirty; at most one redraw runs per
 * interval. On a non-TTY stream nothing is drawn until stop(), which prints
 * the final frame once.
 */

export interface DisplayStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface LiveDisplayOptions {
  stream?: DisplayStream;
  /** Minimum delay between redraws (default: 80ms) */
  refreshIntervalMs?: number;
  /** Redraw in place (default: stream.isTTY) */
  interactive?: boolean;
}

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_TO_END = '\x1b[0J';

export class LiveDisplay {
  private readonly stream: DisplayStream;
  private readonly refreshIntervalMs: number;
  private readonly interactive: boolean;
  private timer: NodeJS.Timeout | null = null;
  private active = false;
  private lastFrame: string | null = null;
  private lastLineCount = 0;

  constructor(private readonly source: () => string, options: LiveDisplayOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 80;
    this.interactive = options.interactive ?? this.stream.isTTY === true;
  }

  get isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    if (this.interactive) {
      this.stream.write(HIDE_CURSOR);
      this.draw();
    }
  }

  /**
   * Ask for a redraw. Safe to call on every state change.
   */
  requestRedraw(): void {
    if (!this.active || !this.interactive || this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.draw();
    }, this.refreshIntervalMs);
  }

  /**
   * Draw the final frame and release the terminal.
   */
  stop(): void {
    if (!this.active) return;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.interactive) {
      this.draw();
      this.stream.write(SHOW_CURSOR);
    } else {
      this.stream.write(this.source() + '\n');
    }
    this.active = false;
  }

  private draw(): void {
    const frame = this.source();
    if (frame === this.lastFrame) return;

    let output = '';
    if (this.lastLineCount > 0) {
      // Back to the first line of the previous frame
      output += `\x1b[${this.lastLineCount}A\r${CLEAR_TO_END}`;
    }
    output += frame + '\n';

    this.stream.write(output);
    this.lastFrame = frame;
    this.lastLineCount = frame.split('\n').length;
  }
}
