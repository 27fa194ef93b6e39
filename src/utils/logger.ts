/**
 * Console logger for repo-deck
 *
 * Emoji-prefixed levels, quiet/verbose modes, optional ISO timestamps
 * and a lightweight TTY spinner for long-running pipeline steps.
 */

export interface LoggerOptions {
  /** Only print errors */
  quiet: boolean;
  /** Print debug messages */
  verbose: boolean;
  /** Disable ANSI colors */
  noColor: boolean;
  /** Prefix every line with an ISO timestamp */
  timestamps: boolean;
}

export interface SpinnerController {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

type Color = keyof typeof COLORS;

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const SPINNER_INTERVAL_MS = 80;

const NOOP_SPINNER: SpinnerController = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  stop: () => {},
};

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      quiet: options.quiet ?? false,
      verbose: options.verbose ?? false,
      noColor: options.noColor ?? false,
      timestamps: options.timestamps ?? false,
    };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  private paint(color: Color, text: string): string {
    if (this.options.noColor) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private format(message: string): string {
    if (!this.options.timestamps) return message;
    return `[${new Date().toISOString()}] ${message}`;
  }

  private out(message: string): void {
    if (this.options.quiet) return;
    console.log(this.format(message));
  }

  /** Repository and file discovery (cloning, walking) */
  discovery(message: string): void {
    this.out(`${this.paint('cyan', '🔍')} ${message}`);
  }

  /** Static work on the checkout (digesting, formatting) */
  analysis(message: string): void {
    this.out(`${this.paint('blue', '🔬')} ${message}`);
  }

  /** Model calls */
  inference(message: string): void {
    this.out(`${this.paint('magenta', '🧠')} ${message}`);
  }

  success(message: string): void {
    this.out(`${this.paint('green', '✓')} ${message}`);
  }

  warning(message: string): void {
    this.out(`${this.paint('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    console.error(this.format(`${this.paint('red', '✗')} ${message}`));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.out(this.paint('dim', `→ ${message}`));
  }

  section(title: string): void {
    this.out(this.paint('bold', `=== ${title} ===`));
  }

  step(index: number, total: number, label: string): void {
    this.out(`${this.paint('bold', `[Step ${index}/${total}]`)} ${label}`);
  }

  info(key: string, value: string | number | boolean): void {
    this.out(`  ${this.paint('dim', `${key}:`)} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    this.out(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    this.out('');
  }

  /**
   * Start a spinner on an interactive terminal.
   * Quiet mode, timestamp mode and non-TTY output get a no-op controller.
   */
  spinner(text: string): SpinnerController {
    if (this.options.quiet || this.options.timestamps || !process.stdout.isTTY) {
      return NOOP_SPINNER;
    }

    let current = text;
    let frame = 0;
    const render = () => {
      const glyph = this.paint('cyan', SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      process.stdout.write(`\r\x1b[2K${glyph} ${current}`);
      frame++;
    };

    render();
    const timer = setInterval(render, SPINNER_INTERVAL_MS);
    timer.unref();

    const clear = () => {
      clearInterval(timer);
      process.stdout.write('\r\x1b[2K');
    };

    return {
      update: (next: string) => {
        current = next;
      },
      succeed: (final?: string) => {
        clear();
        this.success(final ?? current);
      },
      fail: (final?: string) => {
        clear();
        this.error(final ?? current);
      },
      stop: clear,
    };
  }
}

/** Shared instance configured once by the CLI */
export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
