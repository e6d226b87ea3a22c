/**
 * Console logger for changegate
 *
 * Prefixes each line with a glyph for its kind, honours quiet/verbose modes and
 * can prepend ISO timestamps for CI logs.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface LoggerOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  timestamps: boolean;
}

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const ANSI: Record<Color, string> = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
};

const RESET = '\x1b[0m';

const DEFAULT_OPTIONS: LoggerOptions = {
  quiet: false,
  verbose: false,
  noColor: false,
  timestamps: false,
};

// ============================================================================
// LOGGER
// ============================================================================

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  /** Scanning directories, locating files */
  discovery(message: string): void {
    this.out(this.paint('cyan', '🔍'), message);
  }

  /** Running checks over a document */
  analysis(message: string): void {
    this.out(this.paint('blue', '🔬'), message);
  }

  success(message: string): void {
    this.out(this.paint('green', '✓'), message);
  }

  warning(message: string): void {
    this.out(this.paint('yellow', '⚠'), message);
  }

  /**
   * Errors go to stderr and are shown even in quiet mode
   */
  error(message: string): void {
    console.error(this.stamp(`${this.paint('red', '✗')} ${message}`));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.out(this.paint('dim', '→'), message);
  }

  section(title: string): void {
    if (this.options.quiet) return;
    console.log(this.stamp(this.paint('bold', `=== ${title} ===`)));
  }

  info(key: string, value: string | number | boolean): void {
    if (this.options.quiet) return;
    console.log(this.stamp(`  ${this.paint('dim', `${key}:`)} ${value}`));
  }

  listItem(text: string, indent = 0): void {
    if (this.options.quiet) return;
    console.log(this.stamp(`${'  '.repeat(indent)}• ${text}`));
  }

  blank(): void {
    if (this.options.quiet) return;
    console.log('');
  }

  private out(prefix: string, message: string): void {
    if (this.options.quiet) return;
    console.log(this.stamp(`${prefix} ${message}`));
  }

  private paint(color: Color, text: string): string {
    if (this.options.noColor) return text;
    return `${ANSI[color]}${text}${RESET}`;
  }

  private stamp(line: string): string {
    if (!this.options.timestamps) return line;
    return `[${new Date().toISOString()}] ${line}`;
  }
}

// ============================================================================
// SHARED INSTANCE
// ============================================================================

export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
