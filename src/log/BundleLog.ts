import prettyTime from 'pretty-time';

export type LogLevel = 'succinct' | 'verbose' | 'disabled';

export interface BundleLogProps {
  level?: LogLevel;
}

type LogType = 'info' | 'echo' | 'warn' | 'error' | 'bottom_message';

const STYLES: Record<string, [string, string]> = {
  bold: ['\x1b[1m', '\x1b[22m'],
  dim: ['\x1b[2m', '\x1b[22m'],
  red: ['\x1b[31m', '\x1b[39m'],
  green: ['\x1b[32m', '\x1b[39m'],
  yellow: ['\x1b[33m', '\x1b[39m'],
  cyan: ['\x1b[36m', '\x1b[39m'],
  white: ['\x1b[37m', '\x1b[39m'],
  black: ['\x1b[30m', '\x1b[39m'],
  bgRed: ['\x1b[41m', '\x1b[49m'],
  bgGreen: ['\x1b[42m', '\x1b[49m'],
  bgYellow: ['\x1b[43m', '\x1b[49m'],
};

function conj(word: string, amount: number) {
  return amount === 1 ? `1 ${word}` : `${amount} ${word}s`;
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';
}

export class BundleLog {
  public readonly level: LogLevel;
  private readonly _warnings: string[] = [];
  private readonly _errors: string[] = [];
  private startTime: [number, number];
  private indent = '  ';

  constructor(props: BundleLogProps = {}) {
    let level = props.level ?? 'succinct';
    if (process.argv.includes('--verbose')) level = 'verbose';
    if (isTestRun() && !process.argv.includes('--log')) level = 'disabled';
    this.level = level;
    this.startTime = process.hrtime();
  }

  get warnings(): ReadonlyArray<string> {
    return this._warnings;
  }

  get errors(): ReadonlyArray<string> {
    return this._errors;
  }

  startTimeMeasure() {
    this.startTime = process.hrtime();
  }

  /**
   * Replaces `$name` with vars and `<tag>` markup with terminal colours
   */
  getString(message: string, vars?: Record<string, string | number>): string {
    let result = message;
    if (vars) {
      result = result.replace(/\$([a-zA-Z_]\w*)/g, (match: string, name: string) =>
        name in vars ? String(vars[name]) : match,
      );
    }
    return result.replace(/<(\/?)([a-zA-Z]+)>/g, (match: string, closing: string, tag: string) => {
      const style = STYLES[tag];
      if (!style) return match;
      return closing ? style[1] : style[0];
    });
  }

  log(type: LogType, message: string) {
    if (type === 'warn') {
      this._warnings.push(message);
      return;
    }
    if (type === 'error') {
      this._errors.push(message);
      return;
    }
    if (this.level === 'disabled') return;
    console.log(message);
  }

  info(group: string, message: string, vars?: Record<string, string | number>) {
    this.log('info', this.getString(`${this.indent}<bold><green>${group}</green></bold> ${message}`, vars));
  }

  verbose(group: string, message: string, vars?: Record<string, string | number>) {
    if (this.level === 'verbose') {
      this.info(group, message, vars);
    }
  }

  warn(message: string, vars?: Record<string, string | number>) {
    this.log('warn', this.getString(`${this.indent}<yellow>⚠ ${message}</yellow>`, vars));
  }

  error(message: string, vars?: Record<string, string | number>) {
    this.log('error', this.getString(`${this.indent}<red>✗ ${message}</red>`, vars));
  }

  echo(message: string, vars?: Record<string, string | number>) {
    this.log('echo', this.getString(message, vars));
  }

  line() {
    this.echo('');
  }

  fatal(header: string, messages?: ReadonlyArray<string>) {
    this.echo(this.indent + `<white><bold><bgRed> FATAL </bgRed></bold></white> <bold><red>${header}</red></bold>`);
    if (messages) {
      this.echo('');
      for (const msg of messages) {
        this.echo(this.indent + '<red><bold>- ' + msg + '</bold></red>');
      }
    }
  }

  printBottomMessages() {
    for (const item of this._warnings) this.log('bottom_message', item);
    for (const item of this._errors) this.log('bottom_message', item);
  }

  getTime(): string {
    return prettyTime(process.hrtime(this.startTime), 'ms');
  }

  finalise() {
    if (this.level === 'disabled') return;
    const hasErrors = this._errors.length > 0;
    const hasWarnings = this._warnings.length > 0;
    this.printBottomMessages();
    this.line();

    const time = this.getTime();
    const genericError = '<white><bold><bgRed> ERROR </bgRed></bold></white>';
    const timeFormat = 'in <yellow>$time</yellow>';
    if (hasErrors) {
      const warn = hasWarnings ? ` and <yellow>${conj('warning', this._warnings.length)}</yellow>` : '';
      this.log(
        'bottom_message',
        this.getString(this.indent + `${genericError} <red><bold>Completed with $err${warn} ${timeFormat}</bold></red>`, {
          err: conj('error', this._errors.length),
          time,
        }),
      );
    } else if (hasWarnings) {
      this.log(
        'bottom_message',
        this.getString(
          this.indent +
            `<black><bold><bgYellow> WARNING </bgYellow></bold></black>  <yellow><bold>Completed with $warn ${timeFormat}</bold></yellow>`,
          { warn: conj('warning', this._warnings.length), time },
        ),
      );
    } else {
      this.log(
        'bottom_message',
        this.getString(
          this.indent +
            `<white><bold><bgGreen> SUCCESS </bgGreen></bold></white>  <green><bold>Completed without build issues ${timeFormat}</bold></green>`,
          { time },
        ),
      );
    }
    this.line();
  }
}

export function createBundleLog(props: BundleLogProps = {}): BundleLog {
  return new BundleLog(props);
}
