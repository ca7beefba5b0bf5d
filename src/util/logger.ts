export interface StdOut {
  write: (data: string) => void;
}

export interface LoggerOptions {
  stdout?: StdOut;
  quiet?: boolean;
  verbose?: boolean;
  tag?: string;
}

const defaultStdOut = (): StdOut => process?.stdout || {
  write: (str: string) => console.log(str.replace(/(\n|\r)+$/g, '')),
};

export class Logger {
  stdout: StdOut;
  quiet: boolean;
  verbose: boolean;
  tag: string;

  constructor(opts: LoggerOptions = {}) {
    this.stdout = opts.stdout || defaultStdOut();
    this.quiet = opts.quiet || false;
    this.verbose = opts.verbose || false;
    this.tag = opts.tag || '';
  }

  // a logger sharing this one's sink and flags, with its own tag
  child(tag: string): Logger {
    return new Logger({
      stdout: this.stdout,
      quiet: this.quiet,
      verbose: this.verbose,
      tag,
    });
  }

  #line(args: unknown[]) {
    const text = args.map((arg) => `${arg}`).join(' ');
    return this.tag ? `[${this.tag}] ${text}\n` : `${text}\n`;
  }

  // log out a line of text
  log(...args: unknown[]) {
    if (this.quiet) return;
    this.stdout.write(this.#line(args));
  }

  // log out a set of characters
  logChar(str: string) {
    if (this.quiet) return;
    this.stdout.write(str);
  }

  debug(...args: unknown[]) {
    if (this.quiet || !this.verbose) return;
    this.stdout.write(this.#line(args));
  }

  // warnings and errors are written even when quiet
  warn(...args: unknown[]) {
    this.stdout.write(this.#line(['WARNING:', ...args]));
  }

  error(...args: unknown[]) {
    this.stdout.write(this.#line(['ERROR:', ...args]));
  }
}
