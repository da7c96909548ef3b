import chalk from 'chalk';
import {ProgressEvent} from './types.js';

export type ReporterOptions = {
  level?: chalk.Level; // defaults to what the terminal supports
  out?: (line: string) => void;
  err?: (line: string) => void;
};

export class Reporter {
  readonly supportsColor: boolean;
  private readonly c: chalk.Chalk;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(opts: ReporterOptions = {}) {
    const level = opts.level ?? (chalk.supportsColor ? chalk.supportsColor.level : 0);
    this.c = new chalk.Instance({ level });
    this.supportsColor = level > 0;
    this.out = opts.out ?? ((line) => { process.stdout.write(line + '\n'); });
    this.err = opts.err ?? ((line) => { process.stderr.write(line + '\n'); });
  }

  banner() {
    this.out(this.c.green('Generating icons for iOS and Android to be useable on Xamarin Forms...'));
  }

  colorSelected(name: string, hex: string, complementary: string, bright: boolean) {
    const label = this.supportsColor
      ? this.c.bgHex(hex).keyword(bright ? 'black' : 'white')(name)
      : name;
    this.out(`Color selected: ${label} (${hex}, complementary: ${complementary})`);
  }

  info(line: string) {
    this.out(line);
  }

  progress(e: ProgressEvent) {
    this.out(this.c.dim(`  [${e.index}/${e.total}] ${e.baseName}`));
  }

  done() {
    this.out(this.c.green('done.'));
  }

  error(message: string) {
    this.err(this.c.red(`Error: ${message}`));
  }
}
