import chalk, { Chalk, type ChalkInstance } from "chalk";

export type Sink = (text: string) => void;

export type OutputOptions = {
  verbose?: boolean;
  color?: boolean;
  stdout?: Sink;
  stderr?: Sink;
};

export const EmojiInfo = "ℹ️";
export const EmojiSuccess = "✅";
export const EmojiWarning = "⚠️";

const PREFIX = "[repoctl]";

/**
 * Console output for commands. Results go to stdout; log lines
 * (debug/warn/error) go to stderr with the `[repoctl]` prefix.
 */
export class Output {
  private readonly style: ChalkInstance;
  private readonly stdout: Sink;
  private readonly stderr: Sink;
  private verbose: boolean;

  constructor(opts: OutputOptions = {}) {
    this.style = new Chalk({ level: opts.color === false ? 0 : chalk.level });
    this.stdout = opts.stdout ?? ((s) => process.stdout.write(s));
    this.stderr = opts.stderr ?? ((s) => process.stderr.write(s));
    this.verbose = opts.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  writeLine(line: string): void {
    this.stdout(`${line}\n`);
  }

  info(message: string): void {
    this.writeLine(`${EmojiInfo} ${message}`);
  }

  /** Titled block; body lines are indented under the title. */
  block(title: string, lines: string[]): void {
    this.writeLine(this.style.green(`${EmojiSuccess} ${title}`));
    for (const line of lines) this.writeLine(line ? `  ${line}` : "");
  }

  suggestion(message: string): void {
    this.writeLine(this.style.dim(message));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.stderr(this.style.dim(`${PREFIX} ${message}`) + "\n");
  }

  warn(message: string): void {
    this.stderr(this.style.yellow(`${PREFIX} ${EmojiWarning} ${message}`) + "\n");
  }

  error(message: string): void {
    this.stderr(this.style.red(`${PREFIX} ${message}`) + "\n");
  }
}
