import chalk from "chalk";

export type Logger = {
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
};

export type Writer = (text: string) => void;

export const writeStdout: Writer = (text) => {
  process.stdout.write(text);
};

export const writeStderr: Writer = (text) => {
  process.stderr.write(text);
};

// quiet drops progress lines only; warnings always reach the writer.
export const createLogger = (write: Writer, opts: { readonly quiet?: boolean } = {}): Logger => ({
  info: (message) => {
    if (!opts.quiet) write(chalk.dim(`${message}\n`));
  },
  warn: (message) => {
    write(chalk.yellow(`${message}\n`));
  },
});

export const stderrLogger: Logger = createLogger(writeStderr);

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
