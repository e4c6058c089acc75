export interface Logger {
  info(message: string): Promise<void>;
  verbose(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

/**
 * Progress goes to stdout, verbose detail and errors to stderr. `quiet`
 * silences progress; errors are always written.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  return {
    info: async (message) => {
      if (!options.quiet) {
        await writeLine(stdout, message);
      }
    },
    verbose: async (message) => {
      if (options.verbose && !options.quiet) {
        await writeLine(stderr, `  [verbose] ${message}`);
      }
    },
    error: async (message) => {
      await writeLine(stderr, message);
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function writeLine(
  stream: NodeJS.WritableStream,
  message: string,
): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    stream.write(message + "\n", (error?: Error | null) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
