/**
 * Where components send their progress and warnings. Passed in explicitly
 * so nothing in lib/ writes to the console behind the caller's back.
 */
export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * A reporter that writes to the console. Progress messages only appear
 * when verbose - warnings always appear.
 *
 * @param verbose whether to print info level messages
 */
export function consoleReporter(verbose: boolean): Reporter {
  return {
    info: (message) => {
      if (verbose) console.log(`[INFO] ${message}`);
    },
    warn: (message) => console.warn(`[WARNING] ${message}`),
  };
}

export const silentReporter: Reporter = {
  info: () => {},
  warn: () => {},
};

/**
 * Echo captured output of an external tool through the reporter, one line
 * at a time, tagged by the stream it came from.
 */
export function reportToolOutput(
  reporter: Reporter,
  stdout: string,
  stderr: string
) {
  if (stdout) {
    stdout
      .split("\n")
      .filter((l) => l.length > 0)
      .forEach((l) => reporter.info(`stdout ${l}`));
  }
  if (stderr) {
    stderr
      .split("\n")
      .filter((l) => l.length > 0)
      .forEach((l) => reporter.info(`stderr ${l}`));
  }
}
