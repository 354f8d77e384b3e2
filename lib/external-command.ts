import { execFile as execFileCallback } from "child_process";
import { promisify } from "util";
import { ExternalToolError } from "./errors";

// get this functionality as promise compatible function
const execFile = promisify(execFileCallback);

export type ExternalCommandResult = {
  // the exit status of the process (0 for success)
  exitCode: number;

  // everything the process wrote to stdout
  stdout: string;

  // everything the process wrote to stderr
  stderr: string;
};

/**
 * The capability to run an external tool (seqkit, gzip..) to completion. The
 * real implementation shells out - tests substitute a fake that records the
 * invocations.
 */
export interface ExternalCommandRunner {
  run(command: string, args: readonly string[]): Promise<ExternalCommandResult>;
}

/**
 * Runs commands directly with execFile (no shell - so no globbing or pipes, every
 * argument is passed through as is). A non-zero exit is returned as a result, not
 * thrown - it is the caller that decides whether that is fatal.
 */
export class ExecFileCommandRunner implements ExternalCommandRunner {
  constructor(private readonly maxBuffer: number = 64 * 1024 * 1024) {}

  async run(
    command: string,
    args: readonly string[]
  ): Promise<ExternalCommandResult> {
    try {
      const { stdout, stderr } = await execFile(command, args, {
        maxBuffer: this.maxBuffer,
        encoding: "utf8",
      });

      return { exitCode: 0, stdout, stderr };
    } catch (e) {
      // execFile rejects for a non-zero exit with the exit status as a numeric code
      if (
        typeof e === "object" &&
        e !== null &&
        "code" in e &&
        typeof e.code === "number"
      ) {
        return {
          exitCode: e.code,
          stdout: "stdout" in e && typeof e.stdout === "string" ? e.stdout : "",
          stderr: "stderr" in e && typeof e.stderr === "string" ? e.stderr : "",
        };
      }

      // anything else (ENOENT for a missing binary, killed by signal..) means the
      // command never produced an exit status
      throw new ExternalToolError(command, args, null, "", e);
    }
  }
}

/**
 * Run a command and insist that it succeeds.
 *
 * @param runner the runner to use
 * @param command the binary
 * @param args the arguments
 * @throws ExternalToolError if the command exits non-zero
 */
export async function runChecked(
  runner: ExternalCommandRunner,
  command: string,
  args: readonly string[]
): Promise<ExternalCommandResult> {
  const result = await runner.run(command, args);

  if (result.exitCode !== 0)
    throw new ExternalToolError(command, args, result.exitCode, result.stderr);

  return result;
}
