import { execFile } from "child_process";
import { CommandResult } from "../types/store";
import { createLogger, Logger } from "../lib/logger";

/** Exit code reported when the program could not be started or was killed on timeout. */
export const LAUNCH_FAILURE_CODE = 254;

const DEFAULT_TIMEOUT_MS = 600_000;
const MAX_BUFFER = 8 * 1024 * 1024;

export interface ExecuteOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Values masked wherever they appear in the logged command line. */
  redact?: readonly string[];
}

export interface CommandExecutor {
  execute(command: readonly string[], options?: ExecuteOptions): Promise<CommandResult>;
}

interface ExecFailure {
  code?: number | string | null;
  signal?: NodeJS.Signals | null;
  killed?: boolean;
  message?: string;
}

function trimEnd(value: string | Buffer | undefined): string {
  return (value ?? "").toString().trimEnd();
}

export function maskCommand(command: readonly string[], secrets: readonly string[]): string {
  return command
    .map(part => secrets.reduce((masked, secret) => (secret ? masked.split(secret).join("***") : masked), part))
    .join(" ");
}

/**
 * Runs a program directly (no shell) and never rejects: every outcome,
 * including ENOENT and timeouts, comes back as a CommandResult.
 */
export class ChildProcessExecutor implements CommandExecutor {
  constructor(private readonly logger: Logger = createLogger("exec")) {}

  execute(command: readonly string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const [program, ...args] = command;
    if (!program) {
      return Promise.resolve({ code: LAUNCH_FAILURE_CODE, stdout: "", stderr: "empty command" });
    }
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger.debug(`RUN CMD: ${maskCommand(command, options.redact ?? [])} (cwd=${options.cwd ?? ""})`);

    return new Promise<CommandResult>(resolve => {
      execFile(
        program,
        args,
        { cwd: options.cwd, timeout: timeoutMs, maxBuffer: MAX_BUFFER, killSignal: "SIGKILL", encoding: "utf8" },
        (error, stdout, stderr) => {
          const result = this.toResult(error, trimEnd(stdout), trimEnd(stderr), timeoutMs);
          this.logger.debug(`RC=${result.code} stdout=${result.stdout.slice(0, 200)} stderr=${result.stderr.slice(0, 200)}`);
          resolve(result);
        }
      );
    });
  }

  private toResult(error: ExecFailure | null, stdout: string, stderr: string, timeoutMs: number): CommandResult {
    if (!error) return { code: 0, stdout, stderr };

    if (typeof error.code === "number") {
      return { code: error.code, stdout, stderr };
    }

    // Spawn-level failures (ENOENT, EACCES) and maxBuffer overflow carry a string code.
    if (typeof error.code === "string") {
      const reason = error.message || error.code;
      this.logger.error(`Command execution failed: ${reason}`);
      return { code: LAUNCH_FAILURE_CODE, stdout, stderr: reason };
    }

    const reason = error.killed
      ? `command timed out after ${timeoutMs}ms`
      : `command terminated by signal ${error.signal ?? "unknown"}`;
    this.logger.warn(reason);
    return { code: LAUNCH_FAILURE_CODE, stdout, stderr: stderr ? `${stderr}\n${reason}` : reason };
  }
}
