import { spawnSync } from "child_process";
import { SubmitError } from "../../core/errors.js";

export interface SubmissionOutcome {
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface ScriptSubmitter {
  submit(script: string): Promise<SubmissionOutcome>;
}

export interface SbatchPipeOptions {
  command?: string;
  args?: string[];
}

/**
 * Pipes a whole script into the submit command's stdin and waits for it to exit. The child
 * inherits stdout/stderr so the scheduler's own messages reach the user; nothing is parsed.
 * There is no timeout: a hung submit command blocks until it exits.
 */
export class SbatchPipeSubmitter implements ScriptSubmitter {
  private readonly command: string;
  private readonly args: string[];

  constructor(options: SbatchPipeOptions = {}) {
    this.command = options.command ?? "sbatch";
    this.args = [...(options.args ?? [])];
  }

  async submit(script: string): Promise<SubmissionOutcome> {
    const res = spawnSync(this.command, this.args, {
      input: script,
      stdio: ["pipe", "inherit", "inherit"]
    });

    // A child that exits without draining stdin reports EPIPE after it ran; only a process that
    // never started is a failure.
    const code = res.error && "code" in res.error ? res.error.code : undefined;
    if (res.error && (!res.pid || code === "ENOENT" || code === "EACCES")) {
      throw new SubmitError("SubmissionProcessFailure", `cannot run ${this.command}: ${res.error.message}`, {
        cause: res.error
      });
    }

    return { command: this.command, exitCode: res.status, signal: res.signal };
  }
}
