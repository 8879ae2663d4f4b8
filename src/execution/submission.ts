import { promises as fs } from "fs";
import path from "path";
import { SubmitError, describeError } from "../core/errors.js";
import type { JobParameters } from "../core/jobParameters.js";
import type { ScriptSubmitter, SubmissionOutcome } from "./slurm/submitter.js";

export interface SubmissionDeps {
  cwd: string;
  scriptFile: string;
  submitter: ScriptSubmitter;
  stdout: (text: string) => void;
}

export type SubmissionResult =
  | { kind: "dry_run"; scriptPath: string }
  | { kind: "submitted"; scriptPath: string; outcome: SubmissionOutcome };

export async function writeScriptFile(scriptPath: string, script: string): Promise<void> {
  try {
    await fs.writeFile(scriptPath, script, "utf8");
  } catch (err) {
    throw new SubmitError("FileWriteFailure", `cannot write ${scriptPath}: ${describeError(err)}`, { cause: err });
  }
}

export async function writeAndMaybeSubmit(
  params: Readonly<JobParameters>,
  script: string,
  deps: SubmissionDeps
): Promise<SubmissionResult> {
  const scriptPath = path.resolve(deps.cwd, deps.scriptFile);
  await writeScriptFile(scriptPath, script);

  if (!params.silent) {
    deps.stdout(`\nSLURM settings:\n${script}\n`);
  }

  if (params.dryRun) {
    return { kind: "dry_run", scriptPath };
  }

  const outcome = await deps.submitter.submit(script);
  return { kind: "submitted", scriptPath, outcome };
}
