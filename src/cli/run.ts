import { CommanderError } from "commander";
import { loadSiteConfigFromEnv, type SiteConfig } from "../config/siteConfig.js";
import { SubmitError } from "../core/errors.js";
import { renderScript } from "../execution/slurm/submitScript.js";
import { SbatchPipeSubmitter, type ScriptSubmitter } from "../execution/slurm/submitter.js";
import { renderSummary } from "../execution/slurm/summary.js";
import { writeAndMaybeSubmit, type SubmissionResult } from "../execution/submission.js";
import { buildParameters } from "./program.js";

export interface CliIo {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createSubmitter?: (site: SiteConfig) => ScriptSubmitter;
}

function defaultSubmitter(site: SiteConfig): ScriptSubmitter {
  return new SbatchPipeSubmitter({ command: site.submit.command, args: site.submit.args });
}

export async function runPipeline(argv: readonly string[], io: CliIo): Promise<SubmissionResult> {
  const site = await loadSiteConfigFromEnv(io.env);
  const params = buildParameters(argv, site, { writeOut: io.stdout, writeErr: io.stderr });

  if (!params.silent) {
    io.stdout(`\n${renderSummary(params)}\n`);
  }

  const script = renderScript(params);
  const submitter = (io.createSubmitter ?? defaultSubmitter)(site);
  return writeAndMaybeSubmit(params, script, {
    cwd: io.cwd,
    scriptFile: site.script_file,
    submitter,
    stdout: io.stdout
  });
}

/** Returns null for errors commander has already printed together with the usage text. */
export function formatCliError(err: SubmitError): string | null {
  if (err.code === "InvalidArgument" && err.cause instanceof CommanderError) return null;
  return `subslurm: ${err.message}\n`;
}

/** Runs the pipeline and maps its result to a process exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  try {
    // A submitted result carries the submit command's exit status. It is intentionally not
    // propagated: sbatch reports its own failures on the inherited stderr and this tool exits 0.
    await runPipeline(argv, io);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof SubmitError) {
      const message = formatCliError(err);
      if (message) io.stderr(message);
      return 1;
    }
    throw err;
  }
}
