import { SubmitError } from "../../core/errors.js";
import type { JobParameters } from "../../core/jobParameters.js";

type ScriptBlock = string[];

/** The hours field is fixed at `00`; minutes are written as given. */
export function formatWalltime(minutes: number): string {
  return `00:${minutes}:00`;
}

export function directiveBlock(params: Readonly<JobParameters>): ScriptBlock {
  return [
    "#!/bin/bash",
    "",
    `#SBATCH --job-name=${params.name}`,
    `#SBATCH --time=${formatWalltime(params.walltime)}`,
    `#SBATCH --nodes ${params.nnodes}`,
    `#SBATCH --ntasks-per-node=${params.ntasks}`,
    `#SBATCH --partition=${params.partition}`,
    `#SBATCH --qos=${params.qos}`,
    `#SBATCH --account=${params.account}`
  ];
}

export function jobArrayBlock(dirs: readonly string[]): ScriptBlock {
  if (dirs.length < 1) throw new SubmitError("InvalidArgument", "job array needs at least one directory");
  return [
    `#SBATCH --array 1-${dirs.length}`,
    "",
    `JOB_DIRS=(${dirs.join(" ")})`,
    "INDEX=$((${SLURM_ARRAY_TASK_ID} - 1))",
    "cd ${JOB_DIRS[${INDEX}]}"
  ];
}

export function outputRedirectBlock(outputFile: string): ScriptBlock {
  return [`#SBATCH --output=${outputFile}`, `#SBATCH --error=${outputFile}`];
}

function invocationLine(params: Readonly<JobParameters>): string {
  const parts = params.noMpi ? [params.executable] : [params.mpiLauncher, params.executable];
  return `time ${parts.join(" ")}`;
}

export function plainExecutableBlock(params: Readonly<JobParameters>): ScriptBlock {
  const lines = ["unset I_MPI_PIN_PROCESSOR_LIST"];
  if (params.setMpiLibrary) lines.push(`export I_MPI_PMI_LIBRARY=${params.mpiPmiLibrary}`);
  lines.push(invocationLine(params));
  return lines;
}

/**
 * SLURM writes each array task's log to `$SLURM_SUBMIT_DIR`, so the log is linked into the task
 * directory while the job runs and moved there compressed afterwards. Assumes the default
 * `slurm-%A_%a.out` naming.
 */
export function arrayOutputExecutableBlock(params: Readonly<JobParameters>): ScriptBlock {
  return [
    "OUTPUT=$SLURM_SUBMIT_DIR/slurm-${SLURM_ARRAY_JOB_ID}_${SLURM_ARRAY_TASK_ID}.out",
    "ln -s $OUTPUT .",
    "",
    ...plainExecutableBlock(params),
    "",
    "unlink $(basename $OUTPUT)",
    "gzip $OUTPUT",
    "mv $OUTPUT.gz ."
  ];
}

export function executableBlock(params: Readonly<JobParameters>): ScriptBlock {
  if (params.jobArrayDirs && !params.outputFile) return arrayOutputExecutableBlock(params);
  return plainExecutableBlock(params);
}

/** Strips the indentation shared by every non-blank line and empties whitespace-only lines. */
export function dedent(text: string): string {
  const blanked = text.replace(/^[ \t]+$/gm, "");

  let margin: string | null = null;
  for (const m of blanked.matchAll(/^([ \t]*)[^ \t\n]/gm)) {
    const indent = m[1] ?? "";
    if (margin === null || margin.startsWith(indent)) {
      margin = indent;
    } else if (!indent.startsWith(margin)) {
      let i = 0;
      while (i < margin.length && i < indent.length && margin[i] === indent[i]) i++;
      margin = margin.slice(0, i);
    }
  }

  if (!margin) return blanked;
  const prefix = margin;
  return blanked
    .split("\n")
    .map((line) => (line.startsWith(prefix) ? line.slice(prefix.length) : line))
    .join("\n");
}

export function renderScript(params: Readonly<JobParameters>): string {
  const blocks: ScriptBlock[] = [directiveBlock(params)];
  if (params.jobArrayDirs) blocks.push(jobArrayBlock(params.jobArrayDirs));
  if (params.outputFile) blocks.push(outputRedirectBlock(params.outputFile));
  blocks.push(executableBlock(params));

  return dedent(`${blocks.map((block) => block.join("\n")).join("\n\n")}\n`);
}
