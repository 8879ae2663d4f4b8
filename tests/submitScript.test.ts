import { describe, it, expect } from "vitest";
import { DEFAULT_SITE_CONFIG } from "../src/config/siteConfig.js";
import { SubmitError } from "../src/core/errors.js";
import { defaultJobParameters, type JobParameters } from "../src/core/jobParameters.js";
import {
  dedent,
  directiveBlock,
  executableBlock,
  formatWalltime,
  jobArrayBlock,
  renderScript
} from "../src/execution/slurm/submitScript.js";

function params(overrides: Partial<JobParameters> = {}): JobParameters {
  return { ...defaultJobParameters(DEFAULT_SITE_CONFIG), ...overrides };
}

const DEFAULT_DIRECTIVES = [
  "#!/bin/bash",
  "",
  "#SBATCH --job-name=SLURM_job",
  "#SBATCH --time=00:30:00",
  "#SBATCH --nodes 1",
  "#SBATCH --ntasks-per-node=16",
  "#SBATCH --partition=mem_0064",
  "#SBATCH --qos=normal_0064",
  "#SBATCH --account=p70072"
];

const MPI_LINE = "time mpirun -np $SLURM_NTASKS solve_xml_mumps";

describe("renderScript", () => {
  it("renders directives and a timed MPI invocation by default", () => {
    expect(renderScript(params())).toBe(
      [...DEFAULT_DIRECTIVES, "", "unset I_MPI_PIN_PROCESSOR_LIST", MPI_LINE, ""].join("\n")
    );
  });

  it("is deterministic for identical inputs", () => {
    const p = params({ jobArrayDirs: ["a", "b"], setMpiLibrary: true });
    expect(renderScript(p)).toBe(renderScript({ ...p }));
  });

  it("renders the job array block with the per-task log handling", () => {
    const script = renderScript(params({ jobArrayDirs: ["dirA", "dirB", "dirC"] }));
    expect(script).toBe(
      [
        ...DEFAULT_DIRECTIVES,
        "",
        "#SBATCH --array 1-3",
        "",
        "JOB_DIRS=(dirA dirB dirC)",
        "INDEX=$((${SLURM_ARRAY_TASK_ID} - 1))",
        "cd ${JOB_DIRS[${INDEX}]}",
        "",
        "OUTPUT=$SLURM_SUBMIT_DIR/slurm-${SLURM_ARRAY_JOB_ID}_${SLURM_ARRAY_TASK_ID}.out",
        "ln -s $OUTPUT .",
        "",
        "unset I_MPI_PIN_PROCESSOR_LIST",
        MPI_LINE,
        "",
        "unlink $(basename $OUTPUT)",
        "gzip $OUTPUT",
        "mv $OUTPUT.gz .",
        ""
      ].join("\n")
    );
  });

  it("uses the plain redirection block when an array also has an output file", () => {
    const script = renderScript(params({ jobArrayDirs: ["x", "y"], outputFile: "run.log" }));
    expect(script).toBe(
      [
        ...DEFAULT_DIRECTIVES,
        "",
        "#SBATCH --array 1-2",
        "",
        "JOB_DIRS=(x y)",
        "INDEX=$((${SLURM_ARRAY_TASK_ID} - 1))",
        "cd ${JOB_DIRS[${INDEX}]}",
        "",
        "#SBATCH --output=run.log",
        "#SBATCH --error=run.log",
        "",
        "unset I_MPI_PIN_PROCESSOR_LIST",
        MPI_LINE,
        ""
      ].join("\n")
    );
  });

  it("renders only the redirection block for an output file without an array", () => {
    const script = renderScript(params({ outputFile: "/scratch/out.txt" }));
    expect(script).toContain("#SBATCH --output=/scratch/out.txt\n#SBATCH --error=/scratch/out.txt\n");
    expect(script).not.toContain("--array");
    expect(script).not.toContain("OUTPUT=");
  });

  it("drops the launcher for single-core jobs and exports the PMI library on request", () => {
    const script = renderScript(params({ noMpi: true, setMpiLibrary: true, executable: "./solve" }));
    expect(script.endsWith(
      [
        "unset I_MPI_PIN_PROCESSOR_LIST",
        "export I_MPI_PMI_LIBRARY=/cm/shared/apps/slurm/current/lib/libpmi.so",
        "time ./solve",
        ""
      ].join("\n")
    )).toBe(true);
  });

  it("writes walltime minutes into a fixed hours field", () => {
    expect(formatWalltime(45)).toBe("00:45:00");
    expect(formatWalltime(90)).toBe("00:90:00");
    expect(directiveBlock(params({ walltime: 5 }))[3]).toBe("#SBATCH --time=00:5:00");
  });
});

describe("script blocks", () => {
  it("sizes the array range from the directory count", () => {
    expect(jobArrayBlock(["only"])[0]).toBe("#SBATCH --array 1-1");
    expect(jobArrayBlock(["a", "b", "c", "d", "e"])[0]).toBe("#SBATCH --array 1-5");
  });

  it("rejects an empty job array", () => {
    expect(() => jobArrayBlock([])).toThrow(SubmitError);
    expect(() => jobArrayBlock([])).toThrow(/at least one directory/);
    try {
      jobArrayBlock([]);
    } catch (e) {
      expect((e as SubmitError).code).toBe("InvalidArgument");
    }
  });

  it("selects the executable variant from array and output settings", () => {
    expect(executableBlock(params())[0]).toBe("unset I_MPI_PIN_PROCESSOR_LIST");
    expect(executableBlock(params({ jobArrayDirs: ["a"] }))[0]).toMatch(/^OUTPUT=/);
    expect(executableBlock(params({ jobArrayDirs: ["a"], outputFile: "o" }))[0]).toBe(
      "unset I_MPI_PIN_PROCESSOR_LIST"
    );
  });
});

describe("dedent", () => {
  it("strips the common indentation and empties whitespace-only lines", () => {
    expect(dedent("    a\n      b\n   \n    c\n")).toBe("a\n  b\n\nc\n");
  });

  it("keeps text whose lines share no indentation", () => {
    expect(dedent("\tfoo\n  bar\n")).toBe("\tfoo\n  bar\n");
  });

  it("reduces the margin to the shared prefix of mixed indents", () => {
    expect(dedent("  \tx\n   y\n")).toBe("\tx\n y\n");
  });
});
