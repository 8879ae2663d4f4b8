import type { JobParameters } from "../../core/jobParameters.js";

const LABEL_WIDTH = 24;
const EMPTY_MARKER = "none";

export function renderSummary(params: Readonly<JobParameters>): string {
  const rows: Array<[string, string]> = [
    ["Job name:", params.name],
    ["Maximum job runtime:", `${params.walltime} minutes`],
    ["Number of nodes:", String(params.nnodes)],
    ["Executable file:", params.executable],
    ["Job array directories:", params.jobArrayDirs ? params.jobArrayDirs.join(" ") : EMPTY_MARKER],
    ["Output files:", params.outputFile ?? EMPTY_MARKER],
    ["Partition:", params.partition],
    ["Quality of Service:", params.qos],
    ["Account:", params.account]
  ];

  const lines = ["Options:", ""];
  for (const [label, value] of rows) {
    lines.push(`    ${label.padEnd(LABEL_WIDTH)}${value}`);
  }
  return `${lines.join("\n")}\n`;
}
