import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import * as z from "zod/v4";
import { DEFAULT_SITE_CONFIG, type SiteConfig } from "../config/siteConfig.js";
import { SubmitError } from "../core/errors.js";
import { applyOverrides, defaultJobParameters, type JobParameters } from "../core/jobParameters.js";

export interface ProgramOutput {
  writeOut(str: string): void;
  writeErr(str: string): void;
}

const zCliOptions = z.object({
  walltime: z.number().int(),
  name: z.string(),
  nnodes: z.number().int(),
  ntasks: z.number().int(),
  executable: z.string(),
  mpi: z.boolean(),
  setMpiLibrary: z.boolean().optional(),
  jobarray: z.array(z.string()).min(1).optional(),
  dryrun: z.boolean().optional(),
  tmp: z.string().optional(),
  silent: z.boolean().optional(),
  partition: z.string(),
  qos: z.string(),
  account: z.string(),
  itp: z.boolean().optional(),
  ITP: z.boolean().optional(),
  dev: z.boolean().optional()
});

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const INTEGER_FLAGS = new Map<string, string>([
  ["-w", "--walltime"],
  ["--walltime", "--walltime"],
  ["-n", "--nnodes"],
  ["--nnodes", "--nnodes"],
  ["-t", "--ntasks"],
  ["--ntasks", "--ntasks"]
]);

export function parseInteger(value: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new InvalidArgumentError(`invalid int value: '${value}'`);
  }
  return Number.parseInt(value, 10);
}

function integerOption(flags: string, description: string, fallback: number): Option {
  // a bare flag keeps its default
  return new Option(flags, description).default(fallback).preset(String(fallback)).argParser(parseInteger);
}

/**
 * Commander reads `-w -5` as a bare `-w` followed by an unknown option, so a negative value after
 * an integer flag is joined into `--walltime=-5`.
 */
export function attachNegativeIntegers(rawArgs: readonly string[]): string[] {
  const args: string[] = [];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i] ?? "";
    const longFlag = INTEGER_FLAGS.get(arg);
    const next = rawArgs[i + 1];
    if (longFlag && next !== undefined && next.trimStart().startsWith("-") && INTEGER_PATTERN.test(next)) {
      args.push(`${longFlag}=${next}`);
      i++;
      continue;
    }
    if (arg === "--") {
      args.push(...rawArgs.slice(i));
      break;
    }
    args.push(arg);
  }
  return args;
}

export function readCliOptions(values: unknown): z.infer<typeof zCliOptions> {
  const parsed = zCliOptions.safeParse(values);
  if (!parsed.success) {
    throw new SubmitError("InvalidArgument", `unexpected option values: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function createProgram(site: SiteConfig = DEFAULT_SITE_CONFIG, output?: ProgramOutput): Command {
  const d = site.defaults;
  const program = new Command("subslurm")
    .description("Submit a job to the SLURM workload manager.")
    .addOption(integerOption("-w, --walltime [minutes]", "maximum job runtime (in minutes)", d.walltime_minutes))
    .addOption(new Option("-N, --name <name>", "SLURM job name").default(d.name))
    .addOption(integerOption("-n, --nnodes [count]", "number of nodes to allocate", d.nnodes))
    .addOption(integerOption("-t, --ntasks [count]", "number of tasks per node", d.ntasks))
    .addOption(new Option("-e, --executable <file>", "executable for job submission").default(d.executable))
    .addOption(new Option("--no-mpi", "submit single-core job"))
    .addOption(new Option("--set-mpi-library", "set I_MPI_PMI_LIBRARY environment variable"))
    .addOption(new Option("-a, --jobarray <dirs...>", "submit job array to queue, one directory per task"))
    .addOption(new Option("-d, --dryrun", "write submit file and exit"))
    .addOption(new Option("-p, --tmp <path>", "write output and error to this file instead of slurm-<jobid>.out"))
    .addOption(new Option("-s, --silent", "suppress output to stdout"))
    .addOption(new Option("-P, --partition <name>", "specify the partition").default(d.partition))
    .addOption(new Option("-Q, --qos <name>", "specify quality of service (QOS)").default(d.qos))
    .addOption(new Option("-A, --account <name>", "specify user account").default(d.account))
    .addOption(
      new Option("--itp", "override the partition/qos/account settings and use the institute nodes")
    )
    .addOption(new Option("--ITP").hideHelp())
    .addOption(new Option("--dev", "use the development QOS (for runtimes < 10')"))
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride();

  if (output) {
    program.configureOutput({
      writeOut: (str) => output.writeOut(str),
      writeErr: (str) => output.writeErr(str)
    });
  }
  return program;
}

/**
 * Parses command-line flags into a frozen {@link JobParameters}, with the institute and dev-queue
 * overrides applied. Help requests surface as the commander error that reports them.
 */
export function buildParameters(
  rawArgs: readonly string[],
  site: SiteConfig = DEFAULT_SITE_CONFIG,
  output?: ProgramOutput
): Readonly<JobParameters> {
  const program = createProgram(site, output);
  try {
    program.parse(attachNegativeIntegers(rawArgs), { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError && err.code !== "commander.helpDisplayed") {
      throw new SubmitError("InvalidArgument", err.message, { cause: err });
    }
    throw err;
  }

  const opts = readCliOptions(program.opts());

  const params: JobParameters = {
    ...defaultJobParameters(site),
    walltime: opts.walltime,
    name: opts.name,
    nnodes: opts.nnodes,
    ntasks: opts.ntasks,
    executable: opts.executable,
    noMpi: !opts.mpi,
    setMpiLibrary: opts.setMpiLibrary ?? false,
    silent: opts.silent ?? false,
    dryRun: opts.dryrun ?? false,
    partition: opts.partition,
    qos: opts.qos,
    account: opts.account,
    useInstituteNodes: (opts.itp ?? false) || (opts.ITP ?? false),
    useDevQueue: opts.dev ?? false,
    ...(opts.jobarray ? { jobArrayDirs: opts.jobarray } : {}),
    ...(opts.tmp ? { outputFile: opts.tmp } : {})
  };

  return applyOverrides(params, site);
}
