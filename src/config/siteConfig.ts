import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { SubmitError, describeError } from "../core/errors.js";

export const SITE_CONFIG_ENV = "SUBSLURM_CONFIG";

export interface SiteConfig {
  version: number;
  defaults: {
    walltime_minutes: number;
    name: string;
    nnodes: number;
    ntasks: number;
    executable: string;
    partition: string;
    qos: string;
    account: string;
  };
  institute: {
    partition: string;
    qos: string;
    account: string;
  };
  dev_qos: string;
  mpi: {
    launcher: string;
    pmi_library: string;
  };
  submit: {
    command: string;
    args: string[];
  };
  script_file: string;
}

export const DEFAULT_SITE_CONFIG: SiteConfig = {
  version: 1,
  defaults: {
    walltime_minutes: 30,
    name: "SLURM_job",
    nnodes: 1,
    ntasks: 16,
    executable: "solve_xml_mumps",
    partition: "mem_0064",
    qos: "normal_0064",
    account: "p70072"
  },
  institute: {
    partition: "mem_0256",
    qos: "p70623_0256",
    account: "p70623"
  },
  dev_qos: "devel_0128",
  mpi: {
    launcher: "mpirun -np $SLURM_NTASKS",
    pmi_library: "/cm/shared/apps/slurm/current/lib/libpmi.so"
  },
  submit: {
    command: "sbatch",
    args: []
  },
  script_file: "SLURM_INPUT.sh"
};

const zName = z.string().trim().min(1);

export const zSiteConfigFile = z.object({
  version: z.literal(1).optional(),
  defaults: z
    .object({
      walltime_minutes: z.number().int().optional(),
      name: zName.optional(),
      nnodes: z.number().int().optional(),
      ntasks: z.number().int().optional(),
      executable: zName.optional(),
      partition: zName.optional(),
      qos: zName.optional(),
      account: zName.optional()
    })
    .optional(),
  institute: z
    .object({
      partition: zName.optional(),
      qos: zName.optional(),
      account: zName.optional()
    })
    .optional(),
  dev_qos: zName.optional(),
  mpi: z
    .object({
      launcher: zName.optional(),
      pmi_library: zName.optional()
    })
    .optional(),
  submit: z
    .object({
      command: zName.optional(),
      args: z.array(z.string()).optional()
    })
    .optional(),
  script_file: zName.optional()
});

export type SiteConfigFile = z.infer<typeof zSiteConfigFile>;

function expandEnvToken(value: string, env: NodeJS.ProcessEnv, field: string): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;

  const varName = m[1];
  const resolved = varName ? env[varName]?.trim() : undefined;
  if (!resolved) {
    throw new SubmitError("InvalidConfig", `${field} refers to unset environment variable ${trimmed}`);
  }
  return resolved;
}

export function resolveSiteConfig(
  file: SiteConfigFile,
  env: NodeJS.ProcessEnv = process.env
): SiteConfig {
  const base = DEFAULT_SITE_CONFIG;
  return {
    version: file.version ?? base.version,
    defaults: { ...base.defaults, ...file.defaults },
    institute: { ...base.institute, ...file.institute },
    dev_qos: file.dev_qos ?? base.dev_qos,
    mpi: {
      launcher: file.mpi?.launcher ?? base.mpi.launcher,
      pmi_library: expandEnvToken(file.mpi?.pmi_library ?? base.mpi.pmi_library, env, "mpi.pmi_library")
    },
    submit: {
      command: expandEnvToken(file.submit?.command ?? base.submit.command, env, "submit.command"),
      args: [...(file.submit?.args ?? base.submit.args)]
    },
    script_file: file.script_file ?? base.script_file
  };
}

export function parseSiteConfig(raw: string, source: string, env: NodeJS.ProcessEnv = process.env): SiteConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(raw) as unknown;
  } catch (err) {
    throw new SubmitError("InvalidConfig", `invalid site config at ${source}: ${describeError(err)}`, { cause: err });
  }

  // an empty document means "all defaults"
  const result = zSiteConfigFile.safeParse(doc ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SubmitError("InvalidConfig", `invalid site config at ${source}: ${issues}`);
  }
  return resolveSiteConfig(result.data, env);
}

export async function loadSiteConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<SiteConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new SubmitError("InvalidConfig", `cannot read site config ${filePath}: ${describeError(err)}`, {
      cause: err
    });
  }
  return parseSiteConfig(raw, filePath, env);
}

export async function loadSiteConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<SiteConfig> {
  const configPath = env[SITE_CONFIG_ENV]?.trim();
  if (!configPath) return resolveSiteConfig({}, env);
  return loadSiteConfig(configPath, env);
}
