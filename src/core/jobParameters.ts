import type { SiteConfig } from "../config/siteConfig.js";

export interface JobParameters {
  /** Walltime in minutes, rendered into the hardcoded `00:MM:00` time directive. */
  walltime: number;
  name: string;
  nnodes: number;
  /** Tasks per node. */
  ntasks: number;
  executable: string;
  noMpi: boolean;
  setMpiLibrary: boolean;
  /** One working directory per array index; never empty when present. */
  jobArrayDirs?: readonly string[];
  outputFile?: string;
  silent: boolean;
  dryRun: boolean;
  partition: string;
  qos: string;
  account: string;
  useInstituteNodes: boolean;
  useDevQueue: boolean;
  mpiLauncher: string;
  mpiPmiLibrary: string;
}

export function defaultJobParameters(site: SiteConfig): JobParameters {
  return {
    walltime: site.defaults.walltime_minutes,
    name: site.defaults.name,
    nnodes: site.defaults.nnodes,
    ntasks: site.defaults.ntasks,
    executable: site.defaults.executable,
    noMpi: false,
    setMpiLibrary: false,
    silent: false,
    dryRun: false,
    partition: site.defaults.partition,
    qos: site.defaults.qos,
    account: site.defaults.account,
    useInstituteNodes: false,
    useDevQueue: false,
    mpiLauncher: site.mpi.launcher,
    mpiPmiLibrary: site.mpi.pmi_library
  };
}

export function applyInstituteOverride(params: JobParameters, site: SiteConfig): JobParameters {
  if (!params.useInstituteNodes) return params;
  return {
    ...params,
    partition: site.institute.partition,
    qos: site.institute.qos,
    account: site.institute.account
  };
}

export function applyDevQueueOverride(params: JobParameters, site: SiteConfig): JobParameters {
  if (!params.useDevQueue) return params;
  return { ...params, qos: site.dev_qos };
}

/** Institute profile first, then the dev QOS, which wins for `qos` only. */
export function applyOverrides(params: JobParameters, site: SiteConfig): Readonly<JobParameters> {
  const resolved = applyDevQueueOverride(applyInstituteOverride(params, site), site);
  const dirs = resolved.jobArrayDirs;
  return Object.freeze({
    ...resolved,
    ...(dirs ? { jobArrayDirs: Object.freeze([...dirs]) } : {})
  });
}
