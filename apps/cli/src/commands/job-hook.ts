import type { Command } from "commander";
import type { AppConfig } from "@cvslurm/shared";
import { loadConfig, isApiConfigured } from "@/core/config.ts";
import { CloudVisionClient, type FetchLike } from "@/core/cloudvision.ts";
import { buildJobReport, readJobEnvironment } from "@/core/job-report.ts";
import { createLogger, type Logger } from "@/lib/logger.ts";
import { errorMessage } from "@/lib/errors.ts";
import { theme } from "@/lib/theme.ts";

export function registerJobHookCommand(program: Command) {
  program
    .command("job-hook")
    .description(
      "PrologSlurmctld/EpilogSlurmctld hook: report the job to CloudVision",
    )
    .action(async () => {
      try {
        const config = loadConfig();
        const logger = createLogger({
          level: config.job_hook.log_level,
          file: config.job_hook.log_file,
        });
        await reportJob(process.env, config, logger);
      } catch (error) {
        console.error(theme.error(`Error: ${errorMessage(error)}`));
      }
      // Never block the job: the hook exits 0 whatever happened above
      process.exitCode = 0;
    });
}

/**
 * Report the job described by the SLURM_* variables in `env`.
 * Resolves to true only when CloudVision accepted the JobConfig.
 */
export async function reportJob(
  env: NodeJS.ProcessEnv,
  config: AppConfig,
  logger: Logger,
  fetchImpl?: FetchLike,
): Promise<boolean> {
  if (logger.isEnabled("debug")) {
    const slurmEnv = Object.fromEntries(
      Object.entries(env).filter(([key]) => key.startsWith("SLURM_")),
    );
    logger.debug(`SLURM environment: ${JSON.stringify(slurmEnv)}`);
  }

  if (!isApiConfigured(config)) {
    logger.warn(
      "CloudVision API is not configured (api.server or api.token empty).",
    );
    return false;
  }

  const report = buildJobReport(readJobEnvironment(env), config.job_hook, logger);
  if (!report.ok) return false;

  logger.debug(`JobConfig request: ${JSON.stringify(report.input)}`);
  const client = new CloudVisionClient(config.api, logger, fetchImpl);
  return client.sendJobConfig(report.input);
}
