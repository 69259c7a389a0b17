import type { Command } from "commander";
import { existsSync } from "fs";
import ora from "ora";
import { confirm, input, password } from "@inquirer/prompts";
import type { AppConfig } from "@cvslurm/shared";
import { configPath, defaultConfig, readStoredConfig, saveConfig } from "@/core/config.ts";
import { runCommand } from "@/core/exec.ts";
import { SlurmClient } from "@/core/slurm.ts";
import { ConfigError, errorMessage } from "@/lib/errors.ts";
import { createLogger } from "@/lib/logger.ts";
import { formatCommand, formatDetail, theme } from "@/lib/theme.ts";

export function registerInitCommand(program: Command) {
  program
    .command("init")
    .description("Write the cvslurm config file (CloudVision server and token)")
    .option("--force", "Overwrite an existing config file")
    .action(async (options: { force?: boolean }) => {
      try {
        await runInit(options);
      } catch (error) {
        if (error instanceof Error && error.message.includes("User force closed")) {
          console.log("\n");
          process.exit(0);
        }
        console.error(theme.error(`\nSetup failed: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}

/** "a, b,,c" → ["a", "b", "c"] */
export function parsePartitionList(value: string): string[] {
  return value
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function validateServer(value: string): string | true {
  const server = value.trim();
  if (!server) return "Server is required";
  if (/^[a-z]+:\/\//i.test(server)) return "Enter the host name only, without a scheme";
  if (/[\s/]/.test(server)) return "Should look like: cloudvision.example.com";
  return true;
}

export interface BaseConfig {
  config: AppConfig;
  /** Set when an unreadable file was replaced by the defaults. */
  discarded?: string;
}

/**
 * The config init starts from: the file as stored, without environment
 * overrides. With `force`, a file that does not load is replaced by the
 * defaults instead of failing.
 */
export function loadBaseConfig(path: string, force: boolean): BaseConfig {
  try {
    return { config: readStoredConfig(path) };
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    if (!force) throw new ConfigError(`${error.message} (use --force to replace it)`);
    return { config: defaultConfig(), discarded: error.message };
  }
}

async function runInit(options: { force?: boolean }) {
  const path = configPath();
  const { config: existing, discarded } = loadBaseConfig(path, options.force ?? false);

  if (discarded) {
    console.log(theme.warning(`\n${discarded}`));
    console.log(theme.muted("  Starting from the defaults.\n"));
  }

  if (existsSync(path) && !options.force) {
    console.log(theme.success("\ncvslurm is already configured!"));
    console.log(formatDetail("Config", path));
    console.log(formatDetail("Server", existing.api.server || "(not set)"));
    console.log(theme.muted("\n  Use --force to re-run setup.\n"));
    return;
  }

  console.log(theme.emphasis("\nWelcome to cvslurm!\n"));
  console.log(theme.muted("Let's connect this Slurm cluster to CloudVision.\n"));

  const server = await input({
    message: "CloudVision server:",
    default: existing.api.server || undefined,
    validate: validateServer,
  });

  const token = await password({
    message: "Service account token:",
    mask: "*",
    validate: (value) => (value.trim() ? true : "Token is required"),
  });

  const partitions = await input({
    message: "Partitions to report (comma separated, empty for all):",
    default: existing.job_hook.partition_filter.join(", "),
  });

  const tenantJob = await confirm({
    message: "Report jobs as tenant jobs?",
    default: existing.job_hook.tenant_job,
  });

  const spinner = ora("Checking Slurm cluster name...").start();
  try {
    const slurm = new SlurmClient(
      runCommand,
      createLogger({ level: "error", stream: process.stderr }),
    );
    const cluster = await slurm.getClusterName();
    spinner.succeed(`Slurm cluster: ${cluster}`);
  } catch (error) {
    // The job hook falls back to SLURM_CLUSTER_NAME; inventory needs scontrol
    spinner.warn(`Could not read ClusterName: ${errorMessage(error)}`);
  }

  const config: AppConfig = {
    api: { server: server.trim(), token: token.trim() },
    job_hook: {
      ...existing.job_hook,
      partition_filter: parsePartitionList(partitions),
      tenant_job: tenantJob,
    },
    inventory: existing.inventory,
  };
  saveConfig(config, path);

  console.log(theme.success("\nConfiguration saved."));
  console.log(formatDetail("Config", path));
  console.log(formatDetail("Server", config.api.server));
  console.log(theme.muted("\n  Next steps:"));
  console.log(formatCommand("slurm.conf: PrologSlurmctld=cvslurm-job-hook, EpilogSlurmctld=cvslurm-job-hook"));
  console.log(formatCommand("cvslurm inventory --monitor"));
  console.log();
}
