import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { parse as parseTOML, stringify as stringifyTOML } from "smol-toml";
import { z } from "zod";
import type { AppConfig } from "@cvslurm/shared";
import { DEFAULTS } from "@cvslurm/shared";
import { CONFIG_FILE_ENV, CONFIG_ENV_OVERRIDES } from "@/lib/constants.ts";
import { ConfigError, errorMessage } from "@/lib/errors.ts";

export const AppConfigSchema = z.object({
  api: z
    .object({
      server: z.string().default(""),
      token: z.string().default(""),
    })
    .default({}),
  job_hook: z
    .object({
      log_file: z.string().default(DEFAULTS.jobLogFile),
      log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      job_name_filter: z.string().default(DEFAULTS.jobNameFilter),
      partition_filter: z.array(z.string()).default([]),
      tenant_job: z.boolean().default(false),
    })
    .default({}),
  inventory: z
    .object({
      poll_interval: z.number().int().positive().default(DEFAULTS.pollIntervalSeconds),
      iface_name_regex: z.string().default(DEFAULTS.ifaceNameRegex),
      discovery_job_name: z.string().min(1).default(DEFAULTS.discoveryJobName),
      worker_command: z
        .array(z.string().min(1))
        .min(1)
        .default([...DEFAULTS.workerCommand]),
    })
    .default({}),
});

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_FILE_ENV] || DEFAULTS.configFile;
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) return {};

  try {
    return parseTOML(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config ${path}: ${errorMessage(error)}`);
  }
}

/** Schema defaults, as if no config file existed. */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Validate the file at `path` as stored, without environment overrides.
 * A missing file yields the defaults.
 */
export function readStoredConfig(path: string): AppConfig {
  const raw = readConfigFile(path);

  try {
    return AppConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid config at ${path}: ${error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join(", ")}`,
      );
    }
    throw error;
  }
}

/**
 * Load and validate the configuration once. A missing file yields the
 * defaults; CV_API_SERVER, CV_API_TOKEN and CV_LOG_FILE override the file.
 * The returned object is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = readStoredConfig(configPath(env));

  const server = env[CONFIG_ENV_OVERRIDES.server];
  const token = env[CONFIG_ENV_OVERRIDES.token];
  const logFile = env[CONFIG_ENV_OVERRIDES.logFile];

  return deepFreeze({
    api: {
      server: server || config.api.server,
      token: token || config.api.token,
    },
    job_hook: {
      ...config.job_hook,
      log_file: logFile || config.job_hook.log_file,
    },
    inventory: config.inventory,
  });
}

export function isApiConfigured(config: AppConfig): boolean {
  return config.api.server !== "" && config.api.token !== "";
}

export function saveConfig(config: AppConfig, path: string): void {
  const validated = AppConfigSchema.parse(config);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o755 });
  }

  writeFileSync(path, stringifyTOML(validated), { mode: 0o600 });
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
