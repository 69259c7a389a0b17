import chalk from "chalk";
import type { LogLevel } from "@cvslurm/shared";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
  accent: chalk.cyan,
  emphasis: chalk.bold,
} as const;

export const levelColor: Record<LogLevel, (text: string) => string> = {
  debug: theme.muted,
  info: theme.info,
  warn: theme.warning,
  error: theme.error,
};

export function formatDetail(label: string, value: string): string {
  return theme.muted(`  ${label}: ${value}`);
}

export function formatCommand(command: string): string {
  return theme.accent(`  ${command}`);
}
