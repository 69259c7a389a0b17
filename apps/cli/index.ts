import { Command } from "commander";
import { readFileSync } from "fs";
import { registerJobHookCommand } from "./src/commands/job-hook.ts";
import { registerInventoryCommand } from "./src/commands/inventory.ts";
import { registerDiscoverCommand } from "./src/commands/discover.ts";
import { registerInitCommand } from "./src/commands/init.ts";

const pkg: { version: string } = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8"),
);

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name("cvslurm")
    .description("report Slurm jobs and node inventory to CloudVision");

  registerInitCommand(program);
  registerJobHookCommand(program);
  registerInventoryCommand(program);
  registerDiscoverCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
