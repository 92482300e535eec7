import { Command } from "commander";
import { hashCommand } from "./commands/hash.js";
import { initConfigCommand } from "./commands/init-config.js";
import { startCommand } from "./commands/start.js";
import { syncCommand } from "./commands/sync.js";

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name("blogsync")
    .description("Mirror a remote folder locally and rebuild the site on change")
    .version(version);

  program
    .command("start")
    .description("Run the webhook server, admin API and sync loop")
    .option("-c, --config <path>", "Path to config.json")
    .action(startCommand);

  program
    .command("sync")
    .description("Run one sync cycle and exit")
    .option("-c, --config <path>", "Path to config.json")
    .option("--full", "Ignore the stored cursor and list everything")
    .action(async (options: { config?: string; full?: boolean }) => {
      process.exitCode = await syncCommand(options);
    });

  program
    .command("init-config")
    .description("Write config.json with defaults filled in")
    .option("-c, --config <path>", "Path to config.json")
    .action(initConfigCommand);

  program
    .command("hash")
    .description("Print the content hash of a local file")
    .argument("<file>", "File to hash")
    .action(hashCommand);

  return program;
}
