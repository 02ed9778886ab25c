import { config as loadDotenv } from "dotenv";
import { Command } from "commander";
import { registerCharactersCommand } from "./commands/characters";
import { registerStoryCommand } from "./commands/story";
import { ExitCode } from "./exit-codes";

loadDotenv({ path: ".env.local" });
loadDotenv({ path: ".env" });

const program = new Command();

const version = process.env.npm_package_version ?? "0.1.0";
program
  .name("story-spark")
  .description("Build short stories from a prompt and your saved characters")
  .version(version);

registerCharactersCommand(program);
registerStoryCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(ExitCode.failure);
});
