import type { Command } from "commander";
import { z } from "zod";
import { createStoryContext, type StoryContext } from "../application/context";
import { loadConfig, type ConfigOverrides } from "../infrastructure/config/load";
import { createLogger } from "../infrastructure/logging/logger";
import { ExitCode, exitCodeFor } from "./exit-codes";

export const CommonOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;

export function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)");
}

export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  opts: unknown,
): z.infer<T> {
  const parsed = schema.safeParse(opts);
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => i.message).join("\n"));
    process.exit(ExitCode.usage);
  }
  return parsed.data;
}

/** `--debug` and `--verbose` win over the configured log level; otherwise it stands. */
export function configOverridesFor(args: CommonOptions): ConfigOverrides {
  if (args.debug) return { logLevel: "debug" };
  if (args.verbose) return { logLevel: "info" };
  return {};
}

/**
 * Loads configuration (a missing API key stops here, before any prompt is
 * shown), builds the context and runs `action`, mapping failures to exit
 * codes. An action may return its own exit code.
 */
export async function runWithContext(
  args: CommonOptions,
  action: (ctx: StoryContext) => Promise<ExitCode | void>,
): Promise<void> {
  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: configOverridesFor(args),
    });
    const logger = createLogger(config);
    const ctx = createStoryContext(config, { logger });
    const code = await action(ctx);
    process.exitCode = typeof code === "number" ? code : ExitCode.success;
  } catch (error) {
    if (args.debug && error instanceof Error) {
      console.error(error.stack ?? error.message);
    } else {
      console.error(error instanceof Error ? error.message : String(error));
    }
    process.exitCode = exitCodeFor(error);
  }
}
