import { writeFile } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import type { Command } from "commander";
import { z } from "zod";
import { IOError } from "../../domain/common/errors";
import {
  CommonOptionsSchema,
  parseOptions,
  runWithContext,
  withCommonOptions,
} from "../bootstrap";
import { runStorySession, type StoryIo } from "../story-session";

const StoryArgsSchema = CommonOptionsSchema.extend({
  prompt: z.string().optional(),
  title: z.string().optional(),
  out: z.string().optional(),
  auto: z.boolean().optional(),
});

export function registerStoryCommand(program: Command): void {
  withCommonOptions(
    program
      .command("story")
      .description("Build a three-scene story with your characters")
      .option("-p, --prompt <text>", "Story prompt (asked for when omitted)")
      .option("-t, --title <text>", "Optional story title")
      .option("-o, --out <path>", "Write the finished story to this file")
      .option("--auto", "Accept every scene without asking"),
  ).action(async (opts) => {
    const args = parseOptions(StoryArgsSchema, opts);
    await runWithContext(args, async (ctx) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const io: StoryIo = {
        ask: (question) => rl.question(question),
        print: (text) => process.stdout.write(text + "\n"),
      };

      try {
        const result = await runStorySession(ctx.createStoryFlow(), io, {
          prompt: args.prompt,
          title: args.title,
          auto: args.auto,
        });
        if (result.outcome === "quit") {
          ctx.logger.info(`Stopped after ${result.scenes} scene(s)`);
          return;
        }
        if (!args.out) {
          io.print(result.text);
          return;
        }
        const outPath = path.resolve(args.out);
        try {
          await writeFile(outPath, result.text, "utf8");
        } catch (error) {
          throw new IOError(`Failed to write story to ${outPath}`, error, outPath);
        }
        io.print(`Wrote: ${outPath}`);
      } finally {
        rl.close();
      }
    });
  });
}
