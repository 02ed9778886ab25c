import type { Command } from "commander";
import { z } from "zod";
import {
  CommonOptionsSchema,
  parseOptions,
  runWithContext,
  withCommonOptions,
} from "../bootstrap";
import { ExitCode } from "../exit-codes";

const AddArgsSchema = CommonOptionsSchema.extend({
  name: z.string().min(1),
  description: z.string().min(1),
});

const SearchArgsSchema = CommonOptionsSchema.extend({
  query: z.string().min(1),
  topK: z.coerce.number().int().positive().default(3),
});

function print(s: string) {
  process.stdout.write(s + "\n");
}

export function registerCharactersCommand(program: Command): void {
  const characters = program
    .command("characters")
    .description("Manage the character roster used for retrieval");

  withCommonOptions(
    characters
      .command("add")
      .description("Create a character, or replace one with the same name")
      .requiredOption("-n, --name <name>", "Character name (case-sensitive)")
      .requiredOption("-d, --description <text>", "Free-text description"),
  ).action(async (opts) => {
    const args = parseOptions(AddArgsSchema, opts);
    await runWithContext(args, async (ctx) => {
      await ctx.characters.upsert(args.name, args.description);
      print(`Saved ${args.name}`);
    });
  });

  withCommonOptions(
    characters.command("list").description("List saved characters"),
  ).action(async (opts) => {
    const args = parseOptions(CommonOptionsSchema, opts);
    await runWithContext(args, async (ctx) => {
      const all = await ctx.characters.list();
      if (all.length === 0) {
        print("No characters yet. Add your first one with `characters add`.");
        return;
      }
      print(`Total: ${all.length} characters`);
      for (const c of all) print(`- ${c.name}: ${c.description}`);
    });
  });

  withCommonOptions(
    characters
      .command("show")
      .description("Print one character's description")
      .argument("<name>", "Character name"),
  ).action(async (name: string, opts) => {
    const args = parseOptions(CommonOptionsSchema, opts);
    await runWithContext(args, async (ctx) => {
      const description = await ctx.characters.getDescription(name);
      if (description === "") {
        print(`No character named ${name}`);
        return ExitCode.failure;
      }
      print(description);
    });
  });

  withCommonOptions(
    characters
      .command("delete")
      .description("Delete a character (no-op if absent)")
      .argument("<name>", "Character name"),
  ).action(async (name: string, opts) => {
    const args = parseOptions(CommonOptionsSchema, opts);
    await runWithContext(args, async (ctx) => {
      await ctx.characters.delete(name);
      print(`Deleted ${name}`);
    });
  });

  withCommonOptions(
    characters
      .command("search")
      .description("Find the characters closest to a piece of text")
      .requiredOption("-q, --query <text>", "Query text")
      .option("-k, --top-k <n>", "Number of matches", "3"),
  ).action(async (opts) => {
    const args = parseOptions(SearchArgsSchema, opts);
    await runWithContext(args, async (ctx) => {
      const matches = await ctx.characters.search(args.query, args.topK);
      if (matches.length === 0) {
        print("No matching characters.");
        return;
      }
      for (const [i, m] of matches.entries()) {
        print(`${i + 1}. ${m.name} (distance=${m.distance.toFixed(4)}): ${m.description}`);
      }
    });
  });
}
