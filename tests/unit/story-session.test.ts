import { describe, expect, it } from "vitest";
import { runStorySession, type StoryIo } from "../../src/cli/story-session";
import { buildTestContext } from "../fakes/context";

function scriptedIo(answers: string[]): StoryIo & { printed: string[]; questions: string[] } {
  const queue = [...answers];
  const printed: string[] = [];
  const questions: string[] = [];
  return {
    printed,
    questions,
    ask: async (question) => {
      questions.push(question);
      const next = queue.shift();
      if (next === undefined) throw new Error(`No scripted answer for "${question}"`);
      return next;
    },
    print: (text) => {
      printed.push(text);
    },
  };
}

describe("runStorySession", () => {
  it("accepts every scene in auto mode and exports the story", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo([]);

    const result = await runStorySession(ctx.createStoryFlow(), io, {
      prompt: "A storm hits the harbour",
      title: "Harbour",
      auto: true,
    });

    expect(result).toEqual({
      outcome: "exported",
      text: "Harbour\n\nScene 1\n\nscene text #1\n\n---\n\nScene 2\n\nscene text #2\n\n---\n\nScene 3\n\nscene text #3",
    });
    expect(io.questions).toEqual([]);
    expect(io.printed).toContain("Story complete!");
    expect(io.printed).toContain(
      "Scene 1 (3 words): scene text #1\nScene 2 (3 words): scene text #2\nScene 3 (3 words): scene text #3",
    );
  });

  it("applies regenerate and rewrite before accepting", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo(["r", "e", "add a storm", "a", "a", "a"]);

    const result = await runStorySession(ctx.createStoryFlow(), io, { prompt: "A harbour" });

    expect(result).toEqual({
      outcome: "exported",
      text: "Scene 1\n\nscene text #3\n\n---\n\nScene 2\n\nscene text #4\n\n---\n\nScene 3\n\nscene text #5",
    });
    expect(io.questions).toContain("Describe changes: ");
    expect(ctx.llm.requests).toHaveLength(5);
  });

  it("asks again for a blank prompt and stops on quit", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo(["  ", "A harbour", "q"]);

    const result = await runStorySession(ctx.createStoryFlow(), io);

    expect(result).toEqual({ outcome: "quit", scenes: 1 });
    expect(io.printed.filter((l) => l === "Enter a story prompt first.")).toHaveLength(1);
    expect(ctx.llm.lastInstruction).toContain("Story: A harbour");
  });

  it("exports the finished story when quitting at the third scene", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo(["a", "a", "q"]);

    const result = await runStorySession(ctx.createStoryFlow(), io, { prompt: "A harbour" });

    expect(result).toEqual({
      outcome: "exported",
      text: "Scene 1\n\nscene text #1\n\n---\n\nScene 2\n\nscene text #2\n\n---\n\nScene 3\n\nscene text #3",
    });
    expect(io.printed).toContain("Story complete!");
    expect(ctx.llm.requests).toHaveLength(3);
  });

  it("ignores unknown choices and empty rewrite instructions", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo(["x", "e", "", "q"]);

    const result = await runStorySession(ctx.createStoryFlow(), io, { prompt: "A harbour" });

    expect(result).toEqual({ outcome: "quit", scenes: 1 });
    expect(io.printed).toContain('Unknown choice "x".');
    expect(io.printed).toContain("No changes given.");
    expect(ctx.llm.requests).toHaveLength(1);
  });

  it("frames each scene with its number and title", async () => {
    const ctx = buildTestContext();
    const io = scriptedIo(["q"]);

    await runStorySession(ctx.createStoryFlow(), io, { prompt: "A harbour", title: "Tale" });

    expect(io.printed).toEqual([
      "Generating scene 1...",
      "---",
      "Scene 1",
      "Tale",
      "",
      "scene text #1",
      "---",
    ]);
  });
});
