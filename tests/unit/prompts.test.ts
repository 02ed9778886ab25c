import { describe, expect, it } from "vitest";
import {
  buildSceneMessages,
  renderSceneInstruction,
} from "../../src/prompts/v1/scene.generate";
import { buildRewriteMessages } from "../../src/prompts/v1/scene.rewrite";

describe("scene prompt", () => {
  it("renders the full instruction", () => {
    expect(
      renderSceneInstruction({
        sceneNumber: 2,
        prompt: "A storm hits the harbour",
        characters: "- Ember: a dragon",
      }),
    ).toBe(
      "Write Scene 2 in simple English (120–180 words).\n\n" +
        "Characters: - Ember: a dragon\n\n" +
        "Story: A storm hits the harbour\n\n" +
        "Use simple clear sentences.\n",
    );
  });

  it("falls back to the placeholder for empty characters", () => {
    expect(
      renderSceneInstruction({ sceneNumber: 1, prompt: "p", characters: "" }),
    ).toContain("Characters: Create new characters as needed\n");
  });

  it("wraps the instruction in a single user message", () => {
    const built = buildSceneMessages({ sceneNumber: 1, prompt: "p", characters: "" });
    expect(built.promptVersion).toBe("v1");
    expect(built.messages).toHaveLength(1);
    expect(built.messages[0]?.role).toBe("user");
  });
});

describe("rewrite prompt", () => {
  it("keeps the changes before the original scene", () => {
    const { messages } = buildRewriteMessages({ changes: "shorter", scene: "Long scene." });
    expect(messages).toEqual([
      {
        role: "user",
        content:
          "Rewrite this scene with these changes:\nshorter\n\nOriginal:\nLong scene.\n\nRewritten scene:\n",
      },
    ]);
  });
});
