import { describe, expect, it } from "vitest";
import {
  GENERATOR_UNAVAILABLE,
  SceneGenerationStage,
} from "../../src/application/story/scene-generation-stage";
import { ProviderError } from "../../src/domain/common/errors";
import { ready, unavailable } from "../../src/infrastructure/backend";
import type { LlmClient } from "../../src/infrastructure/llm/types";
import { FakeLlm } from "../fakes/backends";

function stage(reply = "T") {
  const llm = new FakeLlm(reply);
  return { llm, generation: new SceneGenerationStage({ backend: ready(llm) }) };
}

describe("SceneGenerationStage.generate", () => {
  it("returns the backend text unchanged", async () => {
    const { generation } = stage("  The harbour was quiet.\n");
    expect(await generation.generate(1, "A storm", "")).toBe("  The harbour was quiet.\n");
  });

  it("names the scene number and premise in the instruction", async () => {
    const { llm, generation } = stage();

    await generation.generate(1, "A storm hits the harbour", "");

    expect(llm.lastInstruction).toContain("Write Scene 1 in simple English");
    expect(llm.lastInstruction).toContain("Story: A storm hits the harbour");
    expect(llm.lastInstruction).toContain("Characters: Create new characters as needed");
  });

  it("includes retrieved characters when present", async () => {
    const { llm, generation } = stage();

    await generation.generate(2, "A storm", "- Ember: a dragon");

    expect(llm.lastInstruction).toContain("Characters: - Ember: a dragon\n");
  });

  it("sends the default model and sampling parameters", async () => {
    const { llm, generation } = stage();

    await generation.generate(1, "A storm", "");

    expect(llm.requests).toHaveLength(1);
    expect(llm.requests[0]).toMatchObject({
      model: "meta/llama-3.1-8b-instruct",
      temperature: 0.7,
      topP: 0.9,
      maxTokens: 200,
    });
  });

  it("returns the sentinel without a call when no backend exists", async () => {
    const generation = new SceneGenerationStage({
      backend: unavailable<LlmClient>("NVIDIA_API_KEY is required"),
    });
    expect(await generation.generate(1, "A storm", "")).toBe(GENERATOR_UNAVAILABLE);
    expect(GENERATOR_UNAVAILABLE).toBe("ERROR: LLM not initialized");
  });

  it("turns a provider failure into a bracketed message", async () => {
    const { llm, generation } = stage();
    llm.failWith = new ProviderError({ message: "rate limited", retryable: true });

    expect(await generation.generate(1, "A storm", "")).toBe(
      "[Scene generation error: rate limited]",
    );
  });

  it("turns any other failure into a bracketed message", async () => {
    const { llm, generation } = stage();
    llm.failWith = new Error("socket hang up");

    expect(await generation.generate(3, "A storm", "")).toBe(
      "[Scene generation error: socket hang up]",
    );
  });
});

describe("SceneGenerationStage.rewrite", () => {
  it("sends the scene and the requested changes", async () => {
    const { llm, generation } = stage("Rain fell on the quiet harbour.");

    const result = await generation.rewrite("The harbour was quiet.", "make it rain");

    expect(result).toBe("Rain fell on the quiet harbour.");
    expect(llm.lastInstruction).toBe(
      "Rewrite this scene with these changes:\nmake it rain\n\nOriginal:\nThe harbour was quiet.\n\nRewritten scene:\n",
    );
  });

  it("reports failures with a rewrite-specific message", async () => {
    const { llm, generation } = stage();
    llm.failWith = new Error("boom");

    expect(await generation.rewrite("old", "new")).toBe("[Scene rewrite error: boom]");
  });
});
