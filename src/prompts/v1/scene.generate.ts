import type { ChatMessage } from "../../infrastructure/llm/types";
import { NO_CHARACTERS_PLACEHOLDER, PROMPT_VERSION } from "./shared";

export type ScenePromptInput = {
  sceneNumber: number;
  prompt: string;
  /** Rendered character context; empty lets the model invent characters */
  characters: string;
};

export function renderSceneInstruction(input: ScenePromptInput): string {
  return [
    `Write Scene ${input.sceneNumber} in simple English (120–180 words).`,
    "",
    `Characters: ${input.characters || NO_CHARACTERS_PLACEHOLDER}`,
    "",
    `Story: ${input.prompt}`,
    "",
    "Use simple clear sentences.",
    "",
  ].join("\n");
}

export function buildSceneMessages(input: ScenePromptInput): {
  promptVersion: string;
  messages: ChatMessage[];
} {
  return {
    promptVersion: PROMPT_VERSION,
    messages: [{ role: "user", content: renderSceneInstruction(input) }],
  };
}
