import type { ChatMessage } from "../../infrastructure/llm/types";
import { PROMPT_VERSION } from "./shared";

export type RewritePromptInput = {
  /** Free-text edit instructions from the writer */
  changes: string;
  scene: string;
};

export function renderRewriteInstruction(input: RewritePromptInput): string {
  return [
    "Rewrite this scene with these changes:",
    input.changes,
    "",
    "Original:",
    input.scene,
    "",
    "Rewritten scene:",
    "",
  ].join("\n");
}

export function buildRewriteMessages(input: RewritePromptInput): {
  promptVersion: string;
  messages: ChatMessage[];
} {
  return {
    promptVersion: PROMPT_VERSION,
    messages: [{ role: "user", content: renderRewriteInstruction(input) }],
  };
}
