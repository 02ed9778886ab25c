import { toAppError } from "../../domain/common/errors";
import type { Backend } from "../../infrastructure/backend";
import {
  GenerationSchema,
  type GenerationConfig,
} from "../../infrastructure/config/schema";
import type { ChatMessage, LlmClient } from "../../infrastructure/llm/types";
import { silentLogger, type Logger } from "../../infrastructure/logging/logger";
import { buildRewriteMessages } from "../../prompts/v1/scene.rewrite";
import { buildSceneMessages } from "../../prompts/v1/scene.generate";

export const GENERATOR_UNAVAILABLE = "ERROR: LLM not initialized";

export const DEFAULT_GENERATION: GenerationConfig = GenerationSchema.parse({});

/**
 * Writes and rewrites scene prose. Never rejects: an absent backend yields
 * GENERATOR_UNAVAILABLE and a failed call yields a bracketed diagnostic, so
 * the writer always sees something and can retry.
 */
export class SceneGenerationStage {
  private readonly backend: Backend<LlmClient>;
  private readonly generation: GenerationConfig;
  private readonly logger: Logger;

  constructor(params: {
    backend: Backend<LlmClient>;
    generation?: GenerationConfig;
    logger?: Logger;
  }) {
    this.backend = params.backend;
    this.generation = params.generation ?? DEFAULT_GENERATION;
    this.logger = params.logger ?? silentLogger;
  }

  async generate(
    sceneNumber: number,
    prompt: string,
    characters: string,
  ): Promise<string> {
    const { messages, promptVersion } = buildSceneMessages({
      sceneNumber,
      prompt,
      characters,
    });
    this.logger.debug(`Generating scene ${sceneNumber} (prompt ${promptVersion})`);
    return this.complete(messages, "Scene generation");
  }

  async rewrite(scene: string, changes: string): Promise<string> {
    const { messages } = buildRewriteMessages({ scene, changes });
    this.logger.debug("Rewriting scene with custom changes");
    return this.complete(messages, "Scene rewrite");
  }

  private async complete(messages: ChatMessage[], label: string): Promise<string> {
    if (this.backend.status === "unavailable") {
      this.logger.warn(`${label} skipped: ${this.backend.reason}`);
      return GENERATOR_UNAVAILABLE;
    }
    try {
      const res = await this.backend.client.chatComplete({
        model: this.generation.model,
        messages,
        temperature: this.generation.temperature,
        topP: this.generation.topP,
        maxTokens: this.generation.maxTokens,
      });
      return res.content;
    } catch (error) {
      const message = toAppError(error).message;
      this.logger.warn(`${label} failed: ${message}`);
      return `[${label} error: ${message}]`;
    }
  }
}
