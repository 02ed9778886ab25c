import type { CharacterVectorStore } from "../domain/characters/character";
import type { AppConfig } from "../infrastructure/config/schema";
import { createBackends, type Backends } from "../infrastructure/llm";
import { silentLogger, type Logger } from "../infrastructure/logging/logger";
import { LanceDbCharacterStore } from "../infrastructure/vectordb/lancedb";
import { CharacterRetriever } from "./characters/character-retriever";
import { CharacterStore } from "./characters/character-store";
import { EmbeddingCache } from "./characters/embedding-cache";
import { RetrievalStage } from "./story/retrieval-stage";
import { SceneGenerationStage } from "./story/scene-generation-stage";
import { ScenePipeline } from "./story/scene-pipeline";
import { StoryFlowController } from "./story/story-flow";

export type StoryContext = {
  config: AppConfig;
  logger: Logger;
  backends: Backends;
  characters: CharacterStore;
  retrieval: RetrievalStage;
  generation: SceneGenerationStage;
  pipeline: ScenePipeline;
  createStoryFlow(): StoryFlowController;
};

export type StoryContextOverrides = {
  logger?: Logger;
  backends?: Backends;
  store?: CharacterVectorStore;
  now?: () => number;
};

export function createStoryContext(
  config: AppConfig,
  overrides: StoryContextOverrides = {},
): StoryContext {
  const logger = overrides.logger ?? silentLogger;
  const backends = overrides.backends ?? createBackends(config, logger);
  const store =
    overrides.store ??
    new LanceDbCharacterStore({
      path: config.characterDb.path,
      table: config.characterDb.table,
    });

  const embeddings = new EmbeddingCache({
    backend: backends.embeddings,
    ttlSeconds: config.embeddings.cacheTtlSeconds,
    now: overrides.now,
  });
  const characters = new CharacterStore({
    store,
    embeddings,
    logger,
    cacheTtlSeconds: config.characterDb.cacheTtlSeconds,
    now: overrides.now,
  });
  const retrieval = new RetrievalStage(
    new CharacterRetriever({ characters, k: config.story.retrievalTopK }),
    logger,
  );
  const generation = new SceneGenerationStage({
    backend: backends.generation,
    generation: config.generation,
    logger,
  });
  const pipeline = new ScenePipeline({ retrieval, generation });

  return {
    config,
    logger,
    backends,
    characters,
    retrieval,
    generation,
    pipeline,
    createStoryFlow: () =>
      new StoryFlowController({ pipeline, generator: generation, logger }),
  };
}
