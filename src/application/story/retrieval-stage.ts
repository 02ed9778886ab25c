import type { DocumentInterface } from "@langchain/core/documents";
import { AppError } from "../../domain/common/errors";
import { silentLogger, type Logger } from "../../infrastructure/logging/logger";
import type {
  CharacterDocumentMetadata,
  CharacterRetriever,
} from "../characters/character-retriever";

export function renderCharacterContext(
  docs: Array<DocumentInterface<CharacterDocumentMetadata>>,
): string {
  return docs
    .map((d) => `- ${d.metadata.name}: ${d.pageContent}`)
    .join("\n");
}

/**
 * Turns a story prompt into the character context block handed to scene
 * generation. Retrieval is an enhancement: on any failure the context is
 * empty and the generator invents its own cast.
 */
export class RetrievalStage {
  private readonly retriever: CharacterRetriever;
  private readonly logger: Logger;

  constructor(retriever: CharacterRetriever, logger: Logger = silentLogger) {
    this.retriever = retriever;
    this.logger = logger;
  }

  async retrieve(prompt: string): Promise<string> {
    try {
      const docs = await this.retriever.invoke(prompt);
      this.logger.debug(
        `Retrieved ${docs.length} character(s): ${docs.map((d) => d.metadata.name).join(", ") || "(none)"}`,
      );
      return renderCharacterContext(docs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof AppError) {
        this.logger.warn(`Character retrieval failed: ${message}`);
      } else {
        this.logger.error(`Unexpected character retrieval failure: ${message}`);
      }
      return "";
    }
  }
}
