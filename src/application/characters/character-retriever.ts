import { Document } from "@langchain/core/documents";
import { BaseRetriever } from "@langchain/core/retrievers";
import type { CallbackManagerForRetrieverRun } from "@langchain/core/callbacks/manager";
import type { CharacterStore } from "./character-store";
import { DEFAULT_SEARCH_K } from "./character-store";

export type CharacterDocumentMetadata = {
  name: string;
  distance: number;
};

export type CharacterRetrieverOptions = {
  characters: CharacterStore;
  k?: number;
};

/**
 * LangChain retriever over the character roster: one Document per matching
 * character, description as page content, closest first.
 */
export class CharacterRetriever extends BaseRetriever<CharacterDocumentMetadata> {
  lc_namespace = ["story-spark", "retrievers", "characters"];
  private readonly characters: CharacterStore;
  readonly k: number;

  constructor(options: CharacterRetrieverOptions) {
    super({});
    this.characters = options.characters;
    this.k = options.k ?? DEFAULT_SEARCH_K;
  }

  override async _getRelevantDocuments(
    query: string,
    _callbacks?: CallbackManagerForRetrieverRun,
  ): Promise<Document<CharacterDocumentMetadata>[]> {
    const matches = await this.characters.search(query, this.k);
    return matches.map(
      (m) =>
        new Document<CharacterDocumentMetadata>({
          pageContent: m.description,
          metadata: { name: m.name, distance: m.distance },
        }),
    );
  }
}
