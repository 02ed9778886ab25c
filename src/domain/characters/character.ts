import { z } from "zod";

/** Name is the primary key (case-sensitive) and the store's record id. */
export const CharacterSchema = z.object({
  name: z.string().refine((s) => s.trim().length > 0, "name is required"),
  description: z
    .string()
    .refine((s) => s.trim().length > 0, "description is required"),
});

export type Character = z.infer<typeof CharacterSchema>;

export type CharacterMatch = Character & {
  /** Cosine distance to the query; lower is closer */
  distance: number;
};

export type CharacterMetadata = {
  name: string;
  updatedAtMs: number;
};

/** One row as written to the vector store; `vector` is derived from `document`. */
export type CharacterRecord = {
  id: string;
  document: string;
  vector: number[];
  metadata: CharacterMetadata;
};

export type CharacterGetResult = {
  ids: string[];
  documents: string[];
  metadatas: CharacterMetadata[];
};

export type CharacterQueryResult = CharacterGetResult & {
  distances: number[];
};

/**
 * Persistent vector store backing the character roster. Implementations
 * report every failure as StoreUnavailableError.
 */
export interface CharacterVectorStore {
  upsert(record: CharacterRecord): Promise<void>;
  delete(id: string): Promise<void>;
  get(ids?: string[]): Promise<CharacterGetResult>;
  /** Nearest records by cosine distance, closest first, at most `k`. */
  query(vector: number[], k: number): Promise<CharacterQueryResult>;
}
