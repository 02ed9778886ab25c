import { mkdir } from "node:fs/promises";
import * as lancedb from "@lancedb/lancedb";
import type { Connection, Table } from "@lancedb/lancedb";
import { z } from "zod";
import {
  AppError,
  StoreUnavailableError,
} from "../../domain/common/errors";
import type {
  CharacterGetResult,
  CharacterQueryResult,
  CharacterRecord,
  CharacterVectorStore,
} from "../../domain/characters/character";

const COLUMNS = ["id", "document", "name", "updatedAtMs"];

const numeric = z.union([z.number(), z.bigint()]).transform(Number);

const CharacterRowSchema = z.object({
  id: z.string(),
  document: z.string(),
  name: z.string(),
  updatedAtMs: numeric,
});

const RankedRowSchema = CharacterRowSchema.extend({
  _distance: numeric,
});

type CharacterRow = z.infer<typeof CharacterRowSchema>;

/**
 * Escape a string value for use in LanceDB SQL WHERE clauses.
 * Prevents SQL injection by escaping single quotes.
 */
function escapeSqlString(value: string): string {
  return value.replace(/'/g, "''");
}

function idPredicate(ids: string[]): string {
  if (ids.length === 1) return `id = '${escapeSqlString(ids[0] ?? "")}'`;
  return `id IN (${ids.map((id) => `'${escapeSqlString(id)}'`).join(", ")})`;
}

function parseRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
): Array<z.infer<T>> {
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    throw new StoreUnavailableError(
      "Character table returned rows in an unexpected shape",
      parsed.error,
    );
  }
  return parsed.data;
}

function toGetResult(rows: CharacterRow[]): CharacterGetResult {
  return {
    ids: rows.map((r) => r.id),
    documents: rows.map((r) => r.document),
    metadatas: rows.map((r) => ({ name: r.name, updatedAtMs: r.updatedAtMs })),
  };
}

const EMPTY_GET: CharacterGetResult = { ids: [], documents: [], metadatas: [] };

export type LanceDbConfig = {
  path: string;
  table: string;
};

/**
 * Embedded, on-disk character table. The table is created on the first
 * upsert; until then every read is empty.
 */
export class LanceDbCharacterStore implements CharacterVectorStore {
  private readonly path: string;
  private readonly tableName: string;
  private db?: Connection;
  private table?: Table;
  private connecting?: Promise<void>;

  constructor(config: LanceDbConfig) {
    if (!config.path || config.path.trim() === "") {
      throw new Error("LanceDB path cannot be empty");
    }
    if (!config.table || config.table.trim() === "") {
      throw new Error("LanceDB table name cannot be empty");
    }
    this.path = config.path;
    this.tableName = config.table;
  }

  async connect(): Promise<void> {
    if (this.db) return;
    const pending =
      this.connecting ??
      this.open().finally(() => {
        this.connecting = undefined;
      });
    this.connecting = pending;
    return pending;
  }

  private async open(): Promise<void> {
    try {
      await mkdir(this.path, { recursive: true });
      const db = await lancedb.connect(this.path);
      const names = await db.tableNames();
      this.table = names.includes(this.tableName)
        ? await db.openTable(this.tableName)
        : undefined;
      this.db = db;
    } catch (error) {
      throw new StoreUnavailableError(
        `Failed to open LanceDB at "${this.path}": ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }

  async upsert(record: CharacterRecord): Promise<void> {
    if (!record.id) throw new StoreUnavailableError("Record missing required 'id'");
    if (record.vector.length === 0) {
      throw new StoreUnavailableError(`Record ${record.id} has an empty vector`);
    }
    const row = {
      id: record.id,
      document: record.document,
      name: record.metadata.name,
      updatedAtMs: record.metadata.updatedAtMs,
      vector: record.vector,
    };

    await this.guard(`upsert "${record.id}"`, async () => {
      await this.connect();
      if (!this.table) {
        const db = this.requireDb();
        this.table = await db.createTable(this.tableName, [row]);
        return;
      }
      const dims = await this.vectorDimension(this.table);
      if (dims !== undefined && dims !== record.vector.length) {
        throw new StoreUnavailableError(
          `Vector for "${record.id}" has ${record.vector.length} dimensions; the character table stores ${dims}`,
        );
      }
      await this.table.delete(idPredicate([record.id]));
      await this.table.add([row]);
    });
  }

  async delete(id: string): Promise<void> {
    await this.guard(`delete "${id}"`, async () => {
      await this.connect();
      if (!this.table) return;
      await this.table.delete(idPredicate([id]));
    });
  }

  async get(ids?: string[]): Promise<CharacterGetResult> {
    if (ids && ids.length === 0) return EMPTY_GET;
    return this.guard("read characters", async () => {
      await this.connect();
      if (!this.table) return EMPTY_GET;
      const filter = ids ? idPredicate(ids) : undefined;
      const count = await this.table.countRows(filter);
      if (count === 0) return EMPTY_GET;

      let query = this.table.query().select(COLUMNS).limit(count);
      if (filter) query = query.where(filter);
      const rows = parseRows(CharacterRowSchema, await query.toArray());
      return toGetResult(rows);
    });
  }

  async query(vector: number[], k: number): Promise<CharacterQueryResult> {
    if (vector.length === 0) {
      throw new StoreUnavailableError("Vector search requires a non-empty vector");
    }
    if (k <= 0) return { ...EMPTY_GET, distances: [] };

    return this.guard("search characters", async () => {
      await this.connect();
      if (!this.table) return { ...EMPTY_GET, distances: [] };
      const dims = await this.vectorDimension(this.table);
      if (dims !== undefined && dims !== vector.length) {
        throw new StoreUnavailableError(
          `Query vector has ${vector.length} dimensions; the character table stores ${dims}`,
        );
      }
      const rows = parseRows(
        RankedRowSchema,
        await this.table
          .vectorSearch(vector)
          .distanceType("cosine")
          .limit(k)
          .toArray(),
      );
      rows.sort((a, b) => a._distance - b._distance);
      return {
        ...toGetResult(rows),
        distances: rows.map((r) => r._distance),
      };
    });
  }

  /** Fixed list size of the `vector` column, read from the table schema. */
  private async vectorDimension(table: Table): Promise<number | undefined> {
    const schema = await table.schema();
    const field = schema.fields.find((f) => f.name === "vector");
    if (!field) return undefined;
    const type = field.type;
    return "listSize" in type && typeof type.listSize === "number"
      ? type.listSize
      : undefined;
  }

  private requireDb(): Connection {
    if (!this.db) throw new StoreUnavailableError("LanceDB not connected");
    return this.db;
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StoreUnavailableError(
        `LanceDB failed to ${action}: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }
}
