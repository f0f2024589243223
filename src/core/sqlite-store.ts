import path from "path";
import Database from "better-sqlite3";
import { StoreError } from "./errors";
import { logger } from "./logger";
import { loadSqliteVecExtension } from "./sqlite-vec";
import {
  cosineSimilarity,
  type VectorEntry,
  type VectorFilter,
  type VectorMatch,
  type StoredChunk,
  type VectorMetadata,
  type VectorStore
} from "./vector-store";
import { ensureDir } from "../utils/fs";

const VECTOR_TABLE = "vectors";

type VectorRow = {
  chunk_id: string;
  project_id: string;
  file_path: string;
  ordinal: number;
  start_offset: number;
  end_offset: number;
  line_start: number;
  line_end: number;
  content: string;
};

type ScoredRow = VectorRow & { distance: number };
type EmbeddedRow = VectorRow & { embedding: Buffer };

export type SqliteVectorStoreOptions = {
  /** Set to false to skip sqlite-vec and rank in process. */
  vectorExtension?: boolean;
  extensionPath?: string;
};

const vectorToBlob = (embedding: number[]): Buffer => Buffer.from(new Float32Array(embedding).buffer);

// Copy first: a pooled Buffer's byteOffset need not be 4-byte aligned.
const blobToVector = (blob: Buffer): Float32Array => new Float32Array(new Uint8Array(blob).buffer);

function rowMetadata(row: VectorRow): VectorMetadata {
  return {
    projectId: row.project_id,
    filePath: row.file_path,
    ordinal: row.ordinal,
    start: row.start_offset,
    end: row.end_offset,
    startLine: row.line_start,
    endLine: row.line_end,
    text: row.content
  };
}

/**
 * Every project's collection in one SQLite table keyed by
 * (project_id, chunk_id). With sqlite-vec loaded, ranking runs in SQL through
 * `vec_distance_cosine`; otherwise embeddings are scored here.
 */
export class SqliteVectorStore implements VectorStore {
  private constructor(
    private readonly db: Database.Database,
    readonly vectorExtension: boolean
  ) {}

  static async open(dbPath: string, options: SqliteVectorStoreOptions = {}): Promise<SqliteVectorStore> {
    let db: Database.Database;
    try {
      if (dbPath !== ":memory:") ensureDir(path.dirname(dbPath));
      db = new Database(dbPath);
      db.pragma("busy_timeout = 5000");
      if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS ${VECTOR_TABLE} (
          project_id TEXT NOT NULL,
          chunk_id TEXT NOT NULL,
          file_path TEXT NOT NULL,
          ordinal INTEGER NOT NULL,
          start_offset INTEGER NOT NULL,
          end_offset INTEGER NOT NULL,
          line_start INTEGER NOT NULL,
          line_end INTEGER NOT NULL,
          content TEXT NOT NULL,
          dims INTEGER NOT NULL,
          embedding BLOB NOT NULL,
          updated_at INTEGER NOT NULL,
          PRIMARY KEY (project_id, chunk_id)
        );
        CREATE INDEX IF NOT EXISTS idx_vectors_file ON ${VECTOR_TABLE}(project_id, file_path);
      `);
    } catch (err) {
      throw new StoreError(`Failed to open vector store at ${dbPath}`, err);
    }

    let vectorExtension = false;
    if (options.vectorExtension !== false) {
      const loaded = await loadSqliteVecExtension({ db, extensionPath: options.extensionPath });
      vectorExtension = loaded.ok;
      if (loaded.ok) {
        logger.debug("sqlite-vec loaded", { version: loaded.version, extensionPath: loaded.extensionPath });
      } else {
        logger.debug(`sqlite-vec unavailable, ranking in process: ${loaded.error ?? "unknown error"}`);
      }
    }
    return new SqliteVectorStore(db, vectorExtension);
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreError(`Vector store ${action} failed`, err);
    }
  }

  async upsert(projectId: string, entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) return;
    this.run("upsert", () => {
      const stmt = this.db.prepare(
        `INSERT INTO ${VECTOR_TABLE}\n` +
          ` (project_id, chunk_id, file_path, ordinal, start_offset, end_offset, line_start, line_end, content, dims, embedding, updated_at)\n` +
          ` VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)\n` +
          ` ON CONFLICT(project_id, chunk_id) DO UPDATE SET\n` +
          `   file_path=excluded.file_path,\n` +
          `   ordinal=excluded.ordinal,\n` +
          `   start_offset=excluded.start_offset,\n` +
          `   end_offset=excluded.end_offset,\n` +
          `   line_start=excluded.line_start,\n` +
          `   line_end=excluded.line_end,\n` +
          `   content=excluded.content,\n` +
          `   dims=excluded.dims,\n` +
          `   embedding=excluded.embedding,\n` +
          `   updated_at=excluded.updated_at`
      );
      const now = Date.now();
      const insertAll = this.db.transaction((items: VectorEntry[]) => {
        for (const entry of items) {
          const meta = entry.metadata;
          stmt.run(
            projectId,
            entry.id,
            meta.filePath,
            meta.ordinal,
            meta.start,
            meta.end,
            meta.startLine,
            meta.endLine,
            meta.text,
            entry.vector.length,
            vectorToBlob(entry.vector),
            now
          );
        }
      });
      insertAll(entries);
    });
  }

  async delete(projectId: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    this.run("delete", () => {
      const stmt = this.db.prepare(`DELETE FROM ${VECTOR_TABLE} WHERE project_id = ? AND chunk_id = ?`);
      const deleteAll = this.db.transaction((items: string[]) => {
        for (const id of items) stmt.run(projectId, id);
      });
      deleteAll(ids);
    });
  }

  async query(projectId: string, vector: number[], k: number, filter: VectorFilter = {}): Promise<VectorMatch[]> {
    if (vector.length === 0 || k <= 0) return [];
    const fileClause = filter.filePath !== undefined ? " AND file_path = ?" : "";
    const params: Array<string | number> = [projectId, vector.length];
    if (filter.filePath !== undefined) params.push(filter.filePath);

    if (this.vectorExtension) {
      const rows = this.run(
        "query",
        () =>
          this.db
            .prepare(
              `SELECT chunk_id, project_id, file_path, ordinal, start_offset, end_offset, line_start, line_end, content,\n` +
                `  vec_distance_cosine(embedding, ?) AS distance\n` +
                ` FROM ${VECTOR_TABLE}\n` +
                ` WHERE project_id = ? AND dims = ?${fileClause}\n` +
                ` ORDER BY distance ASC\n` +
                ` LIMIT ?`
            )
            .all(vectorToBlob(vector), ...params, k) as ScoredRow[]
      );
      return rows.map((row) => ({ id: row.chunk_id, score: 1 - row.distance, metadata: rowMetadata(row) }));
    }

    const rows = this.run(
      "query",
      () =>
        this.db
          .prepare(
            `SELECT chunk_id, project_id, file_path, ordinal, start_offset, end_offset, line_start, line_end, content, embedding\n` +
              ` FROM ${VECTOR_TABLE}\n` +
              ` WHERE project_id = ? AND dims = ?${fileClause}`
          )
          .all(...params) as EmbeddedRow[]
    );
    return rows
      .map((row) => ({
        id: row.chunk_id,
        score: cosineSimilarity(vector, blobToVector(row.embedding)),
        metadata: rowMetadata(row)
      }))
      .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, k);
  }

  async listIds(projectId: string): Promise<string[]> {
    const rows = this.run(
      "listIds",
      () =>
        this.db
          .prepare(`SELECT chunk_id FROM ${VECTOR_TABLE} WHERE project_id = ? ORDER BY chunk_id`)
          .all(projectId) as Array<{ chunk_id: string }>
    );
    return rows.map((row) => row.chunk_id);
  }

  async listFileChunks(projectId: string, filePath: string): Promise<StoredChunk[]> {
    const rows = this.run(
      "listFileChunks",
      () =>
        this.db
          .prepare(
            `SELECT chunk_id, project_id, file_path, ordinal, start_offset, end_offset, line_start, line_end, content\n` +
              ` FROM ${VECTOR_TABLE}\n` +
              ` WHERE project_id = ? AND file_path = ?\n` +
              ` ORDER BY ordinal, chunk_id`
          )
          .all(projectId, filePath) as VectorRow[]
    );
    return rows.map((row) => ({ id: row.chunk_id, metadata: rowMetadata(row) }));
  }

  async count(projectId: string): Promise<number> {
    const row = this.run(
      "count",
      () =>
        this.db.prepare(`SELECT COUNT(*) AS n FROM ${VECTOR_TABLE} WHERE project_id = ?`).get(projectId) as
          | { n: number }
          | undefined
    );
    return row?.n ?? 0;
  }

  async dropCollection(projectId: string): Promise<void> {
    this.run("dropCollection", () => {
      this.db.prepare(`DELETE FROM ${VECTOR_TABLE} WHERE project_id = ?`).run(projectId);
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
