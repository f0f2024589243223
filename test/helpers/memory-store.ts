import { StoreError } from "../../src/core/errors";
import {
  cosineSimilarity,
  type StoredChunk,
  type VectorEntry,
  type VectorFilter,
  type VectorMatch,
  type VectorStore
} from "../../src/core/vector-store";

type Operation = "upsert" | "delete" | "query" | "listIds" | "listFileChunks";

/** In-process VectorStore with an operation log and injectable failures. */
export class MemoryVectorStore implements VectorStore {
  readonly collections = new Map<string, Map<string, VectorEntry>>();
  readonly log: Array<{ op: Operation; projectId: string; ids: string[] }> = [];
  /** Return true to make the call fail with a StoreError. */
  failWhen: ((op: Operation, projectId: string, ids: string[]) => boolean) | null = null;

  private collection(projectId: string): Map<string, VectorEntry> {
    let collection = this.collections.get(projectId);
    if (!collection) {
      collection = new Map();
      this.collections.set(projectId, collection);
    }
    return collection;
  }

  private check(op: Operation, projectId: string, ids: string[]): void {
    if (this.failWhen?.(op, projectId, ids)) {
      throw new StoreError(`Injected ${op} failure`);
    }
  }

  async upsert(projectId: string, entries: VectorEntry[]): Promise<void> {
    const ids = entries.map((entry) => entry.id);
    this.check("upsert", projectId, ids);
    this.log.push({ op: "upsert", projectId, ids });
    const collection = this.collection(projectId);
    for (const entry of entries) {
      collection.set(entry.id, { ...entry, vector: [...entry.vector], metadata: { ...entry.metadata } });
    }
  }

  async delete(projectId: string, ids: string[]): Promise<void> {
    this.check("delete", projectId, ids);
    this.log.push({ op: "delete", projectId, ids: [...ids] });
    const collection = this.collection(projectId);
    for (const id of ids) collection.delete(id);
  }

  async query(projectId: string, vector: number[], k: number, filter: VectorFilter = {}): Promise<VectorMatch[]> {
    this.check("query", projectId, []);
    return Array.from(this.collection(projectId).values())
      .filter((entry) => filter.filePath === undefined || entry.metadata.filePath === filter.filePath)
      .map((entry) => ({ id: entry.id, score: cosineSimilarity(vector, entry.vector), metadata: entry.metadata }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async listIds(projectId: string): Promise<string[]> {
    this.check("listIds", projectId, []);
    return Array.from(this.collection(projectId).keys()).sort();
  }

  async listFileChunks(projectId: string, filePath: string): Promise<StoredChunk[]> {
    this.check("listFileChunks", projectId, []);
    return Array.from(this.collection(projectId).values())
      .filter((entry) => entry.metadata.filePath === filePath)
      .sort((a, b) => a.metadata.ordinal - b.metadata.ordinal)
      .map((entry) => ({ id: entry.id, metadata: { ...entry.metadata } }));
  }

  async count(projectId: string): Promise<number> {
    return this.collection(projectId).size;
  }

  async dropCollection(projectId: string): Promise<void> {
    this.collections.delete(projectId);
  }

  async close(): Promise<void> {}

  idsForFile(projectId: string, filePath: string): string[] {
    return Array.from(this.collection(projectId).values())
      .filter((entry) => entry.metadata.filePath === filePath)
      .map((entry) => entry.id)
      .sort();
  }
}
