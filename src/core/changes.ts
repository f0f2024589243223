import pLimit from "p-limit";
import { FingerprintError } from "./errors";
import type { EnumeratedFile } from "./enumerator";
import { logger } from "./logger";
import type { FileRecord } from "./metadata-store";
import { hashFile } from "../utils/hash";

export type ChangeKind = "unchanged" | "added" | "modified" | "deleted";

export type FileChange =
  | { kind: "added"; relPath: string; file: EnumeratedFile; fingerprint: string }
  | { kind: "modified"; relPath: string; file: EnumeratedFile; fingerprint: string; record: FileRecord }
  | { kind: "unchanged"; relPath: string; file: EnumeratedFile; fingerprint: string; record: FileRecord }
  | {
      kind: "deleted";
      relPath: string;
      /** Absent when an unreadable file had never been indexed. */
      record?: FileRecord;
      error?: FingerprintError;
    };

export type ChangeSet = {
  changes: FileChange[];
  counts: Record<ChangeKind, number>;
};

export type DetectOptions = {
  /** Classify every readable file with a record as modified. */
  forceAll?: boolean;
  concurrency?: number;
};

function countChanges(changes: FileChange[]): Record<ChangeKind, number> {
  const counts: Record<ChangeKind, number> = { unchanged: 0, added: 0, modified: 0, deleted: 0 };
  for (const change of changes) {
    if (change.kind === "deleted" && !change.record) continue;
    counts[change.kind] += 1;
  }
  return counts;
}

/**
 * Classifies every candidate and every recorded path exactly once. Content
 * hashes decide modified against unchanged; timestamps are not consulted.
 */
export async function detectChanges(
  candidates: EnumeratedFile[],
  records: Record<string, FileRecord>,
  options: DetectOptions = {}
): Promise<ChangeSet> {
  const limit = pLimit(Math.max(1, options.concurrency ?? 4));
  const seen = new Set<string>();

  const classified = await Promise.all(
    candidates.map((file) =>
      limit(async (): Promise<FileChange> => {
        const record = records[file.relPath];
        let fingerprint: string;
        try {
          fingerprint = await hashFile(file.absPath);
        } catch (err) {
          const error = new FingerprintError(file.relPath, err);
          logger.warn(error.message);
          return { kind: "deleted", relPath: file.relPath, record, error };
        }
        if (!record) return { kind: "added", relPath: file.relPath, file, fingerprint };
        if (options.forceAll || record.fingerprint !== fingerprint) {
          return { kind: "modified", relPath: file.relPath, file, fingerprint, record };
        }
        return { kind: "unchanged", relPath: file.relPath, file, fingerprint, record };
      })
    )
  );

  const changes: FileChange[] = [];
  for (const change of classified) {
    seen.add(change.relPath);
    changes.push(change);
  }
  for (const [relPath, record] of Object.entries(records)) {
    if (!seen.has(relPath)) changes.push({ kind: "deleted", relPath, record });
  }
  changes.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
  return { changes, counts: countChanges(changes) };
}
