import type Database from "better-sqlite3";
import { formatErrorMessage } from "./errors";

export type VecExtensionStatus = { ok: boolean; extensionPath?: string; version?: string; error?: string };

/** Loads sqlite-vec into `db` and confirms its functions answer. */
export async function loadSqliteVecExtension(params: {
  db: Database.Database;
  extensionPath?: string;
}): Promise<VecExtensionStatus> {
  try {
    const sqliteVec = await import("sqlite-vec");
    const resolvedPath = params.extensionPath?.trim() ? params.extensionPath.trim() : undefined;
    const extensionPath = resolvedPath ?? sqliteVec.getLoadablePath();
    if (resolvedPath) {
      params.db.loadExtension(extensionPath);
    } else {
      sqliteVec.load(params.db);
    }
    const row = params.db.prepare("SELECT vec_version() AS v").get() as { v?: string } | undefined;
    return { ok: true, extensionPath, version: row?.v };
  } catch (err) {
    return { ok: false, error: formatErrorMessage(err) };
  }
}
