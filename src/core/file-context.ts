import fs from "fs";
import { FileNotFoundError } from "./errors";
import type { VectorStore } from "./vector-store";
import { isFile } from "../utils/fs";

export const DEFAULT_CONTEXT_LINES = 50;

export type ContextLine = { number: number; text: string };

/** An indexed chunk overlapping the returned lines. */
export type ContextChunk = {
  chunkId: string;
  ordinal: number;
  lineStart: number;
  lineEnd: number;
};

export type FileContext = {
  /** Null when the file is outside every registered project. */
  projectId: string | null;
  /** Relative to the project root, or the absolute path outside a project. */
  filePath: string;
  absPath: string;
  focusLine: number | null;
  startLine: number;
  endLine: number;
  totalLines: number;
  lines: ContextLine[];
  chunks: ContextChunk[];
};

export type FileContextParams = {
  absPath: string;
  store: VectorStore;
  /** The project holding the file and its path there, when it has one. */
  owner?: { projectId: string; relPath: string };
  line?: number;
  contextLines?: number;
};

export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * 1-based inclusive line range. Without a line it is the head of the file;
 * with one it is centered there, half of `contextLines` on either side.
 */
export function contextWindow(
  totalLines: number,
  contextLines: number,
  line?: number
): { startLine: number; endLine: number } {
  if (totalLines === 0) return { startLine: 0, endLine: 0 };
  const span = Math.max(1, Math.floor(contextLines));
  if (line === undefined || line <= 0) return { startLine: 1, endLine: Math.min(span, totalLines) };
  const focus = Math.min(line, totalLines);
  const half = Math.floor(span / 2);
  return { startLine: Math.max(1, focus - half), endLine: Math.min(totalLines, focus + half) };
}

export async function readFileContext(params: FileContextParams): Promise<FileContext> {
  if (!(await isFile(params.absPath))) throw new FileNotFoundError(params.absPath);
  const all = splitLines(await fs.promises.readFile(params.absPath, "utf8"));
  const { startLine, endLine } = contextWindow(
    all.length,
    params.contextLines ?? DEFAULT_CONTEXT_LINES,
    params.line
  );
  const lines: ContextLine[] = [];
  for (let number = startLine; number >= 1 && number <= endLine; number += 1) {
    lines.push({ number, text: all[number - 1] ?? "" });
  }

  const owner = params.owner;
  const stored = owner ? await params.store.listFileChunks(owner.projectId, owner.relPath) : [];
  const chunks = stored
    .filter((chunk) => chunk.metadata.startLine <= endLine && chunk.metadata.endLine >= startLine)
    .map((chunk) => ({
      chunkId: chunk.id,
      ordinal: chunk.metadata.ordinal,
      lineStart: chunk.metadata.startLine,
      lineEnd: chunk.metadata.endLine
    }));

  return {
    projectId: owner?.projectId ?? null,
    filePath: owner?.relPath ?? params.absPath,
    absPath: params.absPath,
    focusLine:
      params.line !== undefined && params.line > 0 && all.length > 0 ? Math.min(params.line, all.length) : null,
    startLine,
    endLine,
    totalLines: all.length,
    lines,
    chunks
  };
}
