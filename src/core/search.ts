import path from "path";
import { embedQueryWithTimeout, type EmbeddingProvider } from "./embeddings";
import type { Project } from "./project";
import type { VectorStore } from "./vector-store";

export interface SearchResult {
  projectId: string;
  chunkId: string;
  filePath: string;
  absPath: string;
  lineStart: number;
  lineEnd: number;
  snippet: string;
  score: number;
}

export type SearchParams = {
  store: VectorStore;
  provider: EmbeddingProvider;
  projects: Project[];
  query: string;
  limit: number;
  similarityThreshold: number;
  filePath?: string;
  timeoutMs?: number;
  snippetMaxChars?: number;
};

const DEFAULT_SNIPPET_MAX_CHARS = 400;

function truncateSnippet(text: string, maxChars: number): string {
  if (!text) return "";
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars);
}

/**
 * Embeds the query once and asks each project's collection for its nearest
 * chunks. Scores come from the store unchanged; results under the threshold
 * are dropped and the rest are merged by score.
 */
export async function searchProjects(params: SearchParams): Promise<SearchResult[]> {
  const query = params.query.trim();
  if (!query || params.limit <= 0 || params.projects.length === 0) return [];
  const snippetMaxChars = params.snippetMaxChars ?? DEFAULT_SNIPPET_MAX_CHARS;
  const queryVec = await embedQueryWithTimeout(params.provider, query, params.timeoutMs ?? 0);
  const filter = params.filePath !== undefined ? { filePath: params.filePath } : undefined;

  const results: SearchResult[] = [];
  for (const project of params.projects) {
    const matches = await params.store.query(project.id, queryVec, params.limit, filter);
    for (const match of matches) {
      if (match.score < params.similarityThreshold) continue;
      results.push({
        projectId: project.id,
        chunkId: match.id,
        filePath: match.metadata.filePath,
        absPath: path.join(project.root, ...match.metadata.filePath.split("/")),
        lineStart: match.metadata.startLine,
        lineEnd: match.metadata.endLine,
        snippet: truncateSnippet(match.metadata.text, snippetMaxChars),
        score: match.score
      });
    }
  }
  return results.sort((a, b) => b.score - a.score).slice(0, params.limit);
}

export type SimilarFile = {
  projectId: string;
  filePath: string;
  absPath: string;
  /** Mean similarity of the file's matching chunks. */
  score: number;
  matches: number;
};

export type SimilarFilesParams = {
  store: VectorStore;
  provider: EmbeddingProvider;
  projects: Project[];
  /** Text of the reference file; only its head is embedded. */
  content: string;
  limit: number;
  /** The reference file itself, left out of the results. */
  exclude?: { projectId: string; filePath: string };
  timeoutMs?: number;
};

export const SIMILAR_SAMPLE_CHARS = 2000;

/**
 * Embeds the head of a file and ranks other files by the mean score of
 * their chunks among the nearest `3 * limit` of each project.
 */
export async function findSimilarFiles(params: SimilarFilesParams): Promise<SimilarFile[]> {
  const sample = params.content.slice(0, SIMILAR_SAMPLE_CHARS);
  if (!sample.trim() || params.limit <= 0 || params.projects.length === 0) return [];
  const vector = await embedQueryWithTimeout(params.provider, sample, params.timeoutMs ?? 0);

  const byFile = new Map<string, SimilarFile>();
  for (const project of params.projects) {
    const matches = await params.store.query(project.id, vector, params.limit * 3);
    for (const match of matches) {
      const filePath = match.metadata.filePath;
      if (params.exclude?.projectId === project.id && params.exclude.filePath === filePath) continue;
      const key = `${project.id}\n${filePath}`;
      const current = byFile.get(key);
      if (current) {
        current.score += match.score;
        current.matches += 1;
        continue;
      }
      byFile.set(key, {
        projectId: project.id,
        filePath,
        absPath: path.join(project.root, ...filePath.split("/")),
        score: match.score,
        matches: 1
      });
    }
  }

  return Array.from(byFile.values())
    .map((file) => ({ ...file, score: file.score / file.matches }))
    .sort((a, b) => b.score - a.score || a.absPath.localeCompare(b.absPath))
    .slice(0, params.limit);
}
