import crypto from "crypto";
import { ProviderError, formatErrorMessage } from "./errors";
import { getRootDir } from "./layout";
import { logger } from "./logger";
import { importNodeLlamaCpp, type LlamaEmbeddingContext, type LlamaModel, type NodeLlamaCppModule } from "./node-llama";
import { resolveUserPath, type Settings } from "./settings";

export const EMBEDDINGS_MOCK_ENV = "VECSYNC_EMBEDDINGS_MOCK";
export const EMBEDDINGS_MOCK_DIMS_ENV = "VECSYNC_EMBEDDINGS_MOCK_DIMS";

const RETRY_MAX_DELAY_MS = 8000;

/**
 * Text to fixed-length vectors. `embedBatch` returns one vector per input, in
 * input order, and must be safe to call again after a failure.
 */
export type EmbeddingProvider = {
  modelId: string;
  embedBatch: (texts: string[]) => Promise<number[][]>;
  embedQuery: (text: string) => Promise<number[]>;
  dispose?: () => Promise<void>;
};

export type RetryPolicy = {
  /** Attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Per call; 0 disables the timeout. */
  timeoutMs: number;
};

function truthyEnv(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return ["1", "true", "yes", "y", "on"].includes(normalized);
}

export function isMockEmbeddingsEnabled(): boolean {
  return truthyEnv(process.env[EMBEDDINGS_MOCK_ENV]);
}

function isRemoteModelSpecifier(spec: string): boolean {
  return /^(hf:|https?:)/i.test(spec);
}

export function retryPolicyFromSettings(settings: Settings): RetryPolicy {
  return {
    retries: settings.embeddings.retries,
    baseDelayMs: settings.embeddings.retryBaseDelayMs,
    timeoutMs: settings.embeddings.timeoutMs
  };
}

/** Deterministic unit vectors derived from a sha256 of the text. */
export function createMockEmbeddingProvider(dims = 8): EmbeddingProvider {
  const size = Math.max(1, Math.floor(dims));
  const embedText = (text: string): number[] => {
    const buf = crypto.createHash("sha256").update(text, "utf8").digest();
    const vec: number[] = [];
    for (let i = 0; i < size; i += 1) {
      const v = buf[i % buf.length] ?? 0;
      vec.push(v / 127.5 - 1);
    }
    const norm = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0)) || 1;
    return vec.map((v) => v / norm);
  };
  return {
    modelId: `mock-sha256-${size}`,
    embedBatch: async (texts) => texts.map(embedText),
    embedQuery: async (text) => embedText(text)
  };
}

export function createLlamaEmbeddingProvider(settings: Settings): EmbeddingProvider {
  const baseDir = getRootDir();
  const rawModelPath = settings.embeddings.modelPath.trim();
  const modelPath = isRemoteModelSpecifier(rawModelPath) ? rawModelPath : resolveUserPath(rawModelPath, baseDir);
  const cacheDirRaw = settings.embeddings.cacheDir.trim();
  const cacheDir = cacheDirRaw ? resolveUserPath(cacheDirRaw, baseDir) : undefined;

  let modelPromise: Promise<LlamaModel> | null = null;
  let contextPromise: Promise<LlamaEmbeddingContext> | null = null;

  const ensureContext = async (): Promise<LlamaEmbeddingContext> => {
    if (!contextPromise) {
      contextPromise = (async () => {
        let llamaModule: NodeLlamaCppModule;
        try {
          llamaModule = await importNodeLlamaCpp();
        } catch (err) {
          throw new ProviderError(
            `Local embeddings unavailable. Optional dependency node-llama-cpp is missing or failed to load.\n${formatErrorMessage(err)}`,
            { retryable: false, cause: err }
          );
        }
        const { getLlama, LlamaLogLevel, resolveModelFile } = llamaModule;
        const llama = await getLlama({ logLevel: LlamaLogLevel.error });
        logger.debug(`Loading embedding model ${modelPath}`);
        modelPromise = resolveModelFile(modelPath, cacheDir).then((resolved) => llama.loadModel({ modelPath: resolved }));
        const model = await modelPromise;
        return model.createEmbeddingContext();
      })();
      // A failed load must not poison every later pass.
      void contextPromise.catch(() => {
        contextPromise = null;
        modelPromise = null;
      });
    }
    return contextPromise;
  };

  const embedOne = async (context: LlamaEmbeddingContext, text: string): Promise<number[]> => {
    const embedding = await context.getEmbeddingFor(text);
    return Array.from(embedding.vector);
  };

  return {
    modelId: modelPath,
    embedQuery: async (text) => embedOne(await ensureContext(), text),
    embedBatch: async (texts) => {
      const context = await ensureContext();
      const out: number[][] = [];
      for (const text of texts) {
        out.push(await embedOne(context, text));
      }
      return out;
    },
    dispose: async () => {
      const context = contextPromise ? await contextPromise : null;
      const model = modelPromise ? await modelPromise : null;
      contextPromise = null;
      modelPromise = null;
      await context?.dispose();
      await model?.dispose();
    }
  };
}

export function createEmbeddingProvider(settings: Settings): EmbeddingProvider {
  if (isMockEmbeddingsEnabled()) {
    const dims = Math.max(1, Math.floor(Number(process.env[EMBEDDINGS_MOCK_DIMS_ENV]) || 8));
    return createMockEmbeddingProvider(dims);
  }
  return createLlamaEmbeddingProvider(settings);
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return await promise;
  }
  let timer: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderError(message, { retryable: true })), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function assertWellFormed(texts: string[], vectors: number[][]): void {
  if (vectors.length !== texts.length) {
    throw new ProviderError(`Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`, {
      retryable: false
    });
  }
  const dims = vectors[0]?.length ?? 0;
  for (const vector of vectors) {
    if (vector.length === 0 || vector.length !== dims) {
      throw new ProviderError(`Embedding provider returned vectors of inconsistent length`, { retryable: false });
    }
    if (!vector.every((v) => Number.isFinite(v))) {
      throw new ProviderError(`Embedding provider returned a non-finite component`, { retryable: false });
    }
  }
}

function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderError(`Embedding failed: ${formatErrorMessage(err)}`, { retryable: true, cause: err });
}

/**
 * One provider call with a timeout, retried with doubling jittered backoff
 * while the failure is retryable. Always rejects with a ProviderError.
 */
export async function embedBatchWithRetry(
  provider: EmbeddingProvider,
  texts: string[],
  policy: RetryPolicy
): Promise<number[][]> {
  if (texts.length === 0) return [];
  const maxDelayMs = policy.maxDelayMs ?? RETRY_MAX_DELAY_MS;
  let attempt = 0;
  let delayMs = policy.baseDelayMs;
  while (true) {
    try {
      const vectors = await withTimeout(
        provider.embedBatch(texts),
        policy.timeoutMs,
        `Embedding batch timed out after ${Math.round(policy.timeoutMs / 1000)}s`
      );
      assertWellFormed(texts, vectors);
      return vectors;
    } catch (err) {
      const error = toProviderError(err);
      if (!error.retryable || attempt >= policy.retries) {
        throw error;
      }
      const waitMs = Math.min(maxDelayMs, Math.round(delayMs * (1 + Math.random() * 0.2)));
      logger.warn(`Embedding batch failed (${error.message}); retrying in ${waitMs}ms`, {
        attempt: attempt + 1,
        items: texts.length
      });
      await new Promise((resolve) => setTimeout(resolve, waitMs));
      delayMs *= 2;
      attempt += 1;
    }
  }
}

/** Splits `texts` into provider calls of at most `batchSize`, preserving order. */
export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: string[],
  batchSize: number,
  policy: RetryPolicy
): Promise<number[][]> {
  const size = Math.max(1, Math.floor(batchSize));
  const out: number[][] = [];
  let dims: number | null = null;
  for (let start = 0; start < texts.length; start += size) {
    const vectors = await embedBatchWithRetry(provider, texts.slice(start, start + size), policy);
    const batchDims = vectors[0]?.length ?? 0;
    if (dims !== null && batchDims !== dims) {
      throw new ProviderError(`Embedding dimension changed from ${dims} to ${batchDims}`, { retryable: false });
    }
    dims = batchDims;
    out.push(...vectors);
  }
  return out;
}

export async function embedQueryWithTimeout(
  provider: EmbeddingProvider,
  text: string,
  timeoutMs: number
): Promise<number[]> {
  try {
    return await withTimeout(
      provider.embedQuery(text),
      timeoutMs,
      `Query embedding timed out after ${Math.round(timeoutMs / 1000)}s`
    );
  } catch (err) {
    throw toProviderError(err);
  }
}
