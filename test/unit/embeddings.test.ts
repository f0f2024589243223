import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createEmbeddingProvider,
  createMockEmbeddingProvider,
  EMBEDDINGS_MOCK_DIMS_ENV,
  EMBEDDINGS_MOCK_ENV,
  embedBatchWithRetry,
  embedInBatches,
  embedQueryWithTimeout,
  type EmbeddingProvider,
  type RetryPolicy
} from "../../src/core/embeddings";
import { ProviderError } from "../../src/core/errors";
import { DEFAULT_SETTINGS } from "../../src/core/settings";
import { ScriptedProvider } from "../helpers/providers";

const policy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  retries: 3,
  baseDelayMs: 0,
  timeoutMs: 0,
  ...overrides
});

function providerFrom(embedBatch: (texts: string[]) => Promise<number[][]>): EmbeddingProvider {
  return { modelId: "stub", embedBatch, embedQuery: async () => [1, 0] };
}

describe("mock embedding provider", () => {
  it("returns deterministic unit vectors", async () => {
    const provider = createMockEmbeddingProvider(8);
    const [first, again, other] = await provider.embedBatch(["same", "same", "different"]);

    expect(provider.modelId).toBe("mock-sha256-8");
    expect(first).toHaveLength(8);
    expect(again).toEqual(first);
    expect(other).not.toEqual(first);
    const norm = Math.sqrt((first ?? []).reduce((sum, v) => sum + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it("is selected through the environment", () => {
    vi.stubEnv(EMBEDDINGS_MOCK_ENV, "1");
    vi.stubEnv(EMBEDDINGS_MOCK_DIMS_ENV, "16");
    expect(createEmbeddingProvider(DEFAULT_SETTINGS).modelId).toBe("mock-sha256-16");
    vi.unstubAllEnvs();
  });
});

describe("embedBatchWithRetry", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("retries retryable failures until a call succeeds", async () => {
    const provider = new ScriptedProvider();
    provider.failWhen = (_texts, call) => call <= 2;

    const vectors = await embedBatchWithRetry(provider, ["a", "b"], policy());

    expect(vectors).toHaveLength(2);
    expect(provider.calls).toHaveLength(3);
  });

  it("gives up after the configured retries", async () => {
    const provider = new ScriptedProvider();
    provider.failWhen = () => true;

    await expect(embedBatchWithRetry(provider, ["a"], policy({ retries: 1 }))).rejects.toThrow("scripted failure");
    expect(provider.calls).toHaveLength(2);
  });

  it("does not retry a non-retryable failure", async () => {
    const provider = new ScriptedProvider();
    provider.retryable = false;
    provider.failWhen = () => true;

    await expect(embedBatchWithRetry(provider, ["a"], policy())).rejects.toBeInstanceOf(ProviderError);
    expect(provider.calls).toHaveLength(1);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const embedBatch = vi.fn(async () => [[1, 0]]);

    const attempt = embedBatchWithRetry(providerFrom(embedBatch), ["a", "b"], policy());

    await expect(attempt).rejects.toThrow("Embedding provider returned 1 vectors for 2 texts");
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it("rejects ragged or non-finite vectors", async () => {
    await expect(
      embedBatchWithRetry(providerFrom(async () => [[1, 0], [1]]), ["a", "b"], policy())
    ).rejects.toThrow("inconsistent length");
    await expect(
      embedBatchWithRetry(providerFrom(async () => [[Number.NaN, 0]]), ["a"], policy())
    ).rejects.toThrow("non-finite");
  });

  it("wraps unexpected errors as retryable provider errors", async () => {
    const attempt = embedBatchWithRetry(
      providerFrom(async () => {
        throw new Error("socket closed");
      }),
      ["a"],
      policy({ retries: 0 })
    );

    await expect(attempt).rejects.toMatchObject({
      name: "ProviderError",
      message: "Embedding failed: socket closed",
      retryable: true
    });
  });

  it("times out a call that never answers", async () => {
    const hanging = providerFrom(() => new Promise<number[][]>(() => undefined));

    await expect(embedBatchWithRetry(hanging, ["a"], policy({ retries: 0, timeoutMs: 20 }))).rejects.toThrow(
      "Embedding batch timed out"
    );
  });

  it("skips the provider for an empty batch", async () => {
    const provider = new ScriptedProvider();
    expect(await embedBatchWithRetry(provider, [], policy())).toEqual([]);
    expect(provider.calls).toEqual([]);
  });
});

describe("embedInBatches", () => {
  it("splits texts into calls of at most batchSize, keeping order", async () => {
    const provider = new ScriptedProvider();
    const texts = ["t1", "t2", "t3", "t4", "t5"];

    const vectors = await embedInBatches(provider, texts, 2, policy());

    expect(provider.calls).toEqual([["t1", "t2"], ["t3", "t4"], ["t5"]]);
    expect(vectors).toEqual(await createMockEmbeddingProvider(4).embedBatch(texts));
  });

  it("fails when the dimension changes between batches", async () => {
    let call = 0;
    const provider = providerFrom(async (texts) => {
      call += 1;
      return texts.map(() => (call === 1 ? [1, 0] : [1, 0, 0]));
    });

    await expect(embedInBatches(provider, ["a", "b"], 1, policy())).rejects.toThrow(
      "Embedding dimension changed from 2 to 3"
    );
  });
});

describe("embedQueryWithTimeout", () => {
  it("returns the provider's query vector", async () => {
    expect(await embedQueryWithTimeout(providerFrom(async () => []), "q", 0)).toEqual([1, 0]);
  });

  it("rejects with a ProviderError when the query hangs", async () => {
    const provider: EmbeddingProvider = {
      modelId: "stub",
      embedBatch: async () => [],
      embedQuery: () => new Promise<number[]>(() => undefined)
    };
    await expect(embedQueryWithTimeout(provider, "q", 20)).rejects.toBeInstanceOf(ProviderError);
  });
});
