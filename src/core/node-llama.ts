import type { LlamaEmbeddingContext, LlamaModel } from "node-llama-cpp";

export type { LlamaEmbeddingContext, LlamaModel };

export type NodeLlamaCppModule = typeof import("node-llama-cpp");

// node-llama-cpp is ESM only; a CommonJS build would turn a plain import() into require().
const dynamicImport = new Function("specifier", "return import(specifier)") as (
  specifier: "node-llama-cpp"
) => Promise<NodeLlamaCppModule>;

export async function importNodeLlamaCpp(): Promise<NodeLlamaCppModule> {
  return dynamicImport("node-llama-cpp");
}
