/**
 * Adapter exports
 */

export { OpenAICompatibleModel, type OpenAICompatibleModelConfig } from "./llm/OpenAICompatibleModel.js";
export { OpenAIEmbedder, type OpenAIEmbedderConfig } from "./embeddings/OpenAIEmbedder.js";
export { HashingEmbedder, kHASHING_DIMENSIONS } from "./embeddings/HashingEmbedder.js";
export { SqliteSimilarityStore } from "./store/SqliteSimilarityStore.js";
export { QdrantSimilarityStore, type QdrantSimilarityStoreConfig } from "./store/QdrantSimilarityStore.js";
export { HttpZeroShotClient, type HttpZeroShotClientConfig } from "./validator/HttpZeroShotClient.js";
export { PlainTextExtractor } from "./extraction/PlainTextExtractor.js";
