export * from './types';
export * from './errors';
export { loadConfig, assertThreshold, THRESHOLD_PRESETS } from './config';
export type { AppConfig, AnalyzerProvider } from './config';
export { BufferService } from './services/buffer.service';
export { OllamaEmbeddingService } from './services/embedding.service';
export type { EmbeddingProvider } from './services/embedding.service';
export { ChunkerService } from './services/chunker.service';
export { AnalysisService, parseAnalysis, fallbackAnalysis, buildAnalysisPrompt } from './services/analysis.service';
export { OllamaService } from './services/ollama.service';
export { OpenRouterService } from './services/openrouter.service';
export { GraphService } from './services/graph.service';
export { ConversationSession } from './services/session.service';
export type { SessionOptions } from './services/session.service';
export { SessionRegistry } from './services/registry.service';
export { StorageService } from './services/storage.service';
export { cosineSimilarity, adjacentSimilarities } from './utils/vector';
