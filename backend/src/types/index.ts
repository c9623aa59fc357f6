export * from './conversation.types';
export * from './analysis.types';
export * from './graph.types';
export * from './session.types';
export * from './ollama.types';
export * from './openrouter.types';
export * from './vapi.types';
