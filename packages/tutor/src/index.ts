// Types
export * from './types/tutor.js';

// Configuration
export * from './config/keywords.js';
export * from './config/prompts.js';
export * from './config/replies.js';

// Services
export * from './services/context-store.js';
export * from './services/intent-classifier.js';
export * from './services/context-assembler.js';
export * from './services/file-analysis.js';
export * from './services/completion-service.js';
export * from './services/message-pipeline.js';

// Utilities
export * from './utils/reply-formatter.js';
export * from './utils/correlation.js';
