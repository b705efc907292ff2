export { ResponseGenerator } from './response-generator.js';
export type {
  GenerationResult,
  GenerateOptions,
  ResponseGeneratorOptions,
} from './response-generator.js';
export {
  buildReplyPrompt,
  buildSummaryPrompt,
  formatReferences,
  formatTurns,
} from './prompt-builder.js';
export type { BuiltPrompt, ConversationHistory } from './prompt-builder.js';
