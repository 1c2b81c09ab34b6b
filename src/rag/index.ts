export { RagPipeline, buildAnswerPrompt } from './pipeline.js';
export type { AnswerOptions, RagAnswer } from './pipeline.js';
export {
  QueryRewriter,
  REWRITE_METHODS,
  buildCotPrompt,
  buildReactPrompt,
  extractRewrittenQuery,
} from './query-rewriter.js';
export type { RewriteMethod } from './query-rewriter.js';
