export { EmptyGroundTruthError } from './errors.js';
export { evaluate, hitRate, mrr, reciprocalRank, relevanceVector } from './metrics.js';
export type { EvaluateOptions, EvaluationRun, GroundTruthEntry, SearchFunction } from './metrics.js';
export { optimize } from './optimizer.js';
export type {
  Objective,
  OptimizationResult,
  OptimizeOptions,
  ParameterSample,
  ParamRanges,
  ParamValues,
} from './optimizer.js';
export { mapWithConcurrency } from './pool.js';
export { ConsoleEvaluationReporter, silentReporter } from './progress.js';
export type { EvaluationReporter } from './progress.js';
export { createRandom, freshSeed, sample } from './random.js';
export type { RandomSource } from './random.js';
export { subjectIdOf, toSubjectIds } from './subjects.js';
export { createBoostObjective, tuneFieldBoosts } from './tuning.js';
export type { BoostObjectiveOptions, TuneOptions } from './tuning.js';
export {
  DEFAULT_QUESTION_COUNT,
  buildQuestionPrompt,
  formatGroundTruth,
  generateQuestions,
  loadGroundTruth,
  parseGroundTruth,
  saveGroundTruth,
} from './ground-truth.js';
export {
  RELEVANCE_LABELS,
  buildJudgePrompt,
  evaluateRag,
  formatJudgments,
  judgeAnswer,
  saveJudgments,
} from './judge.js';
export type {
  Answerer,
  EvaluateRagOptions,
  RagEvaluationResult,
  RagJudgment,
  RelevanceLabel,
  Verdict,
} from './judge.js';
export { parseLlmJson } from './json-output.js';
export {
  DEFAULT_RELEVANCE_TOP_K,
  answerSimilarity,
  cosineSimilarity,
  relevanceScore,
  scoreAnswers,
} from './similarity.js';
export type {
  AnswerQualityResult,
  AnswerScore,
  ContextAnswerer,
  ReferenceCase,
  ScoreAnswersOptions,
} from './similarity.js';
