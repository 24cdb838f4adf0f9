export { answerRequest, FALLBACK_WARNING } from './answer-request';
export type { AnswerDefaults, AnswerDeps, AnswerResult } from './answer-request';
