export { QUIZ_NOT_GENERATED_MESSAGE, QUIZ_UNAVAILABLE_MESSAGE, QuizService } from './QuizService';
export type { QuizServiceOptions } from './QuizService';
export { QUIZ_SYSTEM_PROMPT, buildQuizPrompt, parseQuizResponse } from './prompts';
export type { ParseQuizResult } from './prompts';
export {
  DEFAULT_QUIZ_QUESTIONS,
  MAX_QUIZ_QUESTIONS,
  MIN_QUIZ_QUESTIONS,
  OPTION_LETTERS,
} from './types';
export type { QuizInput, QuizItem, QuizRequest, QuizResult } from './types';
