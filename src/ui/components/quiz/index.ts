export { AnswerOption } from './AnswerOption';
export type { AnswerOptionProps } from './AnswerOption';
export { QuizQuestionCard } from './QuizQuestionCard';
export type { QuizQuestionCardProps } from './QuizQuestionCard';
