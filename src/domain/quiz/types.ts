/**
 * Data models for generated quizzes.
 */

/**
 * A multiple-choice question.
 * `correctAnswer` is the full text of one of `options`.
 */
export interface QuizItem {
  question: string;
  options: string[];
  correctAnswer: string;
  explanation: string;
}

/**
 * Parameters for generating a quiz.
 */
export interface QuizRequest {
  subject: string;
  level: string;
  numQuestions: number;
  language?: string;
  /** Narrow the quiz to one topic within the subject */
  topic?: string;
  /** Also render the quiz as an HTML page with hidden answers */
  revealFormat?: boolean;
}

/**
 * Quiz parameters as received, before the question count defaults.
 */
export type QuizInput = Omit<QuizRequest, 'numQuestions'> & { numQuestions?: number };

/**
 * Quiz returned to the client.
 * `fallback` is true when no questions could be generated.
 */
export interface QuizResult {
  quiz: QuizItem[];
  formattedQuiz: string | null;
  fallback: boolean;
  message?: string;
}

export const MIN_QUIZ_QUESTIONS = 1;
export const MAX_QUIZ_QUESTIONS = 10;
export const DEFAULT_QUIZ_QUESTIONS = 5;

export const OPTION_LETTERS = ['A', 'B', 'C', 'D', 'E', 'F'] as const;
