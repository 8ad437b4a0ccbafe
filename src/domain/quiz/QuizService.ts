import { ValidationError } from '@/domain/errors';
import { requireText } from '@/domain/preferences';
import type { ILLMProvider, LLMMessage } from '@/ports';
import { renderQuizHtml } from '@/ui/renderQuizHtml';
import { QUIZ_SYSTEM_PROMPT, buildQuizPrompt, parseQuizResponse } from './prompts';
import {
  DEFAULT_QUIZ_QUESTIONS,
  MAX_QUIZ_QUESTIONS,
  MIN_QUIZ_QUESTIONS,
  type QuizInput,
  type QuizRequest,
  type QuizResult,
} from './types';

export const QUIZ_UNAVAILABLE_MESSAGE =
  'The quiz generator is unavailable right now. Please try again in a moment.';

export const QUIZ_NOT_GENERATED_MESSAGE =
  'Sorry, I could not generate a quiz for this subject. Please try again.';

export interface QuizServiceOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Service for multiple-choice quiz generation.
 */
export class QuizService {
  constructor(
    private llmProvider: ILLMProvider,
    private options: QuizServiceOptions = {},
  ) {}

  /**
   * Generate a quiz. Invalid parameters throw `ValidationError` before the model is called.
   * Provider failures and unparseable replies return an empty quiz with `fallback: true`.
   */
  async generate(request: QuizInput): Promise<QuizResult> {
    const normalized = this.normalizeRequest(request);

    const messages: LLMMessage[] = [
      { role: 'system', content: QUIZ_SYSTEM_PROMPT },
      { role: 'user', content: buildQuizPrompt(normalized) },
    ];

    let content: string;
    try {
      const response = await this.llmProvider.chat(messages, {
        temperature: this.options.temperature ?? 0.7,
        maxTokens: this.options.maxTokens ?? 400 * normalized.numQuestions,
        timeoutMs: this.options.timeoutMs,
      });
      content = response.content;
    } catch (error) {
      console.error('[QuizService] Quiz request failed:', error);
      return { quiz: [], formattedQuiz: null, fallback: true, message: QUIZ_UNAVAILABLE_MESSAGE };
    }

    const { items, skipped } = parseQuizResponse(content);
    for (const { reason } of skipped) {
      console.warn(`[QuizService] Skipped question block: ${reason}`);
    }

    if (items.length === 0) {
      console.warn('[QuizService] No questions could be parsed from the reply');
      return { quiz: [], formattedQuiz: null, fallback: true, message: QUIZ_NOT_GENERATED_MESSAGE };
    }

    const quiz = items.slice(0, normalized.numQuestions);
    if (quiz.length < normalized.numQuestions) {
      console.warn(
        `[QuizService] Requested ${normalized.numQuestions} questions, parsed ${quiz.length}`,
      );
    }

    const formattedQuiz = normalized.revealFormat
      ? renderQuizHtml(`${normalized.subject} Quiz (${normalized.level})`, quiz)
      : null;

    return { quiz, formattedQuiz, fallback: false };
  }

  private normalizeRequest(request: QuizInput): QuizRequest {
    const numQuestions = request.numQuestions ?? DEFAULT_QUIZ_QUESTIONS;
    if (
      !Number.isInteger(numQuestions) ||
      numQuestions < MIN_QUIZ_QUESTIONS ||
      numQuestions > MAX_QUIZ_QUESTIONS
    ) {
      throw new ValidationError(
        `numQuestions must be an integer between ${MIN_QUIZ_QUESTIONS} and ${MAX_QUIZ_QUESTIONS}`,
        'numQuestions',
      );
    }

    return {
      ...request,
      subject: requireText(request.subject, 'subject'),
      level: requireText(request.level, 'level'),
      topic: request.topic?.trim() || undefined,
      language: request.language?.trim() || undefined,
      numQuestions,
    };
  }
}
