import type { PreferenceSet } from '@/domain/preferences';
import { requireText, validatePreferences } from '@/domain/preferences';
import type { ILLMProvider, LLMMessage } from '@/ports';
import { TUTOR_SYSTEM_PROMPT, buildTutorPrompt, parseExplanation } from './prompts';

export const TUTOR_UNAVAILABLE_MESSAGE =
  'The tutor is unavailable right now. Please try again in a moment.';

export const EXPLANATION_NOT_GENERATED_MESSAGE =
  'Sorry, I could not generate an explanation for this question. Please try rephrasing it.';

/**
 * Explanation returned to the client.
 * `fallback` is true when the text is a fixed message instead of model output.
 */
export interface ExplanationResult {
  response: string;
  fallback: boolean;
}

export interface TutorServiceOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Service for personalised explanations.
 */
export class TutorService {
  constructor(
    private llmProvider: ILLMProvider,
    private options: TutorServiceOptions = {},
  ) {}

  /**
   * Explain a question for the given learner preferences.
   * Invalid input throws `ValidationError` before the model is called.
   */
  async explain(preferences: PreferenceSet, question: string): Promise<ExplanationResult> {
    validatePreferences(preferences);
    const trimmedQuestion = requireText(question, 'question');

    const messages: LLMMessage[] = [
      { role: 'system', content: TUTOR_SYSTEM_PROMPT },
      { role: 'user', content: buildTutorPrompt(preferences, trimmedQuestion) },
    ];

    let content: string;
    try {
      const response = await this.llmProvider.chat(messages, {
        temperature: this.options.temperature ?? 0.7,
        maxTokens: this.options.maxTokens ?? 1500,
        timeoutMs: this.options.timeoutMs,
      });
      content = response.content;
    } catch (error) {
      console.error('[TutorService] Explanation request failed:', error);
      return { response: TUTOR_UNAVAILABLE_MESSAGE, fallback: true };
    }

    const explanation = parseExplanation(content);
    if (!explanation) {
      console.warn('[TutorService] Model returned an empty explanation');
      return { response: EXPLANATION_NOT_GENERATED_MESSAGE, fallback: true };
    }

    return { response: explanation, fallback: false };
  }
}
