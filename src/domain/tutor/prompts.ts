/**
 * Tutor Prompts Module
 *
 * System prompt and user prompt builder for personalised explanations.
 */

import type { PreferenceSet } from '@/domain/preferences';

// ============ System Prompt ============

export const TUTOR_SYSTEM_PROMPT = `You are a patient, expert tutor who adapts every explanation to the learner in front of you.

Guidelines:
1. Match depth and vocabulary to the learner's level
2. Follow the learner's preferred learning style
3. Build on what the learner already knows and define new terms on first use
4. Prefer short sections, concrete examples and a brief recap at the end
5. Answer entirely in the learner's preferred language
6. If the question is ambiguous, state the interpretation you chose before answering

Format your answer in markdown:
- Use headers for major sections
- Use bullet points for lists
- Use code blocks for code examples
- Use bold for key terms`;

/**
 * Style guidance for the learning styles offered to clients
 */
const LEARNING_STYLE_GUIDANCE: Record<string, string> = {
  visual:
    'Describe diagrams, charts or mental images in words, and use analogies the learner can picture.',
  'text-based': 'Use clear, well-structured prose with headings, definitions and summaries.',
  'hands-on':
    'Teach through worked examples, step-by-step exercises and a small practice task at the end.',
};

/**
 * Get instructions for a learning style; unknown styles get a generic instruction
 */
export function describeLearningStyle(learningStyle: string): string {
  const guidance = LEARNING_STYLE_GUIDANCE[learningStyle.trim().toLowerCase()];
  return guidance ?? `Adapt the explanation to a "${learningStyle}" learning style.`;
}

// ============ User Prompt Builder ============

/**
 * Build the user prompt for a personalised explanation.
 * Every preference is included verbatim.
 */
export function buildTutorPrompt(preferences: PreferenceSet, question: string): string {
  const lines = [
    `Subject: ${preferences.subject}`,
    `Learning level: ${preferences.level}`,
    `Learning style: ${preferences.learningStyle}`,
    `Preferred language: ${preferences.language}`,
  ];

  if (preferences.background) {
    lines.push(`Background knowledge: ${preferences.background}`);
  }

  return `${lines.join('\n')}

Explain the following question to this learner:
${question}

Requirements:
- Pitch the explanation at the ${preferences.level} level in ${preferences.subject}
- ${describeLearningStyle(preferences.learningStyle)}
- Write the whole answer in ${preferences.language}`;
}

// ============ Response Parser ============

/**
 * Clean an explanation reply. Returns null when the model sent nothing usable.
 */
export function parseExplanation(response: string): string | null {
  const explanation = response.trim();
  return explanation.length > 0 ? explanation : null;
}
