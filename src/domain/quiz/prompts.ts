/**
 * Quiz Prompts Module
 *
 * Contains the system prompt, user prompt builder, and response parser
 * for multiple-choice quiz generation.
 */

import { isRecord, parseJSONValue, stripEmphasis } from '@/domain/shared/responseParsing';
import { OPTION_LETTERS, type QuizItem, type QuizRequest } from './types';

// ============ System Prompt ============

export const QUIZ_SYSTEM_PROMPT = `You are an expert educator writing multiple-choice quizzes.

Guidelines:
1. Test understanding, not trivia or memorization of exact wording
2. Every question has exactly 4 options and exactly one correct option
3. Distractors must be plausible for a learner at the given level
4. Questions progress from easier to harder
5. Each explanation says briefly why the correct option is right

Follow the output format exactly. Do not add any text before the first question or after the last one.`;

// ============ User Prompt Builder ============

/**
 * Build the user prompt for quiz generation
 */
export function buildQuizPrompt(request: QuizRequest): string {
  const lines = [`Subject: ${request.subject}`, `Learning level: ${request.level}`];
  if (request.topic) {
    lines.push(`Topic: ${request.topic}`);
  }
  if (request.language) {
    lines.push(`Language: ${request.language}`);
  }

  const languageRequirement = request.language
    ? `\n- Write questions, options and explanations in ${request.language}, but keep the labels "Question", "Correct Answer" and "Explanation" in English`
    : '';

  return `${lines.join('\n')}

Create exactly ${request.numQuestions} multiple-choice questions for this learner.

Use this format for every question, with a blank line between questions:

Question 1: <question text>
A) <option>
B) <option>
C) <option>
D) <option>
Correct Answer: <letter of the correct option>
Explanation: <one or two sentences>

Requirements:
- Number the questions from 1 to ${request.numQuestions}
- Match the difficulty to the ${request.level} level${languageRequirement}`;
}

// ============ Response Parser ============

/**
 * Result of parsing a quiz reply with any skipped blocks
 */
export interface ParseQuizResult {
  items: QuizItem[];
  skipped: Array<{ block: string; reason: string }>;
}

// "Question 1:", "**Question 1:**", "### Question 1" or "**Question 1**" on its own line
const QUESTION_MARKER =
  /^[ \t]*(?:[*_#]+[ \t]*)?(?:Question|Q)[ \t]*(\d+)[ \t]*(?:[:.)][ \t]*[*_]*|[*_]+[ \t]*(?:[:.)][ \t]*)?|(?=[ \t]*$))/gim;
// "A) x", "A. x", "(A) x", "**A)** x", "- A) x"
const OPTION_LINE = /^\s*(?:[-*+][ \t]+)?(?:\*\*|__)?(?:\(([A-F])\)|([A-F])[).:])(?:\*\*|__)?\s*(.+)$/;
const ANSWER_LINE = /^\s*(?:[*_]+)?(?:Correct\s+Answer|Correct\s+Option|Answer)(?:[*_]+)?\s*[:-]\s*(.+)$/i;
const EXPLANATION_LINE = /^\s*(?:[*_]+)?(?:Explanation|Rationale)(?:[*_]+)?\s*:\s*(.*)$/i;
// Groups: parenthesised letter, bare letter, punctuation after it, remaining text
const ANSWER_LETTER = /^(?:\(([A-F])\)|([A-F])([).:])?)(?=\s|$)\s*(.*)$/i;

/**
 * Split a reply into the text that follows each "Question N:" marker
 */
function splitQuestionBlocks(response: string): string[] {
  const markers = [...response.matchAll(QUESTION_MARKER)];
  return markers.map((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const end = i + 1 < markers.length ? (markers[i + 1].index ?? response.length) : response.length;
    return response.slice(start, end);
  });
}

function normalizeAnswerText(text: string): string {
  return text.replace(/[\s.,;:!]+$/, '').trim().toLowerCase();
}

/**
 * Resolve "B", "(B)", "B) Paris" or "Paris" to the option text.
 * A leading letter counts only when it stands alone, carries a marker or is
 * followed by that option's text, so "A cell wall" is not read as option A.
 */
function resolveCorrectAnswer(value: string, options: string[]): string | null {
  const cleaned = stripEmphasis(value).replace(/^option\s+/i, '');
  const normalized = normalizeAnswerText(cleaned);

  const byText = options.find((option) => normalizeAnswerText(option) === normalized);
  if (byText) {
    return byText;
  }

  const letterMatch = cleaned.match(ANSWER_LETTER);
  if (!letterMatch) {
    return null;
  }

  const [, parenthesised, bare, marker, rest] = letterMatch;
  const letter = (parenthesised ?? bare).toUpperCase();
  const option = options[OPTION_LETTERS.findIndex((l) => l === letter)];
  if (option === undefined) {
    return null;
  }

  const hasMarker = parenthesised !== undefined || marker !== undefined;
  if (!rest || hasMarker || normalizeAnswerText(rest) === normalizeAnswerText(option)) {
    return option;
  }
  return null;
}

/**
 * Parse one question block. Returns the item or the reason it was skipped.
 */
function parseQuestionBlock(block: string): QuizItem | string {
  const questionLines: string[] = [];
  const options: string[] = [];
  const explanationLines: string[] = [];
  let answerValue: string | null = null;
  let section: 'question' | 'options' | 'explanation' = 'question';

  for (const rawLine of block.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const answerMatch = line.match(ANSWER_LINE);
    if (answerMatch && section !== 'explanation') {
      answerValue = answerMatch[1].trim();
      section = 'options';
      continue;
    }

    const explanationMatch = line.match(EXPLANATION_LINE);
    if (explanationMatch) {
      section = 'explanation';
      const firstLine = stripEmphasis(explanationMatch[1]);
      if (firstLine) {
        explanationLines.push(firstLine);
      }
      continue;
    }

    if (section === 'explanation') {
      explanationLines.push(line);
      continue;
    }

    const optionMatch = line.match(OPTION_LINE);
    if (optionMatch) {
      options.push(stripEmphasis(optionMatch[3]));
      section = 'options';
      continue;
    }

    if (section === 'question') {
      questionLines.push(line);
    }
  }

  const question = stripEmphasis(questionLines.join(' '));
  if (!question) return 'missing question text';
  if (options.length < 2) return `expected at least 2 options, found ${options.length}`;
  if (!answerValue) return 'missing correct answer';

  const correctAnswer = resolveCorrectAnswer(answerValue, options);
  if (!correctAnswer) return `correct answer "${answerValue}" does not match any option`;

  return {
    question,
    options,
    correctAnswer,
    explanation: explanationLines.join(' '),
  };
}

/**
 * Accept quiz items sent as JSON instead of the delimited format
 */
function parseJSONQuiz(response: string): ParseQuizResult {
  const value = parseJSONValue(response);
  const list = isRecord(value) ? (value.questions ?? value.quiz) : value;
  const result: ParseQuizResult = { items: [], skipped: [] };

  if (!Array.isArray(list)) {
    return result;
  }

  for (const entry of list) {
    const block = JSON.stringify(entry);
    if (!isRecord(entry) || typeof entry.question !== 'string' || !Array.isArray(entry.options)) {
      result.skipped.push({ block, reason: 'missing question or options' });
      continue;
    }

    const options = entry.options.filter((o): o is string => typeof o === 'string');
    const rawAnswer = entry.correct_answer ?? entry.correctAnswer;
    const correctAnswer =
      typeof rawAnswer === 'number'
        ? options[rawAnswer] ?? null
        : typeof rawAnswer === 'string'
          ? resolveCorrectAnswer(rawAnswer, options)
          : null;

    if (options.length < 2 || !correctAnswer) {
      result.skipped.push({ block, reason: 'invalid options or correct answer' });
      continue;
    }

    result.items.push({
      question: entry.question.trim(),
      options,
      correctAnswer,
      explanation: typeof entry.explanation === 'string' ? entry.explanation.trim() : '',
    });
  }

  return result;
}

/**
 * Parse a quiz reply into items.
 * N delimited question blocks give N items unless a block is malformed, in which
 * case it is reported in `skipped`. Never throws.
 */
export function parseQuizResponse(response: string): ParseQuizResult {
  const blocks = splitQuestionBlocks(response);
  if (blocks.length === 0) {
    return parseJSONQuiz(response);
  }

  const result: ParseQuizResult = { items: [], skipped: [] };
  for (const block of blocks) {
    const parsed = parseQuestionBlock(block);
    if (typeof parsed === 'string') {
      result.skipped.push({ block: block.trim(), reason: parsed });
    } else {
      result.items.push(parsed);
    }
  }
  return result;
}
