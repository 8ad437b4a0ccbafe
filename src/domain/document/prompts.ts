/**
 * Document Prompts Module
 *
 * Prompts and reply parsers for document summaries, flashcards and
 * questions about an uploaded document.
 */

import type { LLMMessage } from '@/ports';
import { isRecord, parseJSONValue, stripCodeFences, stripEmphasis } from '@/domain/shared/responseParsing';
import { DEFAULT_FLASHCARD_TOPIC, type Flashcard } from './types';

// ============ System Prompts ============

export const SUMMARY_SYSTEM_PROMPT = `You are a study assistant who writes clear summaries of learning material.

Guidelines:
1. Cover the main ideas in the order the document presents them
2. Keep definitions, formulas and key facts exact
3. Use short markdown sections and bullet points
4. Do not add information that is not in the document`;

export const FLASHCARD_SYSTEM_PROMPT = `You are a study assistant who turns learning material into flashcards.

Guidelines:
1. Each card tests one fact, definition or idea from the document
2. The question side is answerable without seeing the document
3. The answer side is short: one or two sentences
4. The topic is a two to four word label for the area the card covers

Follow the output format exactly. Do not add any text before the first card or after the last one.`;

export const DISCUSS_SYSTEM_PROMPT = `You are a tutor answering a student's questions about a document they uploaded.

Rules:
1. Answer only from the document content you are given
2. If the document does not contain the answer, say that the document does not cover it
3. Quote or paraphrase the relevant part of the document when it helps
4. Format your answer in markdown`;

// ============ User Prompt Builders ============

function documentBlock(documentText: string): string {
  return `Document:\n"""\n${documentText}\n"""`;
}

/**
 * Build the user prompt for a document summary
 */
export function buildSummaryPrompt(documentText: string): string {
  return `Summarize the following document for a student who is studying it.

${documentBlock(documentText)}

Start with one sentence on what the document is about, then list the key points.`;
}

/**
 * Build the user prompt for flashcard generation
 */
export function buildFlashcardPrompt(documentText: string, maxCards: number): string {
  return `Create up to ${maxCards} study flashcards from the following document.

Use this format for every card, with a line containing only --- between cards:

Topic: <short topic label>
Question: <front of the card>
Answer: <back of the card>

${documentBlock(documentText)}`;
}

/**
 * Build the conversation for a question about an uploaded document
 */
export function buildDiscussPrompt(
  question: string,
  documentContent: string,
  documentSummary?: string,
): LLMMessage[] {
  const summarySection = documentSummary?.trim()
    ? `Document summary:\n${documentSummary.trim()}\n\n`
    : '';

  return [
    { role: 'system', content: DISCUSS_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `${summarySection}Document content:\n"""\n${documentContent}\n"""\n\nStudent question: ${question}`,
    },
  ];
}

// ============ Response Parsers ============

const CARD_SEPARATOR = /^[ \t]*-{3,}[ \t]*$/m;
const TOPIC_LINE = /^(?:\d+[.)]\s*)?(?:[*_#]+\s*)?Topic[*_]*\s*:\s*(.*)$/i;
const QUESTION_LINE = /^(?:\d+[.)]\s*)?(?:[*_]+)?(?:Question|Front|Q)[*_]*\s*:\s*(.*)$/i;
const ANSWER_LINE = /^(?:[*_]+)?(?:Answer|Back|A)[*_]*\s*:\s*(.*)$/i;
const HAS_QUESTION_LINE = /^\s*(?:\d+[.)]\s*)?(?:[*_]+)?(?:Question|Front|Q)[*_]*\s*:/im;

type CardFields = Record<keyof Flashcard, string[]>;

function emptyCardFields(): CardFields {
  return { topic: [], question: [], answer: [] };
}

/**
 * Build a card from collected lines, or return null when it lacks a question or an answer
 */
function toFlashcard(fields: CardFields): Flashcard | null {
  const question = stripEmphasis(fields.question.join(' '));
  const answer = stripEmphasis(fields.answer.join(' '));
  if (!question || !answer) {
    return null;
  }

  return {
    topic: stripEmphasis(fields.topic.join(' ')) || DEFAULT_FLASHCARD_TOPIC,
    question,
    answer,
  };
}

/**
 * Parse the cards in one section. A topic line after a question, or a question
 * line after an answer, starts the next card.
 */
function parseCardSection(section: string): Flashcard[] {
  const cards: Flashcard[] = [];
  let fields = emptyCardFields();
  let current: keyof Flashcard | null = null;

  const finishCard = () => {
    const card = toFlashcard(fields);
    if (card) {
      cards.push(card);
    }
    fields = emptyCardFields();
  };

  for (const rawLine of section.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const topicMatch = line.match(TOPIC_LINE);
    const questionMatch = topicMatch ? null : line.match(QUESTION_LINE);
    const answerMatch = topicMatch || questionMatch ? null : line.match(ANSWER_LINE);

    if (topicMatch) {
      if (fields.question.length > 0) finishCard();
      current = 'topic';
      fields.topic.push(topicMatch[1]);
    } else if (questionMatch) {
      if (fields.answer.length > 0) finishCard();
      current = 'question';
      fields.question.push(questionMatch[1]);
    } else if (answerMatch) {
      current = 'answer';
      fields.answer.push(answerMatch[1]);
    } else if (current) {
      fields[current].push(line);
    }
  }

  finishCard();
  return cards;
}

/**
 * Accept flashcards sent as a JSON list instead of the delimited format
 */
function parseJSONFlashcards(response: string): Flashcard[] {
  const value = parseJSONValue(response);
  const list = isRecord(value) ? value.flashcards : value;
  if (!Array.isArray(list)) {
    return [];
  }

  const cards: Flashcard[] = [];
  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const question = entry.question ?? entry.front;
    const answer = entry.answer ?? entry.back;
    if (typeof question !== 'string' || typeof answer !== 'string' || !question.trim() || !answer.trim()) {
      continue;
    }
    cards.push({
      topic: typeof entry.topic === 'string' && entry.topic.trim() ? entry.topic.trim() : DEFAULT_FLASHCARD_TOPIC,
      question: question.trim(),
      answer: answer.trim(),
    });
  }
  return cards;
}

/**
 * Parse a flashcard reply. Cards missing a question or an answer are dropped. Never throws.
 */
export function parseFlashcardResponse(response: string): Flashcard[] {
  const text = stripCodeFences(response);
  if (!HAS_QUESTION_LINE.test(text)) {
    return parseJSONFlashcards(text);
  }

  return text.split(CARD_SEPARATOR).flatMap(parseCardSection);
}

/**
 * Clean a summary reply. Returns an empty string when there is nothing left.
 */
export function parseSummaryResponse(response: string): string {
  return stripCodeFences(response);
}
