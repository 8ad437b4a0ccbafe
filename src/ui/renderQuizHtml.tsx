import type { QuizItem } from '@/domain/quiz/types';
import { renderToStaticMarkup } from 'react-dom/server';
import { QuizPage } from './QuizPage';

/**
 * Render a quiz as a standalone HTML page.
 */
export function renderQuizHtml(title: string, items: QuizItem[]): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<QuizPage title={title} items={items} />)}`;
}
