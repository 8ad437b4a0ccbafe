import type { QuizItem } from '@/domain/quiz/types';
import { QuizQuestionCard } from '@/ui/components/quiz';
import { QUIZ_PAGE_STYLES } from './quizStyles';

export interface QuizPageProps {
  title: string;
  items: QuizItem[];
}

/**
 * Self-contained quiz document. Answers are hidden until revealed.
 */
export function QuizPage({ title, items }: QuizPageProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
        <style>{QUIZ_PAGE_STYLES}</style>
      </head>
      <body>
        <main className="tutor-quiz">
          <h1>{title}</h1>
          {items.map((item, index) => (
            <QuizQuestionCard
              key={index}
              item={item}
              questionNumber={index + 1}
              totalQuestions={items.length}
            />
          ))}
        </main>
      </body>
    </html>
  );
}
