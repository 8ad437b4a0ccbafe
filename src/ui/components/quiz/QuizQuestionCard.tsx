import type { QuizItem } from '@/domain/quiz/types';
import { OPTION_LETTERS } from '@/domain/quiz/types';
import { Card } from '@/ui/components/shared/Card';
import { AnswerOption } from './AnswerOption';

/**
 * QuizQuestionCard component props.
 */
export interface QuizQuestionCardProps {
  item: QuizItem;
  questionNumber: number;
  totalQuestions: number;
}

/**
 * Card showing one question, its options, and the answer behind a reveal.
 */
export function QuizQuestionCard({ item, questionNumber, totalQuestions }: QuizQuestionCardProps) {
  const groupName = `question-${questionNumber}`;
  const correctIndex = item.options.indexOf(item.correctAnswer);
  const correctLetter = OPTION_LETTERS[correctIndex];

  return (
    <Card as="section" className="tutor-quiz-question" aria-labelledby={`${groupName}-title`}>
      <div className="tutor-question-header">
        Question {questionNumber} of {totalQuestions}
      </div>
      <h3 id={`${groupName}-title`} className="tutor-question-text">
        {item.question}
      </h3>
      <ol className="tutor-answer-options">
        {item.options.map((option, index) => (
          <AnswerOption key={index} option={option} index={index} groupName={groupName} />
        ))}
      </ol>
      <details className="tutor-answer-reveal">
        <summary>Show answer</summary>
        <p className="tutor-correct-answer">
          Correct answer: {correctLetter ? `${correctLetter}) ` : ''}
          {item.correctAnswer}
        </p>
        {item.explanation && <p className="tutor-explanation">{item.explanation}</p>}
      </details>
    </Card>
  );
}
