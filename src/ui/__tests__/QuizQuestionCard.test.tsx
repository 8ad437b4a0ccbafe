// @vitest-environment jsdom
import type { QuizItem } from '@/domain/quiz/types';
import { render, screen } from '@testing-library/react';
import { describe, expect, it } from 'vitest';
import { QuizQuestionCard } from '../components/quiz';

const item: QuizItem = {
  question: 'What is the capital of France?',
  options: ['Berlin', 'Paris', 'Madrid', 'Rome'],
  correctAnswer: 'Paris',
  explanation: 'Paris has been the capital since the 10th century.',
};

describe('QuizQuestionCard', () => {
  it('shows the question and its position', () => {
    render(<QuizQuestionCard item={item} questionNumber={2} totalQuestions={5} />);

    expect(screen.getByText('Question 2 of 5')).toBeTruthy();
    expect(screen.getByRole('heading', { name: 'What is the capital of France?' })).toBeTruthy();
  });

  it('renders each option as a radio button in one group', () => {
    render(<QuizQuestionCard item={item} questionNumber={1} totalQuestions={1} />);

    const radios = screen.getAllByRole('radio');
    expect(radios).toHaveLength(4);
    for (const radio of radios) {
      expect(radio.getAttribute('name')).toBe('question-1');
    }
    expect(screen.getByLabelText('B) Paris').getAttribute('value')).toBe('B');
  });

  it('keeps the answer inside a closed reveal element', () => {
    const { container } = render(<QuizQuestionCard item={item} questionNumber={1} totalQuestions={1} />);

    const details = container.querySelector('details');
    expect(details).not.toBeNull();
    expect(details?.hasAttribute('open')).toBe(false);
    expect(details?.querySelector('summary')?.textContent).toBe('Show answer');
    expect(screen.getByText('Correct answer: B) Paris').closest('details')).toBe(details);
    expect(screen.getByText(item.explanation).closest('details')).toBe(details);
  });

  it('omits the explanation paragraph when there is none', () => {
    const { container } = render(
      <QuizQuestionCard item={{ ...item, explanation: '' }} questionNumber={1} totalQuestions={1} />,
    );

    expect(container.querySelector('.tutor-explanation')).toBeNull();
  });
});
