import { OPTION_LETTERS } from '@/domain/quiz/types';

/**
 * AnswerOption component props.
 */
export interface AnswerOptionProps {
  option: string;
  index: number;
  /** Radio group shared by the options of one question */
  groupName: string;
}

/**
 * A selectable multiple-choice option.
 */
export function AnswerOption({ option, index, groupName }: AnswerOptionProps) {
  const optionLetter = OPTION_LETTERS[index] ?? String(index + 1);
  const inputId = `${groupName}-${optionLetter}`;

  return (
    <li className="tutor-answer-option">
      <input type="radio" id={inputId} name={groupName} value={optionLetter} />
      <label htmlFor={inputId}>
        <span className="tutor-answer-option-letter">{optionLetter})</span>{' '}
        <span className="tutor-answer-option-text">{option}</span>
      </label>
    </li>
  );
}
