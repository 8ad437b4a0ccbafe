/**
 * Learner preferences sent with every tutoring request.
 */
export interface PreferenceSet {
  subject: string;
  level: string;
  learningStyle: string;
  language: string;
  /** Prior knowledge of the subject, when the learner gave it */
  background?: string;
}

/**
 * Choices offered to clients. Values outside these lists are still accepted.
 */
export const PREFERENCE_OPTIONS = {
  subjects: ['Mathematics', 'Physics', 'Computer Science', 'History', 'Biology', 'Programming'],
  levels: ['Beginner', 'Intermediate', 'Advanced'],
  learningStyles: ['Visual', 'Text-based', 'Hands-on'],
  languages: ['English', 'Hindi', 'Spanish', 'French'],
  backgrounds: ['Beginner', 'Some Knowledge', 'Experienced'],
} as const;
