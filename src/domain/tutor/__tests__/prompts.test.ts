import { describe, expect, it } from 'vitest';
import {
  TUTOR_SYSTEM_PROMPT,
  buildTutorPrompt,
  describeLearningStyle,
  parseExplanation,
} from '../prompts';

const preferences = {
  subject: 'Physics',
  level: 'Intermediate',
  learningStyle: 'Hands-on',
  language: 'Spanish',
};

describe('TUTOR_SYSTEM_PROMPT', () => {
  it('asks for markdown output', () => {
    expect(TUTOR_SYSTEM_PROMPT).toContain('Format your answer in markdown');
  });
});

describe('buildTutorPrompt', () => {
  it('includes every preference field verbatim', () => {
    const prompt = buildTutorPrompt(
      { ...preferences, background: 'Some Knowledge' },
      "Explain Newton's Second Law of Motion.",
    );

    expect(prompt).toContain('Subject: Physics');
    expect(prompt).toContain('Learning level: Intermediate');
    expect(prompt).toContain('Learning style: Hands-on');
    expect(prompt).toContain('Preferred language: Spanish');
    expect(prompt).toContain('Background knowledge: Some Knowledge');
  });

  it('includes the question verbatim', () => {
    const prompt = buildTutorPrompt(preferences, 'Why is F = m * a?');
    expect(prompt).toContain('Explain the following question to this learner:\nWhy is F = m * a?');
  });

  it('keeps free-text preferences exactly as given', () => {
    const prompt = buildTutorPrompt(
      { ...preferences, subject: 'Quantum  Chemistry (Year 2)', language: 'Português' },
      'What is an orbital?',
    );

    expect(prompt).toContain('Subject: Quantum  Chemistry (Year 2)');
    expect(prompt).toContain('Write the whole answer in Português');
  });

  it('omits background when not given', () => {
    expect(buildTutorPrompt(preferences, 'Q')).not.toContain('Background knowledge');
  });

  it('adds style guidance', () => {
    expect(buildTutorPrompt(preferences, 'Q')).toContain('Teach through worked examples');
  });
});

describe('describeLearningStyle', () => {
  it('matches known styles case-insensitively', () => {
    expect(describeLearningStyle('VISUAL')).toBe(
      'Describe diagrams, charts or mental images in words, and use analogies the learner can picture.',
    );
  });

  it('falls back to a generic instruction', () => {
    expect(describeLearningStyle('Auditory')).toBe(
      'Adapt the explanation to a "Auditory" learning style.',
    );
  });
});

describe('parseExplanation', () => {
  it('trims the reply', () => {
    expect(parseExplanation('\n  ## Answer\nText  \n')).toBe('## Answer\nText');
  });

  it('returns null for an empty reply', () => {
    expect(parseExplanation('   \n')).toBeNull();
  });
});
