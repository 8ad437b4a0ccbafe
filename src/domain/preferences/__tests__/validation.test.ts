import { ValidationError } from '@/domain/errors';
import { describe, expect, it } from 'vitest';
import { requireText, validatePreferences } from '../validation';

describe('requireText', () => {
  it('returns the trimmed value', () => {
    expect(requireText('  What is inertia?\n', 'question')).toBe('What is inertia?');
  });

  it.each(['', '   ', '\n\t', undefined])('rejects %j', (value) => {
    expect(() => requireText(value, 'question')).toThrow('question cannot be empty');
  });

  it('reports the field on the error', () => {
    try {
      requireText(' ', 'subject');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).field).toBe('subject');
    }
  });
});

describe('validatePreferences', () => {
  const preferences = {
    subject: 'Physics',
    level: 'Beginner',
    learningStyle: 'Visual',
    language: 'English',
  };

  it('returns the preferences unchanged', () => {
    const withPadding = { ...preferences, subject: ' Physics ' };
    expect(validatePreferences(withPadding)).toBe(withPadding);
  });

  it('accepts values outside the offered choices', () => {
    expect(() => validatePreferences({ ...preferences, subject: 'Astronomy' })).not.toThrow();
  });

  it('rejects a missing learning style', () => {
    expect(() => validatePreferences({ ...preferences, learningStyle: '' })).toThrow(
      'learningStyle cannot be empty',
    );
  });

  it('does not require background', () => {
    expect(() => validatePreferences({ ...preferences, background: undefined })).not.toThrow();
  });
});
