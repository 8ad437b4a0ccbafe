import { ValidationError } from '@/domain/errors';
import type { PreferenceSet } from './types';

/**
 * Return the trimmed value, or throw when it is empty or whitespace only.
 */
export function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} cannot be empty`, field);
  }
  return trimmed;
}

/**
 * Check that every required preference is present.
 * Values are returned unchanged so prompts carry them verbatim.
 */
export function validatePreferences(preferences: PreferenceSet): PreferenceSet {
  requireText(preferences.subject, 'subject');
  requireText(preferences.level, 'level');
  requireText(preferences.learningStyle, 'learningStyle');
  requireText(preferences.language, 'language');
  return preferences;
}
