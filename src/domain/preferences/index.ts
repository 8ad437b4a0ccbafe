export type { PreferenceSet } from './types';
export { PREFERENCE_OPTIONS } from './types';
export { requireText, validatePreferences } from './validation';
