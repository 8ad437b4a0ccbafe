export {
  EXPLANATION_NOT_GENERATED_MESSAGE,
  TUTOR_UNAVAILABLE_MESSAGE,
  TutorService,
} from './TutorService';
export type { ExplanationResult, TutorServiceOptions } from './TutorService';
export { TUTOR_SYSTEM_PROMPT, buildTutorPrompt, describeLearningStyle, parseExplanation } from './prompts';
