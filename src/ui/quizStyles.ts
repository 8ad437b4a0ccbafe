export const QUIZ_PAGE_STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; padding: 1rem; color: #1f2937; background: #f9fafb; }
h1 { font-size: 1.4rem; margin: 0 0 1rem; }
.tutor-card { background: #fff; border: 1px solid #e5e7eb; border-radius: 8px; padding: 1rem 1.25rem; margin-bottom: 1rem; }
.tutor-question-header { font-size: 0.8rem; color: #6b7280; text-transform: uppercase; letter-spacing: 0.04em; }
.tutor-question-text { font-size: 1.05rem; margin: 0.5rem 0 0.75rem; }
.tutor-answer-options { list-style: none; padding: 0; margin: 0 0 0.75rem; }
.tutor-answer-option { margin: 0.35rem 0; }
.tutor-answer-option-letter { font-weight: 600; }
.tutor-answer-reveal summary { cursor: pointer; color: #2563eb; }
.tutor-correct-answer { font-weight: 600; color: #047857; }
.tutor-explanation { color: #374151; }
`;
