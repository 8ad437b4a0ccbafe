import type { DocumentService } from '@/domain/document';
import { PREFERENCE_OPTIONS } from '@/domain/preferences';
import {
  DEFAULT_QUIZ_QUESTIONS,
  MAX_QUIZ_QUESTIONS,
  MIN_QUIZ_QUESTIONS,
  type QuizService,
} from '@/domain/quiz';
import type { TutorService } from '@/domain/tutor';
import type { ILLMProvider } from '@/ports';
import cors from 'cors';
import express from 'express';
import multer from 'multer';
import { asyncHandler } from './asyncHandler';
import { HttpError } from './errors';
import { errorHandler, notFound, requestLogger } from './middleware';
import { discussRequestSchema, quizRequestSchema, tutorRequestSchema } from './schemas';

export const API_VERSION = '1.0.0';

export interface AppDependencies {
  tutorService: TutorService;
  quizService: QuizService;
  documentService: DocumentService;
  llmProvider: ILLMProvider;
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins: string[];
  maxUploadBytes: number;
}

/**
 * Build the Express application with every route and middleware.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  app.use(requestLogger);
  app.use(cors(deps.corsOrigins.length > 0 ? { origin: deps.corsOrigins } : undefined));
  app.use(express.json({ limit: '2mb' }));

  app.get('/', (_req, res) => {
    res.json({
      title: 'AI Tutor API',
      description:
        'Personalised explanations, quizzes, flashcards and document discussion backed by a hosted language model.',
      version: API_VERSION,
    });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      provider: deps.llmProvider.getProviderName(),
      model: deps.llmProvider.getModelName(),
    });
  });

  app.get('/options', (_req, res) => {
    res.json({
      subjects: PREFERENCE_OPTIONS.subjects,
      levels: PREFERENCE_OPTIONS.levels,
      learning_styles: PREFERENCE_OPTIONS.learningStyles,
      languages: PREFERENCE_OPTIONS.languages,
      backgrounds: PREFERENCE_OPTIONS.backgrounds,
      quiz: {
        min_questions: MIN_QUIZ_QUESTIONS,
        max_questions: MAX_QUIZ_QUESTIONS,
        default_questions: DEFAULT_QUIZ_QUESTIONS,
      },
    });
  });

  app.post(
    '/tutor',
    asyncHandler(async (req, res) => {
      const body = tutorRequestSchema.parse(req.body);
      const result = await deps.tutorService.explain(
        {
          subject: body.subject,
          level: body.level,
          learningStyle: body.learning_style,
          language: body.language,
          background: body.background,
        },
        body.question,
      );
      res.json(result);
    }),
  );

  app.post(
    '/quiz',
    asyncHandler(async (req, res) => {
      const body = quizRequestSchema.parse(req.body);
      const result = await deps.quizService.generate({
        subject: body.subject,
        level: body.level,
        numQuestions: body.num_questions,
        language: body.language,
        topic: body.topic,
        revealFormat: body.reveal_format,
      });
      res.json({
        quiz: result.quiz.map((item) => ({
          question: item.question,
          options: item.options,
          correct_answer: item.correctAnswer,
          explanation: item.explanation,
        })),
        formatted_quiz: result.formattedQuiz,
        fallback: result.fallback,
        message: result.message,
      });
    }),
  );

  app.post(
    '/process_pdf',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      if (!req.file) {
        throw new HttpError(400, 'No file uploaded. Send a PDF in the "file" field.', [
          { field: 'file', message: 'Required' },
        ]);
      }

      const result = await deps.documentService.process({
        filename: req.file.originalname,
        mimeType: req.file.mimetype,
        data: req.file.buffer,
      });
      res.json({
        filename: result.filename,
        content: result.content,
        summary: result.summary,
        flashcards: result.flashcards,
        page_count: result.pageCount,
        chunk_count: result.chunkCount,
        fallback: result.fallback,
      });
    }),
  );

  app.post(
    '/discuss_pdf',
    asyncHandler(async (req, res) => {
      const body = discussRequestSchema.parse(req.body);
      const result = await deps.documentService.discuss({
        question: body.question,
        content: body.pdf_content,
        summary: body.pdf_summary,
      });
      res.json(result);
    }),
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
