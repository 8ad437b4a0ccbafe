import 'dotenv/config';
import { createLLMProvider } from '@/adapters/createLLMProvider';
import { PdfParseTextExtractor } from '@/adapters/pdf/PdfParseTextExtractor';
import { type AppConfig, loadConfig } from '@/config';
import { DocumentService } from '@/domain/document';
import { errorMessage } from '@/domain/errors';
import { QuizService } from '@/domain/quiz';
import { TutorService } from '@/domain/tutor';
import { createApp } from '@/http/app';

/**
 * Wire adapters and services from configuration and start the HTTP server.
 */
function start(config: AppConfig): void {
  const llmProvider = createLLMProvider(config.llm);
  const chatOptions = { temperature: config.llm.temperature, timeoutMs: config.llm.timeoutMs };

  const app = createApp({
    tutorService: new TutorService(llmProvider, chatOptions),
    quizService: new QuizService(llmProvider, chatOptions),
    documentService: new DocumentService(llmProvider, new PdfParseTextExtractor(), {
      ...chatOptions,
      ...config.document,
    }),
    llmProvider,
    corsOrigins: config.corsOrigins,
    maxUploadBytes: config.maxUploadBytes,
  });

  const server = app.listen(config.port, () => {
    console.log(
      `[Server] AI Tutor API listening on http://localhost:${config.port} ` +
        `(${llmProvider.getProviderName()} ${llmProvider.getModelName()})`,
    );
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close((error) => {
      if (error) {
        console.error('[Server] Error while closing:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  start(loadConfig());
} catch (error) {
  console.error(`[Server] Failed to start: ${errorMessage(error)}`);
  process.exit(1);
}
