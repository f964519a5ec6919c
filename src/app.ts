/**
 * Express application for the Greek voice trainer
 */
import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import bodyParser from 'body-parser';
import { errorHandler } from './middleware/error.js';
import type { SpeechRecognizer } from './services/speech-to-text.js';
import type { SpeechSynthesizer } from './services/google-cloud-tts.js';
import type { SentenceGenerator } from './services/sentence-generator.js';

// Route imports
import gradingRouter from './routes/grading.js';
import commandsRouter from './routes/commands.js';
import { createHealthRouter } from './routes/health.js';
import { createSpeechRouter } from './routes/speech.js';
import { createTtsRouter } from './routes/tts.js';
import { createSentencesRouter } from './routes/sentences.js';

/**
 * External services; null when not configured (their routes answer 503)
 */
export interface AppServices {
  recognizer: SpeechRecognizer | null;
  synthesizer: SpeechSynthesizer | null;
  generator: SentenceGenerator | null;
}

export interface AppOptions {
  allowedOrigins: string[];
  recognitionLanguage: string;
  ttsLanguage: string;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like mobile apps or curl)
      if (!origin) return callback(null, true);

      if (options.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // Base64 audio makes bodies large
  app.use(bodyParser.json({ limit: '10mb' }));

  // API Routes
  app.use('/api/health', createHealthRouter(services));
  app.use('/api/grading', gradingRouter);
  app.use('/api/speech', createSpeechRouter(services.recognizer, options.recognitionLanguage));
  app.use('/api/tts', createTtsRouter(services.synthesizer, options.ttsLanguage));
  app.use('/api/sentences', createSentencesRouter(services.generator));
  app.use('/api/commands', commandsRouter);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
