/**
 * Environment configuration
 */
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

export const config = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Application
  FRONTEND_URL: process.env.FRONTEND_URL || 'http://localhost:4000',
  CORS_ORIGINS: process.env.CORS_ORIGINS || 'http://localhost:4000',

  // Speech recognition
  DEEPGRAM_API_KEY: process.env.DEEPGRAM_API_KEY || '',
  RECOGNITION_LANGUAGE: process.env.RECOGNITION_LANGUAGE || 'el-GR',

  // Text-to-speech (falls back to GOOGLE_APPLICATION_CREDENTIALS when empty)
  GOOGLE_CLOUD_CREDENTIALS_JSON: process.env.GOOGLE_CLOUD_CREDENTIALS_JSON || '',
  TTS_LANGUAGE: process.env.TTS_LANGUAGE || 'el-GR',

  // Sentence generation
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
} as const;

// Validate required environment variables
export const requiredEnvVars = [
  'DEEPGRAM_API_KEY',
  'OPENAI_API_KEY',
] as const;

export function missingEnvVars(): string[] {
  return requiredEnvVars.filter((key) => !config[key]);
}

const missing = missingEnvVars();

if (missing.length > 0 && config.NODE_ENV !== 'development' && config.NODE_ENV !== 'test') {
  console.warn(`⚠️  Missing environment variables: ${missing.join(', ')}`);
}

export function corsOrigins(): string[] {
  const listed = config.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return Array.from(new Set([config.FRONTEND_URL, ...listed]));
}

export type Config = typeof config;
