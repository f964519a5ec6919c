/**
 * Main entry point for the Greek Voice Trainer API
 */
import { createServer } from 'http';
import { config, corsOrigins } from './config/env.js';
import { createApp, type AppServices } from './app.js';
import { DeepgramRecognizer } from './services/speech-to-text.js';
import { GoogleSpeechSynthesizer } from './services/google-cloud-tts.js';
import { OpenAISentenceGenerator } from './services/sentence-generator.js';

const services: AppServices = {
  recognizer: config.DEEPGRAM_API_KEY ? new DeepgramRecognizer(config.DEEPGRAM_API_KEY) : null,
  synthesizer: new GoogleSpeechSynthesizer(config.GOOGLE_CLOUD_CREDENTIALS_JSON),
  generator: config.OPENAI_API_KEY
    ? new OpenAISentenceGenerator(config.OPENAI_API_KEY, config.OPENAI_MODEL)
    : null,
};

const app = createApp(services, {
  allowedOrigins: corsOrigins(),
  recognitionLanguage: config.RECOGNITION_LANGUAGE,
  ttsLanguage: config.TTS_LANGUAGE,
});
const httpServer = createServer(app);

// Start server
const PORT = config.PORT;
httpServer.listen(PORT, () => {
  console.log('\n==============================================');
  console.log(`🚀 Greek Voice Trainer API running on port ${PORT}`);
  console.log(`📍 Environment: ${config.NODE_ENV}`);
  console.log(`🌐 CORS enabled for: ${corsOrigins().join(', ')}`);
  console.log(`🎤 Deepgram: ${services.recognizer ? 'Configured' : 'Not configured'}`);
  console.log(`🔊 Google TTS: ${config.GOOGLE_CLOUD_CREDENTIALS_JSON ? 'Inline credentials' : 'Default credentials'}`);
  console.log(`🧠 OpenAI: ${services.generator ? `Configured (${config.OPENAI_MODEL})` : 'Not configured'}`);
  console.log('==============================================\n');
});

export { app, httpServer };
