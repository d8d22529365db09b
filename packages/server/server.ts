import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import type { Application } from 'express';
import { createApp } from './app.js';
import { getTranscriptServiceConfig, getConfigSummary } from './config/transcriptServiceConfig.js';
import { TranscriptService } from './lib/services/TranscriptService.js';
import { logger } from './lib/logger.js';

// Get __dirname equivalent in ES modules
const __filename: string = fileURLToPath(import.meta.url);
const __dirname: string = path.dirname(__filename);

// Load environment variables
// Priority: 1) .env.local (for local dev overrides) 2) .env (default)
// On hosted platforms env vars are injected directly and these files are absent.
dotenv.config({ path: path.join(__dirname, '../../.env') });
dotenv.config({ path: path.join(__dirname, '../../.env.local'), override: true });

/**
 * Build the application from environment configuration and start listening
 */
const initializeServer = async (): Promise<Application> => {
  const config = getTranscriptServiceConfig();
  const app = createApp(TranscriptService.fromConfig(config));

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => resolve());
    server.on('error', reject);
  });

  logger.info('system', `Server running on http://${config.host}:${config.port}`, {
    metadata: { ...getConfigSummary(config), environment: process.env.NODE_ENV || 'development' }
  });

  return app;
};

// Start the server (skip automatic startup during tests)
if (process.env.NODE_ENV !== 'test') {
  initializeServer().catch((error: unknown) => {
    const errorMessage: string = error instanceof Error ? error.message : 'Unknown error in server initialization';
    logger.error('system', 'Server initialization failed', { error: errorMessage });
    process.exit(1);
  });
}

export { initializeServer };
