import express, { Application } from 'express';
import { createRoutes } from './routes/index.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import type { TranscriptLookup } from './lib/services/TranscriptService.js';

/**
 * Create the Express application around a transcript service
 * Kept free of side effects so tests can build it with stub dependencies
 */
export function createApp(transcriptService: TranscriptLookup): Application {
  const app: Application = express();

  // Mount routes
  app.use(createRoutes(transcriptService));

  // Add 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
