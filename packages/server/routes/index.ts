import express, { Router } from 'express';
import { API_ENDPOINTS } from '@transcript-relay/shared';

// Import all route modules
import healthRouter from './health.js';
import { createTranscriptRouter } from './transcript.js';
import type { TranscriptLookup } from '../lib/services/TranscriptService.js';

/**
 * Assemble the service routes around a transcript service
 */
export function createRoutes(transcriptService: TranscriptLookup): Router {
  // Create router with proper typing
  const router: Router = express.Router();

  // Mount routes with descriptive comments
  router.use('/', healthRouter);                                          // Liveness and health probes
  router.use(API_ENDPOINTS.TRANSCRIPT, createTranscriptRouter(transcriptService)); // Transcript lookup

  return router;
}
