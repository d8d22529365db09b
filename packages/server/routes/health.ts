import express, { Router, Request, Response } from 'express';
import { API_ENDPOINTS } from '@transcript-relay/shared';

export const LIVENESS_MESSAGE = 'Transcript Relay API is live!';

// Create router with proper typing
const router: Router = express.Router();

/**
 * Liveness endpoint
 * GET /
 * Always 200; never touches upstream caption sources
 */
router.get(API_ENDPOINTS.ROOT, (_req: Request, res: Response): void => {
    res.status(200).type('text/plain').send(LIVENESS_MESSAGE);
});

/**
 * Platform health probe
 * GET /healthz
 */
router.get(API_ENDPOINTS.HEALTH, (_req: Request, res: Response): void => {
    res.sendStatus(200);
});

export default router;
