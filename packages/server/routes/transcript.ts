import express, { Router, Request, Response } from 'express';
import type { TranscriptNotAvailableResponse, TranscriptResponse } from '@transcript-relay/shared';
import { isTranscriptFound } from '@transcript-relay/shared';
import { parseVideoId } from '../lib/youtube/parseVideoId.js';
import type { TranscriptLookup } from '../lib/services/TranscriptService.js';
import { asyncHandler, jsonBodyErrorHandler } from '../middleware/error.js';

const MISSING_URL_MESSAGE = 'Missing YouTube URL';
const INVALID_URL_MESSAGE = 'Invalid YouTube URL';

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Transcript endpoint
 * POST /transcript with `{ "url": "<YouTube URL>" }`
 *
 * - 400 text/plain when the url is missing or holds no video id
 * - 404 JSON when no source produced a transcript
 * - 200 JSON with transcript, language_code and source
 */
export function createTranscriptRouter(transcriptService: TranscriptLookup): Router {
  const router: Router = express.Router();

  router.post(
    '/',
    express.json(),
    jsonBodyErrorHandler(MISSING_URL_MESSAGE),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const payload: unknown = req.body;

      if (!isJsonObject(payload) || Object.keys(payload).length === 0 || !('url' in payload)) {
        res.status(400).type('text/plain').send(MISSING_URL_MESSAGE);
        return;
      }

      const videoId = typeof payload.url === 'string' ? parseVideoId(payload.url) : null;
      if (!videoId) {
        res.status(400).type('text/plain').send(INVALID_URL_MESSAGE);
        return;
      }

      const result = await transcriptService.getTranscript(videoId);

      if (!isTranscriptFound(result)) {
        const body: TranscriptNotAvailableResponse = {
          error: 'Transcript not available',
          source: result.source
        };
        res.status(404).json(body);
        return;
      }

      // res.json keeps non-ASCII characters literal and declares charset=utf-8
      const body: TranscriptResponse = {
        transcript: result.text,
        language_code: result.languageCode,
        source: result.source
      };
      res.status(200).json(body);
    })
  );

  return router;
}
