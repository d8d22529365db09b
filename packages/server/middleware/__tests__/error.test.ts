/**
 * Unit tests for packages/server/middleware/error.ts
 * Tests the error handling middleware for Express routes
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import express, { type NextFunction, type Request, type Response } from 'express'
import request from 'supertest'
import { asyncHandler, errorHandler, jsonBodyErrorHandler, notFoundHandler } from '../error.js'

interface StatusError extends Error {
  statusCode?: number
  status?: number
}

function statusError(message: string, fields: Partial<StatusError>): StatusError {
  return Object.assign(new Error(message), fields)
}

// Build an app whose only route fails with the given error
function appThrowing(error: unknown) {
  const app = express()
  app.get('/fail', () => {
    throw error
  })
  app.use(notFoundHandler)
  app.use(errorHandler)
  return app
}

describe('Error Handling Middleware', () => {
  let consoleErrorSpy: MockInstance

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('errorHandler', () => {
    it('should answer 500 with the error message and ServerError source', async () => {
      const response = await request(appThrowing(new Error('Test error'))).get('/fail')

      expect(response.status).toBe(500)
      expect(response.body).toEqual({ error: 'Test error', source: 'ServerError' })
    })

    it('should log the error with its stack', async () => {
      await request(appThrowing(new Error('Logged error'))).get('/fail')

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1)
      const [line] = consoleErrorSpy.mock.calls[0]
      const entry = JSON.parse(String(line))
      expect(entry).toMatchObject({
        level: 'error',
        context: 'http',
        message: 'Unhandled error while serving request',
        error: 'Logged error',
        metadata: { method: 'GET', path: '/fail', status: 500 },
      })
      expect(entry.metadata.stack_trace).toContain('Logged error')
    })

    it('should keep an HTTP status carried by the error', async () => {
      const response = await request(appThrowing(statusError('Payload too large', { statusCode: 413 }))).get('/fail')

      expect(response.status).toBe(413)
      expect(response.body).toEqual({ error: 'Payload too large', source: 'ServerError' })
    })

    it('should fall back to `status` when `statusCode` is absent', async () => {
      const response = await request(appThrowing(statusError('Teapot', { status: 418 }))).get('/fail')

      expect(response.status).toBe(418)
    })

    it('should ignore statuses outside the error range', async () => {
      const response = await request(appThrowing(statusError('Odd', { statusCode: 302 }))).get('/fail')

      expect(response.status).toBe(500)
    })

    it('should stringify non-Error throwables', async () => {
      const response = await request(appThrowing('plain string failure')).get('/fail')

      expect(response.status).toBe(500)
      expect(response.body).toEqual({ error: 'plain string failure', source: 'ServerError' })
    })
  })

  describe('jsonBodyErrorHandler', () => {
    const app = express()
    app.post('/echo', express.json(), jsonBodyErrorHandler('Bad body'), (req: Request, res: Response) => {
      res.json(req.body)
    })
    app.use(errorHandler)

    it('should turn a JSON parse failure into a plain-text 400', async () => {
      const response = await request(app)
        .post('/echo')
        .set('Content-Type', 'application/json')
        .send('{oops')

      expect(response.status).toBe(400)
      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8')
      expect(response.text).toBe('Bad body')
    })

    it('should turn other body-parser failures into the same 400', async () => {
      const response = await request(app)
        .post('/echo')
        .set('Content-Type', 'application/json')
        .set('Content-Encoding', 'br-unknown')
        .send('{"ok":true}')

      expect(response.status).toBe(400)
      expect(response.text).toBe('Bad body')
    })

    it('should pass errors without a body-parser type to the next handler', async () => {
      const failing = express()
      failing.post('/echo', (_req: Request, _res: Response, next: NextFunction) => {
        next(new Error('not a body error'))
      }, jsonBodyErrorHandler('Bad body'))
      failing.use(errorHandler)

      const response = await request(failing).post('/echo').send({ ok: true })

      expect(response.status).toBe(500)
      expect(response.body).toEqual({ error: 'not a body error', source: 'ServerError' })
    })

    it('should leave valid bodies alone', async () => {
      const response = await request(app).post('/echo').send({ ok: true })

      expect(response.status).toBe(200)
      expect(response.body).toEqual({ ok: true })
    })
  })

  describe('notFoundHandler', () => {
    it('should answer unknown routes with ENDPOINT_NOT_FOUND', async () => {
      const response = await request(appThrowing(new Error('unused'))).get('/missing')

      expect(response.status).toBe(404)
      expect(response.body).toEqual({ error: 'Endpoint not found', code: 'ENDPOINT_NOT_FOUND' })
    })
  })

  describe('asyncHandler', () => {
    it('should forward rejected promises to the error handler', async () => {
      const app = express()
      app.get('/async', asyncHandler(async () => {
        throw new Error('Async failure')
      }))
      app.use(errorHandler)

      const response = await request(app).get('/async')

      expect(response.status).toBe(500)
      expect(response.body).toEqual({ error: 'Async failure', source: 'ServerError' })
    })

    it('should let resolved handlers respond normally', async () => {
      const app = express()
      app.get('/async', asyncHandler(async (_req, res) => {
        res.status(201).json({ created: true })
      }))

      const response = await request(app).get('/async')

      expect(response.status).toBe(201)
      expect(response.body).toEqual({ created: true })
    })
  })
})
