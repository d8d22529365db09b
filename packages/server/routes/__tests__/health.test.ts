/**
 * Unit tests for packages/server/routes/health.ts
 */

import { describe, it, expect, vi } from 'vitest'
import request from 'supertest'
import express from 'express'
import healthRouter, { LIVENESS_MESSAGE } from '../health.js'
import { createApp } from '../../app.js'

// Create a simple express app to test the router
const app = express()
app.use('/', healthRouter)

describe('Liveness Route (GET /)', () => {
  it('should return 200 with the liveness message', async () => {
    const response = await request(app).get('/')

    expect(response.status).toBe(200)
    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8')
    expect(response.text).toBe('Transcript Relay API is live!')
    expect(LIVENESS_MESSAGE).toBe('Transcript Relay API is live!')
  })

  it('should stay healthy regardless of upstream state', async () => {
    const getTranscript = vi.fn().mockRejectedValue(new Error('upstream down'))
    const fullApp = createApp({ getTranscript })

    const response = await request(fullApp).get('/')

    expect(response.status).toBe(200)
    expect(getTranscript).not.toHaveBeenCalled()
  })
})

describe('Health Probe (GET /healthz)', () => {
  it('should return 200 OK', async () => {
    const response = await request(app).get('/healthz')

    expect(response.status).toBe(200)
    expect(response.text).toBe('OK')
  })
})
