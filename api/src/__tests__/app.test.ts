import request from 'supertest'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../app'

describe('api app', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('queues the webhook body as is and answers ok', async () => {
    const enqueueUpdate = vi.fn(async (_update: unknown) => {})
    const update = { update_id: 7, message: { message_id: 1, text: 'hi' } }

    const res = await request(createApp({ enqueueUpdate })).post('/telegram/webhook').send(update)

    expect(res.status).toBe(200)
    expect(res.text).toBe('ok')
    expect(enqueueUpdate).toHaveBeenCalledWith(update)
  })

  it('still answers ok when the queue is unavailable', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const enqueueUpdate = vi.fn(async (_update: unknown) => {
      throw new Error('Connection is closed.')
    })

    const res = await request(createApp({ enqueueUpdate })).post('/telegram/webhook').send({ update_id: 8 })

    expect(res.status).toBe(200)
    expect(res.text).toBe('ok')
    expect(errorSpy).toHaveBeenCalledWith(
      'TELEGRAM WEBHOOK: не удалось поставить апдейт в очередь:',
      'Connection is closed.'
    )
  })

  it('answers ping and 404 for unknown routes', async () => {
    const app = createApp({ enqueueUpdate: vi.fn(async (_update: unknown) => {}) })

    const ping = await request(app).get('/ping')
    const missing = await request(app).get('/nope')

    expect(ping.text).toBe('pong')
    expect(missing.status).toBe(404)
    expect(missing.body).toEqual({ error: 'Not Found' })
  })
})
