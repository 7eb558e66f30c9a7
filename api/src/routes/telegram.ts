import { Router } from 'express'

export type EnqueueUpdate = (update: unknown) => Promise<void>

/**
 * Telegram шлёт апдейты POST-ом. Тело уходит в очередь как есть, ответ
 * всегда 200: иначе Telegram будет повторять доставку того же апдейта.
 */
export const createTelegramRouter = (enqueueUpdate: EnqueueUpdate): Router => {
  const router = Router()

  router.post('/webhook', async (req, res) => {
    try {
      await enqueueUpdate(req.body)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.error('TELEGRAM WEBHOOK: не удалось поставить апдейт в очередь:', message)
    }

    res.status(200).send('ok')
  })

  return router
}
