// api/src/index.ts

import { createApp } from './app'
import { createRedisConnection } from './redis'
import { createTelegramQueue, createUpdateEnqueuer } from './queues/telegram'

const PORT = Number(process.env.PORT) || 3000

const start = async (): Promise<void> => {
  const redis = createRedisConnection(process.env.REDIS_URL)
  await redis.ping()

  const queue = createTelegramQueue(redis)
  const app = createApp({ enqueueUpdate: createUpdateEnqueuer(queue) })

  const server = app.listen(PORT, () => {
    console.log(`✅ API server running on port ${PORT}`)
  })

  const shutdown = (signal: string) => {
    console.log(`Получен ${signal}, останавливаю API...`)
    server.close()
    queue
      .close()
      .then(() => redis.quit())
      .catch((err: unknown) => {
        console.error('❌ Ошибка при остановке API:', err instanceof Error ? err.message : String(err))
        process.exit(1)
      })
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

start().catch((err: unknown) => {
  console.error('❌ API failed to start:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
