// bot/src/index.ts

import { Telegraf } from 'telegraf'
import type { Worker } from 'bullmq'
import type IORedis from 'ioredis'

import { loadConfig } from './config'
import { loadAdminDirectory } from './admins/adminDirectory'
import { BroadcastRunner } from './broadcast'
import { BroadcastConversation } from './conversation/engine'
import { SessionStore } from './conversation/sessionStore'
import { UserRegistry } from './registry/userRegistry'
import { createRedisConnection } from './redis'
import { startTelegramWorker } from './queues/telegram'
import { setupBot } from './telegraf'
import { TelegrafMessaging } from './telegraf/messaging'

const main = async (): Promise<void> => {
  const config = loadConfig()
  const admins = await loadAdminDirectory(config.adminsFile)

  const bot = new Telegraf(config.token)
  const registry = new UserRegistry()
  const messaging = new TelegrafMessaging(bot.telegram)
  const runner = new BroadcastRunner({ registry, messaging, concurrency: config.broadcastConcurrency })
  const conversation = new BroadcastConversation({ admins, sessions: new SessionStore(), messaging, runner })

  setupBot(bot, { registry, conversation })

  let worker: Worker | undefined
  let connection: IORedis | undefined

  if (config.updates.mode === 'webhook') {
    await bot.telegram.setWebhook(config.updates.webhookUrl.href)
    connection = createRedisConnection(config.updates.redisUrl)
    worker = startTelegramWorker(bot, connection)
    console.log(`✅ Bot started (webhook ${config.updates.webhookUrl.href}), admins: ${admins.size}`)
  } else {
    bot.launch().catch((err: unknown) => {
      console.error('❌ Polling stopped:', err instanceof Error ? err.message : String(err))
      process.exit(1)
    })
    console.log(`✅ Bot started (polling), admins: ${admins.size}`)
  }

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`Получен ${signal}, останавливаюсь...`)
    if (config.updates.mode === 'polling') bot.stop(signal)
    await worker?.close()
    // начатые рассылки доводим до конца
    await runner.drain()
    await connection?.quit()
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('❌ Ошибка при остановке:', err instanceof Error ? err.message : String(err))
      process.exit(1)
    })
  }

  process.once('SIGINT', () => onSignal('SIGINT'))
  process.once('SIGTERM', () => onSignal('SIGTERM'))
}

main().catch((err: unknown) => {
  console.error('❌ Bot failed to start:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
