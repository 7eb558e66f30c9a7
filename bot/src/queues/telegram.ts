import { Job, Worker } from 'bullmq'
import type IORedis from 'ioredis'
import type { Telegraf } from 'telegraf'
import type { Update } from 'telegraf/types'
import { Logger } from '../types/admin'

// очередь, в которую api складывает апдейты из вебхука
export const TELEGRAM_QUEUE = 'telegram'

export const startTelegramWorker = (bot: Telegraf, connection: IORedis, logger: Logger = console): Worker<Update> => {
  const worker = new Worker<Update>(
    TELEGRAM_QUEUE,
    async (job: Job<Update>) => {
      await bot.handleUpdate(job.data)
    },
    {
      // порядок событий одного админа держит BroadcastConversation
      concurrency: 100,
      connection,
    }
  )

  worker.on('failed', (job, err) => {
    logger.error(`TELEGRAM UPDATE: Ошибка в задаче ${job?.id}:`, err.message)
  })

  return worker
}
