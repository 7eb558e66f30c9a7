import { Queue } from 'bullmq'
import type IORedis from 'ioredis'
import type { EnqueueUpdate } from '../routes/telegram'

// бот разбирает эту очередь своим воркером
export const TELEGRAM_QUEUE = 'telegram'

export const createTelegramQueue = (connection: IORedis): Queue =>
  new Queue(TELEGRAM_QUEUE, {
    connection,
    defaultJobOptions: {
      removeOnComplete: true,
      removeOnFail: 1000,
      // повтор мог бы дважды продвинуть диалог или отправить рассылку
      attempts: 1,
    },
  })

export const createUpdateEnqueuer =
  (queue: Pick<Queue, 'add'>): EnqueueUpdate =>
  async (update) => {
    await queue.add('process-update', update)
  }
