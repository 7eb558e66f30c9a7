import IORedis from 'ioredis'

// BullMQ требует maxRetriesPerRequest: null для блокирующих команд воркера
export const createRedisConnection = (url: string): IORedis =>
  new IORedis(url, {
    maxRetriesPerRequest: null,
  })
