import IORedis from 'ioredis'

export const createRedisConnection = (url: string | undefined): IORedis => {
  if (!url) {
    throw new Error('REDIS_URL is not defined')
  }

  return new IORedis(url, {
    // BullMQ не работает с ограничением ретраев на команду
    maxRetriesPerRequest: null,
  })
}
