// bot/src/config.ts

import { DEFAULT_BROADCAST_CONCURRENCY } from './broadcast'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export type UpdatesConfig = { mode: 'polling' } | { mode: 'webhook'; webhookUrl: URL; redisUrl: string }

export interface BotConfig {
  token: string
  updates: UpdatesConfig
  adminsFile: string
  broadcastConcurrency: number
}

const required = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = env[name]?.trim()
  if (!value) {
    throw new ConfigError(`${name} is not defined`)
  }
  return value
}

const parseUrl = (name: string, value: string): URL => {
  try {
    return new URL(value)
  } catch {
    throw new ConfigError(`${name} is not a valid URL: ${value}`)
  }
}

const parseConcurrency = (value: string | undefined): number => {
  if (value === undefined || value.trim() === '') return DEFAULT_BROADCAST_CONCURRENCY
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`BROADCAST_CONCURRENCY must be a positive integer, got "${value}"`)
  }
  return parsed
}

const parseUpdates = (env: NodeJS.ProcessEnv): UpdatesConfig => {
  const mode = env.UPDATES_MODE?.trim() || 'polling'

  if (mode === 'polling') return { mode }

  if (mode === 'webhook') {
    return {
      mode,
      webhookUrl: parseUrl('TELEGRAM_WEBHOOK_URL', required(env, 'TELEGRAM_WEBHOOK_URL')),
      redisUrl: required(env, 'REDIS_URL'),
    }
  }

  throw new ConfigError(`UPDATES_MODE must be "polling" or "webhook", got "${mode}"`)
}

// читается один раз при старте; ошибка — запуск прерывается
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BotConfig => ({
  token: required(env, 'TELEGRAM_TOKEN'),
  updates: parseUpdates(env),
  adminsFile: env.ADMINS_FILE?.trim() || 'admins.json',
  broadcastConcurrency: parseConcurrency(env.BROADCAST_CONCURRENCY),
})
