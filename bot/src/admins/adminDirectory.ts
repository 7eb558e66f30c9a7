// bot/src/admins/adminDirectory.ts

import { readFile, writeFile } from 'node:fs/promises'
import { Logger, UserId } from '../types/admin'

export class AdminDirectory {
  private readonly ids: ReadonlySet<UserId>

  constructor(ids: Iterable<UserId>) {
    this.ids = new Set(ids)
  }

  isAdmin(userId?: UserId): boolean {
    if (userId === undefined) return false
    return this.ids.has(userId)
  }

  get size(): number {
    return this.ids.size
  }

  list(): UserId[] {
    return [...this.ids]
  }
}

export const parseAdminIds = (raw: string): UserId[] => {
  const parsed: unknown = JSON.parse(raw)

  if (!Array.isArray(parsed)) {
    throw new Error('ожидается JSON-массив id')
  }

  return parsed.map((value: unknown) => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw new Error(`некорректный id администратора: ${JSON.stringify(value)}`)
    }
    return value
  })
}

/**
 * Читает список админов один раз при старте.
 * Нет файла или он битый — пишем пустой массив и работаем без админов.
 */
export const loadAdminDirectory = async (filePath: string, logger: Logger = console): Promise<AdminDirectory> => {
  try {
    const raw = await readFile(filePath, 'utf8')
    const ids = parseAdminIds(raw)
    logger.info(`ADMINS: загружено ${ids.length} из ${filePath}`)
    return new AdminDirectory(ids)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error(`ADMINS: файл ${filePath} не найден или повреждён (${message}). Создаю новый.`)
  }

  try {
    await writeFile(filePath, JSON.stringify([]) + '\n', 'utf8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error(`ADMINS: не удалось записать ${filePath}:`, message)
  }

  return new AdminDirectory([])
}
