import type { Message, Update } from 'telegraf/types'
import { restoreHtmlFromEntities } from '../helpers/restoreHtmlFromEntities'
import { BotCommand, InboundEvent, UserId } from '../types/admin'

const COMMANDS: readonly BotCommand[] = ['start', 'broadcast', 'cancel']

const isBotCommand = (value: string): value is BotCommand => COMMANDS.some((command) => command === value)

// "/cancel", "/cancel@my_bot", "/start payload"
const parseCommand = (text: string): string | null => {
  const match = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s|$)/.exec(text)
  return match ? match[1].toLowerCase() : null
}

const fromMessage = (userId: UserId, message: Message): InboundEvent => {
  if ('text' in message) {
    const command = parseCommand(message.text)
    if (command !== null) {
      return isBotCommand(command) ? { type: 'command', userId, command } : { type: 'other', userId }
    }

    return {
      type: 'text',
      userId,
      text: message.text,
      html: restoreHtmlFromEntities(message.text, message.entities),
    }
  }

  if ('photo' in message && message.photo.length > 0) {
    // последний размер — самый большой
    return { type: 'media', userId, kind: 'photo', fileId: message.photo[message.photo.length - 1].file_id }
  }

  if ('video' in message) {
    return { type: 'media', userId, kind: 'video', fileId: message.video.file_id }
  }

  return { type: 'other', userId }
}

/**
 * Переводит апдейт Telegram в событие диалога.
 * null — апдейт без отправителя или не из лички/кнопки, ядру он не нужен.
 */
export const toInboundEvent = (update: Update): InboundEvent | null => {
  if ('message' in update) {
    const { message } = update
    if (!message.from) return null
    return fromMessage(message.from.id, message)
  }

  if ('callback_query' in update) {
    const query = update.callback_query
    if (!('data' in query)) return { type: 'other', userId: query.from.id }
    return { type: 'action', userId: query.from.id, token: query.data }
  }

  return null
}
