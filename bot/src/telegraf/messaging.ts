import { Markup } from 'telegraf'
import type { Telegram } from 'telegraf'
import { getVisibleTextLength } from '../helpers/restoreHtmlFromEntities'
import { ChoiceRow, MessagingPort, UserId } from '../types/admin'

// лимит подписи к медиа в Telegram, считается по тексту после разбора HTML
export const CAPTION_LIMIT = 1024

type TelegramSender = Pick<Telegram, 'sendMessage' | 'sendPhoto' | 'sendVideo'>

export const buildKeyboard = (choices: ChoiceRow[]) =>
  Markup.inlineKeyboard(choices.map((row) => row.map(({ text, token }) => Markup.button.callback(text, token))))

/**
 * MessagingPort поверх bot.telegram. Ошибки Telegram не перехватываются:
 * их считает движок рассылки.
 */
export class TelegrafMessaging implements MessagingPort {
  constructor(private readonly telegram: TelegramSender) {}

  async sendText(userId: UserId, html: string, choices?: ChoiceRow[]): Promise<void> {
    await this.telegram.sendMessage(userId, html, {
      parse_mode: 'HTML',
      reply_markup: choices ? buildKeyboard(choices).reply_markup : undefined,
    })
  }

  async sendPhoto(userId: UserId, fileId: string, caption: string): Promise<void> {
    if (getVisibleTextLength(caption) > CAPTION_LIMIT) {
      await this.telegram.sendPhoto(userId, fileId)
      await this.sendText(userId, caption)
      return
    }
    await this.telegram.sendPhoto(userId, fileId, { caption, parse_mode: 'HTML' })
  }

  async sendVideo(userId: UserId, fileId: string, caption: string): Promise<void> {
    if (getVisibleTextLength(caption) > CAPTION_LIMIT) {
      await this.telegram.sendVideo(userId, fileId)
      await this.sendText(userId, caption)
      return
    }
    await this.telegram.sendVideo(userId, fileId, { caption, parse_mode: 'HTML' })
  }
}
