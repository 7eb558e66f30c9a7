import { describe, expect, it, vi } from 'vitest'
import { CAPTION_LIMIT, TelegrafMessaging } from '../messaging'

const createTelegram = () => ({
  sendMessage: vi.fn().mockResolvedValue({}),
  sendPhoto: vi.fn().mockResolvedValue({}),
  sendVideo: vi.fn().mockResolvedValue({}),
})

describe('TelegrafMessaging', () => {
  it('sends HTML text without a keyboard', async () => {
    const telegram = createTelegram()

    await new TelegrafMessaging(telegram).sendText(5, '<b>hi</b>')

    expect(telegram.sendMessage).toHaveBeenCalledWith(5, '<b>hi</b>', { parse_mode: 'HTML', reply_markup: undefined })
  })

  it('attaches choices as an inline keyboard', async () => {
    const telegram = createTelegram()

    await new TelegrafMessaging(telegram).sendText(5, 'ready?', [
      [{ text: 'Send', token: 'broadcast:send' }],
      [{ text: 'Cancel', token: 'broadcast:cancel' }],
    ])

    expect(telegram.sendMessage).toHaveBeenCalledWith(5, 'ready?', {
      parse_mode: 'HTML',
      reply_markup: {
        inline_keyboard: [
          [expect.objectContaining({ text: 'Send', callback_data: 'broadcast:send' })],
          [expect.objectContaining({ text: 'Cancel', callback_data: 'broadcast:cancel' })],
        ],
      },
    })
  })

  it('sends media with the caption', async () => {
    const telegram = createTelegram()
    const messaging = new TelegrafMessaging(telegram)

    await messaging.sendPhoto(7, 'photo-1', 'Promo')
    await messaging.sendVideo(7, 'video-1', 'Promo')

    expect(telegram.sendPhoto).toHaveBeenCalledWith(7, 'photo-1', { caption: 'Promo', parse_mode: 'HTML' })
    expect(telegram.sendVideo).toHaveBeenCalledWith(7, 'video-1', { caption: 'Promo', parse_mode: 'HTML' })
  })

  it('sends a long caption as a separate message', async () => {
    const telegram = createTelegram()
    const caption = 'x'.repeat(CAPTION_LIMIT + 1)

    await new TelegrafMessaging(telegram).sendPhoto(7, 'photo-1', caption)

    expect(telegram.sendPhoto).toHaveBeenCalledWith(7, 'photo-1')
    expect(telegram.sendMessage).toHaveBeenCalledWith(7, caption, { parse_mode: 'HTML', reply_markup: undefined })
  })

  it('measures the caption limit on visible text, not markup', async () => {
    const telegram = createTelegram()
    const caption = `<b>${'x'.repeat(CAPTION_LIMIT - 4)}</b> &amp;&lt;&gt;`

    await new TelegrafMessaging(telegram).sendVideo(7, 'video-1', caption)

    expect(telegram.sendVideo).toHaveBeenCalledWith(7, 'video-1', { caption, parse_mode: 'HTML' })
    expect(telegram.sendMessage).not.toHaveBeenCalled()
  })

  it('lets delivery errors through', async () => {
    const telegram = createTelegram()
    telegram.sendMessage.mockRejectedValueOnce(new Error('403: Forbidden: bot was blocked by the user'))

    await expect(new TelegrafMessaging(telegram).sendText(9, 'hi')).rejects.toThrow('bot was blocked by the user')
  })
})
