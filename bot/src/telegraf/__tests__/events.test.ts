import type { MessageEntity, Update } from 'telegraf/types'
import { describe, expect, it } from 'vitest'
import { toInboundEvent } from '../events'

const from = { id: 42, is_bot: false, first_name: 'Ann' }
const chat = { id: 42, type: 'private' as const, first_name: 'Ann' }

const textUpdate = (text: string, entities?: MessageEntity[]): Update => ({
  update_id: 1,
  message: { message_id: 1, date: 0, chat, from, text, entities },
})

describe('toInboundEvent', () => {
  it('maps known commands, with or without the bot name', () => {
    expect(toInboundEvent(textUpdate('/cancel'))).toEqual({ type: 'command', userId: 42, command: 'cancel' })
    expect(toInboundEvent(textUpdate('/broadcast@herald_bot'))).toEqual({
      type: 'command',
      userId: 42,
      command: 'broadcast',
    })
    expect(toInboundEvent(textUpdate('/start promo'))).toEqual({ type: 'command', userId: 42, command: 'start' })
  })

  it('does not treat unknown commands as broadcast text', () => {
    expect(toInboundEvent(textUpdate('/help'))).toEqual({ type: 'other', userId: 42 })
  })

  it('keeps formatting of plain text as HTML', () => {
    expect(toInboundEvent(textUpdate('Big sale', [{ type: 'bold', offset: 0, length: 3 }]))).toEqual({
      type: 'text',
      userId: 42,
      text: 'Big sale',
      html: '<b>Big</b> sale',
    })
  })

  it('takes the largest photo size', () => {
    const update: Update = {
      update_id: 2,
      message: {
        message_id: 2,
        date: 0,
        chat,
        from,
        photo: [
          { file_id: 'small', file_unique_id: 's', width: 90, height: 90 },
          { file_id: 'large', file_unique_id: 'l', width: 1280, height: 1280 },
        ],
      },
    }

    expect(toInboundEvent(update)).toEqual({ type: 'media', userId: 42, kind: 'photo', fileId: 'large' })
  })

  it('maps videos', () => {
    const update: Update = {
      update_id: 3,
      message: {
        message_id: 3,
        date: 0,
        chat,
        from,
        video: { file_id: 'clip', file_unique_id: 'c', width: 640, height: 360, duration: 5 },
      },
    }

    expect(toInboundEvent(update)).toEqual({ type: 'media', userId: 42, kind: 'video', fileId: 'clip' })
  })

  it('maps other messages to other', () => {
    const update: Update = {
      update_id: 4,
      message: { message_id: 4, date: 0, chat, from, document: { file_id: 'doc', file_unique_id: 'd' } },
    }

    expect(toInboundEvent(update)).toEqual({ type: 'other', userId: 42 })
  })

  it('maps button presses to actions', () => {
    const update: Update = {
      update_id: 5,
      callback_query: { id: 'cb-1', from, chat_instance: 'ci', data: 'broadcast:send' },
    }

    expect(toInboundEvent(update)).toEqual({ type: 'action', userId: 42, token: 'broadcast:send' })
  })

  it('skips messages without a sender', () => {
    const update: Update = {
      update_id: 6,
      message: { message_id: 6, date: 0, chat, text: 'hi' },
    }

    expect(toInboundEvent(update)).toBeNull()
  })
})
