// bot/src/telegraf/index.ts

import { Context, Telegraf } from 'telegraf'
import { BroadcastConversation } from '../conversation/engine'
import { UserRegistry } from '../registry/userRegistry'
import { Logger } from '../types/admin'
import { toInboundEvent } from './events'
import { registerSender, withErrorHandling } from './middleware'

export interface SetupBotDeps {
  registry: UserRegistry
  conversation: BroadcastConversation
  logger?: Logger
}

export const setupBot = (bot: Telegraf, { registry, conversation, logger = console }: SetupBotDeps): Telegraf => {
  const dispatchUpdate = async (ctx: Context): Promise<void> => {
    const event = toInboundEvent(ctx.update)
    if (event) await conversation.dispatch(event)
  }

  bot.use(registerSender(registry, logger))

  bot.on('message', withErrorHandling(dispatchUpdate, logger))

  bot.on(
    'callback_query',
    withErrorHandling(async (ctx: Context) => {
      // снимаем "часики" с кнопки до обработки
      await ctx.answerCbQuery().catch((err: unknown) => {
        logger.warn('answerCbQuery:', err instanceof Error ? err.message : String(err))
      })
      await dispatchUpdate(ctx)
    }, logger)
  )

  bot.catch((err, ctx) => {
    const message = err instanceof Error ? err.message : String(err)
    logger.error(`TELEGRAM UPDATE ${ctx.update.update_id}:`, message)
  })

  return bot
}
