import { UserRegistry } from '../registry/userRegistry'
import { Logger } from '../types/admin'

type SenderContext = { from?: { id: number } }

// каждый, кто написал или нажал кнопку, попадает в реестр получателей
export const registerSender =
  (registry: UserRegistry, logger: Logger = console) =>
  async (ctx: SenderContext, next: () => Promise<void>): Promise<void> => {
    if (ctx.from && registry.register(ctx.from.id)) {
      logger.info(`USERS: новый пользователь ${ctx.from.id}, всего ${registry.size}`)
    }
    await next()
  }

type ReplyContext = { reply: (text: string) => Promise<unknown> }

export const withErrorHandling =
  <C extends ReplyContext>(handler: (ctx: C) => Promise<void>, logger: Logger = console) =>
  async (ctx: C): Promise<void> => {
    try {
      await handler(ctx)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error('Ошибка в обработчике апдейта:', message)
      await ctx.reply('Произошла ошибка, попробуйте позже.').catch((replyErr: unknown) => {
        logger.error('Не удалось сообщить об ошибке:', replyErr instanceof Error ? replyErr.message : String(replyErr))
      })
    }
  }
