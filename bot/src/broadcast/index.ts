// bot/src/broadcast/index.ts

import { getDeliveryErrorInfo } from '../helpers/deliveryError'
import { prompts } from '../conversation/prompts'
import { UserRegistry } from '../registry/userRegistry'
import { BroadcastPayload, DeliveryTally, Logger, MessagingPort, Prompt, UserId } from '../types/admin'

export const DEFAULT_BROADCAST_CONCURRENCY = 20

export interface BroadcastOptions {
  concurrency?: number
  logger?: Logger
}

const deliver = (messaging: MessagingPort, userId: UserId, payload: BroadcastPayload): Promise<void> => {
  switch (payload.kind) {
    case 'photo':
      return messaging.sendPhoto(userId, payload.fileId, payload.text)
    case 'video':
      return messaging.sendVideo(userId, payload.fileId, payload.text)
    case 'none':
      return messaging.sendText(userId, payload.text)
  }
}

/**
 * Одна попытка доставки на каждого получателя, без ретраев.
 * N воркеров разбирают общий список; ошибка одного получателя только
 * увеличивает failed. successful + failed === recipients.length.
 */
export const runBroadcast = async (
  payload: BroadcastPayload,
  recipients: readonly UserId[],
  messaging: MessagingPort,
  { concurrency = DEFAULT_BROADCAST_CONCURRENCY, logger = console }: BroadcastOptions = {}
): Promise<DeliveryTally> => {
  const tally: DeliveryTally = { successful: 0, failed: 0 }
  let cursor = 0

  const worker = async (): Promise<void> => {
    while (cursor < recipients.length) {
      const userId = recipients[cursor]
      cursor += 1

      try {
        await deliver(messaging, userId, payload)
        tally.successful += 1
      } catch (err) {
        tally.failed += 1
        const { reason, errorCode, description } = getDeliveryErrorInfo(err)
        logger.error(`BROADCAST: не удалось отправить ${userId} [${reason}${errorCode ? ` ${errorCode}` : ''}]:`, description)
      }
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(concurrency), recipients.length))
  await Promise.all(Array.from({ length: workers }, worker))

  return tally
}

export interface BroadcastRunnerDeps {
  registry: UserRegistry
  messaging: MessagingPort
  concurrency?: number
  logger?: Logger
}

/**
 * Запускает рассылки в фоне, чтобы обработчик апдейта не ждал весь fan-out.
 * drain() дожидается всех текущих рассылок (остановка процесса, тесты).
 */
export class BroadcastRunner {
  private readonly running = new Set<Promise<void>>()
  private readonly logger: Logger

  constructor(private readonly deps: BroadcastRunnerDeps) {
    this.logger = deps.logger ?? console
  }

  get active(): number {
    return this.running.size
  }

  start(operatorId: UserId, payload: BroadcastPayload): void {
    const run: Promise<void> = this.execute(operatorId, payload)
      .catch((err) => {
        const message = err instanceof Error ? err.message : String(err)
        this.logger.error(`BROADCAST: рассылка от ${operatorId} прервана:`, message)
      })
      .finally(() => {
        this.running.delete(run)
      })

    this.running.add(run)
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running])
    }
  }

  private async execute(operatorId: UserId, payload: BroadcastPayload): Promise<void> {
    const recipients = this.deps.registry.snapshot()

    await this.notify(operatorId, prompts.broadcastStarted(recipients.length))
    this.logger.info(`BROADCAST: старт от ${operatorId}, получателей ${recipients.length}, вложение ${payload.kind}`)

    const tally = await runBroadcast(payload, recipients, this.deps.messaging, {
      concurrency: this.deps.concurrency,
      logger: this.logger,
    })

    this.logger.info(`BROADCAST: завершена от ${operatorId}, успешно ${tally.successful}, ошибок ${tally.failed}`)
    await this.notify(operatorId, prompts.broadcastFinished(tally))
  }

  // отчёт админу не должен влиять на саму рассылку
  private async notify(operatorId: UserId, prompt: Prompt): Promise<void> {
    try {
      await this.deps.messaging.sendText(operatorId, prompt.text, prompt.choices)
    } catch (err) {
      this.logger.warn(`BROADCAST: не удалось уведомить ${operatorId}:`, getDeliveryErrorInfo(err).description)
    }
  }
}
