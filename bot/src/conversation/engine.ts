// bot/src/conversation/engine.ts

import { AdminDirectory } from '../admins/adminDirectory'
import { BroadcastRunner } from '../broadcast'
import {
  BroadcastPayload,
  BroadcastSession,
  InboundEvent,
  Logger,
  MediaKind,
  MessagingPort,
  Prompt,
  SessionAt,
  UserId,
} from '../types/admin'
import { BROADCAST_ACTIONS, prompts } from './prompts'
import { SessionStore } from './sessionStore'

export interface BroadcastConversationDeps {
  admins: AdminDirectory
  sessions: SessionStore
  messaging: MessagingPort
  runner: BroadcastRunner
  logger?: Logger
}

const isEntry = (event: InboundEvent): boolean =>
  (event.type === 'command' && event.command === 'broadcast') ||
  (event.type === 'action' && event.token === BROADCAST_ACTIONS.start)

const isCancel = (event: InboundEvent): boolean =>
  (event.type === 'command' && event.command === 'cancel') ||
  (event.type === 'action' && event.token === BROADCAST_ACTIONS.cancel)

const chosenMedia = (event: InboundEvent): MediaKind | null => {
  if (event.type !== 'action') return null
  if (event.token === BROADCAST_ACTIONS.addPhoto) return 'photo'
  if (event.token === BROADCAST_ACTIONS.addVideo) return 'video'
  return null
}

const isSend = (event: InboundEvent): boolean => event.type === 'action' && event.token === BROADCAST_ACTIONS.send

/**
 * Диалог составления рассылки:
 *   IDLE -> AWAIT_TEXT -> AWAIT_MEDIA_DECISION -> [AWAIT_MEDIA -> READY_TO_SEND] -> IDLE
 *
 * Ввод, который текущий шаг не принимает, не сбрасывает сессию: админ снова
 * получает подсказку текущего шага. События одного пользователя
 * обрабатываются строго по очереди, разные админы друг друга не ждут.
 */
export class BroadcastConversation {
  private readonly pending = new Map<UserId, Promise<void>>()
  private readonly logger: Logger

  constructor(private readonly deps: BroadcastConversationDeps) {
    this.logger = deps.logger ?? console
  }

  dispatch(event: InboundEvent): Promise<void> {
    const { userId } = event
    const previous = this.pending.get(userId) ?? Promise.resolve()
    const current = previous.then(() => this.handle(event))

    // ошибка уходит вызывающему через current, очередь продолжает работу
    const tail = current.catch(() => undefined)
    this.pending.set(userId, tail)
    void tail.then(() => {
      if (this.pending.get(userId) === tail) this.pending.delete(userId)
    })

    return current
  }

  private async handle(event: InboundEvent): Promise<void> {
    const { userId } = event

    if (event.type === 'command' && event.command === 'start') {
      await this.greet(userId)
      return
    }

    if (isEntry(event)) {
      await this.enter(userId)
      return
    }

    if (isCancel(event)) {
      await this.cancel(userId)
      return
    }

    const session = this.deps.sessions.get(userId)
    if (!session) return

    switch (session.step) {
      case 'AWAIT_TEXT':
        return this.onAwaitText(userId, session, event)
      case 'AWAIT_MEDIA_DECISION':
        return this.onMediaDecision(userId, session, event)
      case 'AWAIT_MEDIA':
        return this.onAwaitMedia(userId, session, event)
      case 'READY_TO_SEND':
        return this.onReadyToSend(userId, session, event)
    }
  }

  private async greet(userId: UserId): Promise<void> {
    await this.reply(userId, prompts.welcome())
    if (this.deps.admins.isAdmin(userId)) {
      await this.reply(userId, prompts.adminMenu())
    }
  }

  private async enter(userId: UserId): Promise<void> {
    if (!this.deps.admins.isAdmin(userId)) {
      this.logger.info(`BROADCAST: ${userId} не админ, вход в рассылку проигнорирован`)
      return
    }

    this.deps.sessions.open(userId)
    await this.reply(userId, prompts.askText())
  }

  private async cancel(userId: UserId): Promise<void> {
    if (!this.deps.sessions.close(userId)) return
    await this.reply(userId, prompts.cancelled())
  }

  private async onAwaitText(userId: UserId, session: SessionAt<'AWAIT_TEXT'>, event: InboundEvent): Promise<void> {
    if (event.type !== 'text' || event.text.trim() === '') {
      await this.reprompt(userId, session)
      return
    }

    this.deps.sessions.save(userId, { step: 'AWAIT_MEDIA_DECISION', draft: { ...session.draft, text: event.html } })
    await this.reply(userId, prompts.mediaDecision(event.html))
  }

  private async onMediaDecision(
    userId: UserId,
    session: SessionAt<'AWAIT_MEDIA_DECISION'>,
    event: InboundEvent
  ): Promise<void> {
    const kind = chosenMedia(event)
    if (kind) {
      await this.chooseMedia(userId, session, kind)
      return
    }

    if (isSend(event)) {
      this.launch(userId, { kind: 'none', text: session.draft.text })
      return
    }

    await this.reprompt(userId, session)
  }

  private async onAwaitMedia(userId: UserId, session: SessionAt<'AWAIT_MEDIA'>, event: InboundEvent): Promise<void> {
    const expected = session.draft.attachmentKind

    if (event.type === 'media' && event.kind === expected) {
      this.deps.sessions.save(userId, {
        step: 'READY_TO_SEND',
        draft: { ...session.draft, attachmentRef: event.fileId },
      })
      await this.reply(userId, prompts.readyToSend(expected))
      return
    }

    if (event.type === 'media' || event.type === 'text' || event.type === 'other') {
      await this.reply(userId, prompts.wrongFormat(expected))
      return
    }

    await this.reprompt(userId, session)
  }

  private async onReadyToSend(userId: UserId, session: SessionAt<'READY_TO_SEND'>, event: InboundEvent): Promise<void> {
    const kind = chosenMedia(event)
    if (kind) {
      await this.chooseMedia(userId, session, kind)
      return
    }

    if (isSend(event)) {
      const { text, attachmentKind, attachmentRef } = session.draft
      this.launch(userId, { kind: attachmentKind, text, fileId: attachmentRef })
      return
    }

    await this.reprompt(userId, session)
  }

  private async chooseMedia(
    userId: UserId,
    session: SessionAt<'AWAIT_MEDIA_DECISION' | 'READY_TO_SEND'>,
    kind: MediaKind
  ): Promise<void> {
    // прежнее вложение сбрасывается
    this.deps.sessions.save(userId, { step: 'AWAIT_MEDIA', draft: { text: session.draft.text, attachmentKind: kind } })
    await this.reply(userId, prompts.askMedia(kind))
  }

  private launch(userId: UserId, payload: BroadcastPayload): void {
    this.deps.sessions.close(userId)
    this.deps.runner.start(userId, payload)
  }

  private async reprompt(userId: UserId, session: BroadcastSession): Promise<void> {
    await this.reply(userId, this.promptFor(session))
  }

  private promptFor(session: BroadcastSession): Prompt {
    switch (session.step) {
      case 'AWAIT_TEXT':
        return prompts.askText()
      case 'AWAIT_MEDIA_DECISION':
        return prompts.mediaDecision(session.draft.text)
      case 'AWAIT_MEDIA':
        return prompts.askMedia(session.draft.attachmentKind)
      case 'READY_TO_SEND':
        return prompts.readyToSend(session.draft.attachmentKind)
    }
  }

  private async reply(userId: UserId, prompt: Prompt): Promise<void> {
    await this.deps.messaging.sendText(userId, prompt.text, prompt.choices)
  }
}
