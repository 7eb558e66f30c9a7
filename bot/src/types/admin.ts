// bot/src/types/admin.ts

export type UserId = number

export type MediaKind = 'photo' | 'video'
export type AttachmentKind = 'none' | MediaKind

// Черновик рассылки. attachmentRef — file_id уже загруженного в Telegram файла
export interface Draft {
  text?: string
  attachmentKind: AttachmentKind
  attachmentRef?: string
}

export type TextDraft = Draft & { text: string }
export type MediaDraft = TextDraft & { attachmentKind: MediaKind }

// шаг определяет, что уже есть в черновике
export type BroadcastSession =
  | { step: 'AWAIT_TEXT'; draft: Draft }
  | { step: 'AWAIT_MEDIA_DECISION'; draft: TextDraft }
  | { step: 'AWAIT_MEDIA'; draft: MediaDraft }
  | { step: 'READY_TO_SEND'; draft: MediaDraft & { attachmentRef: string } }

export type SessionStep = BroadcastSession['step']
export type SessionAt<S extends SessionStep> = Extract<BroadcastSession, { step: S }>
export type BroadcastState = 'IDLE' | SessionStep

// Готовый к отправке черновик
export type BroadcastPayload =
  | { kind: 'none'; text: string }
  | { kind: MediaKind; text: string; fileId: string }

export interface DeliveryTally {
  successful: number
  failed: number
}

// Кнопки выбора: token уходит в callback_data
export interface Choice {
  text: string
  token: string
}

export type ChoiceRow = Choice[]

export interface Prompt {
  text: string
  choices?: ChoiceRow[]
}

export type BotCommand = 'start' | 'broadcast' | 'cancel'

export type InboundEvent =
  | { type: 'command'; userId: UserId; command: BotCommand }
  | { type: 'text'; userId: UserId; text: string; html: string }
  | { type: 'media'; userId: UserId; kind: MediaKind; fileId: string }
  | { type: 'action'; userId: UserId; token: string }
  | { type: 'other'; userId: UserId }

/**
 * Исходящие примитивы транспорта. Любой reject считается неудачной доставкой.
 */
export interface MessagingPort {
  sendText(userId: UserId, html: string, choices?: ChoiceRow[]): Promise<void>
  sendPhoto(userId: UserId, fileId: string, caption: string): Promise<void>
  sendVideo(userId: UserId, fileId: string, caption: string): Promise<void>
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>
