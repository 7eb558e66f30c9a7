import { BroadcastSession, BroadcastState, Draft, UserId } from '../types/admin'

export const emptyDraft = (): Draft => ({ attachmentKind: 'none' })

// Сессии рассылки по id админа. Нет записи — значит IDLE
export class SessionStore {
  private readonly sessions = new Map<UserId, BroadcastSession>()

  get(userId: UserId): BroadcastSession | undefined {
    return this.sessions.get(userId)
  }

  open(userId: UserId): BroadcastSession {
    return this.save(userId, { step: 'AWAIT_TEXT', draft: emptyDraft() })
  }

  save(userId: UserId, session: BroadcastSession): BroadcastSession {
    this.sessions.set(userId, session)
    return session
  }

  close(userId: UserId): boolean {
    return this.sessions.delete(userId)
  }

  stateOf(userId: UserId): BroadcastState {
    return this.sessions.get(userId)?.step ?? 'IDLE'
  }

  get size(): number {
    return this.sessions.size
  }
}
