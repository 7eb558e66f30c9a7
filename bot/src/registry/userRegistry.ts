import { UserId } from '../types/admin'

/**
 * Все, кто хоть раз писал боту. Живёт в памяти процесса и только растёт.
 *
 * Вставка синхронная, поэтому параллельные апдейты не теряют друг друга:
 * между has() и add() event loop не переключается.
 */
export class UserRegistry {
  private readonly users = new Set<UserId>()

  register(userId: UserId): boolean {
    if (this.users.has(userId)) return false
    this.users.add(userId)
    return true
  }

  has(userId: UserId): boolean {
    return this.users.has(userId)
  }

  get size(): number {
    return this.users.size
  }

  // копия на момент вызова: регистрации во время рассылки её не меняют
  snapshot(): UserId[] {
    return [...this.users]
  }
}
