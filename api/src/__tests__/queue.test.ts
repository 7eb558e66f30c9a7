import type { Queue } from 'bullmq'
import { describe, expect, it, vi } from 'vitest'
import { createUpdateEnqueuer } from '../queues/telegram'

describe('createUpdateEnqueuer', () => {
  it('adds the raw update as a process-update job', async () => {
    const add = vi.fn().mockResolvedValue({ id: '1' })
    const queue: Pick<Queue, 'add'> = { add }
    const update = { update_id: 3, callback_query: { id: 'cb', data: 'broadcast:send' } }

    await createUpdateEnqueuer(queue)(update)

    expect(add).toHaveBeenCalledWith('process-update', update)
  })
})
