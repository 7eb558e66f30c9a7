import { describe, expect, it } from 'vitest'
import { getDeliveryErrorInfo } from '../deliveryError'

const telegramError = (errorCode: number, description: string) =>
  Object.assign(new Error(`${errorCode}: ${description}`), {
    code: errorCode,
    response: { ok: false, error_code: errorCode, description },
  })

describe('getDeliveryErrorInfo', () => {
  it('recognises users who blocked the bot', () => {
    expect(getDeliveryErrorInfo(telegramError(403, 'Forbidden: bot was blocked by the user'))).toEqual({
      reason: 'blocked',
      description: 'Forbidden: bot was blocked by the user',
      errorCode: 403,
    })
    expect(getDeliveryErrorInfo(telegramError(403, 'Forbidden: user is deactivated')).reason).toBe('blocked')
  })

  it('reads the code from the response when the error has none', () => {
    const error = { response: { error_code: 400, description: 'Bad Request: chat not found' } }

    expect(getDeliveryErrorInfo(error)).toEqual({
      reason: 'not_found',
      description: 'Bad Request: chat not found',
      errorCode: 400,
    })
  })

  it('falls back to the message for network errors', () => {
    expect(getDeliveryErrorInfo(new Error('socket hang up'))).toEqual({
      reason: 'other',
      description: 'socket hang up',
      errorCode: undefined,
    })
  })

  it('handles thrown non-objects', () => {
    expect(getDeliveryErrorInfo('timeout')).toEqual({ reason: 'other', description: 'timeout', errorCode: undefined })
  })
})
