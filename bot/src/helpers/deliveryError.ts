// bot/src/helpers/deliveryError.ts

export type DeliveryFailureReason = 'blocked' | 'not_found' | 'other'

export type DeliveryErrorInfo = {
  reason: DeliveryFailureReason
  description: string
  errorCode?: number
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null

const getResponse = (e: Record<string, unknown>): Record<string, unknown> | undefined =>
  isRecord(e.response) ? e.response : undefined

export const getTelegramErrorCode = (e: unknown): number | undefined => {
  if (!isRecord(e)) return undefined
  if (typeof e.code === 'number') return e.code
  const code = getResponse(e)?.error_code
  return typeof code === 'number' ? code : undefined
}

export const getTelegramErrorDescription = (e: unknown): string => {
  if (!isRecord(e)) return String(e)
  const desc = getResponse(e)?.description
  if (typeof desc === 'string') return desc
  return typeof e.message === 'string' ? e.message : String(e)
}

/**
 * Telegram не сообщает напрямую, что пользователь недоступен, поэтому
 * разбираем ошибку отправки:
 *  - 403: Forbidden: bot was blocked by the user
 *  - 403: Forbidden: user is deactivated
 *  - 400: Bad Request: chat not found
 */
export const getDeliveryErrorInfo = (e: unknown): DeliveryErrorInfo => {
  const errorCode = getTelegramErrorCode(e)
  const description = getTelegramErrorDescription(e)
  const desc = description.toLowerCase()

  let reason: DeliveryFailureReason = 'other'
  if (errorCode === 403 && (desc.includes('bot was blocked by the user') || desc.includes('user is deactivated'))) {
    reason = 'blocked'
  } else if (errorCode === 400 && desc.includes('chat not found')) {
    reason = 'not_found'
  }

  return { reason, description, errorCode }
}
