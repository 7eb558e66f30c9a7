import type { MessageEntity } from 'telegraf/types'

type TagPair = readonly [open: string, close: string]

const SIMPLE_TAGS: Record<string, TagPair> = {
  bold: ['<b>', '</b>'],
  italic: ['<i>', '</i>'],
  underline: ['<u>', '</u>'],
  strikethrough: ['<s>', '</s>'],
  spoiler: ['<tg-spoiler>', '</tg-spoiler>'],
  code: ['<code>', '</code>'],
  pre: ['<pre>', '</pre>'],
  blockquote: ['<blockquote>', '</blockquote>'],
}

export const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')

// длина текста, который увидит получатель: без тегов, сущность считается за один символ
export const getVisibleTextLength = (html: string): number =>
  html.replace(/<[^>]*>/g, '').replace(/&(?:amp|lt|gt|quot);/g, '&').length

const escapeAttribute = (value: string): string => escapeHtml(value).replace(/"/g, '&quot;')

const tagsFor = (entity: MessageEntity): TagPair | undefined => {
  switch (entity.type) {
    case 'text_link':
      return [`<a href="${escapeAttribute(entity.url)}">`, '</a>']
    case 'text_mention':
      return [`<a href="tg://user?id=${entity.user.id}">`, '</a>']
    default:
      return SIMPLE_TAGS[entity.type]
  }
}

/**
 * Собирает HTML для parse_mode: 'HTML' из текста и entities сообщения,
 * чтобы рассылка ушла с тем же форматированием, что прислал админ.
 * Offsets у Telegram в UTF-16, как и индексы строк JS.
 */
export function restoreHtmlFromEntities(text: string, entities: readonly MessageEntity[] = []): string {
  if (entities.length === 0) return escapeHtml(text)

  const opening = new Map<number, string[]>()
  const closing = new Map<number, string[]>()

  // внешняя сущность раньше вложенной: по offset, при равенстве длиннее первой
  const ordered = [...entities].sort((a, b) => a.offset - b.offset || b.length - a.length)

  for (const entity of ordered) {
    const tags = tagsFor(entity)
    if (!tags) continue

    const start = entity.offset
    const end = entity.offset + entity.length

    opening.set(start, [...(opening.get(start) ?? []), tags[0]])
    // закрываем в обратном порядке, чтобы теги не перекрещивались
    closing.set(end, [tags[1], ...(closing.get(end) ?? [])])
  }

  let result = ''
  for (let i = 0; i <= text.length; i++) {
    result += (closing.get(i) ?? []).join('')
    result += (opening.get(i) ?? []).join('')
    if (i < text.length) result += escapeHtml(text[i])
  }

  return result
}
