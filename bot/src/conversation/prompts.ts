// bot/src/conversation/prompts.ts

import { ChoiceRow, DeliveryTally, MediaKind, Prompt } from '../types/admin'

export const BROADCAST_ACTIONS = {
  start: 'broadcast:start',
  addPhoto: 'broadcast:add_photo',
  addVideo: 'broadcast:add_video',
  send: 'broadcast:send',
  cancel: 'broadcast:cancel',
} as const

const MEDIA_LABELS: Record<MediaKind, { saved: string; ask: string; expected: string }> = {
  photo: {
    saved: '✅ Фото сохранено!',
    ask: '🖼 Отправьте фото, которое нужно прикрепить к рассылке.',
    expected: 'фото',
  },
  video: {
    saved: '✅ Видео сохранено!',
    ask: '🎬 Отправьте видео, которое нужно прикрепить к рассылке.',
    expected: 'видео',
  },
}

const cancelRow: ChoiceRow = [{ text: '❌ Отменить', token: BROADCAST_ACTIONS.cancel }]

const mediaChoices = (): ChoiceRow[] => [
  [{ text: '🖼 Добавить фото', token: BROADCAST_ACTIONS.addPhoto }],
  [{ text: '🎬 Добавить видео', token: BROADCAST_ACTIONS.addVideo }],
  [{ text: '▶️ Отправить рассылку', token: BROADCAST_ACTIONS.send }],
  cancelRow,
]

export const prompts = {
  welcome: (): Prompt => ({
    text: [
      '🌟 <b>Добро пожаловать!</b>',
      '',
      'Вы подписаны на новости бота: сюда будут приходить анонсы, подборки и полезные материалы.',
    ].join('\n'),
  }),

  adminMenu: (): Prompt => ({
    text: '👨‍💻 <b>Панель администратора</b>\n\nДоступные действия:',
    choices: [[{ text: '📢 Рассылка всем пользователям', token: BROADCAST_ACTIONS.start }]],
  }),

  askText: (): Prompt => ({
    text: [
      '📢 <b>Рассылка всем пользователям</b>',
      '',
      'Отправьте текст сообщения. Форматирование сохранится.',
      'Для отмены отправьте /cancel.',
    ].join('\n'),
    choices: [cancelRow],
  }),

  mediaDecision: (textHtml: string): Prompt => ({
    text: ['✅ <b>Текст сохранён</b>', '', textHtml, '', 'Что дальше?'].join('\n'),
    choices: mediaChoices(),
  }),

  askMedia: (kind: MediaKind): Prompt => ({
    text: MEDIA_LABELS[kind].ask,
    choices: [cancelRow],
  }),

  wrongFormat: (kind: MediaKind): Prompt => ({
    text: `❌ Неверный формат. Отправьте ${MEDIA_LABELS[kind].expected}.`,
    choices: [cancelRow],
  }),

  readyToSend: (kind: MediaKind): Prompt => ({
    text: `${MEDIA_LABELS[kind].saved}\n\nГотовы отправить рассылку?`,
    choices: [
      [{ text: '▶️ Отправить рассылку', token: BROADCAST_ACTIONS.send }],
      [
        { text: '🖼 Заменить на фото', token: BROADCAST_ACTIONS.addPhoto },
        { text: '🎬 Заменить на видео', token: BROADCAST_ACTIONS.addVideo },
      ],
      cancelRow,
    ],
  }),

  cancelled: (): Prompt => ({ text: '❌ Рассылка отменена.' }),

  broadcastStarted: (recipients: number): Prompt => ({
    text: `📢 <b>Рассылка запущена</b>\n\nПолучателей: ${recipients}. Подождите...`,
  }),

  broadcastFinished: ({ successful, failed }: DeliveryTally): Prompt => ({
    text: `📢 Рассылка завершена!\n✅ Успешно: ${successful}\n❌ Ошибок: ${failed}`,
  }),
}
