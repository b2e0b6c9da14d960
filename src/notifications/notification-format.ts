import { Language } from '../students/student.entity';

export enum NotificationType {
  INFO = 'info',
  REMINDER = 'reminder',
  WARNING = 'warning',
  URGENT = 'urgent',
  SUCCESS = 'success',
}

const EMOJI: Record<NotificationType, string> = {
  [NotificationType.INFO]: 'ℹ️',
  [NotificationType.REMINDER]: '🔔',
  [NotificationType.WARNING]: '⚠️',
  [NotificationType.URGENT]: '🚨',
  [NotificationType.SUCCESS]: '✅',
};

const LABELS: Record<Language, Record<NotificationType, string>> = {
  [Language.AR]: {
    [NotificationType.INFO]: 'معلومات',
    [NotificationType.REMINDER]: 'تذكير',
    [NotificationType.WARNING]: 'تنبيه',
    [NotificationType.URGENT]: 'عاجل',
    [NotificationType.SUCCESS]: 'نجاح',
  },
  [Language.EN]: {
    [NotificationType.INFO]: 'Info',
    [NotificationType.REMINDER]: 'Reminder',
    [NotificationType.WARNING]: 'Warning',
    [NotificationType.URGENT]: 'Urgent',
    [NotificationType.SUCCESS]: 'Success',
  },
};

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━━━━';

export function isNotificationType(value: string): value is NotificationType {
  return Object.values<string>(NotificationType).includes(value);
}

export function notificationEmoji(type: NotificationType): string {
  return EMOJI[type] ?? '📢';
}

export function notificationLabel(type: NotificationType, language: Language): string {
  return LABELS[language][type] ?? 'Notification';
}

/** Markdown message: header, divider, content, divider, footer. */
export function formatNotification(type: NotificationType, content: string, language: Language = Language.AR): string {
  const footer = language === Language.AR ? 'مركز التدريب' : 'Training Center';
  return (
    `${notificationEmoji(type)} *${notificationLabel(type, language)}*\n${DIVIDER}\n\n` +
    `${content}\n\n${DIVIDER}\n🎓 ${footer}\n`
  );
}
