import { Markup } from 'telegraf';
import { callbackData } from './callback-data';
import { AdminAction, CallbackPrefix, NavAction } from './constants';
import { Translate } from '../i18n/localization.service';

export type Row = ReturnType<typeof Markup.button.callback>[];

export const button = (text: string, data: string) => Markup.button.callback(text, data);

export const backButton = (t: Translate, data: string) => button(t('common.back'), data);

export const homeButton = (t: Translate) => button(t('common.home'), callbackData(CallbackPrefix.NAV, NavAction.MAIN));

export const adminHomeButton = (t: Translate) =>
  button(t('admin.panel.back'), callbackData(CallbackPrefix.ADMIN, AdminAction.PANEL));

export const keyboard = (rows: Row[]) => Markup.inlineKeyboard(rows);

export function mainMenuKeyboard(t: Translate, isAdmin: boolean) {
  const nav = (key: string, action: NavAction) => button(t(key), callbackData(CallbackPrefix.NAV, action));
  const rows: Row[] = [
    [nav('menu.courses', NavAction.COURSES), nav('menu.register', NavAction.REGISTER)],
    [nav('menu.my_registrations', NavAction.MY_REGISTRATIONS), nav('menu.materials', NavAction.MATERIALS)],
    [
      button(t('menu.profile'), callbackData(CallbackPrefix.PROFILE, 'view')),
      nav('menu.language', NavAction.LANGUAGE),
    ],
    [nav('menu.help', NavAction.HELP)],
  ];
  if (isAdmin) {
    rows.push([button(t('menu.admin_panel'), callbackData(CallbackPrefix.ADMIN, AdminAction.PANEL))]);
  }
  return keyboard(rows);
}

export function adminPanelKeyboard(t: Translate) {
  const admin = (key: string, action: AdminAction) => button(t(key), callbackData(CallbackPrefix.ADMIN, action));
  return keyboard([
    [admin('admin.panel.registrations', AdminAction.REGISTRATIONS), admin('admin.panel.payments', AdminAction.PAYMENTS)],
    [admin('admin.panel.students', AdminAction.STUDENTS), admin('admin.panel.courses', AdminAction.COURSES)],
    [admin('admin.panel.new_course', AdminAction.NEW_COURSE), admin('admin.panel.upload', AdminAction.UPLOAD)],
    [admin('admin.panel.notify', AdminAction.NOTIFY), admin('admin.panel.broadcast', AdminAction.BROADCAST)],
    [admin('admin.panel.post', AdminAction.POST), admin('admin.panel.check_posts', AdminAction.CHECK_POSTS)],
    [admin('admin.panel.stats', AdminAction.STATS), admin('admin.panel.guide', AdminAction.GUIDE)],
    [homeButton(t)],
  ]);
}

/** `▓▓▓░░░` for step `current` of `total`. */
export function progressBar(current: number, total: number, width = total): string {
  const filled = Math.round((Math.min(current, total) / total) * width);
  return '▓'.repeat(filled) + '░'.repeat(width - filled);
}
