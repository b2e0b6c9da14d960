export const TELEGRAF_BOT = Symbol('TELEGRAF_BOT');
