import { Inject, Injectable } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { TELEGRAF_BOT } from './telegram.constants';

export interface SendOptions {
  markdown?: boolean;
}

/** Outgoing Telegram messages that are not replies to an update. */
export abstract class MessageSender {
  abstract sendMessage(chatId: number, text: string, options?: SendOptions): Promise<void>;
}

@Injectable()
export class TelegramMessageSender extends MessageSender {
  constructor(@Inject(TELEGRAF_BOT) private readonly bot: Telegraf) {
    super();
  }

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<void> {
    await this.bot.telegram.sendMessage(chatId, text, options.markdown ? { parse_mode: 'Markdown' } : {});
  }
}
