import { Inject, Injectable } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import fetch from 'node-fetch';
import { TELEGRAF_BOT } from './telegram.constants';

/** Files users send to the bot. */
export abstract class FileDownloader {
  /** Direct download URL; it embeds the bot token. */
  abstract getFileLink(fileId: string): Promise<string>;
  abstract download(fileId: string): Promise<Buffer>;
}

@Injectable()
export class TelegramFileDownloader extends FileDownloader {
  constructor(@Inject(TELEGRAF_BOT) private readonly bot: Telegraf) {
    super();
  }

  async getFileLink(fileId: string): Promise<string> {
    const link = await this.bot.telegram.getFileLink(fileId);
    return link.toString();
  }

  async download(fileId: string): Promise<Buffer> {
    const response = await fetch(await this.getFileLink(fileId));
    if (!response.ok) {
      throw new Error(`Telegram file download failed: HTTP ${response.status}`);
    }
    return response.buffer();
  }
}
