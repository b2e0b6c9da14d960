import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { AppConfig } from '../config/configuration';
import { TELEGRAF_BOT } from './telegram.constants';
import { MessageSender, TelegramMessageSender } from './message-sender';
import { FileDownloader, TelegramFileDownloader } from './file-downloader';

@Global()
@Module({
  providers: [
    {
      provide: TELEGRAF_BOT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const bot = new Telegraf(configService.get('telegram', { infer: true }).botToken);
        new Logger('TelegramModule').log('✅ Bot instance created');
        return bot;
      },
    },
    { provide: MessageSender, useClass: TelegramMessageSender },
    { provide: FileDownloader, useClass: TelegramFileDownloader },
  ],
  exports: [TELEGRAF_BOT, MessageSender, FileDownloader],
})
export class TelegramModule {}
