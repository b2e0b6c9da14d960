import { Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { ExtraEditMessageText, ExtraReplyMessage } from 'telegraf/typings/telegram-types';
import { Language } from '../students/student.entity';
import { errorMessage } from '../common/result';

/**
 * What a flow may do with the update it is handling. Flows never see the
 * Telegraf context, so they can be driven from tests.
 */
export interface ChatSession {
  readonly userId: number;
  readonly language: Language;
  reply(text: string, extra?: ExtraReplyMessage): Promise<void>;
  /** Edits the message behind a button press; replies when there is none. */
  edit(text: string, extra?: ExtraEditMessageText): Promise<void>;
  /** Acknowledges a button press, optionally with a toast. Only the first call per update counts. */
  answer(text?: string): Promise<void>;
}

export class TelegrafSession implements ChatSession {
  private readonly logger = new Logger(TelegrafSession.name);
  private answered = false;

  constructor(
    private readonly ctx: Context,
    readonly userId: number,
    readonly language: Language,
  ) {}

  async reply(text: string, extra?: ExtraReplyMessage): Promise<void> {
    await this.ctx.reply(text, extra);
  }

  async edit(text: string, extra?: ExtraEditMessageText): Promise<void> {
    if (!this.ctx.callbackQuery) {
      await this.ctx.reply(text, extra);
      return;
    }
    try {
      await this.ctx.editMessageText(text, extra);
    } catch (error) {
      // Pressing the same button twice edits to identical content.
      if (errorMessage(error).includes('message is not modified')) {
        return;
      }
      this.logger.warn(`Edit failed, sending a new message: ${errorMessage(error)}`);
      await this.ctx.reply(text, extra);
    }
  }

  async answer(text?: string): Promise<void> {
    if (this.ctx.callbackQuery && !this.answered) {
      this.answered = true;
      await this.ctx.answerCbQuery(text);
    }
  }
}
