import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix } from '../constants';
import { adminHomeButton, button, keyboard } from '../keyboards';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { PostingService } from '../../posts/posting.service';
import { PostPlatform } from '../../posts/scheduled-post.entity';
import { FileDownloader } from '../../telegram/file-downloader';

export const POST_PLATFORM_CANCEL = 'cancel';
const SKIP_COMMAND = '/skip';

const PLATFORMS: readonly PostPlatform[] = [PostPlatform.FACEBOOK, PostPlatform.INSTAGRAM, PostPlatform.BOTH];

const isPlatform = (value: string): value is PostPlatform => PLATFORMS.some(platform => platform === value);

/** Admin ad-hoc post: content, platform, then a photo, an image URL or /skip. */
@Injectable()
export class PostingFlow {
  private readonly logger = new Logger(PostingFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly postingService: PostingService,
    private readonly fileDownloader: FileDownloader,
    private readonly stateService: StateService,
  ) {}

  async start(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.setUserState(session.userId, { kind: 'postContent' });
    await session.edit(t('admin.post.enter_content'), keyboard([[this.cancelButton(t)]]));
  }

  async handleContent(session: ChatSession, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const content = text.trim();
    if (!content) {
      await session.reply(t('admin.post.enter_content'));
      return;
    }

    this.stateService.setUserState(session.userId, { kind: 'postPlatform', content });
    await session.reply(
      t('admin.post.select_platform'),
      keyboard([
        ...PLATFORMS.map(platform => [button(t(`platform.${platform}`), callbackData(CallbackPrefix.POST_PLATFORM, platform))]),
        [this.cancelButton(t)],
      ]),
    );
  }

  async selectPlatform(session: ChatSession, value: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.answer();
    if (value === POST_PLATFORM_CANCEL) {
      this.stateService.clearState(session.userId);
      await session.edit(t('common.cancelled'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    const state = this.stateService.getState(session.userId, 'postPlatform');
    if (!state || !isPlatform(value)) {
      await session.edit(t('admin.post.expired'), keyboard([[adminHomeButton(t)]]));
      return;
    }
    this.stateService.setUserState(session.userId, { kind: 'postImage', content: state.content, platform: value });
    await session.edit(t('admin.post.enter_image'));
  }

  /** A URL, or /skip to post without an image. */
  async handleImageText(session: ChatSession, state: StateOf<'postImage'>, text: string): Promise<void> {
    const value = text.trim();
    if (value.toLowerCase() === SKIP_COMMAND) {
      await this.publish(session, state);
      return;
    }
    if (!/^https?:\/\/\S+$/i.test(value)) {
      await session.reply(this.i18n.t('admin.post.invalid_url', session.language));
      return;
    }
    await this.publish(session, state, value);
  }

  async handlePhoto(session: ChatSession, state: StateOf<'postImage'>, fileId: string): Promise<void> {
    await this.publish(session, state, await this.fileDownloader.getFileLink(fileId));
  }

  private async publish(session: ChatSession, state: StateOf<'postImage'>, imageUrl?: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);

    if (state.platform !== PostPlatform.FACEBOOK && !imageUrl) {
      await session.reply(t('admin.post.instagram_requires_image'));
    }
    await session.reply(t('admin.post.publishing'));

    const outcome = await this.postingService.publishNow({ content: state.content, platform: state.platform, imageUrl });
    const done = keyboard([[adminHomeButton(t)]]);
    switch (outcome.kind) {
      case 'refused':
        this.logger.warn(`Post refused: ${outcome.reason}`);
        await session.reply(t('admin.post.cancelled_no_image'), done);
        return;
      case 'published':
        await session.reply(t('admin.post.success'), done);
        return;
      case 'partial':
        await session.reply(t('admin.post.partial_success'), done);
        return;
      case 'failed':
        await session.reply(`${t('admin.post.failed')}\n${outcome.result.error ?? 'Unknown error'}`, done);
        return;
    }
  }

  private cancelButton(t: Translate) {
    return button(t('common.cancel'), callbackData(CallbackPrefix.POST_PLATFORM, POST_PLATFORM_CANCEL));
  }
}
