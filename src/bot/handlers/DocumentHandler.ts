import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { FILE_SIZE_LIMIT } from '../constants';
import { homeButton, keyboard } from '../keyboards';
import { CourseManagerFlow } from '../flows/CourseManagerFlow';
import { UploadFlow } from '../flows/UploadFlow';
import { PostingFlow } from '../flows/PostingFlow';
import { LocalizationService } from '../../i18n/localization.service';
import { UploadedFile } from '../../courses/materials.service';
import { FileDownloader } from '../../telegram/file-downloader';
import { errorMessage } from '../../common/result';

export interface IncomingDocument {
  fileId: string;
  fileName?: string;
  mimeType?: string;
  fileSize?: number;
}

const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Documents for course material uploads and photos for ad-hoc posts. */
@Injectable()
export class DocumentHandler {
  private readonly logger = new Logger(DocumentHandler.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly stateService: StateService,
    private readonly fileDownloader: FileDownloader,
    private readonly courseManagerFlow: CourseManagerFlow,
    private readonly uploadFlow: UploadFlow,
    private readonly postingFlow: PostingFlow,
  ) {}

  async handleDocument(session: ChatSession, document: IncomingDocument): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getUserState(session.userId);
    if (state?.kind !== 'uploadFile' && state?.kind !== 'courseFileUpload') {
      await session.reply(t('common.unexpected_file'), keyboard([[homeButton(t)]]));
      return;
    }
    if (document.fileSize && document.fileSize > FILE_SIZE_LIMIT) {
      await session.reply(t('admin.upload.too_large'));
      return;
    }

    try {
      const file: UploadedFile = {
        content: await this.fileDownloader.download(document.fileId),
        fileName: document.fileName ?? `file_${document.fileId}`,
        mimeType: document.mimeType ?? DEFAULT_MIME_TYPE,
      };
      this.logger.log(`📎 ${file.fileName} (${file.content.length} bytes) from ${session.userId}`);

      if (state.kind === 'uploadFile') {
        await this.uploadFlow.handleDocument(session, state, file);
      } else {
        await this.courseManagerFlow.handleDocument(session, state, file);
      }
    } catch (error) {
      this.logger.error(`Document handling error for ${session.userId}: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      await session.reply(t('common.error'));
      throw error;
    }
  }

  /** `fileIds` are the sizes Telegram offers, smallest first. */
  async handlePhoto(session: ChatSession, fileIds: string[]): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'postImage');
    const largest = fileIds[fileIds.length - 1];
    if (!state || !largest) {
      await session.reply(t('common.unexpected_file'), keyboard([[homeButton(t)]]));
      return;
    }
    await this.postingFlow.handlePhoto(session, state, largest);
  }
}
