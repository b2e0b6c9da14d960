import { Injectable } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, UploadSelectionAction } from '../constants';
import { Row, adminHomeButton, button, keyboard } from '../keyboards';
import { LocalizationService } from '../../i18n/localization.service';
import { CoursesService } from '../../courses/courses.service';
import { MaterialsService, UploadedFile } from '../../courses/materials.service';

/**
 * Upload one file to several courses at once. With no course ticked the
 * file goes to the default Drive folder.
 */
@Injectable()
export class UploadFlow {
  constructor(
    private readonly i18n: LocalizationService,
    private readonly coursesService: CoursesService,
    private readonly materialsService: MaterialsService,
    private readonly stateService: StateService,
  ) {}

  async start(session: ChatSession): Promise<void> {
    this.stateService.setUserState(session.userId, { kind: 'uploadSelection', courseIds: [] });
    await this.showSelection(session, []);
  }

  async toggle(session: ChatSession, courseId: string): Promise<void> {
    const state = this.stateService.getState(session.userId, 'uploadSelection');
    await session.answer();
    if (!state) {
      await this.start(session);
      return;
    }
    const courseIds = state.courseIds.includes(courseId)
      ? state.courseIds.filter(id => id !== courseId)
      : [...state.courseIds, courseId];
    this.stateService.setUserState(session.userId, { kind: 'uploadSelection', courseIds });
    await this.showSelection(session, courseIds);
  }

  async done(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'uploadSelection');
    await session.answer();
    const courseIds = state?.courseIds ?? [];
    this.stateService.setUserState(session.userId, { kind: 'uploadFile', courseIds });
    await session.edit(
      courseIds.length
        ? t('admin.upload.send_file_courses', { count: courseIds.length })
        : t('admin.upload.send_file'),
    );
  }

  async handleDocument(session: ChatSession, state: StateOf<'uploadFile'>, file: UploadedFile): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.reply(t('admin.upload.uploading'));

    const result = state.courseIds.length
      ? await this.materialsService.uploadToCourses(file, state.courseIds)
      : await this.materialsService.uploadFile(file);
    const done = keyboard([[adminHomeButton(t)]]);
    if (!result.success) {
      await session.reply(`❌ ${t('admin.upload.failed')}\n${result.error}`, done);
      return;
    }

    const lines = [t('admin.upload.done', { name: file.fileName }), ...result.links];
    if (result.warnings.length) {
      lines.push('', `⚠️ ${result.warnings.join('\n⚠️ ')}`);
    }
    await session.reply(lines.join('\n'), done);
  }

  private async showSelection(session: ChatSession, selected: string[]): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = await this.coursesService.getCourses(false);
    const rows: Row[] = courses.map(course => [
      button(
        `${selected.includes(course.id) ? '✅' : '⬜️'} ${course.name}`,
        callbackData(CallbackPrefix.UPLOAD_SELECTION, UploadSelectionAction.TOGGLE, course.id),
      ),
    ]);
    rows.push([button(t('admin.upload.continue'), callbackData(CallbackPrefix.UPLOAD_SELECTION, UploadSelectionAction.DONE))]);
    rows.push([adminHomeButton(t)]);
    await session.edit(t('admin.upload.choose_courses', { count: selected.length }), keyboard(rows));
  }
}
