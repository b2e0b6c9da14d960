import { ADMIN_ID, BotHarness, createBotHarness } from '../../testing/bot-harness';
import { FakeSession } from '../../testing/fake-session';
import { CallbackHandler } from '../handlers/CallbackHandler';
import { DocumentHandler } from '../handlers/DocumentHandler';
import { Course } from '../../courses/course.entity';

describe('UploadFlow', () => {
  let harness: BotHarness;
  let session: FakeSession;
  let web: Course;
  let data: Course;
  let press: (data: string) => Promise<void>;
  let sendFile: () => Promise<void>;

  beforeEach(async () => {
    harness = await createBotHarness();
    session = new FakeSession(ADMIN_ID);
    web = await harness.addCourse({ materials_folder_id: 'folder-web' });
    data = await harness.addCourse({
      name: 'Data Science',
      start_date: new Date('2024-09-01T00:00:00Z'),
      end_date: new Date('2024-10-01T00:00:00Z'),
      materials_folder_id: 'folder-data',
    });
    harness.fileStorage.folders.set('folder-web', []);
    harness.fileStorage.folders.set('folder-data', []);
    harness.fileDownloader.files.set('doc-1', Buffer.from('lesson one'));

    const callbackHandler = harness.get(CallbackHandler);
    const documentHandler = harness.get(DocumentHandler);
    press = value => callbackHandler.handle(session, value);
    sendFile = () => documentHandler.handleDocument(session, { fileId: 'doc-1', fileName: 'notes.pdf' });
  });

  it('lets the admin tick courses on and off', async () => {
    await press('admin_upload');
    expect(session.last.text).toBe(
      '📤 Select the courses for this file (0 selected). With none selected it goes to the general folder.',
    );
    expect(session.last.buttons).toEqual([
      [`upsel_toggle_${web.id}`],
      [`upsel_toggle_${data.id}`],
      ['upsel_done'],
      ['admin_panel'],
    ]);

    await press(`upsel_toggle_${web.id}`);
    await press(`upsel_toggle_${data.id}`);
    await press(`upsel_toggle_${web.id}`);

    expect(session.last.text).toContain('(1 selected)');
    expect(harness.state.getState(ADMIN_ID, 'uploadSelection')?.courseIds).toEqual([data.id]);
  });

  it('uploads to every selected course and lists partial failures', async () => {
    harness.fileStorage.failUploadsTo.add('folder-data');
    await press('admin_upload');
    await press(`upsel_toggle_${web.id}`);
    await press(`upsel_toggle_${data.id}`);
    await press('upsel_done');
    expect(session.last.text).toBe('📎 Send the file to upload to 2 courses.');

    await sendFile();

    expect(session.last).toEqual({
      via: 'reply',
      text:
        '✅ notes.pdf uploaded.\nhttps://drive.test/file-1\n\n' +
        '⚠️ Failed to upload to Data Science: upload to folder-data refused',
      buttons: [['admin_panel']],
    });
    expect(harness.fileStorage.folders.get('folder-web')).toHaveLength(1);
  });

  it('reports when no course received the file', async () => {
    harness.fileStorage.failUploadsTo.add('folder-web');
    harness.state.setUserState(ADMIN_ID, { kind: 'uploadFile', courseIds: [web.id] });

    await sendFile();

    expect(session.last.text).toBe('❌ Upload failed.\nFailed to upload to Web Basics: upload to folder-web refused');
    expect(harness.state.getUserState(ADMIN_ID)).toBeUndefined();
  });

  it('falls back to the general folder when nothing was ticked', async () => {
    await press('upsel_done');
    expect(session.last.text).toBe('📎 Send the file now.');

    await sendFile();

    expect(harness.fileStorage.folders.get('root')?.map(file => file.name)).toEqual(['notes.pdf']);
  });
});
