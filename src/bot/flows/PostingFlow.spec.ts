import { ADMIN_ID, BotHarness, createBotHarness } from '../../testing/bot-harness';
import { FakeSession } from '../../testing/fake-session';
import { CallbackHandler } from '../handlers/CallbackHandler';
import { DocumentHandler } from '../handlers/DocumentHandler';
import { TextHandler } from '../handlers/TextHandler';
import { PostStatus } from '../../posts/scheduled-post.entity';

describe('PostingFlow', () => {
  let harness: BotHarness;
  let session: FakeSession;
  let press: (data: string) => Promise<void>;
  let text: (value: string) => Promise<void>;

  beforeEach(async () => {
    harness = await createBotHarness();
    session = new FakeSession(ADMIN_ID);
    const callbackHandler = harness.get(CallbackHandler);
    const textHandler = harness.get(TextHandler);
    press = data => callbackHandler.handle(session, data);
    text = value => textHandler.handle(session, value);
    await press('admin_post');
    await text('Open day on Friday');
  });

  it('publishes to both platforms with the largest photo', async () => {
    await press('postplat_both');
    expect(session.last.text).toBe('Send a photo, an image URL, or /skip to post without an image.');

    await harness.get(DocumentHandler).handlePhoto(session, ['photo-small', 'photo-large']);

    expect(harness.socialPublisher.facebookCalls).toEqual([
      { content: 'Open day on Friday', imageUrl: 'https://files.test/photo-large' },
    ]);
    expect(harness.socialPublisher.instagramCalls).toEqual([
      { imageUrl: 'https://files.test/photo-large', caption: 'Open day on Friday' },
    ]);
    expect(session.texts.slice(-2)).toEqual(['⏳ Publishing...', '✅ Post published successfully.']);
    const [post] = [...harness.scheduledPosts.items.values()];
    expect(post?.status).toBe(PostStatus.PUBLISHED);
  });

  it('rejects text that is not an image URL', async () => {
    await press('postplat_facebook');

    await text('not a link');

    expect(session.last.text).toBe(
      'That is not a valid image URL. Send a photo, a URL starting with http, or /skip.',
    );
    expect(harness.state.getState(ADMIN_ID, 'postImage')).toBeDefined();
  });

  it('falls back to Facebook when both were chosen without an image', async () => {
    await press('postplat_both');

    await text('/skip');

    expect(harness.socialPublisher.facebookCalls).toEqual([{ content: 'Open day on Friday', imageUrl: undefined }]);
    expect(harness.socialPublisher.instagramCalls).toEqual([]);
    expect(session.texts.slice(-3)).toEqual([
      '⚠️ Instagram needs an image.',
      '⏳ Publishing...',
      '✅ Post published successfully.',
    ]);
  });

  it('cancels an Instagram post without an image', async () => {
    await press('postplat_instagram');

    await text('/skip');

    expect(harness.socialPublisher.instagramCalls).toEqual([]);
    expect(session.last.text).toBe('❌ Post cancelled: Instagram cannot publish without an image.');
    expect(harness.scheduledPosts.items.size).toBe(0);
  });

  it('reports a failed publication', async () => {
    harness.socialPublisher.facebookResult = { success: false, error: 'Invalid OAuth access token' };
    await press('postplat_facebook');

    await text('https://cdn.test/poster.jpg');

    expect(session.last.text).toBe('❌ Publishing failed.\nInvalid OAuth access token');
    const [post] = [...harness.scheduledPosts.items.values()];
    expect(post).toMatchObject({ status: PostStatus.FAILED, error_message: 'Invalid OAuth access token' });
  });

  it('drops the draft on cancel', async () => {
    await press('postplat_cancel');

    expect(session.last.text).toBe('Cancelled.');
    expect(harness.state.getUserState(ADMIN_ID)).toBeUndefined();
  });
});
