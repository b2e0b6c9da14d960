import { PostPublisher } from './post-publisher';
import { INSTAGRAM_IMAGE_REQUIRED, PostPlatform, ScheduledPost } from './scheduled-post.entity';
import { FakeSocialPublisher } from '../testing/fakes';

const post = (platform: PostPlatform, image_url?: string) =>
  ScheduledPost.create({
    content: 'Enrollment for the spring term is open',
    scheduled_datetime: new Date('2024-03-01T10:00:00Z'),
    platform,
    image_url,
  });

describe('PostPublisher', () => {
  let meta: FakeSocialPublisher;
  let publisher: PostPublisher;

  beforeEach(() => {
    meta = new FakeSocialPublisher();
    publisher = new PostPublisher(meta);
  });

  it('publishes Facebook posts with their image', async () => {
    const result = await publisher.publish(post(PostPlatform.FACEBOOK, 'https://img.test/a.png'));

    expect(result).toMatchObject({ success: true, skippedInstagram: false });
    expect(meta.facebookCalls).toEqual([
      { content: 'Enrollment for the spring term is open', imageUrl: 'https://img.test/a.png' },
    ]);
    expect(meta.instagramCalls).toHaveLength(0);
  });

  it('refuses an Instagram post without image and makes no call', async () => {
    const result = await publisher.publish(post(PostPlatform.INSTAGRAM, '   '));

    expect(result).toEqual({ success: false, error: INSTAGRAM_IMAGE_REQUIRED, skippedInstagram: true });
    expect(meta.facebookCalls).toHaveLength(0);
    expect(meta.instagramCalls).toHaveLength(0);
  });

  it('sends a both-platform post without image to Facebook only', async () => {
    const result = await publisher.publish(post(PostPlatform.BOTH));

    expect(result.success).toBe(true);
    expect(result.skippedInstagram).toBe(true);
    expect(meta.facebookCalls).toHaveLength(1);
    expect(meta.instagramCalls).toHaveLength(0);
  });

  it('publishes to both platforms when the image is present', async () => {
    const result = await publisher.publish(post(PostPlatform.BOTH, 'https://img.test/b.png'));

    expect(result).toMatchObject({ success: true, skippedInstagram: false });
    expect(meta.instagramCalls).toEqual([
      { imageUrl: 'https://img.test/b.png', caption: 'Enrollment for the spring term is open' },
    ]);
  });

  it('fails a both-platform post when Instagram fails', async () => {
    meta.instagramResult = { success: false, error: 'Media type not supported' };

    const result = await publisher.publish(post(PostPlatform.BOTH, 'https://img.test/b.png'));

    expect(result.success).toBe(false);
    expect(result.error).toBe('Media type not supported');
  });

  it('reports the Facebook error first', async () => {
    meta.facebookResult = { success: false, error: 'Invalid OAuth access token' };
    meta.instagramResult = { success: false, error: 'Media type not supported' };

    const result = await publisher.publish(post(PostPlatform.BOTH, 'https://img.test/b.png'));

    expect(result.error).toBe('Invalid OAuth access token');
  });

  it('publishes Instagram posts through the container flow', async () => {
    const result = await publisher.publish(post(PostPlatform.INSTAGRAM, 'https://img.test/c.png'));

    expect(result.success).toBe(true);
    expect(meta.facebookCalls).toHaveLength(0);
  });
});
