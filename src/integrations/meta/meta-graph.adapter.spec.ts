import fetch, { Response } from 'node-fetch';
import { MetaGraphAdapter } from './meta-graph.adapter';
import { createTestConfig } from '../../testing/test-config';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return { __esModule: true, default: jest.fn(), Response: actual.Response };
});

const fetchMock = jest.mocked(fetch);

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

describe('MetaGraphAdapter', () => {
  let adapter: MetaGraphAdapter;

  beforeEach(() => {
    fetchMock.mockReset();
    adapter = new MetaGraphAdapter(createTestConfig());
  });

  it('posts text to the page feed', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: 'page-1_42' }));

    await expect(adapter.publishToFacebook('Hello')).resolves.toEqual({ success: true, postId: 'page-1_42' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://graph.facebook.com/v18.0/page-1/feed');
    expect(String(init?.body)).toBe('message=Hello&access_token=test-meta-token');
  });

  it('posts a photo with caption when an image is given', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: '77', post_id: 'page-1_77' }));

    await adapter.publishToFacebook('Caption', 'https://img.test/a.png');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://graph.facebook.com/v18.0/page-1/photos');
    expect(String(init?.body)).toBe(
      'url=https%3A%2F%2Fimg.test%2Fa.png&caption=Caption&access_token=test-meta-token',
    );
  });

  it('reports the vendor error message', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: { message: 'Invalid OAuth access token' } }, 400));

    await expect(adapter.publishToFacebook('Hello')).resolves.toEqual({
      success: false,
      error: 'Invalid OAuth access token',
    });
  });

  it('falls back to Unknown error on a body without id', async () => {
    fetchMock.mockResolvedValueOnce(json({}));

    await expect(adapter.publishToFacebook('Hello')).resolves.toEqual({ success: false, error: 'Unknown error' });
  });

  it('turns network failures into a failed result', async () => {
    fetchMock.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(adapter.publishToFacebook('Hello')).resolves.toEqual({ success: false, error: 'socket hang up' });
  });

  it('publishes to Instagram in two steps', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: 'container-9' })).mockResolvedValueOnce(json({ id: 'media-5' }));

    await expect(adapter.publishToInstagram('https://img.test/a.png', 'Caption')).resolves.toEqual({
      success: true,
      postId: 'media-5',
    });

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://graph.facebook.com/v18.0/ig-1/media',
      'https://graph.facebook.com/v18.0/ig-1/media_publish',
    ]);
    expect(String(fetchMock.mock.calls[1][1]?.body)).toBe('creation_id=container-9&access_token=test-meta-token');
  });

  it('stops when the media container cannot be created', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: { message: 'Image too small' } }, 400));

    await expect(adapter.publishToInstagram('https://img.test/a.png', 'Caption')).resolves.toEqual({
      success: false,
      error: 'Image too small',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects a blank image without calling the API', async () => {
    await expect(adapter.publishToInstagram('  ', 'Caption')).resolves.toEqual({
      success: false,
      error: 'Instagram posts require a valid image_url',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
