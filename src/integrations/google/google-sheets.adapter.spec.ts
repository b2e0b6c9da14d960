import { GoogleSheetsAdapter, SheetValuesApi, parsePlatform } from './google-sheets.adapter';
import { PostPlatform } from '../../posts/scheduled-post.entity';
import { FixedClock, createTestConfig } from '../../testing/test-config';

class FakeValuesApi implements SheetValuesApi {
  rows: unknown[][] = [];
  readonly updates: Array<{ range: string; values: string[][] }> = [];
  failUpdates = false;

  async get() {
    return { data: { values: this.rows } };
  }

  async update(params: { range: string; requestBody: { values: string[][] } }) {
    if (this.failUpdates) {
      throw new Error('quota exceeded');
    }
    this.updates.push({ range: params.range, values: params.requestBody.values });
    return {};
  }
}

class TestSheetsAdapter extends GoogleSheetsAdapter {
  constructor(readonly api: FakeValuesApi) {
    super(createTestConfig(), new FixedClock(new Date('2024-01-01T00:00:00Z'), 'Europe/Berlin'));
  }

  protected createValuesApi(): SheetValuesApi {
    return this.api;
  }
}

describe('GoogleSheetsAdapter', () => {
  let api: FakeValuesApi;
  let adapter: TestSheetsAdapter;

  beforeEach(() => {
    api = new FakeValuesApi();
    adapter = new TestSheetsAdapter(api);
  });

  it('parses pending rows with their sheet row index', async () => {
    api.rows = [
      ['Welcome post', '', '2024-01-15', '14:30', 'Facebook', 'pending'],
      ['Already out', '', '2024-01-15', '14:30', 'facebook', 'published'],
      ['Photo post', 'https://img.test/p.jpg', '2024-01-16', '09:00', ' INSTAGRAM ', ' Pending '],
    ];

    const posts = await adapter.getScheduledPosts();

    expect(posts).toHaveLength(2);
    expect(posts[0]).toMatchObject({
      content: 'Welcome post',
      image_url: undefined,
      platform: PostPlatform.FACEBOOK,
      sheet_row_index: 2,
      status: 'pending',
    });
    expect(posts[0].scheduled_datetime.toISOString()).toBe('2024-01-15T13:30:00.000Z');
    expect(posts[1]).toMatchObject({
      image_url: 'https://img.test/p.jpg',
      platform: PostPlatform.INSTAGRAM,
      sheet_row_index: 4,
    });
  });

  it('skips short rows and rows with unparseable dates', async () => {
    api.rows = [
      ['Too short', '', '2024-01-15'],
      ['Bad date', '', '15-01-2024', '14:30', 'both', 'pending'],
      ['Bad time', '', '2024-01-15', '2:30 PM', 'both', 'pending'],
      ['Good', '', '2024-01-15', '10:00', 'both', 'pending'],
    ];

    const posts = await adapter.getScheduledPosts();

    expect(posts.map(post => post.sheet_row_index)).toEqual([5]);
  });

  it('defaults unknown platforms to both', async () => {
    api.rows = [['Post', '', '2024-01-15', '10:00', 'tiktok', 'pending']];

    const [post] = await adapter.getScheduledPosts();

    expect(post.platform).toBe(PostPlatform.BOTH);
  });

  it('writes the published status and error notes into the row', async () => {
    await adapter.markPostPublished(7);
    await adapter.addErrorNote(7, 'Invalid token');

    expect(api.updates).toEqual([
      { range: 'Sheet1!F7', values: [['published']] },
      { range: 'Sheet1!G7', values: [['Invalid token']] },
    ]);
  });

  it('propagates failures to mark a row but only logs failed error notes', async () => {
    api.failUpdates = true;

    await expect(adapter.markPostPublished(3)).rejects.toThrow('quota exceeded');
    await expect(adapter.addErrorNote(3, 'boom')).resolves.toBeUndefined();
  });

  it('parses platform names case-insensitively', () => {
    expect(parsePlatform(' Both ')).toBe(PostPlatform.BOTH);
    expect(parsePlatform('twitter')).toBeUndefined();
  });
});
