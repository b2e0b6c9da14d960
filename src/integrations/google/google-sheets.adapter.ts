import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { google } from 'googleapis';
import { AppConfig, GoogleConfig } from '../../config/configuration';
import { Clock } from '../../common/timezone';
import { errorMessage } from '../../common/result';
import { PostPlatform, ScheduledPost } from '../../posts/scheduled-post.entity';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const FIRST_DATA_ROW = 2;

enum Column {
  CONTENT = 0,
  IMAGE_URL = 1,
  DATE = 2,
  TIME = 3,
  PLATFORM = 4,
  STATUS = 5,
}

/** The slice of the Sheets v4 values resource this adapter needs. */
export interface SheetValuesApi {
  get(params: { spreadsheetId: string; range: string }): Promise<{ data: { values?: unknown[][] | null } }>;
  update(params: {
    spreadsheetId: string;
    range: string;
    valueInputOption: string;
    requestBody: { values: string[][] };
  }): Promise<unknown>;
}

export abstract class PostSource {
  /** Pending rows that parse into posts, in sheet order. */
  abstract getScheduledPosts(sheetName?: string): Promise<ScheduledPost[]>;
  abstract markPostPublished(rowIndex: number, sheetName?: string): Promise<void>;
  abstract addErrorNote(rowIndex: number, message: string, sheetName?: string): Promise<void>;
}

export function parsePlatform(value: string): PostPlatform | undefined {
  switch (value.trim().toLowerCase()) {
    case 'facebook':
      return PostPlatform.FACEBOOK;
    case 'instagram':
      return PostPlatform.INSTAGRAM;
    case 'both':
      return PostPlatform.BOTH;
    default:
      return undefined;
  }
}

const cell = (row: unknown[], column: Column) => {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value).trim();
};

@Injectable()
export class GoogleSheetsAdapter extends PostSource {
  private readonly logger = new Logger(GoogleSheetsAdapter.name);
  private readonly config: GoogleConfig;
  private valuesApi?: SheetValuesApi;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private readonly clock: Clock,
  ) {
    super();
    this.config = configService.get('google', { infer: true });
  }

  async getScheduledPosts(sheetName = this.config.sheetsName): Promise<ScheduledPost[]> {
    const response = await this.values().get({
      spreadsheetId: this.config.sheetsId,
      range: `${sheetName}!A${FIRST_DATA_ROW}:F`,
    });

    const posts: ScheduledPost[] = [];
    (response.data.values ?? []).forEach((row, offset) => {
      const rowIndex = offset + FIRST_DATA_ROW;
      if (row.length < 6) {
        this.logger.warn(`Row ${rowIndex} has insufficient columns, skipping`);
        return;
      }
      if (cell(row, Column.STATUS).toLowerCase() !== 'pending') {
        return;
      }

      try {
        const platformValue = cell(row, Column.PLATFORM);
        let platform = parsePlatform(platformValue);
        if (!platform) {
          this.logger.warn(`Unknown platform "${platformValue}" in row ${rowIndex}, defaulting to both`);
          platform = PostPlatform.BOTH;
        }

        posts.push(
          ScheduledPost.create({
            content: cell(row, Column.CONTENT),
            image_url: cell(row, Column.IMAGE_URL) || undefined,
            scheduled_datetime: this.clock.parseDateTime(cell(row, Column.DATE), cell(row, Column.TIME)),
            platform,
            sheet_row_index: rowIndex,
          }),
        );
      } catch (error) {
        this.logger.error(`Error parsing row ${rowIndex}: ${errorMessage(error)}`);
      }
    });

    this.logger.log(`📄 Found ${posts.length} pending posts in Google Sheets`);
    return posts;
  }

  async markPostPublished(rowIndex: number, sheetName = this.config.sheetsName): Promise<void> {
    await this.write(`${sheetName}!F${rowIndex}`, 'published');
    this.logger.log(`✅ Marked row ${rowIndex} as published`);
  }

  async addErrorNote(rowIndex: number, message: string, sheetName = this.config.sheetsName): Promise<void> {
    try {
      await this.write(`${sheetName}!G${rowIndex}`, message);
      this.logger.log(`Added error note to row ${rowIndex}`);
    } catch (error) {
      this.logger.error(`Failed to add error note to row ${rowIndex}: ${errorMessage(error)}`);
    }
  }

  protected createValuesApi(): SheetValuesApi {
    const auth = new google.auth.GoogleAuth({ keyFile: this.config.serviceAccountFile, scopes: SHEETS_SCOPES });
    const sheets = google.sheets({ version: 'v4', auth });
    return {
      get: params => sheets.spreadsheets.values.get(params),
      update: params => sheets.spreadsheets.values.update(params),
    };
  }

  private values(): SheetValuesApi {
    this.valuesApi ??= this.createValuesApi();
    return this.valuesApi;
  }

  private async write(range: string, value: string): Promise<void> {
    await this.values().update({
      spreadsheetId: this.config.sheetsId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values: [[value]] },
    });
  }
}
