import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync, readFileSync } from 'fs';
import { Readable } from 'stream';
import { drive_v3, google } from 'googleapis';
import { AppConfig, GoogleConfig } from '../../config/configuration';
import { errorMessage } from '../../common/result';
import { readOAuthClient, readOAuthToken } from './oauth-files';

const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];
const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export interface DriveFile {
  id: string;
  name: string;
  webViewLink: string;
  mimeType?: string;
  size?: number;
}

export abstract class FileStorage {
  /** Uploads and shares the file; resolves to its web view link. */
  abstract uploadFile(content: Buffer, fileName: string, mimeType: string, folderId?: string): Promise<string>;
  abstract listFiles(folderId?: string): Promise<DriveFile[]>;
  abstract getShareableLink(fileId: string): Promise<string>;
  abstract createFolder(name: string, parentId?: string): Promise<string>;
  abstract deleteFile(fileId: string): Promise<void>;
}

export const viewLink = (fileId: string) => `https://drive.google.com/file/d/${fileId}/view`;

@Injectable()
export class GoogleDriveAdapter extends FileStorage {
  private readonly logger = new Logger(GoogleDriveAdapter.name);
  private readonly config: GoogleConfig;
  private client?: drive_v3.Drive;

  constructor(configService: ConfigService<AppConfig, true>) {
    super();
    this.config = configService.get('google', { infer: true });
  }

  async uploadFile(content: Buffer, fileName: string, mimeType: string, folderId?: string): Promise<string> {
    const folder = folderId || this.config.driveFolderId;
    const { data } = await this.drive().files.create({
      requestBody: { name: fileName, parents: folder ? [folder] : undefined },
      media: { mimeType, body: Readable.from(content) },
      fields: 'id, webViewLink',
    });
    if (!data.id) {
      throw new Error(`Drive did not return an id for ${fileName}`);
    }

    await this.makePublic(data.id);
    this.logger.log(`📤 Uploaded ${fileName} to Google Drive: ${data.id}`);
    return data.webViewLink ?? viewLink(data.id);
  }

  async listFiles(folderId?: string): Promise<DriveFile[]> {
    const folder = folderId || this.config.driveFolderId;
    const { data } = await this.drive().files.list({
      q: `'${folder}' in parents and trashed=false`,
      fields: 'files(id, name, webViewLink, mimeType, size)',
    });

    return (data.files ?? []).flatMap(file =>
      file.id
        ? [
            {
              id: file.id,
              name: file.name ?? file.id,
              webViewLink: file.webViewLink ?? viewLink(file.id),
              mimeType: file.mimeType ?? undefined,
              size: file.size ? Number(file.size) : undefined,
            },
          ]
        : [],
    );
  }

  async getShareableLink(fileId: string): Promise<string> {
    const { data } = await this.drive().files.get({ fileId, fields: 'webViewLink' });
    return data.webViewLink ?? viewLink(fileId);
  }

  async createFolder(name: string, parentId?: string): Promise<string> {
    const parent = parentId || this.config.driveFolderId;
    const { data } = await this.drive().files.create({
      requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: parent ? [parent] : undefined },
      fields: 'id',
    });
    if (!data.id) {
      throw new Error(`Drive did not return an id for folder ${name}`);
    }

    this.logger.log(`📁 Created folder ${name}: ${data.id}`);
    return data.id;
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.drive().files.delete({ fileId });
    this.logger.log(`🗑 Deleted file ${fileId}`);
  }

  private async makePublic(fileId: string): Promise<void> {
    try {
      await this.drive().permissions.create({ fileId, requestBody: { type: 'anyone', role: 'reader' } });
    } catch (error) {
      this.logger.warn(`Failed to make file ${fileId} public: ${errorMessage(error)}`);
    }
  }

  private drive(): drive_v3.Drive {
    this.client ??= google.drive({ version: 'v3', auth: this.createAuth() });
    return this.client;
  }

  /** OAuth user credentials take precedence over the service account when both files exist. */
  private createAuth() {
    const { oauthClientSecretFile, oauthTokenFile } = this.config;
    if (existsSync(oauthClientSecretFile) && existsSync(oauthTokenFile)) {
      const client = readOAuthClient(readFileSync(oauthClientSecretFile, 'utf8'));
      const oauth = new google.auth.OAuth2(client.clientId, client.clientSecret, client.redirectUri);
      oauth.setCredentials(readOAuthToken(readFileSync(oauthTokenFile, 'utf8')));
      this.logger.log('🔑 Google Drive uses OAuth user credentials');
      return oauth;
    }
    return new google.auth.GoogleAuth({ keyFile: this.config.serviceAccountFile, scopes: DRIVE_SCOPES });
  }
}
