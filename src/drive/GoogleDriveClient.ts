import * as fs from 'fs';
import * as path from 'path';
import { google, drive_v3 } from 'googleapis';
import { DriveClient, DriveConnector } from './DriveClient';

const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];
const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * Quotes a value for a Drive `files.list` query string.
 */
export function quoteQueryValue(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function folderQuery(name: string, parentFolderId?: string): string {
  const clauses = [`name = ${quoteQueryValue(name)}`, `mimeType = '${FOLDER_MIME_TYPE}'`, 'trashed = false'];
  if (parentFolderId) {
    clauses.push(`${quoteQueryValue(parentFolderId)} in parents`);
  }
  return clauses.join(' and ');
}

export function fileQuery(folderId: string, name: string): string {
  return [`name = ${quoteQueryValue(name)}`, `${quoteQueryValue(folderId)} in parents`, 'trashed = false'].join(' and ');
}

/**
 * Drive v3 implementation of DriveClient.
 */
export class GoogleDriveClient implements DriveClient {
  private readonly drive: drive_v3.Drive;

  constructor(drive: drive_v3.Drive) {
    this.drive = drive;
  }

  /**
   * Authenticates with a key file: either a service-account key or an authorized-user
   * token file (both are JSON files understood by GoogleAuth).
   */
  static connector(credentialsFile: string): DriveConnector {
    return {
      connect: async () => {
        const auth = new google.auth.GoogleAuth({
          keyFile: path.resolve(credentialsFile),
          scopes: DRIVE_SCOPES,
        });
        await auth.getClient();
        console.log('Google Drive authentication successful!');
        return new GoogleDriveClient(google.drive({ version: 'v3', auth }));
      },
    };
  }

  async findFolder(name: string, parentFolderId?: string): Promise<string | undefined> {
    return this.findOne(folderQuery(name, parentFolderId));
  }

  async createFolder(name: string, parentFolderId?: string): Promise<string> {
    const response = await this.drive.files.create({
      requestBody: {
        name,
        mimeType: FOLDER_MIME_TYPE,
        parents: parentFolderId ? [parentFolderId] : undefined,
      },
      fields: 'id',
      supportsAllDrives: true,
    });
    return this.requireId(response.data.id, `folder "${name}"`);
  }

  async findFile(folderId: string, name: string): Promise<string | undefined> {
    return this.findOne(fileQuery(folderId, name));
  }

  async createFile(folderId: string, name: string, localPath: string, mimeType: string): Promise<string> {
    const body = fs.createReadStream(localPath);
    try {
      const response = await this.drive.files.create({
        requestBody: { name, parents: [folderId] },
        media: { mimeType, body },
        fields: 'id',
        supportsAllDrives: true,
      });
      return this.requireId(response.data.id, `file "${name}"`);
    } finally {
      body.destroy();
    }
  }

  async updateFile(fileId: string, localPath: string, mimeType: string): Promise<string> {
    const body = fs.createReadStream(localPath);
    try {
      const response = await this.drive.files.update({
        fileId,
        media: { mimeType, body },
        fields: 'id',
        supportsAllDrives: true,
      });
      return this.requireId(response.data.id, `file ${fileId}`);
    } finally {
      body.destroy();
    }
  }

  private async findOne(q: string): Promise<string | undefined> {
    const response = await this.drive.files.list({
      q,
      fields: 'files(id, name)',
      pageSize: 1,
      supportsAllDrives: true,
      includeItemsFromAllDrives: true,
    });
    return response.data.files?.[0]?.id ?? undefined;
  }

  private requireId(id: string | null | undefined, what: string): string {
    if (!id) {
      throw new Error(`Google Drive returned no id for ${what}`);
    }
    return id;
  }
}
