import * as fs from 'fs';
import { DriveClient, DriveConnector } from '../drive/DriveClient';

export interface StoredFile {
  id: string;
  name: string;
  folderId: string;
  mimeType: string;
  versions: Buffer[];
}

interface StoredFolder {
  id: string;
  name: string;
  parentFolderId?: string;
}

/**
 * Drive stand-in that keeps folders and file versions in memory.
 */
export class InMemoryDriveClient implements DriveClient {
  readonly folders: StoredFolder[] = [];
  readonly files: StoredFile[] = [];
  failUploadsWith?: Error;
  private nextId = 1;

  connector(): DriveConnector {
    return { connect: async () => this };
  }

  async findFolder(name: string, parentFolderId?: string): Promise<string | undefined> {
    return this.folders.find(
      folder => folder.name === name && (parentFolderId === undefined || folder.parentFolderId === parentFolderId)
    )?.id;
  }

  async createFolder(name: string, parentFolderId?: string): Promise<string> {
    const id = `folder-${this.nextId++}`;
    this.folders.push({ id, name, parentFolderId });
    return id;
  }

  async findFile(folderId: string, name: string): Promise<string | undefined> {
    return this.files.find(file => file.folderId === folderId && file.name === name)?.id;
  }

  async createFile(folderId: string, name: string, localPath: string, mimeType: string): Promise<string> {
    this.throwIfFailing();
    const id = `file-${this.nextId++}`;
    this.files.push({ id, name, folderId, mimeType, versions: [await fs.promises.readFile(localPath)] });
    return id;
  }

  async updateFile(fileId: string, localPath: string, mimeType: string): Promise<string> {
    this.throwIfFailing();
    const file = this.files.find(candidate => candidate.id === fileId);
    if (!file) {
      throw new Error(`File not found: ${fileId}`);
    }
    file.mimeType = mimeType;
    file.versions.push(await fs.promises.readFile(localPath));
    return file.id;
  }

  private throwIfFailing(): void {
    if (this.failUploadsWith) {
      throw this.failUploadsWith;
    }
  }
}
