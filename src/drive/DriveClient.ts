// src/drive/DriveClient.ts

/**
 * Folder and file operations the synchronizer needs from an authenticated remote drive.
 */
export interface DriveClient {
  findFolder(name: string, parentFolderId?: string): Promise<string | undefined>;
  createFolder(name: string, parentFolderId?: string): Promise<string>;
  findFile(folderId: string, name: string): Promise<string | undefined>;
  createFile(folderId: string, name: string, localPath: string, mimeType: string): Promise<string>;
  /** Replaces the content of an existing file, keeping its id. */
  updateFile(fileId: string, localPath: string, mimeType: string): Promise<string>;
}

export interface DriveConnector {
  connect(): Promise<DriveClient>;
}
