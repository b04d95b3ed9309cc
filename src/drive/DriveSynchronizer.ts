import { DriveClient } from './DriveClient';
import { RemoteFile, RemoteTarget, describeTarget } from '../model/RemoteTarget';
import { SyncError } from '../model/PipelineError';

export class DriveSynchronizer {
  /**
   * Makes the remote file match the local one: reuses or creates the target folder, then
   * updates the file in place when it exists (new version, same id) or creates it.
   * @throws SyncError wrapping any client failure.
   */
  static async sync(client: DriveClient, localPath: string, target: RemoteTarget, mimeType: string): Promise<RemoteFile> {
    try {
      const folderId = await this.resolveFolder(client, target);
      const existingId = await client.findFile(folderId, target.fileName);

      if (existingId) {
        const fileId = await client.updateFile(existingId, localPath, mimeType);
        console.log(`File '${describeTarget(target)}' updated (id ${fileId}).`);
        return { folderId, fileId, created: false };
      }

      const fileId = await client.createFile(folderId, target.fileName, localPath, mimeType);
      console.log(`File '${describeTarget(target)}' uploaded (id ${fileId}).`);
      return { folderId, fileId, created: true };
    } catch (error) {
      throw new SyncError(target, error);
    }
  }

  static async resolveFolder(client: DriveClient, target: RemoteTarget): Promise<string> {
    const existing = await client.findFolder(target.folderName, target.parentFolderId);
    if (existing) {
      return existing;
    }
    console.log(`Creating Google Drive folder '${target.folderName}'.`);
    return client.createFolder(target.folderName, target.parentFolderId);
  }
}
