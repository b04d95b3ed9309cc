import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DriveSynchronizer } from './DriveSynchronizer';
import { SyncError } from '../model/PipelineError';
import { RemoteTarget } from '../model/RemoteTarget';
import { InMemoryDriveClient } from '../testing/InMemoryDriveClient';
import { makeTempDir, removeDir } from '../testing/fixtures';

const CSV_MIME = 'text/csv';

describe('DriveSynchronizer', () => {
  let dir: string;
  let localPath: string;
  const target: RemoteTarget = { folderName: 'Exports', fileName: 'all_data.csv' };

  beforeEach(async () => {
    dir = await makeTempDir();
    localPath = path.join(dir, 'all_data.csv');
    await fs.promises.writeFile(localPath, 'a,b\n1,2\n');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('creates the folder and the file on first sync', async () => {
    const drive = new InMemoryDriveClient();

    const remote = await DriveSynchronizer.sync(drive, localPath, target, CSV_MIME);

    expect(remote.created).toBe(true);
    expect(drive.folders).toEqual([{ id: remote.folderId, name: 'Exports', parentFolderId: undefined }]);
    expect(drive.files).toHaveLength(1);
    expect(drive.files[0].versions.map(version => version.toString())).toEqual(['a,b\n1,2\n']);
  });

  it('updates the same file in place on later syncs', async () => {
    const drive = new InMemoryDriveClient();
    const first = await DriveSynchronizer.sync(drive, localPath, target, CSV_MIME);

    await fs.promises.writeFile(localPath, 'a,b\n3,4\n');
    const second = await DriveSynchronizer.sync(drive, localPath, target, CSV_MIME);

    expect(second).toEqual({ folderId: first.folderId, fileId: first.fileId, created: false });
    expect(drive.folders).toHaveLength(1);
    expect(drive.files).toHaveLength(1);
    expect(drive.files[0].versions.map(version => version.toString())).toEqual(['a,b\n1,2\n', 'a,b\n3,4\n']);
  });

  it('reuses an existing folder under the configured parent', async () => {
    const drive = new InMemoryDriveClient();
    const otherParent = await drive.createFolder('Exports', 'other-parent');
    const existing = await drive.createFolder('Exports', 'parent-1');

    const remote = await DriveSynchronizer.sync(drive, localPath, { ...target, parentFolderId: 'parent-1' }, CSV_MIME);

    expect(remote.folderId).toBe(existing);
    expect(remote.folderId).not.toBe(otherParent);
    expect(drive.folders).toHaveLength(2);
  });

  it('wraps client failures in SyncError', async () => {
    const drive = new InMemoryDriveClient();
    drive.failUploadsWith = new Error('User rate limit exceeded');

    const error = await DriveSynchronizer.sync(drive, localPath, target, CSV_MIME).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncError);
    expect(error instanceof SyncError && error.message).toBe('Upload to Exports/all_data.csv failed: User rate limit exceeded');
  });
});
