export interface RemoteTarget {
  readonly folderName: string;
  readonly parentFolderId?: string;
  readonly fileName: string;
}

export interface RemoteFile {
  readonly folderId: string;
  readonly fileId: string;
  /** False when an existing remote file received a new version. */
  readonly created: boolean;
}

export function describeTarget(target: RemoteTarget): string {
  return `${target.folderName}/${target.fileName}`;
}
