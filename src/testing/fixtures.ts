import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExecConf } from '../model/ExecConf';
import { ExecConfReader } from '../reader/ExecConfReader';

export async function makeTempDir(prefix = 'sf-drive-export-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export interface TestConfInput {
  objects?: unknown[];
  standardFields?: string[];
  fieldLabels?: Record<string, string>;
  appConfiguration?: Record<string, unknown>;
  output?: Record<string, unknown>;
  drive?: Record<string, unknown>;
}

/**
 * Configuration for tests: Account and Contact, no backoff wait, upload disabled unless `drive` says otherwise.
 */
export function testConf(outputFolder: string, input: TestConfInput = {}): ExecConf {
  return ExecConfReader.parseConf({
    objects: input.objects ?? ['Account', 'Contact'],
    standardFields: input.standardFields,
    fieldLabels: input.fieldLabels,
    appConfiguration: {
      retry: { maxAttempts: 3, baseDelaySec: 0, maxDelaySec: 0 },
      ...input.appConfiguration,
    },
    output: { folder: outputFolder, ...input.output },
    drive: { folderName: 'Exports', enabled: false, ...input.drive },
  });
}
