import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ExecConfReader } from './ExecConfReader';
import { ConfigurationError } from '../model/PipelineError';
import { makeTempDir, removeDir } from '../testing/fixtures';

describe('ExecConfReader', () => {
  describe('parseConf', () => {
    it('fills in defaults', () => {
      const execConf = ExecConfReader.parseConf({ objects: ['Account'] });

      expect(execConf.appConfiguration.apiVersion).toBe('58.0');
      expect(execConf.appConfiguration.concurrency).toBe(4);
      expect(execConf.appConfiguration.failurePolicy).toBe('continue');
      expect(execConf.appConfiguration.retry).toEqual({ maxAttempts: 3, baseDelaySec: 2, maxDelaySec: 30 });
      expect(execConf.output).toEqual({
        folder: 'files',
        fileBaseName: 'all_data',
        statisticsLogName: 'Pipeline_Logs.csv',
        includeObjectSheets: true,
        excelRowLimit: 1_048_575,
        excelColumnLimit: 16_384,
      });
      expect(execConf.drive).toEqual({
        enabled: true,
        folderName: 'Salesforce Exports',
        credentialsFile: 'credentials/google.json',
      });
      expect(execConf.standardFields.has('Id')).toBe(true);
      expect(execConf.standardFields.has('Rating__c')).toBe(false);
    });

    it('reads object entries in both forms', () => {
      const execConf = ExecConfReader.parseConf({
        appConfiguration: { apiVersion: 59 },
        objects: ['Account', { name: 'Contact', fields: ['Id', 'Email'], fieldLabels: { Email: 'Contact Email' } }],
      });

      expect(execConf.appConfiguration.apiVersion).toBe('59.0');
      expect(execConf.objects.map(objectConf => objectConf.name)).toEqual(['Account', 'Contact']);
      expect(execConf.objects[0].fields).toBeUndefined();
      expect(execConf.objects[1].fields).toEqual(['Id', 'Email']);
      expect(execConf.objects[1].fieldLabels).toEqual({ Email: 'Contact Email' });
    });

    it('applies command line and environment overrides', () => {
      const execConf = ExecConfReader.parseConf(
        { objects: ['Account'], output: { folder: 'files' }, drive: { folderName: 'From File' } },
        { outputFolder: 'elsewhere', driveFolderName: 'From Env', skipUpload: true }
      );

      expect(execConf.output.folder).toBe('elsewhere');
      expect(execConf.drive.folderName).toBe('From Env');
      expect(execConf.drive.enabled).toBe(false);
    });

    it('rejects an empty object list', () => {
      expect(() => ExecConfReader.parseConf({ objects: [] })).toThrow(
        'Invalid configuration: objects: objects must list at least one Salesforce object'
      );
    });

    it('rejects a missing object list', () => {
      expect(() => ExecConfReader.parseConf({})).toThrow('Invalid configuration: objects: objects is required');
    });

    it('rejects object names that are not API names', () => {
      expect(() => ExecConfReader.parseConf({ objects: ['Account; DELETE'] })).toThrow(ConfigurationError);
      expect(() => ExecConfReader.parseConf({ objects: ['Account; DELETE'] })).toThrow(/objects\.0/);
    });

    it('rejects duplicate objects', () => {
      expect(() => ExecConfReader.parseConf({ objects: ['Account', { name: 'Account' }] })).toThrow(
        'Invalid configuration: object "Account" is listed more than once'
      );
    });

    it('rejects out of range values', () => {
      expect(() =>
        ExecConfReader.parseConf({ objects: ['Account'], appConfiguration: { concurrency: 0 } })
      ).toThrow(/appConfiguration\.concurrency/);
      expect(() =>
        ExecConfReader.parseConf({ objects: ['Account'], appConfiguration: { failurePolicy: 'ignore' } })
      ).toThrow(/appConfiguration\.failurePolicy/);
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('reads a YAML file', async () => {
      const confPath = path.join(dir, 'export.yml');
      await fs.promises.writeFile(
        confPath,
        ['appConfiguration:', '  apiVersion: 58.0', '  failurePolicy: abort', 'objects:', '  - Account', '  - Contact', ''].join('\n')
      );

      const execConf = ExecConfReader.readConfFile(confPath);

      expect(execConf.appConfiguration.apiVersion).toBe('58.0');
      expect(execConf.appConfiguration.failurePolicy).toBe('abort');
      expect(execConf.objects.map(objectConf => objectConf.name)).toEqual(['Account', 'Contact']);
    });

    it('reports unreadable and malformed files as ConfigurationError', async () => {
      const malformed = path.join(dir, 'broken.yml');
      await fs.promises.writeFile(malformed, 'objects: [Account\n');

      expect(() => ExecConfReader.readConfFile(path.join(dir, 'missing.yml'))).toThrow(ConfigurationError);
      expect(() => ExecConfReader.readConfFile(malformed)).toThrow(/^Error reading configuration file/);
    });

    it('checks the Drive credentials file only when upload is enabled', async () => {
      const credentialsFile = path.join(dir, 'google.json');
      const missing = ExecConfReader.parseConf({ objects: ['Account'], drive: { credentialsFile } });

      expect(() => ExecConfReader.validateResources(missing)).toThrow(
        `Google Drive credentials file "${credentialsFile}" does not exist`
      );
      expect(() =>
        ExecConfReader.validateResources(ExecConfReader.parseConf({ objects: ['Account'], drive: { credentialsFile } }, { skipUpload: true }))
      ).not.toThrow();

      await fs.promises.writeFile(credentialsFile, '{}');
      expect(() => ExecConfReader.validateResources(missing)).not.toThrow();
    });
  });
});
