import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { AppConfiguration } from '../model/AppConfiguration';
import { ExecConf } from '../model/ExecConf';
import { ObjectConf } from '../model/ObjectConf';
import { ConfigurationError } from '../model/PipelineError';

const STANDARD_FIELDS_FILE = path.resolve(__dirname, '../../data/standard-fields.json');

const DEFAULT_API_VERSION = '58.0';
const DEFAULT_MAX_FETCH = 5_000_000;
// Excel sheets hold 1,048,576 rows; the header takes one of them.
const EXCEL_MAX_DATA_ROWS = 1_048_575;
const EXCEL_MAX_COLUMNS = 16_384;

// Names end up in SOQL text, so only API-name characters are accepted.
const objectNameSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'must be a Salesforce object API name');
const fieldNameSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9_.]*$/, 'must be a Salesforce field API name');

const labelMapSchema = z.record(z.string().min(1));

const objectSchema = z.union([
  objectNameSchema,
  z.object({
    name: objectNameSchema,
    fields: z.array(fieldNameSchema).min(1).optional(),
    fieldLabels: labelMapSchema.optional(),
  }),
]);

const confSchema = z.object({
  appConfiguration: z
    .object({
      apiVersion: z
        .union([z.string(), z.number()])
        // YAML reads an unquoted 58.0 as the number 58
        .transform(value => (typeof value === 'number' ? value.toFixed(1) : value))
        .default(DEFAULT_API_VERSION),
      concurrency: z.number().int().positive().default(4),
      failurePolicy: z.enum(['continue', 'abort']).default('continue'),
      maxFetch: z.number().int().positive().default(DEFAULT_MAX_FETCH),
      retry: z
        .object({
          maxAttempts: z.number().int().positive().default(3),
          baseDelaySec: z.number().nonnegative().default(2),
          maxDelaySec: z.number().nonnegative().default(30),
        })
        .default({}),
    })
    .default({}),
  objects: z.array(objectSchema, { required_error: 'objects is required' }).min(1, 'objects must list at least one Salesforce object'),
  standardFields: z.array(z.string().min(1)).optional(),
  fieldLabels: labelMapSchema.default({}),
  output: z
    .object({
      folder: z.string().min(1).default('files'),
      fileBaseName: z.string().min(1).default('all_data'),
      statisticsLogName: z.string().min(1).default('Pipeline_Logs.csv'),
      includeObjectSheets: z.boolean().default(true),
      excelRowLimit: z.number().int().positive().max(EXCEL_MAX_DATA_ROWS).default(EXCEL_MAX_DATA_ROWS),
      excelColumnLimit: z.number().int().positive().max(EXCEL_MAX_COLUMNS).default(EXCEL_MAX_COLUMNS),
    })
    .default({}),
  drive: z
    .object({
      enabled: z.boolean().default(true),
      folderName: z.string().min(1).default('Salesforce Exports'),
      parentFolderId: z.string().min(1).optional(),
      credentialsFile: z.string().min(1).default('credentials/google.json'),
    })
    .default({}),
});

export interface ConfOverrides {
  outputFolder?: string;
  driveFolderName?: string;
  skipUpload?: boolean;
}

export class ExecConfReader {
  /**
   * Reads and validates the YAML configuration file.
   * Relative paths in the file are resolved against the current working directory.
   * @throws ConfigurationError when the file cannot be read or does not validate.
   */
  static readConfFile(confFilePath: string, overrides: ConfOverrides = {}): ExecConf {
    let confData: unknown;
    try {
      const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
      confData = yaml.load(confFileContent);
    } catch (error) {
      throw new ConfigurationError(
        `Error reading configuration file "${confFilePath}": ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return this.parseConf(confData, overrides);
  }

  static parseConf(confData: unknown, overrides: ConfOverrides = {}): ExecConf {
    const parsed = confSchema.safeParse(confData ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`, parsed.error);
    }
    const conf = parsed.data;

    const objects = conf.objects.map(objectData =>
      typeof objectData === 'string'
        ? new ObjectConf(objectData)
        : new ObjectConf(objectData.name, objectData.fields, objectData.fieldLabels)
    );
    const seen = new Set<string>();
    for (const objectConf of objects) {
      if (seen.has(objectConf.name)) {
        throw new ConfigurationError(`Invalid configuration: object "${objectConf.name}" is listed more than once`);
      }
      seen.add(objectConf.name);
    }

    const appConfiguration = new AppConfiguration(
      conf.appConfiguration.apiVersion,
      conf.appConfiguration.concurrency,
      conf.appConfiguration.failurePolicy,
      conf.appConfiguration.maxFetch,
      conf.appConfiguration.retry
    );

    return new ExecConf(
      appConfiguration,
      objects,
      conf.standardFields ?? this.readStandardFields(),
      conf.fieldLabels,
      { ...conf.output, folder: overrides.outputFolder ?? conf.output.folder },
      {
        ...conf.drive,
        folderName: overrides.driveFolderName ?? conf.drive.folderName,
        enabled: conf.drive.enabled && !overrides.skipUpload,
      }
    );
  }

  /**
   * Checks the files the run depends on before any network call is made.
   */
  static validateResources(execConf: ExecConf): void {
    if (execConf.drive.enabled && !fs.existsSync(path.resolve(execConf.drive.credentialsFile))) {
      throw new ConfigurationError(
        `Google Drive credentials file "${execConf.drive.credentialsFile}" does not exist`
      );
    }
  }

  private static readStandardFields(): string[] {
    const content: unknown = JSON.parse(fs.readFileSync(STANDARD_FIELDS_FILE, 'utf8'));
    return z.array(z.string()).parse(content);
  }
}
