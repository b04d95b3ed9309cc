import { AppConfiguration } from './AppConfiguration';
import { ObjectConf } from './ObjectConf';

export interface OutputConf {
  readonly folder: string;
  readonly fileBaseName: string;
  readonly statisticsLogName: string;
  readonly includeObjectSheets: boolean;
  readonly excelRowLimit: number;
  readonly excelColumnLimit: number;
}

export interface DriveConf {
  readonly enabled: boolean;
  readonly folderName: string;
  readonly parentFolderId?: string;
  readonly credentialsFile: string;
}

/**
 * Immutable run configuration, built once at startup and passed to every component.
 */
export class ExecConf {
  readonly appConfiguration: AppConfiguration;
  readonly objects: readonly ObjectConf[];
  readonly standardFields: ReadonlySet<string>;
  readonly fieldLabels: Readonly<Record<string, string>>;
  readonly output: OutputConf;
  readonly drive: DriveConf;

  constructor(
    appConfiguration: AppConfiguration,
    objects: ObjectConf[],
    standardFields: string[],
    fieldLabels: Record<string, string>,
    output: OutputConf,
    drive: DriveConf
  ) {
    this.appConfiguration = appConfiguration;
    this.objects = Object.freeze([...objects]);
    this.standardFields = new Set(standardFields);
    this.fieldLabels = Object.freeze({ ...fieldLabels });
    this.output = Object.freeze({ ...output });
    this.drive = Object.freeze({ ...drive });
    Object.freeze(this);
  }
}
