import { z } from 'zod';
import { ConfigurationError } from '../model/PipelineError';

export type SalesforceCredentials =
  | {
      flow: 'clientCredentials';
      instanceUrl: string;
      clientId: string;
      clientSecret: string;
    }
  | {
      flow: 'password';
      loginUrl: string;
      username: string;
      password: string;
      securityToken: string;
    };

export interface Environment {
  salesforce: SalesforceCredentials;
  driveFolderName?: string;
  localFolder?: string;
}

const optional = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value));

const envSchema = z.object({
  SF_INSTANCE_URL: optional.pipe(z.string().url('SF_INSTANCE_URL must be a valid URL').optional()),
  SF_CLIENT_ID: optional,
  SF_CLIENT_SECRET: optional,
  SF_USERNAME: optional,
  SF_PASSWORD: optional,
  SF_TOKEN: optional,
  SF_LOGIN_URL: optional.pipe(z.string().url('SF_LOGIN_URL must be a valid URL').optional()),
  GOOGLE_DRIVE_FOLDER_NAME: optional,
  LOCAL_FOLDER: optional,
});

export class EnvironmentReader {
  /**
   * Reads Salesforce credentials and path overrides from the environment.
   * The username-password flow is used when SF_USERNAME is set, the client-credentials flow otherwise.
   */
  static read(env: NodeJS.ProcessEnv = process.env): Environment {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid environment: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        parsed.error
      );
    }
    const vars = parsed.data;

    let salesforce: SalesforceCredentials;
    if (vars.SF_USERNAME) {
      if (!vars.SF_PASSWORD) {
        throw new ConfigurationError('SF_PASSWORD is required when SF_USERNAME is set');
      }
      salesforce = {
        flow: 'password',
        loginUrl: vars.SF_LOGIN_URL ?? 'https://login.salesforce.com',
        username: vars.SF_USERNAME,
        password: vars.SF_PASSWORD,
        securityToken: vars.SF_TOKEN ?? '',
      };
    } else {
      if (!vars.SF_INSTANCE_URL || !vars.SF_CLIENT_ID || !vars.SF_CLIENT_SECRET) {
        throw new ConfigurationError(
          'Salesforce credentials missing: set SF_INSTANCE_URL, SF_CLIENT_ID and SF_CLIENT_SECRET, or SF_USERNAME and SF_PASSWORD'
        );
      }
      salesforce = {
        flow: 'clientCredentials',
        instanceUrl: vars.SF_INSTANCE_URL,
        clientId: vars.SF_CLIENT_ID,
        clientSecret: vars.SF_CLIENT_SECRET,
      };
    }

    return {
      salesforce,
      driveFolderName: vars.GOOGLE_DRIVE_FOLDER_NAME,
      localFolder: vars.LOCAL_FOLDER,
    };
  }
}
