import { describe, it, expect } from 'vitest';
import { EnvironmentReader } from './EnvironmentReader';
import { ConfigurationError } from '../model/PipelineError';

describe('EnvironmentReader', () => {
  it('reads client credentials', () => {
    const environment = EnvironmentReader.read({
      SF_INSTANCE_URL: 'https://example.my.salesforce.com',
      SF_CLIENT_ID: 'test-client',
      SF_CLIENT_SECRET: 'test-secret',
      LOCAL_FOLDER: 'exports',
    });

    expect(environment).toEqual({
      salesforce: {
        flow: 'clientCredentials',
        instanceUrl: 'https://example.my.salesforce.com',
        clientId: 'test-client',
        clientSecret: 'test-secret',
      },
      driveFolderName: undefined,
      localFolder: 'exports',
    });
  });

  it('prefers the username-password flow when a username is set', () => {
    const environment = EnvironmentReader.read({
      SF_USERNAME: 'etl@example.com',
      SF_PASSWORD: 'test-password',
      SF_CLIENT_ID: 'test-client',
      GOOGLE_DRIVE_FOLDER_NAME: 'Nightly',
    });

    expect(environment.salesforce).toEqual({
      flow: 'password',
      loginUrl: 'https://login.salesforce.com',
      username: 'etl@example.com',
      password: 'test-password',
      securityToken: '',
    });
    expect(environment.driveFolderName).toBe('Nightly');
  });

  it('treats blank values as unset', () => {
    expect(() =>
      EnvironmentReader.read({ SF_INSTANCE_URL: 'https://example.my.salesforce.com', SF_CLIENT_ID: 'test-client', SF_CLIENT_SECRET: '  ' })
    ).toThrow(ConfigurationError);
  });

  it('requires a password with a username', () => {
    expect(() => EnvironmentReader.read({ SF_USERNAME: 'etl@example.com' })).toThrow(
      'SF_PASSWORD is required when SF_USERNAME is set'
    );
  });

  it('rejects a malformed instance URL', () => {
    expect(() =>
      EnvironmentReader.read({ SF_INSTANCE_URL: 'not a url', SF_CLIENT_ID: 'test-client', SF_CLIENT_SECRET: 'test-secret' })
    ).toThrow('Invalid environment: SF_INSTANCE_URL must be a valid URL');
  });
});
