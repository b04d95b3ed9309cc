// src/salesforce/SalesforceAuthenticator.ts
import { Connection } from 'jsforce';
import axios from 'axios';
import { SalesforceCredentials } from '../reader/EnvironmentReader';
import { AuthenticationError, errorMessage } from '../model/PipelineError';
import { classifyError } from './ErrorClassifier';
import { JsforceObjectSource } from './JsforceObjectSource';
import { SalesforceConnector, SalesforceSource } from './SalesforceSource';

const MS_IN_HOUR = 3600000; // 1 hour in milliseconds

// Token endpoint statuses that reject the credentials themselves.
const REJECTED_STATUSES = new Set([400, 401, 403]);

interface TokenResponse {
  access_token: string;
  instance_url?: string;
}

export class SalesforceAuthenticator implements SalesforceConnector {
  private readonly credentials: SalesforceCredentials;
  private readonly apiVersion: string;
  private readonly maxFetch: number;

  private actualConnection: Connection | null = null;
  private tokenCreatedAt: number | null = null; // Store the timestamp when the token was generated

  constructor(credentials: SalesforceCredentials, apiVersion: string, maxFetch: number) {
    this.credentials = credentials;
    this.apiVersion = apiVersion;
    this.maxFetch = maxFetch;
  }

  async connect(): Promise<SalesforceSource> {
    return new JsforceObjectSource(await this.authenticate(), this.maxFetch);
  }

  /**
   * Returns a jsforce connection, reusing the previous one while its token is less than an hour old.
   * @throws AuthenticationError when Salesforce rejects the credentials.
   */
  async authenticate(): Promise<Connection> {
    const now = Date.now();
    if (this.actualConnection && this.tokenCreatedAt && now - this.tokenCreatedAt < MS_IN_HOUR) {
      return this.actualConnection;
    }

    this.actualConnection =
      this.credentials.flow === 'clientCredentials'
        ? await this.clientCredentialsLogin(this.credentials.instanceUrl, this.credentials.clientId, this.credentials.clientSecret)
        : await this.passwordLogin(
            this.credentials.loginUrl,
            this.credentials.username,
            this.credentials.password + this.credentials.securityToken
          );
    this.tokenCreatedAt = Date.now();
    console.log('Salesforce login successful!');
    return this.actualConnection;
  }

  private async clientCredentialsLogin(instanceUrl: string, clientId: string, clientSecret: string): Promise<Connection> {
    const tokenUrl = `${instanceUrl}/services/oauth2/token`;
    try {
      const response = await axios.post<TokenResponse>(tokenUrl, null, {
        params: {
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
        },
      });
      return new Connection({
        instanceUrl: response.data.instance_url ?? instanceUrl,
        accessToken: response.data.access_token,
        version: this.apiVersion,
      });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response && REJECTED_STATUSES.has(error.response.status)) {
        throw new AuthenticationError(`Salesforce authentication failed (${error.response.status}): ${error.message}`, error);
      }
      throw error;
    }
  }

  private async passwordLogin(loginUrl: string, username: string, passwordAndToken: string): Promise<Connection> {
    const connection = new Connection({ loginUrl, version: this.apiVersion });
    try {
      await connection.login(username, passwordAndToken);
    } catch (error) {
      if (classifyError(error) === 'fatal') {
        throw new AuthenticationError(`Salesforce login rejected: ${errorMessage(error)}`, error);
      }
      throw error;
    }
    return connection;
  }
}
