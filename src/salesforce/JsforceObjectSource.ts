import { Connection } from 'jsforce';
import { FieldDescriptor, RawRecord, SalesforceSource } from './SalesforceSource';

const ATTRIBUTES_KEY = 'attributes';

export class JsforceObjectSource implements SalesforceSource {
  private readonly connection: Connection;
  private readonly maxFetch: number;

  constructor(connection: Connection, maxFetch: number) {
    this.connection = connection;
    this.maxFetch = maxFetch;
  }

  async describeFields(objectName: string): Promise<FieldDescriptor[]> {
    const description = await this.connection.describe(objectName);
    return description.fields.map(field => ({
      name: field.name,
      label: field.label,
      type: field.type,
    }));
  }

  /**
   * Runs a SOQL query with jsforce's auto-fetch, which follows `nextRecordsUrl` until
   * the result is complete or `maxFetch` records have been read.
   */
  async queryAll(objectName: string, fields: readonly string[]): Promise<RawRecord[]> {
    const soql = `SELECT ${fields.join(', ')} FROM ${objectName}`;
    console.log(`Executing query: ${soql}`);
    const result = await this.connection.query(soql, { autoFetch: true, maxFetch: this.maxFetch });
    if (!result.done && result.records.length >= this.maxFetch) {
      console.warn(`Query for ${objectName} stopped at maxFetch (${this.maxFetch}) of ${result.totalSize} records.`);
    }
    return result.records.map(record => {
      const raw: RawRecord = {};
      for (const [field, value] of Object.entries(record)) {
        if (field !== ATTRIBUTES_KEY) {
          raw[field] = value;
        }
      }
      return raw;
    });
  }
}
