// src/salesforce/SalesforceSource.ts

export interface FieldDescriptor {
  name: string;
  label: string;
  type: string;
}

/** A record as returned by the Salesforce API, without the `attributes` envelope. */
export type RawRecord = Record<string, unknown>;

/**
 * The part of an authenticated Salesforce session the extractor uses.
 * `queryAll` returns every matching record in server order; paging is the implementation's job.
 */
export interface SalesforceSource {
  describeFields(objectName: string): Promise<FieldDescriptor[]>;
  queryAll(objectName: string, fields: readonly string[]): Promise<RawRecord[]>;
}

export interface SalesforceConnector {
  connect(): Promise<SalesforceSource>;
}
