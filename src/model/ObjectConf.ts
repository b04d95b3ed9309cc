// src/model/ObjectConf.ts

/**
 * A Salesforce object type to extract.
 */
export class ObjectConf {
  readonly name: string;
  /** Explicit field subset; when absent, fields are picked from the object's metadata. */
  readonly fields?: readonly string[];
  readonly fieldLabels: Readonly<Record<string, string>>;

  constructor(name: string, fields?: string[], fieldLabels: Record<string, string> = {}) {
    this.name = name;
    this.fields = fields ? Object.freeze([...fields]) : undefined;
    this.fieldLabels = Object.freeze({ ...fieldLabels });
    Object.freeze(this);
  }
}
