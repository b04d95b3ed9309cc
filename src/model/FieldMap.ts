// src/model/FieldMap.ts

export type FieldKind = 'standard' | 'custom';

const CUSTOM_FIELD_SUFFIX = '__c';

export interface FieldEntry {
  readonly apiName: string;
  readonly label: string;
  readonly kind: FieldKind;
  /** Salesforce field type from the object's describe result (e.g. "string", "date"), when known. */
  readonly type?: string;
}

/**
 * Tells custom fields (API names ending in `__c`) apart from standard ones.
 */
export function classifyField(apiName: string): FieldKind {
  return apiName.toLowerCase().endsWith(CUSTOM_FIELD_SUFFIX) ? 'custom' : 'standard';
}

/**
 * Label used for a custom field with no configured or described label.
 */
export function stripCustomSuffix(apiName: string): string {
  return classifyField(apiName) === 'custom'
    ? apiName.slice(0, -CUSTOM_FIELD_SUFFIX.length)
    : apiName;
}

/**
 * Ordered mapping from API field names to the labels used as output columns, for one object.
 * Labels are unique within the map.
 */
export class FieldMap {
  readonly objectName: string;
  readonly entries: readonly FieldEntry[];
  private readonly byApiName: Map<string, FieldEntry>;

  constructor(objectName: string, entries: FieldEntry[]) {
    this.objectName = objectName;
    this.entries = Object.freeze(FieldMap.disambiguate(entries));
    this.byApiName = new Map(this.entries.map(entry => [entry.apiName, entry]));
  }

  get apiNames(): string[] {
    return this.entries.map(entry => entry.apiName);
  }

  get labels(): string[] {
    return this.entries.map(entry => entry.label);
  }

  get(apiName: string): FieldEntry | undefined {
    return this.byApiName.get(apiName);
  }

  /**
   * Label for a field, falling back to the raw API name for fields the map does not know.
   */
  labelOf(apiName: string): string {
    return this.byApiName.get(apiName)?.label ?? apiName;
  }

  private static disambiguate(entries: FieldEntry[]): FieldEntry[] {
    const counts = new Map<string, number>();
    for (const entry of entries) {
      counts.set(entry.label, (counts.get(entry.label) ?? 0) + 1);
    }
    return entries.map(entry =>
      (counts.get(entry.label) ?? 0) > 1
        ? { ...entry, label: `${entry.label} (${entry.apiName})` }
        : entry
    );
  }
}
