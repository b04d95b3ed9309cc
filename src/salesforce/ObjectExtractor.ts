import { CellValue, NULL_CELL } from '../model/CellValue';
import { ExecConf } from '../model/ExecConf';
import { FieldEntry, FieldMap, classifyField, stripCustomSuffix } from '../model/FieldMap';
import { ObjectConf } from '../model/ObjectConf';
import { ExtractionError } from '../model/PipelineError';
import { DataRecord, RecordSet } from '../model/RecordSet';
import { classifyError } from './ErrorClassifier';
import { FieldDescriptor, RawRecord, SalesforceSource } from './SalesforceSource';

const ID_FIELD = 'Id';
const DATE_FIELD_TYPES = new Set(['date', 'datetime']);
// Salesforce writes offsets as +0000; Date.parse wants +00:00.
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;

export class ObjectExtractor {
  /**
   * Fetches every record of one object and relabels its fields.
   * @throws ExtractionError wrapping whatever the source raised.
   */
  static async extract(execConf: ExecConf, objectConf: ObjectConf, source: SalesforceSource): Promise<RecordSet> {
    try {
      const fieldMap = this.buildFieldMap(execConf, objectConf, await source.describeFields(objectConf.name));
      const rawRecords = await source.queryAll(objectConf.name, fieldMap.apiNames);
      const records = rawRecords.map(raw => this.toDataRecord(raw, fieldMap));
      return Object.freeze({
        objectName: objectConf.name,
        columns: Object.freeze(fieldMap.labels),
        records: Object.freeze(records),
      });
    } catch (error) {
      throw new ExtractionError(objectConf.name, error, 1, classifyError(error));
    }
  }

  /**
   * Chooses the fields to query and their labels.
   * Without an explicit field list: the configured standard fields the object has, plus all custom fields.
   * Label order of precedence: object label map, global label map, described label, raw name.
   */
  static buildFieldMap(execConf: ExecConf, objectConf: ObjectConf, descriptors: FieldDescriptor[]): FieldMap {
    const described = new Map(descriptors.map(descriptor => [descriptor.name, descriptor]));

    let apiNames: string[];
    if (objectConf.fields) {
      apiNames = [...objectConf.fields];
    } else {
      apiNames = descriptors
        .map(descriptor => descriptor.name)
        .filter(name => classifyField(name) === 'custom' || execConf.standardFields.has(name));
    }
    if (apiNames.length === 0) {
      console.warn(`No configured fields found for ${objectConf.name}, querying ${ID_FIELD} only.`);
      apiNames = [ID_FIELD];
    }

    const entries: FieldEntry[] = apiNames.map(apiName => {
      const descriptor = described.get(apiName);
      const label =
        objectConf.fieldLabels[apiName] ??
        execConf.fieldLabels[apiName] ??
        (descriptor?.label || stripCustomSuffix(apiName));
      return { apiName, label, kind: classifyField(apiName), type: descriptor?.type };
    });
    return new FieldMap(objectConf.name, entries);
  }

  static toDataRecord(raw: RawRecord, fieldMap: FieldMap): DataRecord {
    const record = new Map<string, CellValue>();
    for (const entry of fieldMap.entries) {
      record.set(entry.label, this.toCell(this.valueAt(raw, entry.apiName), entry.type));
    }
    return record;
  }

  /**
   * Reads a field from a raw record; relationship paths such as `Owner.Name` walk the nested objects.
   */
  static valueAt(raw: RawRecord, apiName: string): unknown {
    if (apiName in raw) {
      return raw[apiName];
    }
    let current: unknown = raw;
    for (const part of apiName.split('.')) {
      if (typeof current !== 'object' || current === null || !(part in current)) {
        return undefined;
      }
      current = Reflect.get(current, part);
    }
    return current;
  }

  static toCell(value: unknown, fieldType?: string): CellValue {
    if (value === null || value === undefined) {
      return NULL_CELL;
    }
    if (typeof value === 'string') {
      if (fieldType !== undefined && DATE_FIELD_TYPES.has(fieldType)) {
        const time = Date.parse(value.replace(COMPACT_OFFSET, '$1:$2'));
        if (!Number.isNaN(time)) {
          return { kind: 'date', value: new Date(time) };
        }
      }
      return { kind: 'string', value };
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'string', value: String(value) };
    }
    if (typeof value === 'boolean') {
      return { kind: 'boolean', value };
    }
    if (typeof value === 'object') {
      // Compound fields (addresses, geolocations) and relationship lookups
      return { kind: 'string', value: JSON.stringify(value) };
    }
    return { kind: 'string', value: String(value) };
  }
}
