import { describe, it, expect } from 'vitest';
import { FieldMap, classifyField, stripCustomSuffix } from './FieldMap';
import { canTransition } from './PipelineState';
import { cellToText } from './CellValue';

describe('classifyField', () => {
  it('classifies __c fields as custom', () => {
    expect(classifyField('Elevator__c')).toBe('custom');
    expect(classifyField('Elevator__C')).toBe('custom');
  });

  it('classifies everything else as standard', () => {
    expect(classifyField('Name')).toBe('standard');
    expect(classifyField('Owner.Name')).toBe('standard');
    expect(classifyField('c__Thing')).toBe('standard');
  });

  it('strips the suffix from custom fields only', () => {
    expect(stripCustomSuffix('Service_Cost__c')).toBe('Service_Cost');
    expect(stripCustomSuffix('Name')).toBe('Name');
  });
});

describe('FieldMap', () => {
  const fieldMap = new FieldMap('Account', [
    { apiName: 'Id', label: 'Account ID', kind: 'standard' },
    { apiName: 'Name', label: 'Name', kind: 'standard' },
    { apiName: 'Name__c', label: 'Name', kind: 'custom' },
  ]);

  it('keeps field order', () => {
    expect(fieldMap.apiNames).toEqual(['Id', 'Name', 'Name__c']);
  });

  it('suffixes clashing labels with the API name', () => {
    expect(fieldMap.labels).toEqual(['Account ID', 'Name (Name)', 'Name (Name__c)']);
  });

  it('falls back to the API name for unknown fields', () => {
    expect(fieldMap.labelOf('Id')).toBe('Account ID');
    expect(fieldMap.labelOf('Phone')).toBe('Phone');
  });
});

describe('PipelineState transitions', () => {
  it('moves forward one step at a time', () => {
    expect(canTransition('INIT', 'EXTRACTING')).toBe(true);
    expect(canTransition('INIT', 'MERGING')).toBe(false);
    expect(canTransition('SYNCING', 'REPORTING')).toBe(true);
    expect(canTransition('REPORTING', 'DONE')).toBe(true);
  });

  it('reaches FAILED from any non-terminal state only', () => {
    expect(canTransition('PERSISTING', 'FAILED')).toBe(true);
    expect(canTransition('DONE', 'FAILED')).toBe(false);
    expect(canTransition('FAILED', 'INIT')).toBe(false);
  });
});

describe('cellToText', () => {
  it('renders each kind of cell', () => {
    expect(cellToText({ kind: 'string', value: 'Acme' })).toBe('Acme');
    expect(cellToText({ kind: 'number', value: 12.5 })).toBe('12.5');
    expect(cellToText({ kind: 'boolean', value: false })).toBe('false');
    expect(cellToText({ kind: 'date', value: new Date('2024-03-01T00:00:00.000Z') })).toBe('2024-03-01T00:00:00.000Z');
    expect(cellToText({ kind: 'null' })).toBe('');
  });
});
