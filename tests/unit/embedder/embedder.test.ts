import { describe, it, expect } from 'vitest';
import {
  buildDictionaryEntries,
  columnMetadataFor,
  dictionaryEntry,
  embedMetadata,
  formatEnum,
} from '../../../src/lib/embedder/index.js';
import { normalizeRecords } from '../../../src/lib/normalizer/index.js';
import type { FieldDefinition, FieldRegistry, RawRecord } from '../../../src/types/data-model.js';
import { MetadataError } from '../../../src/utils/errors.js';

const fields: FieldDefinition[] = [
  { name: 'CERT', title: 'FDIC Certificate Number', description: '', declaredType: 'integer' },
  { name: 'NAME', title: 'Institution Name', description: 'Legal name\n  of the institution', declaredType: 'string' },
  {
    name: 'ZIP',
    title: 'Zip Code',
    description: '',
    declaredType: 'string',
    unit: 'code',
  },
];

const registry: FieldRegistry = {
  dataset: 'institutions',
  fields: new Map(fields.map((field) => [field.name, field])),
};

const records: RawRecord[] = [
  { CERT: '628', NAME: 'Example Bank' },
  { CERT: '999', NAME: 'Other Bank', STATE: 'CA' },
];

describe('Metadata embedder', () => {
  it('should attach declared metadata and mark undeclared columns', () => {
    const { table } = normalizeRecords(records, registry);
    const annotated = embedMetadata(table, registry);

    expect(annotated.columns.map((column) => column.name)).toEqual(['CERT', 'NAME', 'ZIP', 'STATE']);
    expect(annotated.columns[0]?.metadata).toEqual({
      declared: true,
      title: 'FDIC Certificate Number',
      description: '',
    });
    expect(annotated.columns[2]?.metadata).toEqual({
      declared: true,
      title: 'Zip Code',
      description: '',
      unit: 'code',
    });
    expect(annotated.columns[3]?.metadata).toEqual({ declared: false });
  });

  it('should report schema drift in both directions', () => {
    const { table } = normalizeRecords(records, registry);
    const annotated = embedMetadata(table, registry);

    expect(annotated.drift).toEqual({ undeclared: ['STATE'], unobserved: ['ZIP'] });
  });

  it('should refuse a registry for another dataset', () => {
    const { table } = normalizeRecords(records, registry);

    const mismatched: FieldRegistry = { dataset: 'failures', fields: new Map() };

    expect(() => embedMetadata(table, mismatched)).toThrow(MetadataError);
    expect(() => embedMetadata(table, mismatched)).toThrow('Field registry for failures cannot annotate institutions');
  });

  it('should flatten an annotated table into dictionary entries', () => {
    const { table } = normalizeRecords(records, registry);
    const entries = buildDictionaryEntries(embedMetadata(table, registry));

    expect(entries).toEqual([
      {
        dataset: 'institutions',
        field_name: 'CERT',
        type: 'integer',
        status: 'declared',
        title: 'FDIC Certificate Number',
        description: '',
        unit: '',
        enum: '',
      },
      {
        dataset: 'institutions',
        field_name: 'NAME',
        type: 'string',
        status: 'declared',
        title: 'Institution Name',
        description: 'Legal name of the institution',
        unit: '',
        enum: '',
      },
      {
        dataset: 'institutions',
        field_name: 'ZIP',
        type: 'string',
        status: 'unobserved',
        title: 'Zip Code',
        description: '',
        unit: 'code',
        enum: '',
      },
      {
        dataset: 'institutions',
        field_name: 'STATE',
        type: 'string',
        status: 'undefined',
        title: '',
        description: '',
        unit: '',
        enum: '',
      },
    ]);
  });

  describe('formatEnum', () => {
    it('should join code=label pairs and keep bare codes', () => {
      const enumMap = new Map([
        ['N', 'N'],
        ['SM', 'State Member'],
      ]);

      expect(formatEnum(enumMap)).toBe('N|SM=State Member');
      expect(formatEnum(undefined)).toBe('');
    });
  });

  describe('dictionaryEntry', () => {
    it('should carry enum labels of a declared field', () => {
      const metadata = columnMetadataFor({
        name: 'STALP',
        title: 'State',
        description: '',
        declaredType: 'categorical',
        enum: new Map([['CA', 'California']]),
      });

      expect(dictionaryEntry('failures', 'STALP', 'categorical', metadata, true).enum).toBe('CA=California');
    });
  });
});
