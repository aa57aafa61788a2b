import { describe, it, expect } from 'vitest';
import {
  decodeColumnMetadata,
  decodeTableMetadata,
  encodeColumnMetadata,
  encodeTableMetadata,
} from '../../../src/lib/emitter/metadata-codec.js';
import type { AnnotatedColumn, AnnotatedTable } from '../../../src/types/data-model.js';
import { MetadataError } from '../../../src/utils/errors.js';

const stateColumn: AnnotatedColumn = {
  name: 'STALP',
  type: 'categorical',
  values: [{ kind: 'string', value: 'CA' }],
  declared: true,
  observed: true,
  metadata: {
    declared: true,
    title: 'State',
    description: 'Two-letter state code',
    enum: new Map([
      ['NY', 'New York'],
      ['CA', 'California'],
    ]),
  },
};

const extraColumn: AnnotatedColumn = {
  name: 'EXTRA',
  type: 'integer',
  values: [{ kind: 'integer', value: 1 }],
  declared: false,
  observed: true,
  metadata: { declared: false },
};

const table: AnnotatedTable = {
  dataset: 'institutions',
  rowCount: 1,
  columns: [stateColumn, extraColumn],
  drift: { undeclared: ['EXTRA'], unobserved: [] },
};

describe('Parquet metadata codec', () => {
  it('should encode column metadata as JSON with ordered enum pairs', () => {
    expect(encodeColumnMetadata(stateColumn)).toBe(
      '{"declared":true,"type":"categorical","title":"State","description":"Two-letter state code",' +
        '"enum":[["NY","New York"],["CA","California"]]}',
    );
    expect(encodeColumnMetadata(extraColumn)).toBe('{"declared":false,"type":"integer"}');
  });

  it('should decode what it encodes, keeping enum order', () => {
    const decoded = decodeColumnMetadata('STALP', encodeColumnMetadata(stateColumn));

    expect(decoded?.type).toBe('categorical');
    expect(decoded?.metadata).toEqual(stateColumn.metadata);
    if (decoded?.metadata.declared) {
      expect(Array.from(decoded.metadata.enum?.keys() ?? [])).toEqual(['NY', 'CA']);
    }
  });

  it('should write provenance and one entry per column', () => {
    const entries = encodeTableMetadata(table, {
      dataset: 'institutions',
      generatedAt: '2026-10-19T12:00:00.000Z',
      sourceFile: 'institutions_20261019.json',
    });

    expect(entries.map((entry) => entry.key)).toEqual([
      'bankfind.dataset',
      'bankfind.generated_at',
      'bankfind.row_count',
      'bankfind.columns',
      'bankfind.source_file',
      'bankfind.column.STALP',
      'bankfind.column.EXTRA',
    ]);

    const decoded = decodeTableMetadata(entries);
    expect(decoded.dataset).toBe('institutions');
    expect(decoded.generatedAt).toBe('2026-10-19T12:00:00.000Z');
    expect(decoded.sourceFile).toBe('institutions_20261019.json');
    expect(decoded.rowCount).toBe(1);
    expect(decoded.columns.map((column) => column.name)).toEqual(['STALP', 'EXTRA']);
  });

  it('should ignore foreign footer keys', () => {
    const decoded = decodeTableMetadata([
      { key: 'ARROW:schema', value: 'opaque' },
      { key: 'bankfind.column.X', value: '{"declared":false,"type":"string"}' },
    ]);

    expect(decoded.columns).toEqual([{ name: 'X', type: 'string', metadata: { declared: false } }]);
    expect(decoded.dataset).toBeUndefined();
  });

  it('should reject column metadata that is not JSON', () => {
    expect(() => decodeColumnMetadata('X', '{oops')).toThrow(MetadataError);
    expect(() => decodeColumnMetadata('X', '{oops')).toThrow('Column metadata for X is not valid JSON');
  });
});
