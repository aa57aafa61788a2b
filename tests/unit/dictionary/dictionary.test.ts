import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  dictionaryFromRegistry,
  mergeDictionary,
  parseDictionary,
  serializeDictionary,
  updateDictionaryFile,
} from '../../../src/lib/dictionary/index.js';
import type { DataDictionaryEntry } from '../../../src/types/data-model.js';
import { InputReadError } from '../../../src/utils/errors.js';

function entry(dataset: string, fieldName: string, overrides: Partial<DataDictionaryEntry> = {}): DataDictionaryEntry {
  return {
    dataset,
    field_name: fieldName,
    type: 'string',
    status: 'declared',
    title: '',
    description: '',
    unit: '',
    enum: '',
    ...overrides,
  };
}

describe('Data dictionary', () => {
  describe('mergeDictionary', () => {
    it('should replace entries with the same dataset and field name and sort the result', () => {
      const existing = [entry('institutions', 'NAME'), entry('failures', 'CERT', { title: 'Old' })];
      const incoming = [entry('failures', 'CERT', { title: 'New' }), entry('failures', 'BANK')];

      const merged = mergeDictionary(existing, incoming);

      expect(merged.map((item) => `${item.dataset}.${item.field_name}`)).toEqual([
        'failures.BANK',
        'failures.CERT',
        'institutions.NAME',
      ]);
      expect(merged[1]?.title).toBe('New');
    });

    it('should drop every existing entry of a replaced dataset', () => {
      const existing = [
        entry('institutions', 'CERT'),
        entry('institutions', 'STATE', { status: 'undefined' }),
        entry('failures', 'CERT'),
      ];

      const merged = mergeDictionary(existing, [entry('institutions', 'CERT')], {
        replaceDatasets: ['institutions'],
      });

      expect(merged.map((item) => `${item.dataset}.${item.field_name}`)).toEqual([
        'failures.CERT',
        'institutions.CERT',
      ]);
    });

    it('should keep status and type on file when asked to', () => {
      const existing = [entry('failures', 'FAILDATE', { type: 'date', status: 'unobserved', title: 'Old' })];
      const incoming = [
        entry('failures', 'FAILDATE', { title: 'Failure Date' }),
        entry('failures', 'NAME', { title: 'Institution Name' }),
      ];

      const merged = mergeDictionary(existing, incoming, { keepObservedFields: true });

      expect(merged).toEqual([
        entry('failures', 'FAILDATE', { type: 'date', status: 'unobserved', title: 'Failure Date' }),
        entry('failures', 'NAME', { title: 'Institution Name' }),
      ]);
    });

    it('should sort field names by code unit', () => {
      const merged = mergeDictionary([], [entry('failures', 'b'), entry('failures', 'B'), entry('failures', 'A')]);

      expect(merged.map((item) => item.field_name)).toEqual(['A', 'B', 'b']);
    });
  });

  describe('serializeDictionary', () => {
    it('should write a header row and quote values that need it', () => {
      const text = serializeDictionary([
        entry('failures', 'CERT', { type: 'integer', title: 'Cert', description: 'A, B' }),
      ]);

      expect(text).toBe(
        'dataset,field_name,type,status,title,description,unit,enum\n' +
          'failures,CERT,integer,declared,Cert,"A, B",,\n',
      );
    });
  });

  describe('parseDictionary', () => {
    it('should read back what serializeDictionary writes', () => {
      const entries = [
        entry('failures', 'CERT', { type: 'integer', description: 'Quoted "value", with comma' }),
        entry('institutions', 'STATE', { status: 'undefined' }),
      ];

      expect(parseDictionary(serializeDictionary(entries))).toEqual(entries);
    });

    it('should skip rows without a dataset or field name', () => {
      const text = 'dataset,field_name,type,status,title,description,unit,enum\n,CERT,integer,declared,,,,\n';

      expect(parseDictionary(text)).toEqual([]);
    });

    it('should reject malformed rows', () => {
      const text = 'dataset,field_name,type,status,title,description,unit,enum\nfailures,CERT\n';

      expect(() => parseDictionary(text)).toThrow(InputReadError);
    });
  });

  describe('dictionaryFromRegistry', () => {
    it('should describe every declared field', () => {
      const entries = dictionaryFromRegistry({
        dataset: 'failures',
        fields: new Map([
          ['CERT', { name: 'CERT', title: 'Cert', description: '', declaredType: 'integer' as const }],
        ]),
      });

      expect(entries).toEqual([entry('failures', 'CERT', { type: 'integer', title: 'Cert' })]);
    });

    it('should apply type overrides', () => {
      const entries = dictionaryFromRegistry(
        {
          dataset: 'failures',
          fields: new Map([
            ['FAILDATE', { name: 'FAILDATE', title: 'Failure Date', description: '', declaredType: 'string' as const }],
          ]),
        },
        { FAILDATE: 'date' },
      );

      expect(entries[0]?.type).toBe('date');
    });
  });

  describe('updateDictionaryFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bankfind-dictionary-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should create the file, then leave it alone when nothing changed', async () => {
      const filePath = path.join(tempDir, 'data_dictionary.csv');
      const incoming = [entry('failures', 'CERT')];

      const first = await updateDictionaryFile(filePath, incoming);
      const { mtimeMs } = await fs.stat(filePath);
      const second = await updateDictionaryFile(filePath, incoming);

      expect(first).toEqual({ path: filePath, entries: 1, written: true });
      expect(second).toEqual({ path: filePath, entries: 1, written: false });
      expect((await fs.stat(filePath)).mtimeMs).toBe(mtimeMs);
    });

    it('should keep entries of other datasets', async () => {
      const filePath = path.join(tempDir, 'data_dictionary.csv');
      await updateDictionaryFile(filePath, [entry('institutions', 'NAME')]);
      await updateDictionaryFile(filePath, [entry('failures', 'CERT')]);

      const entries = parseDictionary(await fs.readFile(filePath, 'utf-8'));
      expect(entries.map((item) => `${item.dataset}.${item.field_name}`)).toEqual([
        'failures.CERT',
        'institutions.NAME',
      ]);
      expect(await fs.readdir(tempDir)).toEqual(['data_dictionary.csv']);
    });
  });
});
