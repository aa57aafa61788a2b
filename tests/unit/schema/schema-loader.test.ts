import { describe, it, expect, vi, beforeEach } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  buildSchemaRegistry,
  loadFieldRegistry,
  loadSchemaFile,
  parseSchemaDocument,
} from '../../../src/lib/schema/index.js';
import { logger } from '../../../src/utils/logger.js';
import { SchemaParseError } from '../../../src/utils/errors.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  }
}));

function load(text: string) {
  return loadFieldRegistry(parseSchemaDocument(text, 'institutions'), 'institutions');
}

describe('schema loader', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('loadFieldRegistry', () => {
    it('should load a flat mapping of declarations in declaration order', () => {
      const registry = load(`
CERT:
  type: integer
  title: FDIC Certificate Number
  description: A unique number assigned by the FDIC
NAME:
  title: Institution Name
STALP:
  title: State
  enum:
    CA: California
    NY: New York
ASSET:
  type: number
  title: Total Assets
  x-number-unit: Thousands of US Dollars
`);

      expect(registry.dataset).toBe('institutions');
      expect(Array.from(registry.fields.keys())).toEqual(['CERT', 'NAME', 'STALP', 'ASSET']);
      expect(registry.fields.get('CERT')).toEqual({
        name: 'CERT',
        title: 'FDIC Certificate Number',
        description: 'A unique number assigned by the FDIC',
        declaredType: 'integer',
      });
      expect(registry.fields.get('NAME')).toEqual({
        name: 'NAME',
        title: 'Institution Name',
        description: '',
        declaredType: 'string',
      });
      expect(Array.from(registry.fields.get('STALP')?.enum ?? [])).toEqual([
        ['CA', 'California'],
        ['NY', 'New York'],
      ]);
      expect(registry.fields.get('ASSET')?.declaredType).toBe('float');
      expect(registry.fields.get('ASSET')?.unit).toBe('Thousands of US Dollars');
    });

    it('should unwrap the properties.data.properties envelope', () => {
      const registry = load(`
type: object
properties:
  data:
    type: object
    properties:
      FAILDATE:
        type: string
        format: date
        title: Failure Date
      CHCLASS1:
        type: string
        enum:
          - N
          - SM
`);

      expect(Array.from(registry.fields.keys())).toEqual(['FAILDATE', 'CHCLASS1']);
      expect(registry.fields.get('FAILDATE')?.declaredType).toBe('date');
      expect(Array.from(registry.fields.get('CHCLASS1')?.enum ?? [])).toEqual([
        ['N', 'N'],
        ['SM', 'SM'],
      ]);
    });

    it('should keep enum codes in source order, including numeric codes', () => {
      const registry = load(`
BKCLASS:
  enum:
    2: Two
    1: One
`);

      expect(Array.from(registry.fields.get('BKCLASS')?.enum?.keys() ?? [])).toEqual(['2', '1']);
    });

    it('should accept type aliases', () => {
      const registry = load(`
A:
  type: int
B:
  type: double
C:
  type: category
`);

      expect(registry.fields.get('A')?.declaredType).toBe('integer');
      expect(registry.fields.get('B')?.declaredType).toBe('float');
      expect(registry.fields.get('C')?.declaredType).toBe('categorical');
    });

    it('should accept an already parsed plain object', () => {
      const registry = loadFieldRegistry({ CERT: { type: 'integer', title: 'Cert' } }, 'failures');

      expect(registry.dataset).toBe('failures');
      expect(registry.fields.get('CERT')?.declaredType).toBe('integer');
    });

    it('should return an empty registry for an empty document', () => {
      const registry = load('');

      expect(registry.fields.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Empty field-definition document', { dataset: 'institutions' });
    });

    it('should reject a duplicate field name', () => {
      const text = `
CERT:
  title: First
CERT:
  title: Second
`;
      expect(() => load(text)).toThrow(SchemaParseError);
      expect(() => load(text)).toThrow(/Duplicate key/);
    });

    it('should reject a document that is not a mapping', () => {
      expect(() => load('- CERT\n- NAME\n')).toThrow(/is not a mapping of field declarations/);
    });

    it('should reject a declaration block that is not a mapping', () => {
      expect(() => load('CERT: 5\n')).toThrow('Invalid field-definition document for institutions: /CERT must be object');
    });

    it('should reject an enum that is neither a mapping nor a list', () => {
      expect(() => load('CERT:\n  enum: "yes"\n')).toThrow(
        '/CERT/enum enum must be a mapping of code to label or a list of codes',
      );
    });

    it('should reject an unsupported type', () => {
      expect(() => load('CERT:\n  type: blob\n')).toThrow('Field "CERT" declares unsupported type "blob"');
    });
  });

  describe('loadSchemaFile', () => {
    it('should return an empty registry when the file does not exist', async () => {
      const missing = path.join(os.tmpdir(), 'bankfind-missing', 'institution_properties.yaml');
      const registry = await loadSchemaFile(missing, 'institutions');

      expect(registry.fields.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('buildSchemaRegistry', () => {
    it('should key registries by dataset', () => {
      const institutions = loadFieldRegistry({ CERT: {} }, 'institutions');
      const failures = loadFieldRegistry({ FAILDATE: {} }, 'failures');
      const registry = buildSchemaRegistry([institutions, failures]);

      expect(registry.get('failures')).toBe(failures);
      expect(registry.get('institutions')).toBe(institutions);
    });

    it('should reject two registries for one dataset', () => {
      const first = loadFieldRegistry({ CERT: {} }, 'institutions');
      const second = loadFieldRegistry({ NAME: {} }, 'institutions');

      expect(() => buildSchemaRegistry([first, second])).toThrow(SchemaParseError);
    });
  });
});
