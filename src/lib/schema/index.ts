/**
 * Schema loader - reads field-definition documents into field registries
 */

import fs from "fs/promises";
import { parseDocument } from "yaml";
import type {
  DatasetName,
  EnumMap,
  FieldDefinition,
  FieldRegistry,
  FieldType,
  SchemaRegistry,
} from "../../types/data-model.js";
import { SchemaParseError, hasErrorCode, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { DeclarationValidator } from "./declaration-validator.js";
import type { FieldDeclaration } from "./types.js";

export * from "./types.js";
export * from "./declaration-validator.js";

const TYPE_ALIASES: ReadonlyMap<string, FieldType> = new Map([
  ["string", "string"],
  ["str", "string"],
  ["text", "string"],
  ["integer", "integer"],
  ["int", "integer"],
  ["float", "float"],
  ["double", "float"],
  ["number", "float"],
  ["date", "date"],
  ["date-time", "date"],
  ["datetime", "date"],
  ["categorical", "categorical"],
  ["category", "categorical"],
  ["enum", "categorical"],
]);

const DATE_FORMATS = new Set(["date", "date-time"]);

type Entries = Array<[string, unknown]>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Map);
}

/**
 * Entries of a mapping in source order, with keys stringified.
 * Returns undefined when the value is not a mapping.
 */
function mappingEntries(value: unknown): Entries | undefined {
  if (value instanceof Map) {
    return Array.from(value.entries(), ([key, item]): [string, unknown] => [String(key), item]);
  }
  if (isPlainObject(value)) {
    return Object.entries(value);
  }
  return undefined;
}

/**
 * Convert a tree of Maps into plain objects so it can be checked against a JSON Schema
 */
function toPlain(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toPlain);
  const entries = mappingEntries(value);
  if (entries) {
    return Object.fromEntries(entries.map(([key, item]) => [key, toPlain(item)]));
  }
  return value;
}

function lookup(entries: Entries, key: string): unknown {
  return entries.find(([name]) => name === key)?.[1];
}

/**
 * The FDIC documents nest field declarations under properties.data.properties
 */
function unwrapEnvelope(document: unknown): unknown {
  const root = mappingEntries(document);
  if (!root) return document;
  const properties = mappingEntries(lookup(root, "properties"));
  if (!properties) return document;
  const data = mappingEntries(lookup(properties, "data"));
  if (!data) return document;
  const fields = lookup(data, "properties");
  return mappingEntries(fields) ? fields : document;
}

/**
 * Parse YAML (or JSON) text into a document tree of ordered Maps.
 * Duplicate keys are rejected by the parser.
 */
export function parseSchemaDocument(text: string, dataset: DatasetName): unknown {
  const doc = parseDocument(text, { uniqueKeys: true });

  if (doc.errors.length > 0) {
    const duplicate = doc.errors.find((error) => error.code === "DUPLICATE_KEY");
    throw new SchemaParseError(
      duplicate
        ? `Duplicate key in ${dataset} field-definition document: ${duplicate.message}`
        : `Failed to parse ${dataset} field-definition document: ${doc.errors[0]?.message}`,
      { dataset },
      { cause: doc.errors[0] },
    );
  }

  return doc.toJS({ mapAsMap: true });
}

function resolveDeclaredType(name: string, declaration: FieldDeclaration): FieldType {
  if (declaration.type === undefined) return "string";

  const resolved = TYPE_ALIASES.get(declaration.type.toLowerCase());
  if (!resolved) {
    throw new SchemaParseError(`Field "${name}" declares unsupported type "${declaration.type}"`, {
      field: name,
      type: declaration.type,
    });
  }

  if (resolved === "string" && declaration.format && DATE_FORMATS.has(declaration.format)) {
    return "date";
  }
  return resolved;
}

function resolveEnum(rawEnum: unknown): EnumMap | undefined {
  if (rawEnum === undefined) return undefined;
  if (Array.isArray(rawEnum)) {
    // A list of codes: each code labels itself
    return new Map(rawEnum.map((code): [string, string] => [String(code), String(code)]));
  }
  const entries = mappingEntries(rawEnum) ?? [];
  return new Map(entries.map(([code, label]): [string, string] => [code, String(label)]));
}

function buildDefinition(name: string, rawBlock: unknown, declaration: FieldDeclaration): FieldDefinition {
  const unit = declaration.unit ?? declaration["x-number-unit"];
  // Enum order comes from the source tree; the validated plain copy may have reordered numeric codes
  const enumMap = resolveEnum(lookup(mappingEntries(rawBlock) ?? [], "enum"));

  return {
    name,
    title: declaration.title ?? "",
    description: declaration.description ?? "",
    declaredType: resolveDeclaredType(name, declaration),
    ...(unit !== undefined ? { unit } : {}),
    ...(enumMap ? { enum: enumMap } : {}),
  };
}

/**
 * Build a field registry from a parsed field-definition document
 *
 * @param document - Parsed document (plain objects or ordered Maps)
 * @param dataset - Dataset the document describes
 * @throws SchemaParseError if the document is not a mapping of mappings, a field
 * name repeats, or a declaration block is malformed
 */
export function loadFieldRegistry(document: unknown, dataset: DatasetName): FieldRegistry {
  if (document === null || document === undefined) {
    logger.warn("Empty field-definition document", { dataset });
    return { dataset, fields: new Map() };
  }

  const unwrapped = unwrapEnvelope(document);
  const entries = mappingEntries(unwrapped);
  if (!entries) {
    throw new SchemaParseError(`Field-definition document for ${dataset} is not a mapping of field declarations`, {
      dataset,
    });
  }

  const validator = new DeclarationValidator();
  const plain = toPlain(unwrapped);
  if (!validator.validate(plain)) {
    const violations = validator.getViolations();
    throw new SchemaParseError(
      `Invalid field-definition document for ${dataset}: ${violations
        .map((violation) => `${violation.path} ${violation.message}`)
        .join("; ")}`,
      { dataset, violations },
    );
  }

  const fields = new Map<string, FieldDefinition>();
  for (const [name, rawBlock] of entries) {
    if (fields.has(name)) {
      throw new SchemaParseError(`Field "${name}" is declared more than once in ${dataset}`, {
        dataset,
        field: name,
      });
    }
    const declaration = plain[name];
    if (!declaration) continue;
    fields.set(name, buildDefinition(name, rawBlock, declaration));
  }

  logger.debug("Field registry loaded", { dataset, fields: fields.size });
  return { dataset, fields };
}

/**
 * Read and load a field-definition file. A missing file yields an empty registry.
 */
export async function loadSchemaFile(filePath: string, dataset: DatasetName): Promise<FieldRegistry> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      logger.warn("Field-definition document not found; all columns will be undeclared", {
        dataset,
        filePath,
      });
      return { dataset, fields: new Map() };
    }
    throw new FileIOError(`Failed to read field-definition document ${filePath}`, { dataset }, { cause: error });
  }

  const registry = loadFieldRegistry(parseSchemaDocument(text, dataset), dataset);
  logger.info("Variable definitions loaded", { dataset, fields: registry.fields.size });
  return registry;
}

/**
 * Assemble per-dataset registries into a schema registry
 */
export function buildSchemaRegistry(registries: Iterable<FieldRegistry>): SchemaRegistry {
  const registry = new Map<DatasetName, FieldRegistry>();
  for (const entry of registries) {
    if (registry.has(entry.dataset)) {
      throw new SchemaParseError(`Dataset "${entry.dataset}" has more than one field registry`, {
        dataset: entry.dataset,
      });
    }
    registry.set(entry.dataset, entry);
  }
  return registry;
}
