/**
 * Structural validation of field-definition documents using Ajv
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { FieldDeclarationMap } from "./types.js";

/**
 * A mapping of field name to declaration block. Unknown keys in a block are
 * allowed; the FDIC documents carry vendor extensions.
 */
export const FIELD_DECLARATION_MAP_SCHEMA = {
  type: "object",
  additionalProperties: {
    type: "object",
    properties: {
      title: { type: "string" },
      description: { type: "string" },
      unit: { type: "string" },
      "x-number-unit": { type: "string" },
      type: { type: "string" },
      format: { type: "string" },
      enum: {
        anyOf: [
          { type: "object", additionalProperties: { type: "string" } },
          {
            type: "array",
            items: { type: ["string", "number", "boolean"] },
          },
        ],
      },
    },
  },
};

export interface DeclarationViolation {
  path: string;
  message: string;
}

export class DeclarationValidator {
  private validateFn: ValidateFunction<FieldDeclarationMap>;

  constructor() {
    const ajv = new Ajv({
      strict: false, // Allow vendor extensions and union types
      allErrors: true, // Collect all validation errors
    });
    this.validateFn = ajv.compile<FieldDeclarationMap>(
      FIELD_DECLARATION_MAP_SCHEMA,
    );
  }

  validate(document: unknown): document is FieldDeclarationMap {
    return this.validateFn(document);
  }

  /**
   * Violations of the last validation, one per offending location
   */
  getViolations(): DeclarationViolation[] {
    const errors: ErrorObject[] = this.validateFn.errors ?? [];
    const byPath = new Map<string, string>();

    for (const error of errors) {
      const path = error.instancePath || "/";
      // anyOf reports each branch; keep the first message per location
      if (!byPath.has(path)) {
        byPath.set(path, describeError(error));
      }
    }

    return Array.from(byPath, ([path, message]) => ({ path, message }));
  }
}

function describeError(error: ErrorObject): string {
  if (error.instancePath.endsWith("/enum")) {
    return "enum must be a mapping of code to label or a list of codes";
  }
  return error.message ?? `failed ${error.keyword} check`;
}
