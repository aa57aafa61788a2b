/**
 * Schema loader module types
 */

/**
 * One declaration block as it appears in a field-definition document
 */
export interface FieldDeclaration {
  title?: string;
  description?: string;
  unit?: string;
  "x-number-unit"?: string;
  type?: string;
  format?: string;
  enum?: Record<string, string> | Array<string | number | boolean>;
}

export type FieldDeclarationMap = Record<string, FieldDeclaration>;
