/**
 * Plain structured data accepted by the HCL encoder.
 * Mappings keep their insertion order in the generated text.
 */
export type HclScalar = string | number | boolean | null;

export type HclValue = HclScalar | readonly HclValue[] | HclTree;

export interface HclTree {
  readonly [key: string]: HclValue;
}

export type HclExpression =
  | { kind: 'literal'; value: HclScalar }
  | { kind: 'tuple'; items: HclExpression[] }
  | { kind: 'object'; entries: HclObjectEntry[] };

export interface HclObjectEntry {
  key: string;
  value: HclExpression;
}

export interface HclAttribute {
  kind: 'attribute';
  name: string;
  value: HclExpression;
}

export interface HclBlock {
  kind: 'block';
  type: string;
  labels: string[];
  body: HclBody;
}

export type HclBodyItem = HclAttribute | HclBlock;

export interface HclBody {
  items: HclBodyItem[];
}

// Attribute names, block types and bare object keys.
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
