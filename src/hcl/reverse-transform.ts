import { EncodingError } from '../errors.js';
import {
  type HclAttribute,
  type HclBlock,
  type HclBody,
  type HclBodyItem,
  type HclExpression,
  type HclTree,
  IDENTIFIER_PATTERN
} from './ast.js';

export interface ReverseTransformOptions {
  /**
   * Field of a nested block item whose string value becomes the block label.
   * Defaults to `name`.
   */
  labelKey?: string;
}

/**
 * Builds an HCL2 syntax tree from plain structured data.
 *
 * Top-level mappings become blocks. Inside a block, a non-empty list made only of
 * mappings becomes one nested block per item (labeled by `labelKey` when present);
 * everything else becomes an attribute.
 */
export function reverseTransform(tree: HclTree, options: ReverseTransformOptions = {}): HclBody {
  const labelKey = options.labelKey ?? 'name';

  const items = Object.entries(tree).map(([key, value]): HclBodyItem => {
    assertIdentifier(key, key);
    if (isTree(value)) {
      return { kind: 'block', type: key, labels: [], body: toBody(value, key, labelKey) };
    }
    return toAttribute(key, value, key);
  });

  return { items };
}

function toBody(tree: HclTree, path: string, labelKey: string): HclBody {
  const items: HclBodyItem[] = [];

  for (const [key, value] of Object.entries(tree)) {
    const childPath = joinPath(path, key);
    assertIdentifier(key, childPath);

    if (isBlockList(value)) {
      value.forEach((item, index) => {
        items.push(toNestedBlock(key, item, joinPath(childPath, String(index)), labelKey));
      });
    } else {
      items.push(toAttribute(key, value, childPath));
    }
  }

  return { items };
}

function toNestedBlock(type: string, item: HclTree, path: string, labelKey: string): HclBlock {
  const label = item[labelKey];
  if (typeof label !== 'string') {
    return { kind: 'block', type, labels: [], body: toBody(item, path, labelKey) };
  }

  const rest = Object.fromEntries(Object.entries(item).filter(([key]) => key !== labelKey));
  return { kind: 'block', type, labels: [label], body: toBody(rest, path, labelKey) };
}

function toAttribute(name: string, value: unknown, path: string): HclAttribute {
  return { kind: 'attribute', name, value: toExpression(value, path) };
}

function toExpression(value: unknown, path: string): HclExpression {
  if (value === null) {
    return { kind: 'literal', value: null };
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return { kind: 'literal', value };
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError(`Number ${value} has no HCL representation`, path);
      }
      return { kind: 'literal', value };
  }

  if (Array.isArray(value)) {
    return {
      kind: 'tuple',
      items: value.map((item: unknown, index) => toExpression(item, joinPath(path, String(index))))
    };
  }

  if (isTree(value)) {
    return {
      kind: 'object',
      entries: Object.entries(value).map(([key, entry]) => ({
        key,
        value: toExpression(entry, joinPath(path, key))
      }))
    };
  }

  throw new EncodingError(`Unsupported value of type ${describeType(value)}`, path);
}

function isTree(value: unknown): value is HclTree {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function isBlockList(value: unknown): value is HclTree[] {
  return Array.isArray(value) && value.length > 0 && value.every(isTree);
}

function assertIdentifier(name: string, path: string): void {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new EncodingError(`"${name}" is not a valid HCL identifier`, path);
  }
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
