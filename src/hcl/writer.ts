import {
  type HclAttribute,
  type HclBlock,
  type HclBody,
  type HclExpression,
  type HclScalar,
  IDENTIFIER_PATTERN
} from './ast.js';

const INDENT = '  ';

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
};

/**
 * Serializes an HCL2 syntax tree to text.
 * Output is deterministic and ends with a single newline.
 */
export function writes(body: HclBody): string {
  const lines = writeBody(body, 0);
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

function writeBody(body: HclBody, depth: number): string[] {
  const lines: string[] = [];

  body.items.forEach((item, index) => {
    const previous = index > 0 ? body.items[index - 1] : undefined;
    // Blocks are always separated from their neighbours by one blank line
    if (previous && (previous.kind === 'block' || item.kind === 'block')) {
      lines.push('');
    }
    lines.push(...(item.kind === 'block' ? writeBlock(item, depth) : writeAttribute(item, depth)));
  });

  return lines;
}

function writeBlock(block: HclBlock, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  const header = [block.type, ...block.labels.map(quoteLabel)].join(' ');
  const inner = writeBody(block.body, depth + 1);

  if (inner.length === 0) {
    return [`${pad}${header} {}`];
  }
  return [`${pad}${header} {`, ...inner, `${pad}}`];
}

function writeAttribute(attribute: HclAttribute, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  return `${pad}${attribute.name} = ${writeExpression(attribute.value, depth)}`.split('\n');
}

function writeExpression(expression: HclExpression, depth: number): string {
  if (expression.kind !== 'object' || expression.entries.length === 0) {
    return writeInline(expression);
  }

  const pad = INDENT.repeat(depth);
  const entries = expression.entries.map(
    (entry) => `${pad}${INDENT}${writeKey(entry.key)} = ${writeExpression(entry.value, depth + 1)}`
  );
  return ['{', ...entries, `${pad}}`].join('\n');
}

function writeInline(expression: HclExpression): string {
  switch (expression.kind) {
    case 'literal':
      return writeLiteral(expression.value);
    case 'tuple':
      return `[${expression.items.map(writeInline).join(', ')}]`;
    case 'object':
      if (expression.entries.length === 0) return '{}';
      return `{ ${expression.entries
        .map((entry) => `${writeKey(entry.key)} = ${writeInline(entry.value)}`)
        .join(', ')} }`;
  }
}

function writeLiteral(value: HclScalar): string {
  if (typeof value === 'string') return quote(value);
  return String(value);
}

function writeKey(key: string): string {
  return IDENTIFIER_PATTERN.test(key) ? key : quote(key);
}

const TEMPLATE_DIRECTIVE = /^~?\s*(if|for|else|endif|endfor)\b/;

// Template sequences (`${...}`, `%{...}`) are left as written when they are closed;
// an unclosed or malformed opener is escaped to its literal form.
function quote(value: string): string {
  return `"${escapeTemplates(escapeCharacters(value), false)}"`;
}

// Labels are plain string literals, so every template opener is escaped.
function quoteLabel(value: string): string {
  return `"${escapeTemplates(escapeCharacters(value), true)}"`;
}

function escapeCharacters(value: string): string {
  return value.replace(/[\\"\n\r\t]/g, (char) => ESCAPES[char] ?? char);
}

function escapeTemplates(value: string, literalOnly: boolean): string {
  let result = '';
  let index = 0;

  while (index < value.length) {
    const pair = value.slice(index, index + 2);
    const triple = value.slice(index, index + 3);

    if (triple === '$${' || triple === '%%{') {
      result += triple;
      index += 3;
      continue;
    }

    if (pair === '${' || pair === '%{') {
      const end = literalOnly ? -1 : closingBrace(value, index + 2);
      const content = end === -1 ? '' : value.slice(index + 2, end);
      const valid =
        end !== -1 &&
        (pair === '${' ? content.trim().length > 0 : TEMPLATE_DIRECTIVE.test(content));

      if (valid) {
        result += value.slice(index, end + 1);
        index = end + 1;
      } else {
        result += `${pair[0]}${pair}`;
        index += 2;
      }
      continue;
    }

    result += value[index];
    index += 1;
  }

  return result;
}

function closingBrace(value: string, start: number): number {
  let depth = 1;
  for (let index = start; index < value.length; index++) {
    const char = value[index];
    if (char === '{') depth += 1;
    if (char === '}') depth -= 1;
    if (depth === 0) return index;
  }
  return -1;
}
