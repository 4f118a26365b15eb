/**
 * Expression Parsing
 *
 * Parses `${...}` interpolations in declaration strings. Supported forms:
 *
 *   var.NAME
 *   count.index
 *   TYPE.NAME.ATTR              (uncounted resource)
 *   TYPE.NAME[2].ATTR           (one instance of a counted resource)
 *   TYPE.NAME[count.index].ATTR (same index as the current instance)
 *   TYPE.NAME[*].ATTR           (every instance, as a list)
 *
 * `$${` escapes a literal `${`.
 */

import { ValidationError } from '../core/errors.js';

/**
 * Index selector on a resource expression
 */
export type IndexSelector =
  | { kind: 'none' }
  | { kind: 'literal'; value: number }
  | { kind: 'count' }
  | { kind: 'splat' };

/**
 * Parsed interpolation body
 */
export type Expression =
  | { kind: 'var'; name: string }
  | { kind: 'count-index' }
  | {
      kind: 'resource';
      type: string;
      name: string;
      index: IndexSelector;
      path: string[];
    };

/**
 * A piece of a template string
 */
export type Segment =
  | { kind: 'text'; text: string }
  | { kind: 'expr'; expr: Expression; source: string };

const VAR_PATTERN = /^var\.([A-Za-z_][A-Za-z0-9_]*)$/;
const RESOURCE_PATTERN =
  /^([a-z][a-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_-]*)(?:\[(\d+|\*|count\.index)\])?\.([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)$/;
const ADDRESS_PATTERN = /^([a-z][a-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_-]*)(?:\[(\d+|count\.index)\])?$/;

/**
 * Parse the body of a single `${...}` interpolation.
 *
 * @throws ValidationError if the expression is not one of the supported forms
 */
export function parseExpression(source: string): Expression {
  const trimmed = source.trim();

  if (trimmed === 'count.index') {
    return { kind: 'count-index' };
  }

  const varMatch = VAR_PATTERN.exec(trimmed);
  if (varMatch?.[1]) {
    return { kind: 'var', name: varMatch[1] };
  }

  const resourceMatch = RESOURCE_PATTERN.exec(trimmed);
  if (resourceMatch?.[1] && resourceMatch[2] && resourceMatch[4]) {
    const rawIndex = resourceMatch[3];
    let index: IndexSelector;
    if (rawIndex === undefined) {
      index = { kind: 'none' };
    } else if (rawIndex === '*') {
      index = { kind: 'splat' };
    } else if (rawIndex === 'count.index') {
      index = { kind: 'count' };
    } else {
      index = { kind: 'literal', value: Number(rawIndex) };
    }

    return {
      kind: 'resource',
      type: resourceMatch[1],
      name: resourceMatch[2],
      index,
      path: resourceMatch[4].split('.'),
    };
  }

  throw new ValidationError(`Invalid expression "\${${trimmed}}"`);
}

/**
 * Split a string into literal text and parsed interpolations.
 *
 * @throws ValidationError on an unterminated `${` or an invalid expression
 */
export function parseTemplate(input: string): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let position = 0;

  while (position < input.length) {
    if (input.startsWith('$${', position)) {
      text += '${';
      position += 3;
      continue;
    }

    if (input.startsWith('${', position)) {
      const end = input.indexOf('}', position + 2);
      if (end === -1) {
        throw new ValidationError(`Unterminated interpolation in "${input}"`);
      }
      if (text) {
        segments.push({ kind: 'text', text });
        text = '';
      }
      const source = input.slice(position + 2, end);
      segments.push({ kind: 'expr', expr: parseExpression(source), source });
      position = end + 1;
      continue;
    }

    text += input[position];
    position++;
  }

  if (text) {
    segments.push({ kind: 'text', text });
  }

  return segments;
}

/**
 * Build a resource id from its parts.
 */
export function formatResourceId(type: string, name: string, index: number | null): string {
  return index === null ? `${type}.${name}` : `${type}.${name}[${index}]`;
}

/**
 * Parse a `depends_on` entry: `TYPE.NAME`, `TYPE.NAME[N]` or
 * `TYPE.NAME[count.index]`.
 *
 * @throws ValidationError if the address is malformed
 */
export function parseAddress(
  address: string
): { type: string; name: string; index: number | 'count' | null } {
  const match = ADDRESS_PATTERN.exec(address.trim());
  if (!match?.[1] || !match[2]) {
    throw new ValidationError(`Invalid resource address "${address}"`);
  }
  const rawIndex = match[3];
  return {
    type: match[1],
    name: match[2],
    index: rawIndex === undefined ? null : rawIndex === 'count.index' ? 'count' : Number(rawIndex),
  };
}
