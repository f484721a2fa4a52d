import { findNodeAtLocation, parseTree, printParseErrorCode } from 'jsonc-parser';
import type { Node, ParseError } from 'jsonc-parser';
import { InvalidInputError } from '../errors/layout-errors';

const STRICT_JSON = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false };

export type JsonTreeResult =
  | { ok: true; root: Node }
  | { ok: false; reason: string; offset: number };

/**
 * Parse strict JSON into a syntax tree. Unlike a parsed object, the tree keeps
 * properties in source order even for integer-like names ("2024" after "Item").
 */
export function parseJsonTree(text: string): JsonTreeResult {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, STRICT_JSON);
  const [first] = errors;
  if (first) {
    return { ok: false, reason: printParseErrorCode(first.error), offset: first.offset };
  }
  if (!root) {
    return { ok: false, reason: 'ValueExpected', offset: 0 };
  }
  return { ok: true, root };
}

/** Property names of an object node in source order; empty for any other node */
export function propertyNames(node: Node): string[] {
  if (node.type !== 'object') return [];
  return (node.children ?? []).flatMap((property) => {
    const key = property.children?.[0];
    return key && typeof key.value === 'string' ? [key.value] : [];
  });
}

/**
 * Plain value of a tree node. `onObject` sees every object after its own
 * properties are filled in.
 */
export function nodeToValue(
  node: Node,
  onObject?: (node: Node, value: Record<string, unknown>) => void,
): unknown {
  if (node.type === 'array') {
    return (node.children ?? []).map((child) => nodeToValue(child, onObject));
  }
  if (node.type === 'object') {
    const value: Record<string, unknown> = {};
    for (const property of node.children ?? []) {
      const [key, child] = property.children ?? [];
      if (key && child) setOwn(value, String(key.value), nodeToValue(child, onObject));
    }
    onObject?.(node, value);
    return value;
  }
  return node.value;
}

// plain assignment would route "__proto__" to the prototype setter
function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Column order of a Table field as written: declared columns, then every
 * record key in first-seen order. Undefined when the node is not a Table
 * field with records, or its declared columns are not a list of strings.
 */
function sourceColumnOrder(field: Node): string[] | undefined {
  if (findNodeAtLocation(field, ['data_type'])?.value !== 'Table') return undefined;
  const records = findNodeAtLocation(field, ['value']);
  if (records?.type !== 'array') return undefined;

  const names = new Set<string>();
  const declared = findNodeAtLocation(field, ['columns']);
  if (declared) {
    if (declared.type !== 'array') return undefined;
    for (const column of declared.children ?? []) {
      if (typeof column.value !== 'string') return undefined;
      names.add(column.value);
    }
  }
  for (const record of records.children ?? []) {
    for (const name of propertyNames(record)) {
      if (name) names.add(name);
    }
  }
  return names.size > 0 ? [...names] : undefined;
}

/**
 * Parse upstream document text. Every Table field comes back with `columns`
 * spelling out the order its records were written in.
 */
export function parseDocumentJson(text: string): unknown {
  const tree = parseJsonTree(text);
  if (!tree.ok) {
    throw new InvalidInputError(tree.reason, tree.offset);
  }
  return nodeToValue(tree.root, (node, value) => {
    const columns = sourceColumnOrder(node);
    if (columns) setOwn(value, 'columns', columns);
  });
}
