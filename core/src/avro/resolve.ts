/**
 * Avro Schema Resolution
 *
 * Normalizes a raw Avro schema document into a tree the datum reader and
 * writer can walk: object and bare primitive forms are unified, logical type
 * annotations are dropped (values are read as their physical type), and named
 * type references are resolved. Recursive records resolve to cyclic trees.
 */

import { DecodeError } from '../errors.js';
import { isAvroPrimitive, isPlainObject, type AvroPrimitive } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ResolvedField {
  readonly name: string;
  readonly schema: ResolvedSchema;
}

export type ResolvedSchema =
  | { readonly kind: 'primitive'; readonly type: AvroPrimitive }
  | { readonly kind: 'record'; readonly name: string; readonly fields: ResolvedField[] }
  | { readonly kind: 'enum'; readonly name: string; readonly symbols: readonly string[] }
  | { readonly kind: 'array'; readonly items: ResolvedSchema }
  | { readonly kind: 'map'; readonly values: ResolvedSchema }
  | { readonly kind: 'fixed'; readonly name: string; readonly size: number }
  | { readonly kind: 'union'; readonly branches: readonly ResolvedSchema[] };

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a raw schema document.
 *
 * @throws DecodeError('INVALID_SCHEMA') if the document is not a valid Avro schema
 */
export function resolveSchema(schema: unknown): ResolvedSchema {
  const named = new Map<string, ResolvedSchema>();
  return resolveNode(schema, named, undefined);
}

function resolveNode(
  node: unknown,
  named: Map<string, ResolvedSchema>,
  namespace: string | undefined
): ResolvedSchema {
  if (typeof node === 'string') {
    if (isAvroPrimitive(node)) {
      return { kind: 'primitive', type: node };
    }
    const found = named.get(qualify(node, namespace)) ?? named.get(node);
    if (found === undefined) {
      throw invalidSchema(`unknown named type "${node}"`);
    }
    return found;
  }

  if (Array.isArray(node)) {
    if (node.length === 0) {
      throw invalidSchema('union must have at least one branch');
    }
    return { kind: 'union', branches: node.map((branch) => resolveNode(branch, named, namespace)) };
  }

  if (!isPlainObject(node)) {
    throw invalidSchema(`unexpected schema node ${JSON.stringify(node)}`);
  }

  const type = node.type;
  if (isAvroPrimitive(type)) {
    return { kind: 'primitive', type };
  }

  switch (type) {
    case 'record':
    case 'error': {
      const { fullName, innerNamespace } = nameOf(node, namespace);
      const fields: ResolvedField[] = [];
      const record: ResolvedSchema = { kind: 'record', name: fullName, fields };
      named.set(fullName, record);
      if (!Array.isArray(node.fields)) {
        throw invalidSchema(`record ${fullName} has no fields array`);
      }
      for (const field of node.fields) {
        if (!isPlainObject(field) || typeof field.name !== 'string' || !('type' in field)) {
          throw invalidSchema(`record ${fullName} has an invalid field ${JSON.stringify(field)}`);
        }
        fields.push({ name: field.name, schema: resolveNode(field.type, named, innerNamespace) });
      }
      return record;
    }
    case 'enum': {
      const { fullName } = nameOf(node, namespace);
      const symbols = node.symbols;
      if (!Array.isArray(symbols) || !symbols.every((s): s is string => typeof s === 'string')) {
        throw invalidSchema(`enum ${fullName} has invalid symbols`);
      }
      const resolved: ResolvedSchema = { kind: 'enum', name: fullName, symbols };
      named.set(fullName, resolved);
      return resolved;
    }
    case 'fixed': {
      const { fullName } = nameOf(node, namespace);
      const size = node.size;
      if (typeof size !== 'number' || !Number.isInteger(size) || size < 0) {
        throw invalidSchema(`fixed ${fullName} has invalid size`);
      }
      const resolved: ResolvedSchema = { kind: 'fixed', name: fullName, size };
      named.set(fullName, resolved);
      return resolved;
    }
    case 'array':
      return { kind: 'array', items: resolveNode(node.items, named, namespace) };
    case 'map':
      return { kind: 'map', values: resolveNode(node.values, named, namespace) };
    default:
      // { "type": "<named reference>" } or { "type": { ... } }
      if (type !== undefined) {
        return resolveNode(type, named, namespace);
      }
      throw invalidSchema(`schema object without type ${JSON.stringify(node)}`);
  }
}

function nameOf(
  node: Record<string, unknown>,
  namespace: string | undefined
): { fullName: string; innerNamespace: string | undefined } {
  if (typeof node.name !== 'string' || node.name === '') {
    throw invalidSchema(`named type without a name ${JSON.stringify(node)}`);
  }
  const ownNamespace = typeof node.namespace === 'string' && node.namespace !== '' ? node.namespace : namespace;
  const fullName = qualify(node.name, ownNamespace);
  const lastDot = fullName.lastIndexOf('.');
  return { fullName, innerNamespace: lastDot >= 0 ? fullName.slice(0, lastDot) : undefined };
}

function qualify(name: string, namespace: string | undefined): string {
  return name.includes('.') || namespace === undefined ? name : `${namespace}.${name}`;
}

function invalidSchema(detail: string): DecodeError {
  return new DecodeError(`Invalid Avro schema: ${detail}`, 'INVALID_SCHEMA');
}
