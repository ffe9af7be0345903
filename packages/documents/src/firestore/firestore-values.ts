/**
 * Firestore typed-value encoding for the REST API
 */

import { z } from 'zod';
import type { DocumentPayload } from '../types.js';

export type FirestoreValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number }
  | { stringValue: string }
  | { timestampValue: string }
  | { referenceValue: string }
  | { arrayValue: { values?: FirestoreValue[] } }
  | { mapValue: { fields?: Record<string, FirestoreValue> } };

export const FirestoreValueSchema: z.ZodType<FirestoreValue> = z.lazy(() =>
  z.union([
    z.object({ nullValue: z.null() }),
    z.object({ booleanValue: z.boolean() }),
    z.object({ integerValue: z.string() }),
    z.object({ doubleValue: z.number() }),
    z.object({ stringValue: z.string() }),
    z.object({ timestampValue: z.string() }),
    z.object({ referenceValue: z.string() }),
    z.object({ arrayValue: z.object({ values: z.array(FirestoreValueSchema).optional() }) }),
    z.object({ mapValue: z.object({ fields: z.record(FirestoreValueSchema).optional() }) }),
  ])
);

export const FirestoreDocumentSchema = z.object({
  name: z.string(),
  fields: z.record(FirestoreValueSchema).optional(),
  createTime: z.string().optional(),
  updateTime: z.string(),
});

export type FirestoreDocument = z.infer<typeof FirestoreDocumentSchema>;

export function encodeValue(value: unknown): FirestoreValue {
  if (value === null) {
    return { nullValue: null };
  }
  if (typeof value === 'boolean') {
    return { booleanValue: value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { integerValue: value.toString() } : { doubleValue: value };
  }
  if (typeof value === 'bigint') {
    return { integerValue: value.toString() };
  }
  if (typeof value === 'string') {
    return { stringValue: value };
  }
  if (value instanceof Date) {
    return { timestampValue: value.toISOString() };
  }
  if (Array.isArray(value)) {
    return { arrayValue: { values: value.map((item: unknown) => encodeValue(item)) } };
  }
  if (typeof value === 'object') {
    return { mapValue: { fields: encodeFields(value) } };
  }
  throw new TypeError(`Cannot store a ${typeof value} in a document`);
}

/**
 * Map fields; undefined members are left out
 */
export function encodeFields(payload: object): Record<string, FirestoreValue> {
  const fields: Record<string, FirestoreValue> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) {
      fields[key] = encodeValue(value);
    }
  }
  return fields;
}

export function decodeValue(value: FirestoreValue): unknown {
  if ('nullValue' in value) {
    return null;
  }
  if ('booleanValue' in value) {
    return value.booleanValue;
  }
  if ('integerValue' in value) {
    const parsed = BigInt(value.integerValue);
    return parsed >= BigInt(Number.MIN_SAFE_INTEGER) && parsed <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(parsed)
      : parsed;
  }
  if ('doubleValue' in value) {
    return value.doubleValue;
  }
  if ('stringValue' in value) {
    return value.stringValue;
  }
  if ('timestampValue' in value) {
    return new Date(value.timestampValue);
  }
  if ('referenceValue' in value) {
    return value.referenceValue;
  }
  if ('arrayValue' in value) {
    return (value.arrayValue.values ?? []).map(decodeValue);
  }
  return decodeFields(value.mapValue.fields);
}

export function decodeFields(fields: Record<string, FirestoreValue> | undefined): DocumentPayload {
  const payload: DocumentPayload = {};
  for (const [key, value] of Object.entries(fields ?? {})) {
    payload[key] = decodeValue(value);
  }
  return payload;
}
