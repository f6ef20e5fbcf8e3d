import { Annotation } from '../core/annotation.js';
import { ConsistencyError, TextLayersError } from '../core/errors.js';
import { Layer, Span } from '../core/layer.js';
import { createEnvelopingSpan, createSpan, type BaseSpan } from '../core/span.js';
import type { Text } from '../core/text.js';

/** `[start, end]` for elementary spans, the list of child records for enveloping ones. */
export type BaseSpanRecord = readonly [number, number] | readonly BaseSpanRecord[];

export interface SpanRecord {
  base_span: BaseSpanRecord;
  annotations: Record<string, unknown>[];
}

/** Structural, JSON-ready form of a layer. */
export interface LayerRecord {
  name: string;
  attributes: string[];
  parent: string | null;
  enveloping: string | null;
  ambiguous: boolean;
  fragment_of?: string;
  default_values?: Record<string, unknown>;
  spans: SpanRecord[];
}

const LAYER_RECORD_KEYS = new Set([
  'name',
  'attributes',
  'parent',
  'enveloping',
  'ambiguous',
  'fragment_of',
  'default_values',
  'spans'
]);

const SPAN_RECORD_KEYS = new Set(['base_span', 'annotations']);

/** Convert a layer to its record form. Attributes come out in declared order. */
export function layerToRecord(layer: Layer): LayerRecord {
  const record: LayerRecord = {
    name: layer.name,
    attributes: [...layer.attributes],
    parent: layer.parent ?? null,
    enveloping: layer.enveloping ?? null,
    ambiguous: layer.ambiguous,
    spans: layer.spans.map((span) => ({
      base_span: baseSpanToRecord(span.base),
      annotations: span.annotations.map((annotation) => annotation.toRecord())
    }))
  };

  if (layer.fragmentOf !== undefined) {
    record.fragment_of = layer.fragmentOf;
  }
  if (Object.keys(layer.defaults).length > 0) {
    record.default_values = { ...layer.defaults };
  }

  return record;
}

export function baseSpanToRecord(span: BaseSpan): BaseSpanRecord {
  if (span.kind === 'elementary') {
    return [span.start, span.end];
  }
  return span.children.map(baseSpanToRecord);
}

/**
 * Rebuild a layer from an untrusted record. Nothing is repaired: spans are
 * stored exactly as listed and then run through the layer's consistency
 * check, so schema problems, unsorted spans, wrong annotation keys or counts,
 * and (with a text) dependency mismatches all surface as `ConsistencyError`.
 */
export function recordToLayer(record: unknown, text?: Text): Layer {
  if (!isPlainObject(record)) {
    throw new ConsistencyError('RECORD_SHAPE', '<record>', 'layer record must be an object');
  }

  const name = typeof record.name === 'string' ? record.name : '<record>';
  const fail = (message: string): ConsistencyError => new ConsistencyError('RECORD_SHAPE', name, message);

  const unknownKeys = Object.keys(record).filter((key) => !LAYER_RECORD_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw fail(`unexpected keys ${unknownKeys.join(', ')}`);
  }
  if (typeof record.name !== 'string') {
    throw fail('name must be a string');
  }
  if (!isStringArray(record.attributes)) {
    throw fail('attributes must be an array of strings');
  }
  if (typeof record.ambiguous !== 'boolean') {
    throw fail('ambiguous must be a boolean');
  }
  const parent = optionalName(record.parent, 'parent', fail);
  const enveloping = optionalName(record.enveloping, 'enveloping', fail);
  const fragmentOf = optionalName(record.fragment_of, 'fragment_of', fail);
  const defaults = optionalObject(record.default_values, 'default_values', fail);
  if (!Array.isArray(record.spans)) {
    throw fail('spans must be an array');
  }

  let layer: Layer;
  try {
    layer = new Layer({
      name: record.name,
      attributes: record.attributes,
      ambiguous: record.ambiguous,
      defaults,
      parent,
      enveloping,
      fragmentOf,
      textObject: text
    });
  } catch (error) {
    if (error instanceof TextLayersError) {
      throw new ConsistencyError('RECORD_SCHEMA', name, error.message);
    }
    throw error;
  }

  record.spans.forEach((spanRecord: unknown, index: number) => {
    layer.spans.push(spanFromRecord(layer, spanRecord, index));
  });
  layer.checkSpanConsistency();

  return layer;
}

function spanFromRecord(layer: Layer, record: unknown, index: number): Span {
  if (!isPlainObject(record)) {
    throw new ConsistencyError('RECORD_SHAPE', layer.name, `span ${index} must be an object`);
  }

  const extra = Object.keys(record).filter((key) => !SPAN_RECORD_KEYS.has(key));
  if (extra.length > 0) {
    throw new ConsistencyError('RECORD_SHAPE', layer.name, `span ${index} has unexpected keys ${extra.join(', ')}`);
  }

  const span = new Span(layer, baseSpanFromRecord(layer.name, record.base_span, index));
  if (!Array.isArray(record.annotations)) {
    throw new ConsistencyError('RECORD_SHAPE', layer.name, `span ${index} annotations must be an array`);
  }
  for (const values of record.annotations) {
    if (!isPlainObject(values)) {
      throw new ConsistencyError('RECORD_SHAPE', layer.name, `span ${index} has a non-object annotation`);
    }
    span.annotations.push(new Annotation(span, values));
  }

  return span;
}

/** Parse a `base_span` value; range and child-order errors are reported as consistency errors. */
export function baseSpanFromRecord(layerName: string, value: unknown, index: number): BaseSpan {
  try {
    return parseBaseSpan(value);
  } catch (error) {
    if (error instanceof TextLayersError) {
      throw new ConsistencyError('RECORD_BASE_SPAN', layerName, `span ${index}: ${error.message}`);
    }
    throw error;
  }
}

function parseBaseSpan(value: unknown): BaseSpan {
  if (!Array.isArray(value) || value.length === 0) {
    throw new TextLayersError('RECORD_BASE_SPAN', 'base_span must be a non-empty array');
  }

  const [start, end] = value;
  if (value.length === 2 && typeof start === 'number' && typeof end === 'number') {
    return createSpan(start, end);
  }

  return createEnvelopingSpan(value.map((child: unknown) => parseBaseSpan(child)));
}

function optionalName(
  value: unknown,
  field: string,
  fail: (message: string) => ConsistencyError
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw fail(`${field} must be a string or null`);
  }
  return value;
}

function optionalObject(
  value: unknown,
  field: string,
  fail: (message: string) => ConsistencyError
): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    throw fail(`${field} must be an object`);
  }
  if (Object.keys(value).length === 0) {
    throw fail(`${field} must be left out when empty`);
  }
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}
