import { isDeepStrictEqual } from 'node:util';

import type { Layer, Span } from '../core/layer.js';
import { baseSpanToRecord, type BaseSpanRecord } from '../converters/layer-record.js';

/** A location present on one side only. */
export interface SpanOnlyOnOneSide {
  base_span: BaseSpanRecord;
  annotations: Record<string, unknown>[];
}

/** A location present on both sides whose annotation lists differ. */
export interface ChangedAnnotations {
  base_span: BaseSpanRecord;
  expected: Record<string, unknown>[];
  actual: Record<string, unknown>[];
}

export interface LayerDiff {
  equal: boolean;
  schema: string[];
  missingSpans: SpanOnlyOnOneSide[];
  extraSpans: SpanOnlyOnOneSide[];
  changedAnnotations: ChangedAnnotations[];
}

/** Compare two layers location by location; annotation lists are compared in order. */
export function diffLayers(expected: Layer, actual: Layer): LayerDiff {
  const schema = diffSchema(expected, actual);
  const actualByKey = new Map(actual.spans.map((span) => [spanKey(span), span]));
  const expectedKeys = new Set<string>();

  const missingSpans: SpanOnlyOnOneSide[] = [];
  const changedAnnotations: ChangedAnnotations[] = [];
  for (const span of expected.spans) {
    const key = spanKey(span);
    expectedKeys.add(key);
    const counterpart = actualByKey.get(key);
    if (!counterpart) {
      missingSpans.push(describeSpan(span));
      continue;
    }

    const wanted = annotationRecords(span);
    const got = annotationRecords(counterpart);
    if (!isDeepStrictEqual(wanted, got)) {
      changedAnnotations.push({ base_span: baseSpanToRecord(span.base), expected: wanted, actual: got });
    }
  }

  const extraSpans = actual.spans.filter((span) => !expectedKeys.has(spanKey(span))).map(describeSpan);

  return {
    equal: schema.length === 0 && missingSpans.length === 0 && extraSpans.length === 0 && changedAnnotations.length === 0,
    schema,
    missingSpans,
    extraSpans,
    changedAnnotations
  };
}

function diffSchema(expected: Layer, actual: Layer): string[] {
  const differences: string[] = [];
  if (expected.name !== actual.name) {
    differences.push(`name: expected '${expected.name}', got '${actual.name}'`);
  }
  if (!isDeepStrictEqual(expected.attributes, actual.attributes)) {
    differences.push(`attributes: expected [${expected.attributes.join(', ')}], got [${actual.attributes.join(', ')}]`);
  }
  if (expected.ambiguous !== actual.ambiguous) {
    differences.push(`ambiguous: expected ${expected.ambiguous}, got ${actual.ambiguous}`);
  }
  if (!isDeepStrictEqual(expected.topology, actual.topology)) {
    differences.push(`topology: expected ${describeTopology(expected)}, got ${describeTopology(actual)}`);
  }
  if (!isDeepStrictEqual(expected.defaults, actual.defaults)) {
    differences.push('default values differ');
  }
  return differences;
}

function describeTopology(layer: Layer): string {
  const topology = layer.topology;
  return topology.kind === 'independent' ? 'independent' : `${topology.kind} of '${topology.base}'`;
}

function spanKey(span: Span): string {
  return JSON.stringify(baseSpanToRecord(span.base));
}

function annotationRecords(span: Span): Record<string, unknown>[] {
  return span.annotations.map((annotation) => annotation.toRecord());
}

function describeSpan(span: Span): SpanOnlyOnOneSide {
  return { base_span: baseSpanToRecord(span.base), annotations: annotationRecords(span) };
}
