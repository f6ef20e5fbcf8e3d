import { describe, expect, it } from 'vitest';

import { MissingPriorityAttributeError } from '../../src/core/errors.js';
import { Layer } from '../../src/core/layer.js';
import { Text } from '../../src/core/text.js';
import {
  resolveConflicts,
  resolveSpanConflicts,
  type ConflictCandidate,
  type ResolveConflictsOptions
} from '../../src/operations/conflict-resolver.js';

function candidate(start: number, end: number, priority?: number): ConflictCandidate {
  return { start, end, values: priority === undefined ? {} : { priority } };
}

function resolvedLocations(candidates: ConflictCandidate[], options: ResolveConflictsOptions): [number, number][] {
  return resolveSpanConflicts(candidates, options).map((entry) => [entry.start, entry.end]);
}

describe('resolveSpanConflicts with priorities', () => {
  it('lets a stronger priority win over any overlap', () => {
    const options = { strategy: 'MAX', priorityAttribute: 'priority' } as const;
    expect(resolvedLocations([candidate(1, 8, 0), candidate(2, 4, 1), candidate(3, 6, 1)], options)).toEqual([[1, 8]]);
    expect(resolvedLocations([candidate(1, 8, 1), candidate(2, 4, 0), candidate(3, 6, 1)], options)).toEqual([[2, 4]]);
  });

  it('applies the same filter under MIN', () => {
    expect(
      resolvedLocations([candidate(1, 8, 1), candidate(2, 4, 1), candidate(3, 6, 0)], {
        strategy: 'MIN',
        priorityAttribute: 'priority'
      })
    ).toEqual([[3, 6]]);
  });

  it('keeps weaker spans under ALL once their stronger neighbour is gone', () => {
    expect(
      resolvedLocations([candidate(1, 3, 2), candidate(2, 7, 1), candidate(4, 8, 0)], {
        strategy: 'ALL',
        priorityAttribute: 'priority'
      })
    ).toEqual([
      [1, 3],
      [4, 8]
    ]);
  });

  it('drops exact repeats but keeps differing values at one location', () => {
    const repeated = { start: 1, end: 4, values: { priority: 0, label: 'a' } };
    const resolved = resolveSpanConflicts(
      [repeated, { ...repeated }, { start: 1, end: 4, values: { priority: 0, label: 'b' } }],
      { strategy: 'MAX', priorityAttribute: 'priority' }
    );

    expect(resolved.map((entry) => entry.values.label)).toEqual(['a', 'b']);
    expect(resolved[0]).toBe(repeated);
  });

  it('rejects candidates without a finite numeric priority', () => {
    expect(() =>
      resolveSpanConflicts([candidate(0, 2, 0), candidate(1, 3)], { priorityAttribute: 'priority' })
    ).toThrow(MissingPriorityAttributeError);
    expect(() =>
      resolveSpanConflicts([{ start: 0, end: 2, values: { priority: Number.NaN } }], { priorityAttribute: 'priority' })
    ).toThrow(MissingPriorityAttributeError);
  });
});

describe('resolveSpanConflicts without priorities', () => {
  it('prefers the longer span under MAX and the shorter under MIN', () => {
    const commonStart = [candidate(1, 4), candidate(1, 6)];
    const commonEnd = [candidate(3, 6), candidate(1, 6)];

    expect(resolvedLocations(commonStart, { strategy: 'MAX' })).toEqual([[1, 6]]);
    expect(resolvedLocations(commonEnd, { strategy: 'MAX' })).toEqual([[1, 6]]);
    expect(resolvedLocations(commonStart, { strategy: 'MIN' })).toEqual([[1, 4]]);
    expect(resolvedLocations(commonEnd, { strategy: 'MIN' })).toEqual([[3, 6]]);
  });

  it('keeps the earlier span on a length tie', () => {
    const chain = [candidate(1, 8), candidate(2, 4), candidate(3, 6)];
    expect(resolvedLocations(chain, { strategy: 'MIN' })).toEqual([[2, 4]]);
    expect(resolvedLocations(chain, { strategy: 'MAX' })).toEqual([[1, 8]]);
  });

  it('defaults to MAX and keeps non-overlapping spans', () => {
    expect(resolvedLocations([candidate(6, 9), candidate(0, 5), candidate(2, 7)], {})).toEqual([
      [0, 5],
      [6, 9]
    ]);
  });

  it('returns nothing for no candidates and leaves the input untouched', () => {
    expect(resolveSpanConflicts([])).toEqual([]);

    const frozen = Object.freeze([candidate(3, 6), candidate(1, 4)]);
    expect(resolveSpanConflicts(frozen, { strategy: 'ALL' }).map((entry) => entry.start)).toEqual([1, 3]);
    expect(frozen.map((entry) => entry.start)).toEqual([3, 1]);
  });
});

describe('resolveConflicts on layers', () => {
  function ambiguousLayer(rows: [number, number, number[]][]): Layer {
    const layer = new Layer({ name: 'entities', attributes: ['attr_1', 'priority'], ambiguous: true });
    for (const [start, end, priorities] of rows) {
      priorities.forEach((priority, index) => layer.addSpan({ start, end }, { attr_1: index + 1, priority }));
    }
    return layer;
  }

  it('keeps equal-priority annotations at one location when keepEqual is set', () => {
    const layer = ambiguousLayer([
      [1, 2, [0]],
      [2, 3, [1, 2, 3, 4]],
      [4, 5, [1, 1, 0, 0]],
      [6, 7, [2, 1, 2, 3]]
    ]);

    const resolved = resolveConflicts(layer, { strategy: 'ALL', priorityAttribute: 'priority', keepEqual: true });

    expect(resolved.spans.flatMap((span) => span.annotations.map(() => [span.start, span.end]))).toEqual([
      [1, 2],
      [2, 3],
      [4, 5],
      [4, 5],
      [6, 7]
    ]);
    expect(resolved.attributeValues('attr_1').values).toEqual([[1], [1], [3, 4], [2]]);
    expect(layer.spans.map((span) => span.annotations.length)).toEqual([1, 4, 4, 4]);
  });

  it('drops equal-priority duplicates when keepEqual is off', () => {
    const layer = ambiguousLayer([
      [1, 4, [0]],
      [3, 6, [1, 2, 3, 4]],
      [5, 7, [1, 1, 0, 0]]
    ]);

    const resolved = resolveConflicts(layer, { strategy: 'ALL', priorityAttribute: 'priority', keepEqual: false });

    expect(resolved.spans.map((span) => [span.start, span.end])).toEqual([
      [1, 4],
      [5, 7]
    ]);
    expect(resolved.attributeValues('attr_1').values).toEqual([[1], [3]]);
  });

  it('keeps a single annotation for exact repeats at one location', () => {
    const layer = new Layer({ name: 'test_layer', attributes: ['_priority_'], ambiguous: true }).fromRecords([
      [
        { start: 1, end: 4, _priority_: 0 },
        { start: 1, end: 4, _priority_: 0 }
      ]
    ]);

    for (const strategy of ['MAX', 'MIN', 'ALL'] as const) {
      const resolved = resolveConflicts(layer, { strategy, priorityAttribute: '_priority_' });
      expect(resolved.spans.map((span) => [span.start, span.end, span.annotations.length])).toEqual([[1, 4, 1]]);
    }
    expect(layer.at(0)?.annotations.length).toBe(2);
  });

  it('returns a new layer with the same schema and text object', () => {
    const text = new Text('abcdefghij');
    const layer = new Layer({ name: 'chunks', textObject: text }).fromRecords([
      { start: 0, end: 5 },
      { start: 2, end: 7 },
      { start: 6, end: 9 }
    ]);

    const resolved = resolveConflicts(layer, { strategy: 'MAX' });

    expect(resolved).not.toBe(layer);
    expect(resolved.hasSameSchema(layer)).toBe(true);
    expect(resolved.textObject).toBe(text);
    expect(resolved.text).toEqual(['abcde', 'ghi']);
    expect(layer.length).toBe(3);
    expect(() => resolved.checkSpanConsistency()).not.toThrow();
  });

  it('requires the priority attribute to be declared', () => {
    const layer = new Layer({ name: 'chunks' }).fromRecords([{ start: 0, end: 5 }]);
    expect(() => resolveConflicts(layer, { priorityAttribute: 'priority' })).toThrow(MissingPriorityAttributeError);
  });
});
