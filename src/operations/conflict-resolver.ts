import { isDeepStrictEqual } from 'node:util';

import { Annotation, type AttributeValues } from '../core/annotation.js';
import { MissingPriorityAttributeError } from '../core/errors.js';
import { Layer, Span, topologyOptions } from '../core/layer.js';
import {
  compareSpans,
  locationOf,
  sameLocation,
  spanLength,
  spansOverlap,
  type BaseSpan,
  type SpanLocation
} from '../core/span.js';

/** Overlap policy applied after the priority filter. */
export type ConflictStrategy = 'MAX' | 'MIN' | 'ALL';

/** One location/values pair taking part in conflict resolution. */
export interface ConflictCandidate {
  readonly start: number;
  readonly end: number;
  readonly values: AttributeValues;
}

export interface ResolveConflictsOptions {
  /** Defaults to `'MAX'`. */
  strategy?: ConflictStrategy;
  /** Numeric attribute ranking candidates; lower values win. Without it every candidate ranks 0. */
  priorityAttribute?: string;
  /** Keep equal-priority candidates at an identical location. Defaults to true. */
  keepEqual?: boolean;
}

interface RankedEntry<T extends ConflictCandidate> {
  candidate: T;
  order: number;
  priority: number;
}

type RankedLocation = SpanLocation & { priority: number };

/** Survivors sharing one location, in input order. */
interface LocationGroup<T extends ConflictCandidate> {
  start: number;
  end: number;
  priority: number;
  entries: RankedEntry<T>[];
}

/**
 * Resolve overlaps in a candidate sequence. The input is not modified; the
 * result is sorted by `(start, end)` and keeps input order within a location.
 */
export function resolveSpanConflicts<T extends ConflictCandidate>(
  candidates: readonly T[],
  options: ResolveConflictsOptions = {}
): T[] {
  const strategy = options.strategy ?? 'MAX';
  const keepEqual = options.keepEqual ?? true;

  const ranked = candidates.map((candidate, order) => ({
    candidate,
    order,
    priority: priorityOf(candidate, options.priorityAttribute)
  }));

  const survivors = filterByPriority(ranked, keepEqual);
  survivors.sort((left, right) => compareSpans(left.candidate, right.candidate) || left.order - right.order);

  if (strategy === 'ALL') {
    return survivors.map((entry) => entry.candidate);
  }

  return sweepOverlaps(groupByLocation(survivors), strategy).flatMap((group) =>
    group.entries.map((entry) => entry.candidate)
  );
}

/**
 * Layer form of `resolveSpanConflicts`: every annotation is a candidate.
 * Returns a new layer with the same schema and text object; the input layer
 * is left as it is.
 */
export function resolveConflicts(layer: Layer, options: ResolveConflictsOptions = {}): Layer {
  const priorityAttribute = options.priorityAttribute;
  if (priorityAttribute !== undefined && !layer.attributes.includes(priorityAttribute)) {
    throw new MissingPriorityAttributeError(
      priorityAttribute,
      undefined,
      `is not declared on layer '${layer.name}'`
    );
  }

  const candidates = layer.spans.flatMap((span) =>
    span.annotations.map((annotation) => ({
      start: span.start,
      end: span.end,
      base: span.base,
      values: annotation.toRecord()
    }))
  );
  const resolved = resolveSpanConflicts(candidates, options);

  const result = new Layer({
    name: layer.name,
    attributes: layer.attributes,
    ambiguous: layer.ambiguous,
    defaults: layer.defaults,
    ...topologyOptions(layer.topology),
    textObject: layer.textObject
  });

  for (const candidate of resolved) {
    appendCandidate(result, candidate.base, candidate.values);
  }

  return result;
}

function appendCandidate(layer: Layer, base: BaseSpan, values: AttributeValues): void {
  let span = layer.spans.at(-1);
  if (!span || !sameLocation(span, base)) {
    span = new Span(layer, base);
    layer.spans.push(span);
  }
  span.annotations.push(new Annotation(span, values));
}

function priorityOf(candidate: ConflictCandidate, attribute: string | undefined): number {
  if (attribute === undefined) {
    return 0;
  }

  if (!Object.hasOwn(candidate.values, attribute)) {
    throw new MissingPriorityAttributeError(attribute, locationOf(candidate));
  }

  const value = candidate.values[attribute];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MissingPriorityAttributeError(attribute, locationOf(candidate), 'is not a finite number');
  }

  return value;
}

/**
 * Commit candidates from the strongest priority down. A candidate overlapping
 * a committed one of strictly stronger priority is dropped; equal priorities
 * only compete at an identical location, and only when `keepEqual` is off.
 * An exact repeat of a committed candidate (location and values) is always dropped.
 */
function filterByPriority<T extends ConflictCandidate>(
  ranked: readonly RankedEntry<T>[],
  keepEqual: boolean
): RankedEntry<T>[] {
  const ordered = [...ranked].sort(
    (left, right) =>
      left.priority - right.priority ||
      compareSpans(left.candidate, right.candidate) ||
      left.order - right.order
  );

  const committed: RankedEntry<T>[] = [];
  for (const entry of ordered) {
    const blocked = committed.some((other) => {
      if (other.priority < entry.priority) {
        return spansOverlap(other.candidate, entry.candidate);
      }
      if (other.priority !== entry.priority || !sameLocation(other.candidate, entry.candidate)) {
        return false;
      }
      return !keepEqual || isDeepStrictEqual(other.candidate.values, entry.candidate.values);
    });

    if (!blocked) {
      committed.push(entry);
    }
  }

  return committed;
}

function groupByLocation<T extends ConflictCandidate>(sorted: readonly RankedEntry<T>[]): LocationGroup<T>[] {
  const groups: LocationGroup<T>[] = [];
  for (const entry of sorted) {
    const last = groups.at(-1);
    if (last && sameLocation(last, entry.candidate)) {
      last.entries.push(entry);
      last.priority = Math.min(last.priority, entry.priority);
      continue;
    }

    groups.push({
      start: entry.candidate.start,
      end: entry.candidate.end,
      priority: entry.priority,
      entries: [entry]
    });
  }
  return groups;
}

/**
 * Sweep location groups in `(start, end)` order against the last accepted
 * group. Since groups arrive sorted by start, a replacement never reaches back
 * over an earlier accepted group, so the result stays overlap-free.
 */
function sweepOverlaps<T extends ConflictCandidate>(
  groups: readonly LocationGroup<T>[],
  strategy: 'MAX' | 'MIN'
): LocationGroup<T>[] {
  const accepted: LocationGroup<T>[] = [];
  for (const group of groups) {
    const last = accepted.at(-1);
    if (!last || !spansOverlap(last, group)) {
      accepted.push(group);
    } else if (beats(group, last, strategy)) {
      accepted[accepted.length - 1] = group;
    }
  }
  return accepted;
}

/** Priority first, then length; ties keep the incumbent. */
function beats(challenger: RankedLocation, incumbent: RankedLocation, strategy: 'MAX' | 'MIN'): boolean {
  if (challenger.priority !== incumbent.priority) {
    return challenger.priority < incumbent.priority;
  }

  const difference = spanLength(challenger) - spanLength(incumbent);
  return strategy === 'MAX' ? difference > 0 : difference < 0;
}
