import { InvalidRangeError, NonContiguousChildrenError } from './errors.js';

/** Plain `[start, end)` location, as accepted by every span-taking operation. */
export interface SpanLocation {
  readonly start: number;
  readonly end: number;
}

/** Leaf interval over the raw text. */
export interface ElementarySpan extends SpanLocation {
  readonly kind: 'elementary';
}

/** Composite span over ordered, non-overlapping child spans. */
export interface EnvelopingSpan extends SpanLocation {
  readonly kind: 'enveloping';
  readonly children: readonly BaseSpan[];
}

/** Location part of a layer entry, independent of any annotation. */
export type BaseSpan = ElementarySpan | EnvelopingSpan;

/** Text of a span: a slice for leaves, child texts (nested) for enveloping spans. */
export type SpanText = string | readonly SpanText[];

/** Build an elementary span, rejecting empty, negative, or fractional ranges. */
export function createSpan(start: number, end: number): ElementarySpan {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start >= end) {
    throw new InvalidRangeError(start, end);
  }

  const span: ElementarySpan = { kind: 'elementary', start, end };
  return Object.freeze(span);
}

/**
 * Build an enveloping span. Children must be strictly increasing and may
 * leave gaps between them, but never overlap.
 */
export function createEnvelopingSpan(children: readonly BaseSpan[]): EnvelopingSpan {
  const first = children[0];
  const last = children.at(-1);
  if (!first || !last) {
    throw new NonContiguousChildrenError(0, 'Enveloping span needs at least one child span.');
  }

  for (let index = 1; index < children.length; index += 1) {
    const previous = children[index - 1];
    const current = children[index];
    if (previous && current && current.start < previous.end) {
      throw new NonContiguousChildrenError(
        index,
        `Child ${index} [${current.start}, ${current.end}) overlaps or precedes child ${index - 1} [${previous.start}, ${previous.end}).`
      );
    }
  }

  const span: EnvelopingSpan = {
    kind: 'enveloping',
    start: first.start,
    end: last.end,
    children: Object.freeze([...children])
  };
  return Object.freeze(span);
}

/** True for values built by `createSpan` or `createEnvelopingSpan`. */
export function isBaseSpan(value: SpanLocation): value is BaseSpan {
  return 'kind' in value && (value.kind === 'elementary' || value.kind === 'enveloping');
}

/** Normalize a plain location to an elementary span, keeping base spans as they are. */
export function toBaseSpan(location: SpanLocation): BaseSpan {
  if (isBaseSpan(location)) {
    return location;
  }

  return createSpan(location.start, location.end);
}

/** `(start, end)` tuple order. */
export function compareSpans(left: SpanLocation, right: SpanLocation): number {
  return left.start - right.start || left.end - right.end;
}

/** Identical boundaries; annotation content and span kind play no part. */
export function sameLocation(left: SpanLocation, right: SpanLocation): boolean {
  return left.start === right.start && left.end === right.end;
}

/** True when the two half-open intervals share at least one position. */
export function spansOverlap(left: SpanLocation, right: SpanLocation): boolean {
  return left.start < right.end && right.start < left.end;
}

/** True when `inner` lies within `outer`. */
export function containsSpan(outer: SpanLocation, inner: SpanLocation): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function spanLength(span: SpanLocation): number {
  return span.end - span.start;
}

/** Resolve the text of a base span against the raw string. */
export function spanText(span: BaseSpan, raw: string): SpanText {
  if (span.kind === 'elementary') {
    return raw.slice(span.start, span.end);
  }

  return span.children.map((child) => spanText(child, raw));
}

/** Binary search for `location` in a sorted span list; `found` tells whether it is present. */
export function searchSpans(
  spans: readonly SpanLocation[],
  location: SpanLocation
): { index: number; found: boolean } {
  let low = 0;
  let high = spans.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const probe = spans[mid];
    if (probe && compareSpans(probe, location) < 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  const candidate = spans[low];
  return { index: low, found: candidate !== undefined && sameLocation(candidate, location) };
}

/** `[start, end)` pair used in messages and records. */
export function locationOf(span: SpanLocation): { start: number; end: number } {
  return { start: span.start, end: span.end };
}
