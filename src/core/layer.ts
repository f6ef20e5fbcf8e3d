import { isDeepStrictEqual } from 'node:util';

import { Annotation, type AttributeValues } from './annotation.js';
import {
  AmbiguousAccessError,
  AttributeMismatchError,
  ConsistencyError,
  DuplicateSpanError,
  InvalidAttributeNameError,
  InvalidLayerNameError,
  LayerOwnershipError,
  LayerTopologyError,
  NoMatchingEnvelopedSpanError,
  UnboundError,
  UnknownAttributeError
} from './errors.js';
import { checkSpanAgainstBase, findDependencyViolation, findStructuralViolation } from './layer-checks.js';
import {
  collectAttribute,
  collectAttributeTuples,
  LayerView,
  selectSpans,
  type AttributeList,
  type AttributeTupleList,
  type SelectOptions,
  type SpanSelector
} from './layer-view.js';
import {
  compareSpans,
  createEnvelopingSpan,
  createSpan,
  locationOf,
  sameLocation,
  searchSpans,
  spanLength,
  spanText,
  toBaseSpan,
  type BaseSpan,
  type SpanLocation,
  type SpanText
} from './span.js';
import type { Text } from './text.js';

/** Identifier rule shared by layer and attribute names. */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Keys that carry location in flat span records and therefore cannot be attributes. */
const LOCATION_KEYS = new Set(['start', 'end']);

/** How a layer's spans relate to another layer of the same text. */
export type LayerTopology =
  | { readonly kind: 'independent' }
  | { readonly kind: 'parent'; readonly base: string }
  | { readonly kind: 'enveloping'; readonly base: string }
  | { readonly kind: 'fragment'; readonly base: string };

/** Layer construction options. At most one of `parent`, `enveloping`, `fragmentOf` may be set. */
export interface LayerOptions {
  name: string;
  attributes?: readonly string[];
  ambiguous?: boolean;
  defaults?: AttributeValues;
  parent?: string;
  enveloping?: string;
  fragmentOf?: string;
  textObject?: Text;
}

/** Flat span record accepted by `Layer.fromRecords`. */
export interface SpanRecordInput {
  readonly start: number;
  readonly end: number;
  readonly [attribute: string]: unknown;
}

/** One location of a layer together with its annotations. */
export class Span implements SpanLocation {
  readonly layer: Layer;
  readonly base: BaseSpan;
  readonly annotations: Annotation[] = [];

  constructor(layer: Layer, base: BaseSpan) {
    this.layer = layer;
    this.base = base;
  }

  get start(): number {
    return this.base.start;
  }

  get end(): number {
    return this.base.end;
  }

  get length(): number {
    return spanLength(this.base);
  }

  /** Slice of the raw text, or the child texts for enveloping spans. */
  get text(): SpanText {
    return spanText(this.base, this.layer.requireText().text);
  }

  /** Contiguous slice covering the whole span, gaps included. */
  get enclosingText(): string {
    return this.layer.requireText().text.slice(this.start, this.end);
  }

  /** The only annotation of a span on an unambiguous layer. */
  get annotation(): Annotation {
    if (this.layer.ambiguous) {
      throw new AmbiguousAccessError(this.layer.name);
    }

    const annotation = this.annotations[0];
    if (!annotation) {
      throw new ConsistencyError('ANNOTATION_COUNT', this.layer.name, 'span has no annotations', locationOf(this));
    }
    return annotation;
  }

  get(attribute: string): unknown {
    return this.annotation.get(attribute);
  }

  /** One value per annotation, in annotation order. */
  values(attribute: string): unknown[] {
    this.layer.assertAttribute(attribute);
    return this.annotations.map((annotation) => annotation.get(attribute));
  }

  addAnnotation(values: AttributeValues = {}): Annotation {
    const filled = this.layer.completeValues(values);
    if (!this.layer.ambiguous && this.annotations.length > 0) {
      throw new DuplicateSpanError(this.layer.name, locationOf(this));
    }

    const annotation = new Annotation(this, filled);
    this.annotations.push(annotation);
    return annotation;
  }

  /** Entries of the enveloped layer that this span's children stand for. */
  get children(): Span[] {
    const topology = this.layer.topology;
    if (topology.kind !== 'enveloping' || this.base.kind !== 'enveloping') {
      throw new LayerTopologyError(this.layer.name, `Layer '${this.layer.name}' is not an enveloping layer.`);
    }

    const enveloped = this.layer.requireText().layer(topology.base);
    return this.base.children.map((child) => {
      const entry = enveloped.spanAt(child);
      if (!entry) {
        throw new NoMatchingEnvelopedSpanError(this.layer.name, enveloped.name, locationOf(child));
      }
      return entry;
    });
  }

  /**
   * Entry at the same location in a parent-attached layer built on this span's layer.
   * Missing entries are created with default values.
   */
  mark(layerName: string): Span {
    const dependant = this.layer.requireText().layer(layerName);
    const topology = dependant.topology;
    if (topology.kind !== 'parent' || topology.base !== this.layer.name) {
      throw new LayerTopologyError(
        dependant.name,
        `Layer '${dependant.name}' is not parent-attached to '${this.layer.name}'.`
      );
    }

    return dependant.spanAt(this) ?? dependant.addSpan(locationOf(this));
  }

  /**
   * Read an attribute owned by this layer or by a related layer, through the
   * text's table of resolvable foreign attributes. Returns one value per
   * matching annotation; an unmatched location yields an empty list.
   */
  resolve(attribute: string): unknown[] {
    if (this.layer.attributes.includes(attribute)) {
      return this.values(attribute);
    }

    const text = this.layer.requireText();
    const foreign = text.resolvableAttributes(this.layer.name).get(attribute);
    if (!foreign) {
      throw new UnknownAttributeError(this.layer.name, attribute);
    }

    if (foreign.relation === 'enveloped') {
      return this.children.flatMap((child) => child.values(attribute));
    }

    const match = text.layer(foreign.layer).spanAt(this);
    return match ? match.values(attribute) : [];
  }
}

/**
 * Named, schema-typed, ordered collection of spans.
 *
 * `spans` is the raw storage and stays strictly sorted by `(start, end)` with
 * unique locations as long as it is only touched through the layer's methods.
 * Code that edits it directly must call `checkSpanConsistency()` afterwards.
 */
export class Layer implements Iterable<Span> {
  readonly name: string;
  readonly attributes: readonly string[];
  readonly ambiguous: boolean;
  readonly defaults: AttributeValues;
  readonly topology: LayerTopology;
  readonly spans: Span[] = [];
  private boundText?: Text;

  constructor(options: LayerOptions) {
    if (!IDENTIFIER_PATTERN.test(options.name)) {
      throw new InvalidLayerNameError(options.name);
    }
    this.name = options.name;
    this.attributes = Object.freeze(validateAttributeNames(options.name, options.attributes ?? []));
    this.ambiguous = options.ambiguous ?? false;
    this.topology = resolveTopology(options);
    this.defaults = Object.freeze(validateDefaults(options.name, this.attributes, options.defaults ?? {}));
    this.boundText = options.textObject;
  }

  get parent(): string | undefined {
    return this.topology.kind === 'parent' ? this.topology.base : undefined;
  }

  get enveloping(): string | undefined {
    return this.topology.kind === 'enveloping' ? this.topology.base : undefined;
  }

  get fragmentOf(): string | undefined {
    return this.topology.kind === 'fragment' ? this.topology.base : undefined;
  }

  /** Name of the layer this one depends on, whatever the relation. */
  get baseLayer(): string | undefined {
    return this.topology.kind === 'independent' ? undefined : this.topology.base;
  }

  get textObject(): Text | undefined {
    return this.boundText;
  }

  get bound(): boolean {
    return this.boundText !== undefined;
  }

  /** Bind to a text. Called by `Text` when the layer is attached. */
  bind(text: Text): void {
    if (this.boundText && this.boundText !== text) {
      throw new LayerOwnershipError(this.name);
    }
    this.boundText = text;
  }

  /** Drop the text binding. Called by `Text` when the layer is removed or replaced. */
  unbind(): void {
    this.boundText = undefined;
  }

  requireText(): Text {
    if (!this.boundText) {
      throw new UnboundError(this.name);
    }
    return this.boundText;
  }

  get length(): number {
    return this.spans.length;
  }

  [Symbol.iterator](): Iterator<Span> {
    return this.spans[Symbol.iterator]();
  }

  at(index: number): Span | undefined {
    return this.spans.at(index);
  }

  /** Entry at exactly this location, if any. */
  spanAt(location: SpanLocation): Span | undefined {
    const { index, found } = searchSpans(this.spans, location);
    return found ? this.spans[index] : undefined;
  }

  get text(): SpanText[] {
    this.requireText();
    return this.spans.map((span) => span.text);
  }

  defaultValue(attribute: string): unknown {
    return Object.hasOwn(this.defaults, attribute) ? this.defaults[attribute] : null;
  }

  assertAttribute(attribute: string): void {
    if (!this.attributes.includes(attribute)) {
      throw new UnknownAttributeError(this.name, attribute);
    }
  }

  /**
   * Reject undeclared keys and fill unset declared attributes from the defaults,
   * so that every stored annotation carries exactly the declared attribute set.
   */
  completeValues(values: AttributeValues): Record<string, unknown> {
    const extra = Object.keys(values).filter((key) => !this.attributes.includes(key));
    if (extra.length > 0) {
      throw new AttributeMismatchError(this.name, [], extra);
    }

    const completed: Record<string, unknown> = {};
    for (const attribute of this.attributes) {
      completed[attribute] = Object.hasOwn(values, attribute) ? values[attribute] : this.defaultValue(attribute);
    }
    return completed;
  }

  /**
   * Insert an elementary span, or add an annotation to an existing location on
   * ambiguous layers. Only the bounds of `location` are used, so entries and
   * enveloping spans of other layers are accepted as locations.
   */
  addSpan(location: SpanLocation, values: AttributeValues = {}): Span {
    if (this.topology.kind === 'enveloping') {
      throw new LayerTopologyError(this.name, `Use addEnvelopingSpan on enveloping layer '${this.name}'.`);
    }

    return this.insert(createSpan(location.start, location.end), values);
  }

  /** Insert a span enveloping `children`; the composite bounds are computed from them. */
  addEnvelopingSpan(children: readonly SpanLocation[], values: AttributeValues = {}): Span {
    if (this.topology.kind !== 'enveloping') {
      throw new LayerTopologyError(this.name, `Layer '${this.name}' is not an enveloping layer.`);
    }

    const base = createEnvelopingSpan(
      children.map((child) => (child instanceof Span ? child.base : toBaseSpan(child)))
    );
    return this.insert(base, values);
  }

  /**
   * Bulk-load flat records (`{start, end, ...attributes}`), or one array of
   * records per location on ambiguous layers. Records are validated and sorted
   * once; duplicate locations fail on unambiguous layers and merge otherwise.
   */
  fromRecords(records: readonly (SpanRecordInput | readonly SpanRecordInput[])[]): this {
    if (this.topology.kind === 'enveloping') {
      throw new LayerTopologyError(this.name, `fromRecords does not build enveloping layer '${this.name}'.`);
    }

    const flat = records.flatMap((entry) => (isRecordGroup(entry) ? [...entry] : [entry]));
    if (this.spans.length > 0) {
      // Dry run on a copy first so a failing record leaves this layer untouched.
      const scratch = this.copy();
      for (const record of flat) {
        scratch.addSpan(createSpan(record.start, record.end), valuesOfRecord(record));
      }
      for (const record of flat) {
        this.addSpan(createSpan(record.start, record.end), valuesOfRecord(record));
      }
      return this;
    }

    const text = this.boundText;
    const prepared = flat.map((record, order) => {
      const base = createSpan(record.start, record.end);
      const values = this.completeValues(valuesOfRecord(record));
      if (text) {
        const violation = checkSpanAgainstBase(this, base, (name) => text.layers.get(name));
        if (violation) {
          throw violation;
        }
      }
      return { base, values, order };
    });
    prepared.sort((left, right) => compareSpans(left.base, right.base) || left.order - right.order);

    const built: Span[] = [];
    for (const entry of prepared) {
      const last = built.at(-1);
      if (last && sameLocation(last, entry.base)) {
        if (!this.ambiguous) {
          throw new DuplicateSpanError(this.name, locationOf(entry.base));
        }
        last.annotations.push(new Annotation(last, entry.values));
        continue;
      }

      const span = new Span(this, entry.base);
      span.annotations.push(new Annotation(span, entry.values));
      built.push(span);
    }

    this.spans.push(...built);
    return this;
  }

  slice(start?: number, end?: number): LayerView {
    return new LayerView(this, this.spans.slice(start, end));
  }

  select(selector: SpanSelector, options: SelectOptions = {}): LayerView {
    return new LayerView(this, selectSpans(this.name, this.spans, selector, options));
  }

  /** Typed column view of one declared attribute. */
  attributeValues(attribute: string): AttributeList {
    return collectAttribute(this, this.spans, attribute);
  }

  attributeTuples(attributes: readonly string[]): AttributeTupleList {
    return collectAttributeTuples(this, this.spans, attributes);
  }

  /** Occurrences of each value of `attribute` across all spans and annotations. */
  countValues(attribute: string): Map<unknown, number> {
    this.assertAttribute(attribute);
    const counts = new Map<unknown, number>();
    for (const span of this.spans) {
      for (const annotation of span.annotations) {
        const value = annotation.get(attribute);
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }
    }
    return counts;
  }

  /**
   * Re-validate every layer invariant and throw a `ConsistencyError` for the
   * first violation. Dependency alignment is checked only while bound.
   */
  checkSpanConsistency(): void {
    const structural = findStructuralViolation(this);
    if (structural) {
      throw structural;
    }

    const text = this.boundText;
    if (!text) {
      return;
    }

    const dependency = findDependencyViolation(this, (name) => text.layers.get(name));
    if (dependency) {
      throw new ConsistencyError(`DEPENDENCY_${dependency.code}`, this.name, dependency.message);
    }
  }

  /** Same name, attributes, ambiguity, defaults, and topology. */
  hasSameSchema(other: Layer): boolean {
    return (
      this.name === other.name &&
      this.ambiguous === other.ambiguous &&
      isDeepStrictEqual(this.attributes, other.attributes) &&
      isDeepStrictEqual(this.topology, other.topology) &&
      isDeepStrictEqual(this.defaults, other.defaults)
    );
  }

  /** Schema, span locations, and annotation values all equal. */
  isEqual(other: Layer): boolean {
    if (!this.hasSameSchema(other) || this.spans.length !== other.spans.length) {
      return false;
    }

    return this.spans.every((span, index) => {
      const counterpart = other.spans[index];
      return (
        counterpart !== undefined &&
        isDeepStrictEqual(span.base, counterpart.base) &&
        span.annotations.length === counterpart.annotations.length &&
        span.annotations.every((annotation, position) => {
          const match = counterpart.annotations[position];
          return match !== undefined && annotation.isEqual(match);
        })
      );
    });
  }

  /** Detached deep copy of the span storage, bound to the same text object. */
  copy(): Layer {
    const clone = new Layer({
      name: this.name,
      attributes: this.attributes,
      ambiguous: this.ambiguous,
      defaults: this.defaults,
      ...topologyOptions(this.topology),
      textObject: this.boundText
    });

    for (const span of this.spans) {
      const copied = new Span(clone, span.base);
      for (const annotation of span.annotations) {
        copied.annotations.push(new Annotation(copied, annotation.toRecord()));
      }
      clone.spans.push(copied);
    }

    return clone;
  }

  private insert(base: BaseSpan, values: AttributeValues): Span {
    const completed = this.completeValues(values);
    const text = this.boundText;
    if (text) {
      const violation = checkSpanAgainstBase(this, base, (name) => text.layers.get(name));
      if (violation) {
        throw violation;
      }
    }

    const { index, found } = searchSpans(this.spans, base);
    const existing = this.spans[index];
    if (found && existing) {
      if (!this.ambiguous) {
        throw new DuplicateSpanError(this.name, locationOf(base));
      }
      existing.annotations.push(new Annotation(existing, completed));
      return existing;
    }

    const span = new Span(this, base);
    span.annotations.push(new Annotation(span, completed));
    this.spans.splice(index, 0, span);
    return span;
  }
}

/** Constructor options that reproduce a topology. */
export function topologyOptions(topology: LayerTopology): Pick<LayerOptions, 'parent' | 'enveloping' | 'fragmentOf'> {
  switch (topology.kind) {
    case 'independent':
      return {};
    case 'parent':
      return { parent: topology.base };
    case 'enveloping':
      return { enveloping: topology.base };
    case 'fragment':
      return { fragmentOf: topology.base };
  }
}

function resolveTopology(options: LayerOptions): LayerTopology {
  const declared: LayerTopology[] = [];
  if (options.parent !== undefined) {
    declared.push({ kind: 'parent', base: options.parent });
  }
  if (options.enveloping !== undefined) {
    declared.push({ kind: 'enveloping', base: options.enveloping });
  }
  if (options.fragmentOf !== undefined) {
    declared.push({ kind: 'fragment', base: options.fragmentOf });
  }

  const [topology, ...rest] = declared;
  if (rest.length > 0) {
    throw new LayerTopologyError(
      options.name,
      `Layer '${options.name}' may declare only one of parent, enveloping, fragmentOf.`
    );
  }
  if (!topology || topology.kind === 'independent') {
    return { kind: 'independent' };
  }
  if (topology.base === options.name) {
    throw new LayerTopologyError(options.name, `Layer '${options.name}' cannot depend on itself.`);
  }
  return topology;
}

function validateAttributeNames(layerName: string, attributes: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const attribute of attributes) {
    if (!IDENTIFIER_PATTERN.test(attribute)) {
      throw new InvalidAttributeNameError(layerName, attribute, 'is not a valid identifier');
    }
    if (LOCATION_KEYS.has(attribute)) {
      throw new InvalidAttributeNameError(layerName, attribute, 'is reserved for span locations');
    }
    if (seen.has(attribute)) {
      throw new InvalidAttributeNameError(layerName, attribute, 'is declared twice');
    }
    seen.add(attribute);
  }
  return [...attributes];
}

function validateDefaults(
  layerName: string,
  attributes: readonly string[],
  defaults: AttributeValues
): Record<string, unknown> {
  const extra = Object.keys(defaults).filter((key) => !attributes.includes(key));
  if (extra.length > 0) {
    throw new AttributeMismatchError(layerName, [], extra);
  }
  return { ...defaults };
}

function isRecordGroup(entry: SpanRecordInput | readonly SpanRecordInput[]): entry is readonly SpanRecordInput[] {
  return Array.isArray(entry);
}

function valuesOfRecord(record: SpanRecordInput): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!LOCATION_KEYS.has(key)) {
      values[key] = value;
    }
  }
  return values;
}
