/** `[start, end)` pair attached to errors that point at one span location. */
export interface ErrorLocation {
  start: number;
  end: number;
}

/** Root of every error thrown by the layer model, resolver, and taggers. */
export class TextLayersError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'TextLayersError';
    this.code = code;
  }
}

/** Span boundaries that do not describe a non-empty, non-negative interval. */
export class InvalidRangeError extends TextLayersError {
  constructor(start: number, end: number) {
    super('INVALID_RANGE', `Invalid span range [${start}, ${end}): expected integers with 0 <= start < end.`);
    this.name = 'InvalidRangeError';
  }
}

/** Enveloping children that are empty, unordered, or overlapping. */
export class NonContiguousChildrenError extends TextLayersError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('NON_CONTIGUOUS_CHILDREN', message);
    this.name = 'NonContiguousChildrenError';
    this.index = index;
  }
}

/** Attribute lookup for a name the layer does not declare. */
export class UnknownAttributeError extends TextLayersError {
  readonly layerName: string;
  readonly attribute: string;

  constructor(layerName: string, attribute: string) {
    super('UNKNOWN_ATTRIBUTE', `Layer '${layerName}' does not declare attribute '${attribute}'.`);
    this.name = 'UnknownAttributeError';
    this.layerName = layerName;
    this.attribute = attribute;
  }
}

/** Annotation values whose keys do not match the declared attribute set. */
export class AttributeMismatchError extends TextLayersError {
  readonly layerName: string;
  readonly missing: string[];
  readonly extra: string[];

  constructor(layerName: string, missing: string[], extra: string[]) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing ${missing.join(', ')}`);
    }
    if (extra.length > 0) {
      parts.push(`undeclared ${extra.join(', ')}`);
    }
    super('ATTRIBUTE_MISMATCH', `Annotation for layer '${layerName}' has ${parts.join('; ')}.`);
    this.name = 'AttributeMismatchError';
    this.layerName = layerName;
    this.missing = missing;
    this.extra = extra;
  }
}

/** Second span at an occupied location of an unambiguous layer. */
export class DuplicateSpanError extends TextLayersError {
  readonly layerName: string;
  readonly location: ErrorLocation;

  constructor(layerName: string, location: ErrorLocation) {
    super(
      'DUPLICATE_SPAN',
      `Layer '${layerName}' already has a span at [${location.start}, ${location.end}) and is not ambiguous.`
    );
    this.name = 'DuplicateSpanError';
    this.layerName = layerName;
    this.location = location;
  }
}

/** Layer name that is not an identifier. */
export class InvalidLayerNameError extends TextLayersError {
  constructor(name: string) {
    super('INVALID_LAYER_NAME', `Layer name '${name}' is not a valid identifier.`);
    this.name = 'InvalidLayerNameError';
  }
}

/** Attribute name that is not an identifier, repeats, or shadows a location key. */
export class InvalidAttributeNameError extends TextLayersError {
  constructor(layerName: string, attribute: string, reason: string) {
    super('INVALID_ATTRIBUTE_NAME', `Attribute '${attribute}' of layer '${layerName}' ${reason}.`);
    this.name = 'InvalidAttributeNameError';
  }
}

/** Operation that does not apply to the layer's topology. */
export class LayerTopologyError extends TextLayersError {
  readonly layerName: string;

  constructor(layerName: string, message: string) {
    super('LAYER_TOPOLOGY', message);
    this.name = 'LayerTopologyError';
    this.layerName = layerName;
  }
}

/** Layer name already taken on a text, or reserved by the text itself. */
export class LayerNameCollisionError extends TextLayersError {
  constructor(name: string, reason: string) {
    super('LAYER_NAME_COLLISION', `Cannot attach layer '${name}': ${reason}.`);
    this.name = 'LayerNameCollisionError';
  }
}

/** Layer bound to a different text than the one it is attached to. */
export class LayerOwnershipError extends TextLayersError {
  constructor(name: string) {
    super('LAYER_OWNERSHIP', `Layer '${name}' is bound to a different Text.`);
    this.name = 'LayerOwnershipError';
  }
}

/** Lookup of a layer name that the text does not hold. */
export class UnknownLayerError extends TextLayersError {
  constructor(name: string) {
    super('UNKNOWN_LAYER', `Text has no layer named '${name}'.`);
    this.name = 'UnknownLayerError';
  }
}

/** Base class for errors about a layer's relation to the layer it depends on. */
export class DependencyError extends TextLayersError {
  readonly layerName: string;

  constructor(code: string, layerName: string, message: string) {
    super(code, message);
    this.name = 'DependencyError';
    this.layerName = layerName;
  }
}

/** Dependency layer that is not attached to the text. */
export class MissingDependencyError extends DependencyError {
  readonly dependency: string;

  constructor(layerName: string, dependency: string) {
    super('MISSING_DEPENDENCY', layerName, `Layer '${layerName}' depends on '${dependency}', which is not attached.`);
    this.name = 'MissingDependencyError';
    this.dependency = dependency;
  }
}

/** Parent-attached span without a parent span at the same location. */
export class NoMatchingParentSpanError extends DependencyError {
  readonly location: ErrorLocation;

  constructor(layerName: string, parent: string, location: ErrorLocation) {
    super(
      'NO_MATCHING_PARENT_SPAN',
      layerName,
      `Span [${location.start}, ${location.end}) of layer '${layerName}' has no matching span in parent '${parent}'.`
    );
    this.name = 'NoMatchingParentSpanError';
    this.location = location;
  }
}

/** Enveloping child that is not a span of the enveloped layer. */
export class NoMatchingEnvelopedSpanError extends DependencyError {
  readonly location: ErrorLocation;

  constructor(layerName: string, enveloped: string, location: ErrorLocation) {
    super(
      'NO_MATCHING_ENVELOPED_SPAN',
      layerName,
      `Child [${location.start}, ${location.end}) of layer '${layerName}' is not a span of '${enveloped}'.`
    );
    this.name = 'NoMatchingEnvelopedSpanError';
    this.location = location;
  }
}

/** Fragment span not contained in any span of its base layer. */
export class FragmentOutsideBaseError extends DependencyError {
  readonly location: ErrorLocation;

  constructor(layerName: string, base: string, location: ErrorLocation) {
    super(
      'FRAGMENT_OUTSIDE_BASE',
      layerName,
      `Fragment [${location.start}, ${location.end}) of layer '${layerName}' lies outside every span of '${base}'.`
    );
    this.name = 'FragmentOutsideBaseError';
    this.location = location;
  }
}

/** Removal of a layer that other attached layers still depend on. */
export class DependentLayerError extends DependencyError {
  readonly dependants: string[];

  constructor(layerName: string, dependants: string[]) {
    super(
      'DEPENDENT_LAYERS',
      layerName,
      `Layer '${layerName}' is still required by ${dependants.map((name) => `'${name}'`).join(', ')}.`
    );
    this.name = 'DependentLayerError';
    this.dependants = dependants;
  }
}

/** First invariant violation found by a layer self-audit or a record import. */
export class ConsistencyError extends TextLayersError {
  readonly layerName: string;
  readonly location?: ErrorLocation;

  constructor(code: string, layerName: string, message: string, location?: ErrorLocation) {
    const where = location ? ` at [${location.start}, ${location.end})` : '';
    super(code, `Layer '${layerName}'${where}: ${message}`);
    this.name = 'ConsistencyError';
    this.layerName = layerName;
    this.location = location;
  }
}

/** Candidate without a usable priority value, or a layer that does not declare the priority attribute. */
export class MissingPriorityAttributeError extends TextLayersError {
  readonly attribute: string;
  readonly location?: ErrorLocation;

  constructor(attribute: string, location?: ErrorLocation, reason = 'is missing') {
    super(
      'MISSING_PRIORITY_ATTRIBUTE',
      location
        ? `Priority attribute '${attribute}' ${reason} on candidate [${location.start}, ${location.end}).`
        : `Priority attribute '${attribute}' ${reason}.`
    );
    this.name = 'MissingPriorityAttributeError';
    this.attribute = attribute;
    this.location = location;
  }
}

/** Text access on a span or layer that has no text object yet. */
export class UnboundError extends TextLayersError {
  constructor(layerName: string) {
    super('UNBOUND', `Layer '${layerName}' is not bound to a Text.`);
    this.name = 'UnboundError';
  }
}

/** Single-value access on a span that may carry several annotations. */
export class AmbiguousAccessError extends TextLayersError {
  constructor(layerName: string) {
    super(
      'AMBIGUOUS_ACCESS',
      `Layer '${layerName}' is ambiguous; read annotations or values() instead of a single value.`
    );
    this.name = 'AmbiguousAccessError';
  }
}

/** Selector that cannot be applied to the layer. */
export class SelectionError extends TextLayersError {
  constructor(message: string, code = 'INVALID_SELECTION') {
    super(code, message);
    this.name = 'SelectionError';
  }
}

/** Selection that produced (or requested) no spans where that is disallowed. */
export class EmptySelectionError extends SelectionError {
  constructor(message: string) {
    super(message, 'EMPTY_SELECTION');
    this.name = 'EmptySelectionError';
  }
}

/** Tagger output that breaks the tagger's own declaration. */
export class TaggerContractError extends TextLayersError {
  constructor(message: string) {
    super('TAGGER_CONTRACT', message);
    this.name = 'TaggerContractError';
  }
}

/** Use of a resource handle after it was closed. */
export class ResourceClosedError extends TextLayersError {
  constructor(name: string) {
    super('RESOURCE_CLOSED', `Resource '${name}' has been closed.`);
    this.name = 'ResourceClosedError';
  }
}
