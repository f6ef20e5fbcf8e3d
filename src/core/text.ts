import {
  DependentLayerError,
  LayerNameCollisionError,
  LayerOwnershipError,
  LayerTopologyError,
  UnknownLayerError
} from './errors.js';
import { findDependencyViolation, findStructuralViolation, type LayerLookup } from './layer-checks.js';
import type { Layer } from './layer.js';

/** How a foreign attribute is reached from a layer. */
export type ForeignAttributeRelation = 'parent' | 'enveloped' | 'dependant';

/** Entry of the table of attributes a layer can read from related layers. */
export interface ForeignAttribute {
  attribute: string;
  layer: string;
  relation: ForeignAttributeRelation;
}

export interface RemoveLayerOptions {
  /** Remove dependants (deepest first) instead of refusing. */
  cascade?: boolean;
}

/**
 * Raw string plus its named layers. Layers iterate in attach order, which is
 * always a valid dependency order.
 */
export class Text {
  readonly text: string;
  meta: Record<string, unknown> = {};
  private readonly layerMap = new Map<string, Layer>();
  private foreignTables = new Map<string, Map<string, ForeignAttribute>>();

  constructor(text: string) {
    this.text = text;
  }

  get layers(): ReadonlyMap<string, Layer> {
    return this.layerMap;
  }

  layerNames(): string[] {
    return [...this.layerMap.keys()];
  }

  hasLayer(name: string): boolean {
    return this.layerMap.has(name);
  }

  layer(name: string): Layer {
    const layer = this.layerMap.get(name);
    if (!layer) {
      throw new UnknownLayerError(name);
    }
    return layer;
  }

  /**
   * Validate and attach a layer. Every check runs before the layer map is
   * touched, so a failing attach leaves the text unchanged.
   */
  addLayer(layer: Layer): void {
    if (isReservedName(layer.name)) {
      throw new LayerNameCollisionError(layer.name, 'the name is reserved by Text');
    }
    if (this.layerMap.has(layer.name)) {
      throw new LayerNameCollisionError(layer.name, 'a layer with this name is already attached');
    }
    if (layer.textObject && layer.textObject !== this) {
      throw new LayerOwnershipError(layer.name);
    }

    this.validate(layer, (name) => this.layerMap.get(name));

    layer.bind(this);
    this.layerMap.set(layer.name, layer);
    this.rebuildForeignTables();
  }

  /**
   * Swap an attached layer for a new version with the same schema, checking the
   * replacement and every layer that depends on it before the swap.
   */
  replaceLayer(layer: Layer): void {
    const current = this.layer(layer.name);
    if (!current.hasSameSchema(layer)) {
      throw new LayerTopologyError(layer.name, `Replacement for layer '${layer.name}' has a different schema.`);
    }
    if (layer.textObject && layer.textObject !== this) {
      throw new LayerOwnershipError(layer.name);
    }

    const lookup: LayerLookup = (name) => (name === layer.name ? layer : this.layerMap.get(name));
    this.validate(layer, lookup);
    for (const dependantName of this.directDependantsOf(layer.name)) {
      const violation = findDependencyViolation(this.layer(dependantName), lookup);
      if (violation) {
        throw violation;
      }
    }

    if (current !== layer) {
      current.unbind();
    }
    layer.bind(this);
    this.layerMap.set(layer.name, layer);
    this.rebuildForeignTables();
  }

  /** Remove a layer; dependants must go first unless `cascade` is set. Returns removed names. */
  removeLayer(name: string, options: RemoveLayerOptions = {}): string[] {
    this.layer(name);
    const dependants = this.dependantsOf(name);
    if (dependants.length > 0 && !options.cascade) {
      throw new DependentLayerError(name, dependants);
    }

    const removed = [...dependants].reverse();
    removed.push(name);
    for (const removedName of removed) {
      this.layerMap.get(removedName)?.unbind();
      this.layerMap.delete(removedName);
    }
    this.rebuildForeignTables();
    return removed;
  }

  /** Transitive dependants of `name`, in attach order. */
  dependantsOf(name: string): string[] {
    const found = new Set<string>();
    const queue = [name];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) {
        break;
      }
      for (const dependant of this.directDependantsOf(next)) {
        if (!found.has(dependant)) {
          found.add(dependant);
          queue.push(dependant);
        }
      }
    }

    return this.layerNames().filter((layerName) => found.has(layerName));
  }

  /** Foreign attributes readable from `layerName`, keyed by attribute name. */
  resolvableAttributes(layerName: string): ReadonlyMap<string, ForeignAttribute> {
    this.layer(layerName);
    return this.foreignTables.get(layerName) ?? new Map();
  }

  private directDependantsOf(name: string): string[] {
    return [...this.layerMap.values()].filter((layer) => layer.baseLayer === name).map((layer) => layer.name);
  }

  private validate(layer: Layer, lookup: LayerLookup): void {
    const structural = findStructuralViolation(layer);
    if (structural) {
      throw structural;
    }

    const dependency = findDependencyViolation(layer, lookup);
    if (dependency) {
      throw dependency;
    }
  }

  /**
   * Rebuild the foreign attribute tables. Own attributes shadow everything;
   * then the parent chain (nearest first), the enveloped layer, and finally
   * parent-attached dependants in attach order.
   */
  private rebuildForeignTables(): void {
    const tables = new Map<string, Map<string, ForeignAttribute>>();

    for (const layer of this.layerMap.values()) {
      const table = new Map<string, ForeignAttribute>();
      const own = new Set(layer.attributes);
      const offer = (source: Layer, relation: ForeignAttributeRelation): void => {
        for (const attribute of source.attributes) {
          if (!own.has(attribute) && !table.has(attribute)) {
            table.set(attribute, { attribute, layer: source.name, relation });
          }
        }
      };

      const visited = new Set([layer.name]);
      let ancestor = layer.parent !== undefined ? this.layerMap.get(layer.parent) : undefined;
      while (ancestor && !visited.has(ancestor.name)) {
        visited.add(ancestor.name);
        offer(ancestor, 'parent');
        ancestor = ancestor.parent !== undefined ? this.layerMap.get(ancestor.parent) : undefined;
      }

      if (layer.enveloping !== undefined) {
        const enveloped = this.layerMap.get(layer.enveloping);
        if (enveloped) {
          offer(enveloped, 'enveloped');
        }
      }

      for (const candidate of this.layerMap.values()) {
        if (candidate.parent === layer.name) {
          offer(candidate, 'dependant');
        }
      }

      tables.set(layer.name, table);
    }

    this.foreignTables = tables;
  }
}

/** Instance fields of `Text`; methods and accessors are read off the prototypes. */
const INSTANCE_FIELDS = ['text', 'meta', 'layerMap', 'foreignTables'];

let reservedNames: Set<string> | undefined;

/** Member names of `Text`, its own or inherited, that layer names may not shadow. */
function isReservedName(name: string): boolean {
  reservedNames ??= new Set([
    ...INSTANCE_FIELDS,
    ...Object.getOwnPropertyNames(Text.prototype),
    ...Object.getOwnPropertyNames(Object.prototype)
  ]);
  return reservedNames.has(name);
}
