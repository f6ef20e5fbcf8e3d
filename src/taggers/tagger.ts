import { isDeepStrictEqual } from 'node:util';

import { MissingDependencyError, TaggerContractError } from '../core/errors.js';
import type { Layer } from '../core/layer.js';
import type { Text } from '../core/text.js';

/** Builds a new layer from a text and its attached layers. */
export interface Tagger {
  readonly outputLayer: string;
  readonly outputAttributes: readonly string[];
  readonly inputLayers: readonly string[];
  makeLayer(text: Text, layers: ReadonlyMap<string, Layer>): Layer;
}

/** Edits an existing layer in place; only ever handed a detached copy by `retagText`. */
export interface Retagger {
  readonly outputLayer: string;
  readonly inputLayers: readonly string[];
  changeLayer(layer: Layer, layers: ReadonlyMap<string, Layer>): void;
}

/**
 * Run a tagger and attach its layer. The produced layer must carry the
 * declared name and attributes and pass the consistency check before the
 * text is touched.
 */
export function tagText(text: Text, tagger: Tagger): Layer {
  assertInputs(text, tagger.outputLayer, tagger.inputLayers);

  const layer = tagger.makeLayer(text, text.layers);
  if (layer.name !== tagger.outputLayer) {
    throw new TaggerContractError(
      `Tagger declared output layer '${tagger.outputLayer}' but produced '${layer.name}'.`
    );
  }
  if (!isDeepStrictEqual([...layer.attributes], [...tagger.outputAttributes])) {
    throw new TaggerContractError(
      `Layer '${layer.name}' has attributes [${layer.attributes.join(', ')}], declared [${tagger.outputAttributes.join(', ')}].`
    );
  }

  layer.checkSpanConsistency();
  text.addLayer(layer);
  return layer;
}

/**
 * Apply a retagger to a copy of the attached layer, check the copy and swap
 * it in. Readers of the text only ever see the old or the new layer.
 */
export function retagText(text: Text, retagger: Retagger): Layer {
  assertInputs(text, retagger.outputLayer, retagger.inputLayers);

  const draft = text.layer(retagger.outputLayer).copy();
  retagger.changeLayer(draft, text.layers);
  draft.checkSpanConsistency();
  text.replaceLayer(draft);
  return draft;
}

function assertInputs(text: Text, outputLayer: string, inputLayers: readonly string[]): void {
  for (const input of inputLayers) {
    if (!text.hasLayer(input)) {
      throw new MissingDependencyError(outputLayer, input);
    }
  }
}
