import { addDiagnostic, createDiagnosticContext, type Diagnostic } from '../core/diagnostics.js';
import { TextLayersError } from '../core/errors.js';
import type { Layer } from '../core/layer.js';
import type { Text } from '../core/text.js';
import { layerToRecord, recordToLayer } from './layer-record.js';
import { buildText, textToRecord, type ImportOptions, type TextImportResult } from './text-record.js';

export interface JsonExportOptions {
  /** Indentation passed to `JSON.stringify`. */
  space?: number;
}

export interface LayerImportResult {
  layer?: Layer;
  diagnostics: Diagnostic[];
}

export function textToJson(text: Text, options: JsonExportOptions = {}): string {
  return JSON.stringify(textToRecord(text), null, options.space);
}

export function layerToJson(layer: Layer, options: JsonExportOptions = {}): string {
  return JSON.stringify(layerToRecord(layer), null, options.space);
}

/** Parse a JSON text record. Malformed input yields `JSON_NOT_WELL_FORMED`. */
export function jsonToText(json: string, options: ImportOptions = {}): TextImportResult {
  const ctx = createDiagnosticContext(options.mode ?? 'lenient', options.sourceName);
  const parsed = parseJson(json);
  if (!parsed.ok) {
    addDiagnostic(ctx, 'JSON_NOT_WELL_FORMED', 'error', parsed.message);
    return { diagnostics: ctx.diagnostics };
  }

  const text = buildText(parsed.value, options, ctx);
  if (!text || (ctx.mode === 'strict' && ctx.validationFailure)) {
    return { diagnostics: ctx.diagnostics };
  }
  return { text, diagnostics: ctx.diagnostics };
}

/** Parse a JSON layer record, optionally binding it to `text` (the layer is not attached). */
export function jsonToLayer(json: string, text?: Text): LayerImportResult {
  const ctx = createDiagnosticContext('strict');
  const parsed = parseJson(json);
  if (!parsed.ok) {
    addDiagnostic(ctx, 'JSON_NOT_WELL_FORMED', 'error', parsed.message);
    return { diagnostics: ctx.diagnostics };
  }

  try {
    return { layer: recordToLayer(parsed.value, text), diagnostics: ctx.diagnostics };
  } catch (error) {
    if (!(error instanceof TextLayersError)) {
      throw error;
    }
    addDiagnostic(ctx, error.code, 'error', error.message);
    return { diagnostics: ctx.diagnostics };
  }
}

type JsonParseOutcome = { ok: true; value: unknown } | { ok: false; message: string };

function parseJson(json: string): JsonParseOutcome {
  try {
    const value: unknown = JSON.parse(json);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : 'Invalid JSON.' };
  }
}
