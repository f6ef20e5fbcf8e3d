import {
  addDiagnostic,
  createDiagnosticContext,
  type Diagnostic,
  type DiagnosticContext,
  type ImportMode
} from '../core/diagnostics.js';
import { TextLayersError } from '../core/errors.js';
import { Text } from '../core/text.js';
import { isPlainObject, layerToRecord, recordToLayer, type LayerRecord } from './layer-record.js';

/** Structural form of a text: raw string, metadata, and layers in attach order. */
export interface TextRecord {
  text: string;
  meta: Record<string, unknown>;
  layers: LayerRecord[];
}

/** Import options shared by the record, JSON and TCF readers. */
export interface ImportOptions {
  mode?: ImportMode;
  sourceName?: string;
  /** Only load the named layers. Layers depending on a skipped layer fail to load. */
  layers?: readonly string[];
}

/** Import envelope: the text is absent when nothing usable could be built. */
export interface TextImportResult {
  text?: Text;
  diagnostics: Diagnostic[];
}

const TEXT_RECORD_KEYS = new Set(['text', 'meta', 'layers']);

export function textToRecord(text: Text): TextRecord {
  return {
    text: text.text,
    meta: { ...text.meta },
    layers: [...text.layers.values()].map(layerToRecord)
  };
}

/**
 * Rebuild a text from an untrusted record. Layer failures are reported as
 * diagnostics carrying the error code; in strict mode any error drops the text,
 * in lenient mode the layers that loaded are kept.
 */
export function recordToText(record: unknown, options: ImportOptions = {}): TextImportResult {
  const ctx = createDiagnosticContext(options.mode ?? 'lenient', options.sourceName);
  const text = buildText(record, options, ctx);

  if (!text || (ctx.mode === 'strict' && ctx.validationFailure)) {
    return { diagnostics: ctx.diagnostics };
  }

  return { text, diagnostics: ctx.diagnostics };
}

/** Shared by the JSON reader so both report through one context. */
export function buildText(record: unknown, options: ImportOptions, ctx: DiagnosticContext): Text | undefined {
  if (!isPlainObject(record)) {
    addDiagnostic(ctx, 'RECORD_NOT_OBJECT', 'error', 'Text record must be an object.', { path: '/' });
    return undefined;
  }

  if (typeof record.text !== 'string') {
    addDiagnostic(ctx, 'TEXT_MISSING', 'error', "Text record has no string 'text' field.", { path: '/text' });
    return undefined;
  }

  for (const key of Object.keys(record)) {
    if (!TEXT_RECORD_KEYS.has(key)) {
      addDiagnostic(ctx, 'UNKNOWN_RECORD_KEY', 'warning', `Ignoring unknown key '${key}'.`, { path: `/${key}` });
    }
  }

  const text = new Text(record.text);
  if (isPlainObject(record.meta)) {
    text.meta = { ...record.meta };
  } else if (record.meta !== undefined) {
    addDiagnostic(ctx, 'META_INVALID', 'warning', "Ignoring 'meta' that is not an object.", { path: '/meta' });
  }

  const layers = record.layers ?? [];
  if (!Array.isArray(layers)) {
    addDiagnostic(ctx, 'LAYERS_INVALID', 'error', "'layers' must be an array.", { path: '/layers' });
    return text;
  }

  layers.forEach((layerRecord: unknown, index: number) => {
    const name = isPlainObject(layerRecord) && typeof layerRecord.name === 'string' ? layerRecord.name : undefined;
    if (options.layers && (name === undefined || !options.layers.includes(name))) {
      return;
    }

    try {
      text.addLayer(recordToLayer(layerRecord, text));
    } catch (error) {
      if (!(error instanceof TextLayersError)) {
        throw error;
      }
      addDiagnostic(ctx, error.code, 'error', error.message, { layer: name, path: `/layers/${index}` });
    }
  });

  return text;
}
