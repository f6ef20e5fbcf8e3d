import type { ImportMode } from '../core/diagnostics.js';
import type { Text } from '../core/text.js';
import { jsonToText, textToJson } from '../converters/json.js';
import { exportTcf, importTcf, type TcfExportOptions, type TcfLayerNames } from '../converters/tcf.js';
import type { TextImportResult } from '../converters/text-record.js';

/** Serialized text formats understood by `loadText` and `saveText`. */
export type TextFormat = 'json' | 'tcf';

/** Options shared by the format-dispatching entry points. */
export interface LoadTextOptions extends TcfLayerNames {
  format?: TextFormat | 'auto';
  mode?: ImportMode;
  sourceName?: string;
  /** JSON only: restrict loading to these layers. */
  layers?: readonly string[];
}

export interface SaveTextOptions extends TcfExportOptions {
  format?: TextFormat;
  /** JSON indentation. */
  space?: number;
}

/** Load a text from JSON or TCF; `auto` picks TCF for input starting with `<`. */
export function loadText(input: string, options: LoadTextOptions = {}): TextImportResult {
  const format = options.format ?? 'auto';
  const resolved = format === 'auto' ? detectFormat(input) : format;

  if (resolved === 'tcf') {
    return importTcf(input, options);
  }
  return jsonToText(input, options);
}

/** Serialize a text; JSON unless `format` says otherwise. */
export function saveText(text: Text, options: SaveTextOptions = {}): string {
  if (options.format === 'tcf') {
    return exportTcf(text, options);
  }
  return textToJson(text, { space: options.space });
}

function detectFormat(input: string): TextFormat {
  return input.trimStart().startsWith('<') ? 'tcf' : 'json';
}
