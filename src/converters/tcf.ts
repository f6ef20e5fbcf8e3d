import { addDiagnostic, createDiagnosticContext, type Diagnostic, type DiagnosticContext } from '../core/diagnostics.js';
import { TextLayersError } from '../core/errors.js';
import { Layer, type Span } from '../core/layer.js';
import { containsSpan, createSpan } from '../core/span.js';
import { Text } from '../core/text.js';
import type { ImportOptions, TextImportResult } from './text-record.js';
import { parseXml, XmlParseError, type XmlElement } from './xml-ast.js';
import { attribute, childrenOf, escapeXml, firstChild, parseOptionalInt, rawTextOf, textOf } from './xml-utils.js';

const DSPIN_NAMESPACE = 'http://www.dspin.de/data';
const METADATA_NAMESPACE = 'http://www.dspin.de/data/metadata';
const TEXTCORPUS_NAMESPACE = 'http://www.dspin.de/data/textcorpus';

/** Layer and attribute a TCF annotation element maps to. */
export interface TcfAnnotationMapping {
  layer: string;
  attribute: string;
}

/** Layer names shared by export and import. */
export interface TcfLayerNames {
  tokensLayer?: string;
  sentencesLayer?: string;
  lemmas?: TcfAnnotationMapping;
  posTags?: TcfAnnotationMapping;
}

export interface TcfExportOptions extends TcfLayerNames {
  lang?: string;
  posTagset?: string;
}

export interface TcfImportOptions extends ImportOptions, TcfLayerNames {}

interface ResolvedLayerNames {
  tokensLayer: string;
  sentencesLayer: string;
  lemmas: TcfAnnotationMapping;
  posTags: TcfAnnotationMapping;
}

function resolveLayerNames(options: TcfLayerNames): ResolvedLayerNames {
  return {
    tokensLayer: options.tokensLayer ?? 'tokens',
    sentencesLayer: options.sentencesLayer ?? 'sentences',
    lemmas: options.lemmas ?? { layer: 'lemmas', attribute: 'lemma' },
    posTags: options.posTags ?? { layer: 'pos_tags', attribute: 'pos' }
  };
}

/**
 * Write a text as a TCF (D-Spin 0.4) document. The tokens layer is required;
 * sentences, lemmas and POS tags are written when those layers are attached.
 * Ambiguous lemma and POS layers produce one element per annotation.
 */
export function exportTcf(text: Text, options: TcfExportOptions = {}): string {
  const names = resolveLayerNames(options);
  const tokens = text.layer(names.tokensLayer);
  const tokenIds = new Map<string, string>();
  tokens.spans.forEach((token, index) => tokenIds.set(locationKey(token), `t${index}`));

  const sections: string[] = [`    <text>${escapeXml(text.text)}</text>`];

  sections.push(
    [
      '    <tokens>',
      ...tokens.spans.map(
        (token, index) =>
          `      <token ID="t${index}" start="${token.start}" end="${token.end}">${escapeXml(text.text.slice(token.start, token.end))}</token>`
      ),
      '    </tokens>'
    ].join('\n')
  );

  if (text.hasLayer(names.sentencesLayer)) {
    const sentences = text.layer(names.sentencesLayer).spans.map((sentence, index) => {
      const ids = tokens.spans
        .filter((token) => containsSpan(sentence, token))
        .map((token) => tokenIds.get(locationKey(token)) ?? '');
      return `      <sentence ID="s${index}" tokenIDs="${ids.join(' ')}"/>`;
    });
    sections.push(['    <sentences>', ...sentences, '    </sentences>'].join('\n'));
  }

  if (text.hasLayer(names.lemmas.layer)) {
    const lemmas = annotationElements(text.layer(names.lemmas.layer), names.lemmas.attribute, tokenIds).map(
      (entry, index) => `      <lemma ID="l${index}" tokenIDs="${entry.tokenId}">${escapeXml(entry.value)}</lemma>`
    );
    sections.push(['    <lemmas>', ...lemmas, '    </lemmas>'].join('\n'));
  }

  if (text.hasLayer(names.posTags.layer)) {
    const tags = annotationElements(text.layer(names.posTags.layer), names.posTags.attribute, tokenIds).map(
      (entry, index) => `      <tag ID="pt${index}" tokenIDs="${entry.tokenId}">${escapeXml(entry.value)}</tag>`
    );
    sections.push(
      [`    <POStags tagset="${escapeXml(options.posTagset ?? '')}">`, ...tags, '    </POStags>'].join('\n')
    );
  }

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<D-Spin xmlns="${DSPIN_NAMESPACE}" version="0.4">`,
    `  <MetaData xmlns="${METADATA_NAMESPACE}"/>`,
    `  <TextCorpus xmlns="${TEXTCORPUS_NAMESPACE}" lang="${escapeXml(options.lang ?? 'et')}">`,
    ...sections,
    '  </TextCorpus>',
    '</D-Spin>',
    ''
  ].join('\n');
}

/** Values of `attribute` at token locations; spans off token boundaries and null values are skipped. */
function annotationElements(
  layer: Layer,
  attributeName: string,
  tokenIds: ReadonlyMap<string, string>
): { tokenId: string; value: string }[] {
  const entries: { tokenId: string; value: string }[] = [];
  for (const span of layer.spans) {
    const tokenId = tokenIds.get(locationKey(span));
    if (tokenId === undefined) {
      continue;
    }
    for (const value of span.values(attributeName)) {
      if (value !== null && value !== undefined) {
        entries.push({ tokenId, value: String(value) });
      }
    }
  }
  return entries;
}

/**
 * Read a TCF document into a text with tokens, sentences, lemma and POS
 * layers. Token offsets missing from the document are inferred by searching
 * the raw text (warning); references to unknown token IDs are errors and the
 * referring element is skipped.
 */
export function importTcf(xml: string, options: TcfImportOptions = {}): TextImportResult {
  const ctx = createDiagnosticContext(options.mode ?? 'lenient', options.sourceName);
  const names = resolveLayerNames(options);

  let root: XmlElement;
  try {
    root = parseXml(xml, options.sourceName);
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }
    addDiagnostic(ctx, error.code, 'error', error.message, {
      source: error.location ? { name: options.sourceName, ...error.location } : undefined
    });
    return { diagnostics: ctx.diagnostics };
  }

  if (root.name !== 'D-Spin') {
    addDiagnostic(ctx, 'TCF_UNSUPPORTED_ROOT', 'error', `Expected a D-Spin root, found '${root.name}'.`, at(root, ctx));
    return { diagnostics: ctx.diagnostics };
  }

  const corpus = firstChild(root, 'TextCorpus');
  const raw = rawTextOf(firstChild(corpus, 'text'));
  if (!corpus || raw === undefined) {
    addDiagnostic(ctx, 'TCF_TEXT_MISSING', 'error', 'TextCorpus has no <text> element.', at(corpus ?? root, ctx));
    return { diagnostics: ctx.diagnostics };
  }

  const text = new Text(raw);
  const lang = attribute(corpus, 'lang');
  if (lang !== undefined) {
    text.meta.lang = lang;
  }

  const tokensElement = firstChild(corpus, 'tokens');
  const tokenSpans = readTokens(text, tokensElement, names.tokensLayer, ctx);
  if (tokenSpans) {
    const sentencesElement = firstChild(corpus, 'sentences');
    if (sentencesElement) {
      readSentences(text, sentencesElement, names.sentencesLayer, names.tokensLayer, tokenSpans, ctx);
    }

    const lemmasElement = firstChild(corpus, 'lemmas');
    if (lemmasElement) {
      readTokenAnnotations(text, childrenOf(lemmasElement, 'lemma'), names.lemmas, names.tokensLayer, tokenSpans, ctx);
    }

    const posElement = firstChild(corpus, 'POStags');
    if (posElement) {
      readTokenAnnotations(text, childrenOf(posElement, 'tag'), names.posTags, names.tokensLayer, tokenSpans, ctx);
    }
  }

  if (ctx.mode === 'strict' && ctx.validationFailure) {
    return { diagnostics: ctx.diagnostics };
  }
  return { text, diagnostics: ctx.diagnostics };
}

/** Build and attach the tokens layer; returns token spans by ID, or nothing when no layer could be attached. */
function readTokens(
  text: Text,
  element: XmlElement | undefined,
  layerName: string,
  ctx: DiagnosticContext
): Map<string, Span> | undefined {
  if (!element) {
    addDiagnostic(ctx, 'TCF_TOKENS_MISSING', 'warning', 'TextCorpus has no <tokens> element.');
    return undefined;
  }

  const layer = new Layer({ name: layerName, textObject: text });
  const pending: { id: string; start: number; end: number }[] = [];
  let cursor = 0;

  for (const token of childrenOf(element, 'token')) {
    const id = attribute(token, 'ID');
    if (id === undefined) {
      addDiagnostic(ctx, 'TCF_TOKEN_ID_MISSING', 'error', 'Token has no ID attribute.', at(token, ctx));
      continue;
    }

    let start = parseOptionalInt(attribute(token, 'start'));
    let end = parseOptionalInt(attribute(token, 'end'));
    if (start === undefined || end === undefined) {
      const surface = textOf(token) ?? '';
      const found = surface.length > 0 ? text.text.indexOf(surface, cursor) : -1;
      if (found === -1) {
        addDiagnostic(
          ctx,
          'TCF_TOKEN_NOT_FOUND',
          'error',
          `Token '${id}' has no offsets and its text does not occur in the document text.`,
          at(token, ctx)
        );
        continue;
      }
      start = found;
      end = found + surface.length;
      addDiagnostic(ctx, 'TCF_OFFSET_INFERRED', 'warning', `Inferred offsets [${start}, ${end}) for token '${id}'.`, at(token, ctx));
    }

    pending.push({ id, start, end });
    cursor = end;
  }

  const spans = new Map<string, Span>();
  for (const entry of pending) {
    if (spans.has(entry.id)) {
      addDiagnostic(ctx, 'TCF_DUPLICATE_TOKEN_ID', 'error', `Token ID '${entry.id}' occurs more than once.`, {
        layer: layerName
      });
      continue;
    }
    try {
      spans.set(entry.id, layer.addSpan(createSpan(entry.start, entry.end)));
    } catch (error) {
      reportLayerError(ctx, error, layerName);
    }
  }

  try {
    text.addLayer(layer);
  } catch (error) {
    reportLayerError(ctx, error, layerName);
    return undefined;
  }
  return spans;
}

function readSentences(
  text: Text,
  element: XmlElement,
  layerName: string,
  tokensLayer: string,
  tokenSpans: ReadonlyMap<string, Span>,
  ctx: DiagnosticContext
): void {
  const layer = new Layer({ name: layerName, enveloping: tokensLayer, textObject: text });
  for (const sentence of childrenOf(element, 'sentence')) {
    const children = resolveTokenIds(sentence, tokenSpans, ctx);
    if (!children || children.length === 0) {
      continue;
    }
    try {
      layer.addEnvelopingSpan(children);
    } catch (error) {
      reportLayerError(ctx, error, layerName, sentence);
    }
  }
  attach(text, layer, ctx);
}

function readTokenAnnotations(
  text: Text,
  elements: readonly XmlElement[],
  mapping: TcfAnnotationMapping,
  tokensLayer: string,
  tokenSpans: ReadonlyMap<string, Span>,
  ctx: DiagnosticContext
): void {
  const layer = new Layer({
    name: mapping.layer,
    attributes: [mapping.attribute],
    ambiguous: true,
    parent: tokensLayer,
    textObject: text
  });

  for (const element of elements) {
    const tokens = resolveTokenIds(element, tokenSpans, ctx);
    if (!tokens) {
      continue;
    }
    const value = textOf(element) ?? '';
    for (const token of tokens) {
      try {
        layer.addSpan(token.base, { [mapping.attribute]: value });
      } catch (error) {
        reportLayerError(ctx, error, mapping.layer, element);
      }
    }
  }
  attach(text, layer, ctx);
}

/** Token spans named by `tokenIDs`, in document order; `undefined` when any ID is unknown. */
function resolveTokenIds(
  element: XmlElement,
  tokenSpans: ReadonlyMap<string, Span>,
  ctx: DiagnosticContext
): Span[] | undefined {
  const ids = (attribute(element, 'tokenIDs') ?? '').split(/\s+/).filter((id) => id.length > 0);
  if (ids.length === 0) {
    addDiagnostic(ctx, 'TCF_TOKEN_IDS_MISSING', 'warning', `<${element.name}> references no tokens.`, at(element, ctx));
    return undefined;
  }

  const spans: Span[] = [];
  for (const id of ids) {
    const span = tokenSpans.get(id);
    if (!span) {
      addDiagnostic(ctx, 'TCF_UNKNOWN_TOKEN_ID', 'error', `Unknown token ID '${id}'.`, at(element, ctx));
      return undefined;
    }
    spans.push(span);
  }
  return spans.sort((left, right) => left.start - right.start || left.end - right.end);
}

function attach(text: Text, layer: Layer, ctx: DiagnosticContext): void {
  try {
    text.addLayer(layer);
  } catch (error) {
    reportLayerError(ctx, error, layer.name);
  }
}

function reportLayerError(ctx: DiagnosticContext, error: unknown, layer: string, element?: XmlElement): void {
  if (!(error instanceof TextLayersError)) {
    throw error;
  }
  addDiagnostic(ctx, error.code, 'error', error.message, { layer, ...(element ? at(element, ctx) : {}) });
}

function at(element: XmlElement, ctx: DiagnosticContext): Pick<Diagnostic, 'path' | 'source'> {
  return {
    path: element.path,
    source: { name: ctx.sourceName, ...element.location }
  };
}

function locationKey(span: Span): string {
  return `${span.start}:${span.end}`;
}
