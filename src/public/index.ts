export * from './api.js';

export { Annotation, type AttributeValues } from '../core/annotation.js';
export {
  addDiagnostic,
  createDiagnosticContext,
  hasErrors,
  type Diagnostic,
  type DiagnosticContext,
  type DiagnosticSeverity,
  type DiagnosticSource,
  type ImportMode
} from '../core/diagnostics.js';
export * from '../core/errors.js';
export {
  IDENTIFIER_PATTERN,
  Layer,
  Span,
  topologyOptions,
  type LayerOptions,
  type LayerTopology,
  type SpanRecordInput
} from '../core/layer.js';
export {
  LayerView,
  type AttributeList,
  type AttributeTupleList,
  type SelectOptions,
  type SpanSelector
} from '../core/layer-view.js';
export {
  compareSpans,
  containsSpan,
  createEnvelopingSpan,
  createSpan,
  isBaseSpan,
  sameLocation,
  spanLength,
  spansOverlap,
  spanText,
  toBaseSpan,
  type BaseSpan,
  type ElementarySpan,
  type EnvelopingSpan,
  type SpanLocation,
  type SpanText
} from '../core/span.js';
export {
  Text,
  type ForeignAttribute,
  type ForeignAttributeRelation,
  type RemoveLayerOptions
} from '../core/text.js';

export {
  resolveConflicts,
  resolveSpanConflicts,
  type ConflictCandidate,
  type ConflictStrategy,
  type ResolveConflictsOptions
} from '../operations/conflict-resolver.js';

export {
  layerToRecord,
  recordToLayer,
  type BaseSpanRecord,
  type LayerRecord,
  type SpanRecord
} from '../converters/layer-record.js';
export {
  recordToText,
  textToRecord,
  type ImportOptions,
  type TextImportResult,
  type TextRecord
} from '../converters/text-record.js';
export {
  jsonToLayer,
  jsonToText,
  layerToJson,
  textToJson,
  type JsonExportOptions,
  type LayerImportResult
} from '../converters/json.js';
export {
  exportTcf,
  importTcf,
  type TcfAnnotationMapping,
  type TcfExportOptions,
  type TcfImportOptions,
  type TcfLayerNames
} from '../converters/tcf.js';
export { XmlParseError } from '../converters/xml-ast.js';

export { retagText, tagText, type Retagger, type Tagger } from '../taggers/tagger.js';
export { ResourceHandle } from '../taggers/resource.js';
export { DEFAULT_TOKEN_PATTERN, TokensTagger, type TokensTaggerOptions } from '../taggers/tokens-tagger.js';
export { SentenceTagger, type SentenceTaggerOptions } from '../taggers/sentence-tagger.js';
export { RegexTagger, type RegexRule, type RegexTaggerOptions } from '../taggers/regex-tagger.js';
export { AnalyzerTagger, type Analyzer, type AnalyzerTaggerOptions } from '../taggers/analyzer-tagger.js';
export {
  AnnotationRewriter,
  type AnnotationRewrite,
  type AnnotationRewriterOptions
} from '../taggers/annotation-rewriter.js';

export { diffLayers, type LayerDiff } from '../testkit/layer-diff.js';
export {
  loadTaggerCases,
  parseTaggerCase,
  runTaggerCase,
  TaggerCaseError,
  type TaggerCase,
  type TaggerCaseRecord,
  type TaggerCaseResult
} from '../testkit/tagger-fixtures.js';
export {
  runWithConcurrency,
  summarizeCorpusRun,
  tagCorpus,
  type BatchOptions,
  type CorpusRunResult,
  type CorpusSummary,
  type TextRunResult
} from '../testkit/batch.js';
