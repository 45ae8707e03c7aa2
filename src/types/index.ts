/**
 * Shared value types for resolution, extraction and streaming.
 */

// ============================================
// RESOLUTION
// ============================================

/** Strategy that produced a locator, in fallback order */
export type StrategyTag = 'direct' | 'cached' | 'text' | 'semantic';

export const STRATEGY_ORDER: readonly StrategyTag[] = ['direct', 'cached', 'text', 'semantic'];

/**
 * A caller's request for "a piece of content".
 * Frozen once built; one instance per resolution attempt.
 */
export interface LogicalTarget {
  readonly logicalName: string;
  /** Raw locator attempted verbatim by the direct strategy */
  readonly selectorHint?: string;
  /** Free text (usually the original field query) */
  readonly textHint?: string;
  /** Role or archetype description, e.g. "price" */
  readonly semanticHint?: string;
}

/**
 * Engine-executable locator plus how it was found.
 */
export interface LocatorCandidate {
  readonly locator: string;
  readonly strategy: StrategyTag;
  /** In [0, 1] */
  readonly confidence: number;
  /** DOM depth of the first matching node, when known */
  readonly depth?: number;
}

export interface SelectorCacheEntry {
  candidate: LocatorCandidate;
  hits: number;
  /** Epoch milliseconds */
  lastVerifiedAt: number;
}

// ============================================
// PAGE-SIDE DESCRIPTIONS
// ============================================

/**
 * Serializable description of one DOM element, produced by a page provider.
 * `index` is the position among `body *` in document order.
 */
export interface ElementSnapshot {
  index: number;
  parentIndex: number;
  depth: number;
  tag: string;
  id: string;
  classes: string[];
  attributes: Record<string, string>;
  /** Normalized textContent, truncated */
  text: string;
  /** Normalized text of direct text-node children only */
  ownText: string;
  visible: boolean;
  /** CSS path that re-selects this element */
  path: string;
}

export type BlockKind = 'heading' | 'table' | 'list' | 'text';

export interface ContentBlock {
  index: number;
  tag: string;
  kind: BlockKind;
  text: string;
  selector: string;
}

export interface ScoredBlock extends ContentBlock {
  score: number;
}

export interface RawTable {
  headers: string[];
  rows: string[][];
}

export type CellValue = string | number | null;

export interface ExtractedTable {
  index: number;
  headers: string[];
  rows: CellValue[][];
  records: Array<Record<string, CellValue>>;
  rowCount: number;
  columnCount: number;
}

export interface StructureInfo {
  tag: string;
  id: string | null;
  classes: string[];
  attributes: Array<{ name: string; value: string }>;
  textPreview: string;
  htmlPreview: string;
  cssPath: string;
  xpath: string;
  parent: { tag: string; id: string | null; classes: string[] } | null;
  childrenCount: number;
  suggestedSelectors: string[];
}

export interface PagePreview {
  title: string;
  h1: string;
  h2Headings: string[];
  paragraphPreview: string[];
  sections: Array<{ index: number; tag: string; textPreview: string }>;
}

export interface FormField {
  name: string | null;
  type: string;
  id: string | null;
  placeholder: string | null;
  /** Text of the associated label, when one exists */
  label: string | null;
}

export interface FormInfo {
  index: number;
  id: string | null;
  action: string | null;
  method: string;
  /** Locator that matches this form alone */
  selector: string;
  fields: FormField[];
}

// ============================================
// EXTRACTION RESULTS
// ============================================

export type ValueType = 'text' | 'number' | 'boolean' | 'link' | 'button' | 'list' | 'table';

export type FieldValue = string | number | boolean | string[] | ExtractedTable[] | null;

export interface ExtractedField {
  name: string;
  logicalName: string;
  valueType: ValueType;
  value: FieldValue;
  strategy: StrategyTag | 'table';
  confidence: number;
  locator: string;
}

export interface FieldFailure {
  name: string;
  logicalName: string;
  attemptedStrategies: StrategyTag[];
}

export interface ExtractionResult {
  data: Record<string, FieldValue>;
  fields: ExtractedField[];
  failures: FieldFailure[];
}

// ============================================
// STREAMING
// ============================================

export type StreamStopReason = 'budget' | 'chunk_limit' | 'exhausted';

export interface StreamChunk {
  sequence: number;
  content: string;
  isFinal: boolean;
  /** Set on the final chunk only */
  stopReason?: StreamStopReason;
}

// ============================================
// NETWORK
// ============================================

export interface NetworkCall {
  url: string;
  method: string;
  status: number | null;
  resourceType: string;
  startedAt: number;
  durationMs: number | null;
}

export interface NetworkQuery {
  /** Most recent N calls (default: all) */
  limit?: number;
  resourceTypes?: string[];
  urlContains?: string;
}

export interface NavigationOutcome {
  url: string;
  status: number | null;
  ok: boolean;
}
