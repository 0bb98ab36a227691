/** Primitive cell value produced by a tabular-source reader; `null` is the empty marker. */
export type RawCell = string | number | boolean | Date | null;

/** One source row keyed by column header. */
export type RawRow = Record<string, RawCell>;

/** A raw row with the row number the source shows for it (header row is 1). */
export interface SourceRow {
  row: number;
  cells: RawRow;
}

/** Canonical field value; `null` marks a missing value. */
export type FieldValue = number | string | Date | null;

/** Declared coercion applied to one column. */
export type FieldType = 'number' | 'date' | 'text';

/** Canonical record for one test location. */
export interface CampaignRecord {
  identifier: string;
  /** Column name to value, in source column order. */
  fields: Map<string, FieldValue>;
  orderingKey?: number | string;
  group?: string;
  /** Row number as the source sheet shows it; the header is row 1. */
  sourceRow: number;
}

/** Front-matter outline entry that carries no record. */
export interface FrontMatterSection {
  kind: 'front-matter';
  id: string;
  title: string;
  body: string;
  slug: string;
}

/** Outline entry bound to exactly one record. */
export interface RecordSection {
  kind: 'record';
  id: string;
  title: string;
  record: CampaignRecord;
  slug: string;
  group?: string;
  groupSlug?: string;
}

export type Section = FrontMatterSection | RecordSection;

/** Ordered document outline. */
export interface Outline {
  sections: Section[];
}

/** Why a slot has no usable figure; `unusable` names a file LaTeX cannot load by path. */
export type UnresolvedReason = 'missing' | 'ambiguous' | 'unusable';

/** Per-category figure slot state after resolution. */
export type FigureSlot =
  | { status: 'resolved'; path: string; fileName: string }
  | { status: 'placeholder'; path: string; reason: UnresolvedReason }
  | { status: 'omitted'; reason: UnresolvedReason }
  | { status: 'disabled' };

/** Resolved figure for one record and category. */
export interface FigureReference {
  category: string;
  caption: string;
  slot: FigureSlot;
}

/** Kinds of file the composer and compiler produce. */
export type ArtifactKind = 'front-matter' | 'section' | 'summary' | 'master' | 'summary-pdf' | 'master-pdf';

/** One produced output file. */
export interface DocumentArtifact {
  kind: ArtifactKind;
  sectionId?: string;
  /** Absolute path on disk. */
  path: string;
}

/** Narrow a section to the record variant. */
export function isRecordSection(section: Section): section is RecordSection {
  return section.kind === 'record';
}
