import { ConfigurationError } from '../core/errors.js';
import type { CampaignRecord, FrontMatterSection, Outline, RecordSection } from '../core/record.js';

/** Front-matter entry as configured. */
export interface FrontMatterEntry {
  id: string;
  title: string;
  body: string;
}

export interface OutlineOptions {
  orderingField: string;
  groupField?: string;
  frontMatter?: readonly FrontMatterEntry[];
}

/**
 * Build the document outline: front matter in configured order, then one
 * section per record sorted by ordering key ascending with identifier as the
 * tie-break. With a group field, groups keep the order of their first record
 * and records stay sorted inside each group.
 */
export function buildOutline(records: readonly CampaignRecord[], options: OutlineOptions): Outline {
  if (records.length > 0 && !records.some((record) => record.fields.has(options.orderingField))) {
    throw new ConfigurationError(
      'ORDERING_FIELD_MISSING',
      `Ordering field '${options.orderingField}' does not exist on any record.`
    );
  }

  const matter = new SlugNamespace();
  const groupDirectories = new Map<string, SlugNamespace>();

  const frontMatter: FrontMatterSection[] = (options.frontMatter ?? []).map((entry) => {
    const slug = matter.claim(`front:${entry.id}`, toPathSlug(entry.id), (candidate) => `${candidate}.tex`);
    return { kind: 'front-matter', id: entry.id, title: entry.title, body: entry.body, slug };
  });

  const sorted = sortRecords(records);
  const ordered = options.groupField ? groupInFirstSeenOrder(sorted) : sorted;

  const recordSections = ordered.map((record): RecordSection => {
    const section: RecordSection = {
      kind: 'record',
      id: record.identifier,
      title: record.identifier,
      record,
      slug: ''
    };

    let directory = matter;
    if (options.groupField && record.group !== undefined) {
      const groupSlug = matter.claim(`group:${record.group}`, toPathSlug(record.group));
      directory = groupDirectories.get(groupSlug) ?? new SlugNamespace();
      groupDirectories.set(groupSlug, directory);
      section.group = record.group;
      section.groupSlug = groupSlug;
    }

    section.slug = directory.claim(`record:${record.identifier}`, toPathSlug(record.identifier));
    return section;
  });

  return { sections: [...frontMatter, ...recordSections] };
}

/** Stable ascending sort by ordering key, identifier as tie-break. */
export function sortRecords(records: readonly CampaignRecord[]): CampaignRecord[] {
  return [...records].sort(
    (left, right) =>
      compareOrderingKeys(left.orderingKey, right.orderingKey) || compareCodeUnits(left.identifier, right.identifier)
  );
}

/**
 * Ordering-key comparison: missing keys sort last, numbers before strings,
 * numbers numerically, strings by code unit.
 */
export function compareOrderingKeys(left: number | string | undefined, right: number | string | undefined): number {
  if (left === undefined || right === undefined) {
    return left === right ? 0 : left === undefined ? 1 : -1;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right ? 0 : left < right ? -1 : 1;
  }
  if (typeof left === 'number') {
    return -1;
  }
  if (typeof right === 'number') {
    return 1;
  }
  return compareCodeUnits(left, right);
}

/** Locale-independent string comparison. */
function compareCodeUnits(left: string, right: string): number {
  return left === right ? 0 : left < right ? -1 : 1;
}

/** Keep sorted order inside each group; groups ordered by their first record. */
function groupInFirstSeenOrder(records: readonly CampaignRecord[]): CampaignRecord[] {
  const groups = new Map<string | undefined, CampaignRecord[]>();
  for (const record of records) {
    const bucket = groups.get(record.group);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(record.group, [record]);
    }
  }
  return [...groups.values()].flat();
}

/**
 * File-safe path segment for identifiers and group labels: whitespace and
 * path separators become `_`, anything outside `[A-Za-z0-9._-]` is dropped.
 */
export function toPathSlug(value: string): string {
  const slug = value
    .trim()
    .replace(/[\s/\\]+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/_+/g, '_')
    .replace(/^[._]+/, '');
  return slug === '' ? 'section' : slug;
}

/**
 * Entry names handed out inside one output directory. Names compare
 * case-insensitively; a taken name gets `_2`, `_3`, ... in claim order.
 */
class SlugNamespace {
  private readonly taken = new Set<string>();
  private readonly owners = new Map<string, string>();

  claim(owner: string, base: string, entryName: (slug: string) => string = (slug) => slug): string {
    const existing = this.owners.get(owner);
    if (existing !== undefined) {
      return existing;
    }
    let slug = base;
    for (let suffix = 2; this.taken.has(entryName(slug).toLowerCase()); suffix += 1) {
      slug = `${base}_${suffix}`;
    }
    this.taken.add(entryName(slug).toLowerCase());
    this.owners.set(owner, slug);
    return slug;
  }
}
