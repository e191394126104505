import { REPORT_SECTIONS, type ReportSection } from '../config';
import type { EntityKind } from '../bundle/entities';
import type { FetchFailure } from '../bundle/entity-bundle';
import { compareIdentities, identityEquals } from '../table/field-identity';
import { SCENE_FIELDS } from '../table/builtin-fields';
import type { CensusResult, OutOfRangeReference, ReferenceTarget } from '../census/reference-census';
import type { ObjectRecord, ObjectUsage, RecordOf, ReportRecord } from './records';

/** Object records are drafted bare; usage and references come from the census. */
export interface ObjectDraft {
  section: 'objects';
  id: number;
  name?: string;
}

export type RecordDraft = Exclude<ReportRecord, ObjectRecord> | ObjectDraft;

export interface InfoReport {
  /** False when at least one entity failed to import. */
  ok: boolean;
  sections: ReadonlySet<ReportSection>;
  /** Entity counts of the kinds the selected sections cover. */
  counts: Partial<Record<EntityKind, number>>;
  /** Records in section order, then in the order they were added. */
  records: readonly ReportRecord[];
  failures: readonly FetchFailure[];
  outOfRange: readonly OutOfRangeReference[];
  census?: CensusResult;
  importMilliseconds: number;
}

function referenceTarget(draft: Exclude<RecordDraft, ObjectDraft>): ReferenceTarget | undefined {
  switch (draft.section) {
    case 'meshes': return 'mesh';
    case 'materials': return 'material';
    case 'lights': return 'light';
    case 'skins': return draft.kind;
    case 'textures': return 'texture';
    case 'images': return draft.kind;
    case 'scenes':
    case 'animations':
      return undefined;
  }
}

/** Per-field usage of one object, builtin fields first in their canonical order. */
export function objectUsage(census: CensusResult, id: number): ObjectUsage[] {
  const usage: ObjectUsage[] = [];
  for (const source of census.sources('object', id)) {
    const identity = source.identity;
    if (!identity) continue;
    const existing = usage.find((u) => identityEquals(u.identity, identity));
    if (existing) existing.count++;
    else usage.push({ identity, label: source.field, count: 1 });
  }
  return usage.sort((a, b) => compareIdentities(a.identity, b.identity, SCENE_FIELDS));
}

/**
 * Collects record drafts per section while the bundle is walked, then
 * annotates them from the finished census in build().
 */
export class ReportBuilder {
  private readonly drafts = new Map<ReportSection, RecordDraft[]>();
  private readonly counts: Partial<Record<EntityKind, number>> = {};

  constructor(private readonly sections: ReadonlySet<ReportSection>) {}

  setCount(kind: EntityKind, count: number): void {
    this.counts[kind] = count;
  }

  add(draft: RecordDraft): void {
    if (!this.sections.has(draft.section)) {
      throw new Error(`Section ${draft.section} was not selected`);
    }
    const list = this.drafts.get(draft.section);
    if (list) list.push(draft);
    else this.drafts.set(draft.section, [draft]);
  }

  build(options: {
    census?: CensusResult;
    failures?: readonly FetchFailure[];
    importMilliseconds?: number;
  } = {}): InfoReport {
    const { census } = options;
    const failures = options.failures ?? [];
    const records: ReportRecord[] = [];
    for (const section of REPORT_SECTIONS) {
      for (const draft of this.drafts.get(section) ?? []) records.push(this.annotate(draft, census));
    }
    return {
      ok: failures.length === 0,
      sections: this.sections,
      counts: { ...this.counts },
      records,
      failures,
      outOfRange: census?.outOfRange() ?? [],
      census,
      importMilliseconds: options.importMilliseconds ?? 0,
    };
  }

  private annotate(draft: RecordDraft, census: CensusResult | undefined): ReportRecord {
    if (draft.section === 'objects') {
      if (!census?.covers('object')) {
        throw new Error('Object records need a census that walked the scenes');
      }
      const references = census.count('object', draft.id);
      return { ...draft, fields: objectUsage(census, draft.id), references, unreferenced: references === 0 };
    }
    const target = referenceTarget(draft);
    if (!target || !census?.covers(target)) return draft;
    return { ...draft, references: census.count(target, draft.id) };
  }
}

/** Records of one section, typed. */
export function recordsOf<S extends ReportSection>(report: InfoReport, section: S): RecordOf<S>[] {
  return report.records.filter((r): r is RecordOf<S> => r.section === section);
}
