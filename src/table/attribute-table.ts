import { formatKind, type ScalarKind } from '../view/element-kind';
import { TypeMismatchError, type Ownership, type TypedView } from '../view/typed-view';
import { customLabel, identityEquals, type FieldIdentity } from './field-identity';

/** Resolves a custom field id to its display name. Empty or absent means unnamed. */
export type FieldNameResolver = (id: number) => string | undefined;

interface EntryBase<B extends string> {
  readonly identity: FieldIdentity<B>;
  /** Row of each data element. `null`: element i belongs to row i. */
  readonly mapping: TypedView | null;
  readonly data: TypedView;
  /** Mapping values are non-decreasing, so consumers may binary-search them. */
  readonly orderedMapping?: boolean;
}

/**
 * One (identity, mapping, data) triple. Tables whose entries carry extra
 * per-entry details (animation tracks) set `X`, which makes `info` required.
 */
export type AttributeEntry<B extends string = string, X = undefined> = EntryBase<B> &
  (X extends undefined ? { readonly info?: undefined } : { readonly info: X });

export interface AttributeTableInit<B extends string, X> {
  readonly entries: readonly AttributeEntry<B, X>[];
  /** Size of the shared index domain. Entries without a mapping must have exactly this many elements. */
  readonly rowCount?: number;
  /** Required scalar kind of every mapping view. */
  readonly mappingKind?: ScalarKind;
  readonly ownership?: Ownership;
  readonly resolveName?: FieldNameResolver;
}

/**
 * Ordered bag of fields sharing one index domain. The same identity may
 * appear more than once; insertion order is preserved and significant.
 * Tables are read-only once constructed.
 */
export class AttributeTable<B extends string = string, X = undefined> {
  readonly rowCount: number;
  readonly mappingKind: ScalarKind | undefined;
  readonly ownership: Ownership;
  private readonly fields: readonly AttributeEntry<B, X>[];
  private readonly resolver: FieldNameResolver | undefined;

  constructor(init: AttributeTableInit<B, X>) {
    const rowCount = init.rowCount ?? 0;
    if (!Number.isInteger(rowCount) || rowCount < 0) {
      throw new RangeError(`Table row count must be a non-negative integer, got ${rowCount}`);
    }
    this.rowCount = rowCount;
    this.mappingKind = init.mappingKind;
    this.ownership = init.ownership ?? 'owned';
    this.resolver = init.resolveName;
    this.fields = [...init.entries];
    this.fields.forEach((entry) => this.validate(entry));
  }

  get entries(): readonly AttributeEntry<B, X>[] {
    return this.fields;
  }

  get size(): number {
    return this.fields.length;
  }

  /** Builtin name, or the resolver's name for a custom id. */
  resolveName(identity: FieldIdentity<B>): string | undefined {
    if (identity.type === 'builtin') return identity.name;
    const name = this.resolver?.(identity.id);
    return name ? name : undefined;
  }

  /** Resolved name, or the `Custom(n)` placeholder. */
  label(identity: FieldIdentity<B>): string {
    if (identity.type === 'custom') return this.resolveName(identity) ?? customLabel(identity.id);
    return identity.name;
  }

  find(identity: FieldIdentity<B>): AttributeEntry<B, X>[] {
    return this.fields.filter((entry) => identityEquals(entry.identity, identity));
  }

  /** How many earlier entries share the identity of entry `index`. */
  occurrence(index: number): number {
    const identity = this.entryAt(index).identity;
    let n = 0;
    for (let i = 0; i < index; i++) {
      if (identityEquals(this.fields[i].identity, identity)) n++;
    }
    return n;
  }

  isDuplicated(index: number): boolean {
    return this.find(this.entryAt(index).identity).length > 1;
  }

  /** Row index of every element of entry `index`. */
  rows(index: number): number[] {
    const entry = this.entryAt(index);
    if (entry.mapping) return entry.mapping.indices();
    return Array.from({ length: entry.data.count }, (_, i) => i);
  }

  private entryAt(index: number): AttributeEntry<B, X> {
    const entry = this.fields[index];
    if (!entry) throw new RangeError(`Field index ${index} out of range for ${this.fields.length} fields`);
    return entry;
  }

  private validate(entry: AttributeEntry<B, X>): void {
    const label = this.label(entry.identity);
    if (entry.data.isBroadcast) {
      throw new Error(`Field ${label}: value data cannot have a zero stride`);
    }
    const { mapping, data } = entry;
    if (!mapping) {
      if (data.count !== this.rowCount) {
        throw new Error(`Field ${label}: ${data.count} elements but the table has ${this.rowCount} rows`);
      }
      return;
    }
    if (mapping.kind.type !== 'scalar') {
      throw new TypeMismatchError(`a scalar mapping for field ${label}`, mapping.kind);
    }
    if (this.mappingKind && mapping.kind.scalar !== this.mappingKind) {
      throw new TypeMismatchError(`${this.mappingKind} mapping for field ${label}`, mapping.kind);
    }
    if (mapping.count !== data.count) {
      throw new Error(
        `Field ${label}: mapping has ${mapping.count} elements but ${formatKind(data.kind)} data has ${data.count}`,
      );
    }
  }
}
