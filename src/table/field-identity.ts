/**
 * Field identity: either one of a closed set of builtin names or an open
 * numeric custom id. Two identities are equal iff they are the same variant
 * with the same payload.
 */
export type FieldIdentity<B extends string = string> =
  | { readonly type: 'builtin'; readonly name: B }
  | { readonly type: 'custom'; readonly id: number };

const MAX_CUSTOM_ID = 0xffff_ffff;

export function builtinField<B extends string>(name: B): FieldIdentity<B> {
  return { type: 'builtin', name };
}

export function customField(id: number): FieldIdentity<never> {
  if (!isCustomId(id)) {
    throw new RangeError(`Custom field id must be an unsigned 32-bit integer, got ${id}`);
  }
  return { type: 'custom', id };
}

export function isCustomId(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= MAX_CUSTOM_ID;
}

export function identityEquals(a: FieldIdentity, b: FieldIdentity): boolean {
  if (a.type === 'builtin') return b.type === 'builtin' && a.name === b.name;
  return b.type === 'custom' && a.id === b.id;
}

/**
 * Total order: builtins before customs, builtins by their position in
 * `builtinOrder` (then by name), customs by id.
 */
export function compareIdentities<B extends string>(
  a: FieldIdentity<B>,
  b: FieldIdentity<B>,
  builtinOrder: readonly B[] = [],
): number {
  if (a.type === 'builtin') {
    if (b.type === 'custom') return -1;
    const ia = builtinOrder.indexOf(a.name);
    const ib = builtinOrder.indexOf(b.name);
    if (ia !== ib) return (ia === -1 ? Infinity : ia) - (ib === -1 ? Infinity : ib);
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  }
  if (b.type === 'builtin') return 1;
  return a.id - b.id;
}

/** Placeholder label for a custom identity nobody named. */
export function customLabel(id: number): string {
  return `Custom(${id})`;
}
