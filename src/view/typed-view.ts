import {
  componentCount,
  elementSize,
  formatKind,
  isIntegerScalar,
  kindEquals,
  scalarOf,
  scalarSize,
  type ElementKind,
  type ScalarKind,
} from './element-kind';

/**
 * Who owns the memory behind a view. Only affects whether the owner may
 * mutate or release it; reads behave the same for all three.
 */
export type Ownership = 'owned' | 'borrowed' | 'borrowed-mutable';

export type TypedArray =
  | Uint8Array
  | Uint8ClampedArray
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | BigUint64Array
  | BigInt64Array
  | Float32Array
  | Float64Array;

/** Thrown when a view is read as an element kind it does not hold. */
export class TypeMismatchError extends Error {
  constructor(expected: string, actual: ElementKind | string) {
    super(`Expected ${expected}, got ${typeof actual === 'string' ? actual : formatKind(actual)}`);
    this.name = 'TypeMismatchError';
  }
}

export interface TypedViewInit {
  kind: ElementKind;
  count: number;
  /** Backing memory. May be omitted only for empty views. */
  data?: ArrayBufferView | ArrayBufferLike | null;
  /** Byte offset of the first element, relative to the start of `data`. */
  byteOffset?: number;
  /** Distance between elements in bytes. Default: the element size. May be zero or negative. */
  stride?: number;
  ownership?: Ownership;
}

function scalarOfArray(array: TypedArray): ScalarKind {
  if (array instanceof Uint8Array || array instanceof Uint8ClampedArray) return 'UnsignedByte';
  if (array instanceof Int8Array) return 'Byte';
  if (array instanceof Uint16Array) return 'UnsignedShort';
  if (array instanceof Int16Array) return 'Short';
  if (array instanceof Uint32Array) return 'UnsignedInt';
  if (array instanceof Int32Array) return 'Int';
  if (array instanceof BigUint64Array) return 'UnsignedLong';
  if (array instanceof BigInt64Array) return 'Long';
  if (array instanceof Float32Array) return 'Float';
  return 'Double';
}

/**
 * Non-owning, type-erased description of `count` elements laid out with a
 * fixed byte stride over some memory. Every typed read is bounds- and
 * kind-checked; data is little-endian.
 */
export class TypedView {
  readonly kind: ElementKind;
  readonly count: number;
  readonly stride: number;
  readonly ownership: Ownership;
  private readonly bytes: DataView;
  private readonly base: number;

  constructor(init: TypedViewInit) {
    const { kind, count } = init;
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`TypedView count must be a non-negative integer, got ${count}`);
    }
    const size = elementSize(kind);
    const stride = init.stride ?? size;
    if (!Number.isInteger(stride)) {
      throw new RangeError(`TypedView stride must be an integer, got ${stride}`);
    }

    const data = init.data ?? new ArrayBuffer(0);
    this.bytes = ArrayBuffer.isView(data)
      ? new DataView(data.buffer, data.byteOffset, data.byteLength)
      : new DataView(data);
    this.base = init.byteOffset ?? 0;

    if (count > 0) {
      const last = this.base + (count - 1) * stride;
      const lo = Math.min(this.base, last);
      const hi = Math.max(this.base, last) + size;
      if (lo < 0 || hi > this.bytes.byteLength) {
        throw new RangeError(
          `TypedView: ${count} elements of ${formatKind(kind)} with stride ${stride} ` +
          `at offset ${this.base} do not fit into ${this.bytes.byteLength} bytes`,
        );
      }
    }

    this.kind = kind;
    this.count = count;
    this.stride = stride;
    this.ownership = init.ownership ?? 'owned';
  }

  /**
   * Wrap a typed array. The element count is the array length divided by the
   * number of components in `kind`; the array's scalar type must match.
   */
  static fromArray(array: TypedArray, kind: ElementKind, ownership: Ownership = 'owned'): TypedView {
    const actual = scalarOfArray(array);
    if (actual !== scalarOf(kind)) {
      throw new TypeMismatchError(`${formatKind(kind)} data`, { type: 'scalar', scalar: actual });
    }
    const components = componentCount(kind);
    if (array.length % components !== 0) {
      throw new RangeError(
        `Array of ${array.length} values is not a whole number of ${formatKind(kind)} elements`,
      );
    }
    return new TypedView({ kind, count: array.length / components, data: array, ownership });
  }

  /** Zero stride over more than one element: every element aliases the first. */
  get isBroadcast(): boolean {
    return this.stride === 0 && this.count > 1;
  }

  /** Read one scalar component of one element. */
  component(index: number, component: number): number {
    const offset = this.offsetOf(index, component);
    const dv = this.bytes;
    switch (scalarOf(this.kind)) {
      case 'UnsignedByte':  return dv.getUint8(offset);
      case 'Byte':          return dv.getInt8(offset);
      case 'UnsignedShort': return dv.getUint16(offset, true);
      case 'Short':         return dv.getInt16(offset, true);
      case 'UnsignedInt':   return dv.getUint32(offset, true);
      case 'Int':           return dv.getInt32(offset, true);
      // Rounds beyond 2^53; integer() keeps the exact value.
      case 'UnsignedLong':  return Number(dv.getBigUint64(offset, true));
      case 'Long':          return Number(dv.getBigInt64(offset, true));
      case 'Float':         return dv.getFloat32(offset, true);
      case 'Double':        return dv.getFloat64(offset, true);
    }
  }

  /**
   * Exact value of one element of an integer scalar view. 64-bit values
   * outside the safe integer range come back as a bigint.
   */
  integer(index: number): number | bigint {
    if (this.kind.type !== 'scalar' || !isIntegerScalar(this.kind.scalar)) {
      throw new TypeMismatchError('an integer scalar', this.kind);
    }
    const scalar = this.kind.scalar;
    if (scalar !== 'UnsignedLong' && scalar !== 'Long') return this.component(index, 0);
    const offset = this.offsetOf(index, 0);
    const value = scalar === 'Long' ? this.bytes.getBigInt64(offset, true) : this.bytes.getBigUint64(offset, true);
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value;
  }

  integers(): Array<number | bigint> {
    const out: Array<number | bigint> = [];
    for (let i = 0; i < this.count; i++) out.push(this.integer(i));
    return out;
  }

  /** All components of one element, in memory order. */
  element(index: number): number[] {
    const n = componentCount(this.kind);
    const out: number[] = [];
    for (let c = 0; c < n; c++) out.push(this.component(index, c));
    return out;
  }

  elements(): number[][] {
    const out: number[][] = [];
    for (let i = 0; i < this.count; i++) out.push(this.element(i));
    return out;
  }

  /** Values of a scalar view of any numeric kind. */
  values(): number[] {
    if (this.kind.type !== 'scalar') throw new TypeMismatchError('a scalar', this.kind);
    const out: number[] = [];
    for (let i = 0; i < this.count; i++) out.push(this.component(i, 0));
    return out;
  }

  /** Values of an integer scalar view, as used for ids and index mappings. */
  indices(): number[] {
    if (this.kind.type !== 'scalar' || !isIntegerScalar(this.kind.scalar)) {
      throw new TypeMismatchError('an integer scalar', this.kind);
    }
    return this.values();
  }

  /** Assert the view holds exactly `kind`. */
  expect(kind: ElementKind): this {
    if (!kindEquals(this.kind, kind)) throw new TypeMismatchError(formatKind(kind), this.kind);
    return this;
  }

  private offsetOf(index: number, component: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new RangeError(`Element index ${index} out of range for ${this.count} elements`);
    }
    const components = componentCount(this.kind);
    if (!Number.isInteger(component) || component < 0 || component >= components) {
      throw new RangeError(`Component ${component} out of range for ${formatKind(this.kind)}`);
    }
    return this.base + index * this.stride + component * scalarSize(scalarOf(this.kind));
  }
}
