/**
 * Element kinds describe what a single element of a typed view is made of:
 * a scalar, a fixed-rank vector, a fixed-size matrix, or a fixed-size array
 * of one of those. All components of an element share one scalar kind.
 */

export type ScalarKind =
  | 'UnsignedByte'
  | 'Byte'
  | 'UnsignedShort'
  | 'Short'
  | 'UnsignedInt'
  | 'Int'
  | 'UnsignedLong'
  | 'Long'
  | 'Float'
  | 'Double';

interface ScalarInfo {
  readonly size: number;
  readonly integer: boolean;
  readonly signed: boolean;
  /** Suffix used when naming vectors and matrices of this scalar (Vector3ui, Matrix4x4d). */
  readonly suffix: string;
}

const SCALAR_INFO: Record<ScalarKind, ScalarInfo> = {
  UnsignedByte:  { size: 1, integer: true,  signed: false, suffix: 'ub' },
  Byte:          { size: 1, integer: true,  signed: true,  suffix: 'b' },
  UnsignedShort: { size: 2, integer: true,  signed: false, suffix: 'us' },
  Short:         { size: 2, integer: true,  signed: true,  suffix: 's' },
  UnsignedInt:   { size: 4, integer: true,  signed: false, suffix: 'ui' },
  Int:           { size: 4, integer: true,  signed: true,  suffix: 'i' },
  UnsignedLong:  { size: 8, integer: true,  signed: false, suffix: 'ul' },
  Long:          { size: 8, integer: true,  signed: true,  suffix: 'l' },
  Float:         { size: 4, integer: false, signed: true,  suffix: '' },
  Double:        { size: 8, integer: false, signed: true,  suffix: 'd' },
};

export type Dimension = 2 | 3 | 4;

export interface ScalarElement {
  readonly type: 'scalar';
  readonly scalar: ScalarKind;
}

export interface VectorElement {
  readonly type: 'vector';
  readonly scalar: ScalarKind;
  readonly rank: Dimension;
}

export interface MatrixElement {
  readonly type: 'matrix';
  readonly scalar: ScalarKind;
  readonly columns: Dimension;
  readonly rows: Dimension;
}

export type ValueKind = ScalarElement | VectorElement | MatrixElement;

export interface ArrayElement {
  readonly type: 'array';
  readonly element: ValueKind;
  readonly arity: number;
}

export type ElementKind = ValueKind | ArrayElement;

export function scalarKind(scalar: ScalarKind): ScalarElement {
  return { type: 'scalar', scalar };
}

export function vectorKind(scalar: ScalarKind, rank: Dimension): VectorElement {
  return { type: 'vector', scalar, rank };
}

export function matrixKind(scalar: ScalarKind, columns: Dimension, rows: Dimension): MatrixElement {
  return { type: 'matrix', scalar, columns, rows };
}

export function arrayKind(element: ValueKind, arity: number): ArrayElement {
  if (!Number.isInteger(arity) || arity < 1) {
    throw new RangeError(`Array arity must be a positive integer, got ${arity}`);
  }
  return { type: 'array', element, arity };
}

export function scalarOf(kind: ElementKind): ScalarKind {
  return kind.type === 'array' ? kind.element.scalar : kind.scalar;
}

export function scalarSize(scalar: ScalarKind): number {
  return SCALAR_INFO[scalar].size;
}

export function isIntegerScalar(scalar: ScalarKind): boolean {
  return SCALAR_INFO[scalar].integer;
}

export function isUnsignedScalar(scalar: ScalarKind): boolean {
  return SCALAR_INFO[scalar].integer && !SCALAR_INFO[scalar].signed;
}

/** Number of scalar components in one element. */
export function componentCount(kind: ElementKind): number {
  switch (kind.type) {
    case 'scalar': return 1;
    case 'vector': return kind.rank;
    case 'matrix': return kind.columns * kind.rows;
    case 'array':  return kind.arity * componentCount(kind.element);
  }
}

/** Size of one element in bytes. */
export function elementSize(kind: ElementKind): number {
  return componentCount(kind) * scalarSize(scalarOf(kind));
}

export function kindEquals(a: ElementKind, b: ElementKind): boolean {
  if (a.type === 'array' || b.type === 'array') {
    return a.type === 'array' && b.type === 'array' &&
      a.arity === b.arity && kindEquals(a.element, b.element);
  }
  if (a.scalar !== b.scalar) return false;
  switch (a.type) {
    case 'scalar': return b.type === 'scalar';
    case 'vector': return b.type === 'vector' && a.rank === b.rank;
    case 'matrix': return b.type === 'matrix' && a.columns === b.columns && a.rows === b.rows;
  }
}

/**
 * Display name of an element kind: `Float`, `Vector3`, `Vector3ub`,
 * `Matrix4x4d`, `Short[3]`.
 */
export function formatKind(kind: ElementKind): string {
  switch (kind.type) {
    case 'scalar': return kind.scalar;
    case 'vector': return `Vector${kind.rank}${SCALAR_INFO[kind.scalar].suffix}`;
    case 'matrix': return `Matrix${kind.columns}x${kind.rows}${SCALAR_INFO[kind.scalar].suffix}`;
    case 'array':  return `${formatKind(kind.element)}[${kind.arity}]`;
  }
}
