import { describe, it, expect } from 'vitest';
import {
  arrayKind,
  componentCount,
  elementSize,
  formatKind,
  isIntegerScalar,
  isUnsignedScalar,
  kindEquals,
  matrixKind,
  scalarKind,
  scalarOf,
  vectorKind,
} from './element-kind';

describe('formatKind', () => {
  it('names scalars, vectors, matrices and arrays', () => {
    expect(formatKind(scalarKind('Float'))).toBe('Float');
    expect(formatKind(vectorKind('Float', 3))).toBe('Vector3');
    expect(formatKind(vectorKind('UnsignedByte', 3))).toBe('Vector3ub');
    expect(formatKind(matrixKind('Double', 4, 4))).toBe('Matrix4x4d');
    expect(formatKind(arrayKind(scalarKind('Short'), 3))).toBe('Short[3]');
  });
});

describe('element sizes', () => {
  it('counts components', () => {
    expect(componentCount(scalarKind('Int'))).toBe(1);
    expect(componentCount(matrixKind('Float', 3, 3))).toBe(9);
    expect(componentCount(arrayKind(vectorKind('Float', 2), 2))).toBe(4);
  });

  it('multiplies components by the scalar size', () => {
    expect(elementSize(vectorKind('Float', 3))).toBe(12);
    expect(elementSize(arrayKind(scalarKind('Short'), 3))).toBe(6);
    expect(elementSize(scalarKind('Long'))).toBe(8);
  });

  it('finds the scalar of an array', () => {
    expect(scalarOf(arrayKind(vectorKind('UnsignedShort', 2), 4))).toBe('UnsignedShort');
  });
});

describe('arrayKind', () => {
  it('rejects arity below one', () => {
    expect(() => arrayKind(scalarKind('Float'), 0)).toThrow(RangeError);
    expect(() => arrayKind(scalarKind('Float'), 1.5)).toThrow(RangeError);
  });
});

describe('kindEquals', () => {
  it('compares shape and scalar', () => {
    expect(kindEquals(vectorKind('Float', 3), vectorKind('Float', 3))).toBe(true);
    expect(kindEquals(vectorKind('Float', 3), vectorKind('Float', 4))).toBe(false);
    expect(kindEquals(scalarKind('Float'), scalarKind('Double'))).toBe(false);
    expect(kindEquals(matrixKind('Float', 3, 3), vectorKind('Float', 3))).toBe(false);
  });

  it('never equates an array with its element', () => {
    expect(kindEquals(arrayKind(scalarKind('Short'), 1), scalarKind('Short'))).toBe(false);
    expect(kindEquals(arrayKind(scalarKind('Short'), 3), arrayKind(scalarKind('Short'), 3))).toBe(true);
  });
});

describe('scalar traits', () => {
  it('classifies integers and signedness', () => {
    expect(isIntegerScalar('UnsignedLong')).toBe(true);
    expect(isIntegerScalar('Double')).toBe(false);
    expect(isUnsignedScalar('UnsignedInt')).toBe(true);
    expect(isUnsignedScalar('Int')).toBe(false);
    expect(isUnsignedScalar('Float')).toBe(false);
  });
});
