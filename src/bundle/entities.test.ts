import { describe, it, expect } from 'vitest';
import { matrixKind, scalarKind, vectorKind } from '../view/element-kind';
import { TypeMismatchError, TypedView } from '../view/typed-view';
import { builtinField, customField } from '../table/field-identity';
import {
  createAnimation,
  createImage,
  createLight,
  createMaterial,
  createMesh,
  createScene,
  createSkin,
  createTexture,
} from './entities';

const u32 = (values: number[]) => TypedView.fromArray(new Uint32Array(values), scalarKind('UnsignedInt'));
const f32 = (values: number[]) => TypedView.fromArray(new Float32Array(values), scalarKind('Float'));

describe('createScene', () => {
  it('derives dimensions from transformation fields', () => {
    const translation2d = TypedView.fromArray(new Float32Array(2), vectorKind('Float', 2));
    const rotation3d = TypedView.fromArray(new Float32Array(4), vectorKind('Float', 4));
    const transform2d = TypedView.fromArray(new Float32Array(9), matrixKind('Float', 3, 3));

    const field = (name: 'Translation' | 'Rotation' | 'Transformation', data: TypedView) =>
      ({ identity: builtinField(name), mapping: u32([0]), data });

    expect(createScene(0, undefined, { mappingKind: 'UnsignedInt', mappingBound: 1, fields: [field('Translation', translation2d)] }).dimensions).toBe(2);
    expect(createScene(0, undefined, { mappingKind: 'UnsignedInt', mappingBound: 1, fields: [field('Rotation', rotation3d)] }).dimensions).toBe(3);
    expect(createScene(0, undefined, { mappingKind: 'UnsignedInt', mappingBound: 1, fields: [field('Transformation', transform2d)] }).dimensions).toBe(2);
    expect(createScene(0, undefined, { mappingKind: 'UnsignedInt', mappingBound: 1, fields: [] }).dimensions).toBeUndefined();
  });

  it('needs an integer mapping kind', () => {
    expect(() => createScene(0, undefined, { mappingKind: 'Float', mappingBound: 0, fields: [] }))
      .toThrow(TypeMismatchError);
  });

  it('uses the mapping bound as row count', () => {
    const scene = createScene(3, 'Main', {
      mappingKind: 'UnsignedInt',
      mappingBound: 12,
      fields: [{ identity: customField(9), mapping: u32([11]), data: f32([0.5]) }],
      ownership: 'borrowed',
    }, (id) => (id === 9 ? 'Weight' : undefined));
    expect(scene.table.rowCount).toBe(12);
    expect(scene.table.ownership).toBe('borrowed');
    expect(scene.table.label(customField(9))).toBe('Weight');
    expect(scene.name).toBe('Main');
  });
});

describe('createAnimation', () => {
  it('fills extrapolation defaults and derives the duration', () => {
    const animation = createAnimation(0, undefined, {
      tracks: [
        { target: 'Translation3D', object: 4, keys: f32([0.5, 2]), values: TypedView.fromArray(new Float32Array(6), vectorKind('Float', 3)), interpolation: 'Linear' },
        { target: 'Scaling3D', object: 1, keys: f32([1, 3.5]), values: TypedView.fromArray(new Float32Array(6), vectorKind('Float', 3)), interpolation: 'Constant', after: 'Extrapolated' },
      ],
    });
    expect(animation.duration).toEqual([0.5, 3.5]);
    expect(animation.table.entries[0].info).toEqual({ object: 4, interpolation: 'Linear', before: 'Constant', after: 'Constant' });
    expect(animation.table.entries[1].info.after).toBe('Extrapolated');
  });

  it('prefers an explicit duration and falls back to zero', () => {
    expect(createAnimation(0, undefined, { tracks: [], duration: [1, 2] }).duration).toEqual([1, 2]);
    expect(createAnimation(0, undefined, { tracks: [] }).duration).toEqual([0, 0]);
  });

  it('needs Float keys', () => {
    expect(() => createAnimation(0, undefined, {
      tracks: [{ target: 'Rotation2D', object: 0, keys: u32([0]), values: f32([1]), interpolation: 'Linear' }],
    })).toThrow('Expected Float mapping for field Rotation2D, got UnsignedInt');
  });
});

describe('createSkin', () => {
  it('pairs joints with inverse bind matrices', () => {
    const skin = createSkin(1, undefined, 'skin2d', {
      joints: u32([3, 4]),
      inverseBindMatrices: TypedView.fromArray(new Float32Array(18), matrixKind('Float', 3, 3)),
    });
    expect(skin.dimensions).toBe(2);
    expect(skin.table.rowCount).toBe(2);
    expect(skin.table.entries.map((e) => skin.table.label(e.identity))).toEqual(['Joint', 'InverseBindMatrix']);
  });

  it('rejects mismatched counts and kinds', () => {
    expect(() => createSkin(1, undefined, 'skin3d', {
      joints: u32([3, 4]),
      inverseBindMatrices: TypedView.fromArray(new Float32Array(16), matrixKind('Float', 4, 4)),
    })).toThrow('Skin 1: 2 joints but 1 inverse bind matrices');
    expect(() => createSkin(1, undefined, 'skin3d', {
      joints: u32([3]),
      inverseBindMatrices: TypedView.fromArray(new Float32Array(9), matrixKind('Float', 3, 3)),
    })).toThrow('Expected Matrix4x4, got Matrix3x3');
  });
});

describe('createLight', () => {
  it('applies per-type defaults', () => {
    const spot = createLight(0, undefined, { type: 'Spot', color: [1, 1, 1], intensity: 2 });
    expect(spot.attenuation).toEqual([1, 0, 1]);
    expect(spot.innerConeAngle).toBe(0);
    expect(spot.outerConeAngle).toBe(45);
    expect(spot.range).toBe(Infinity);

    const sun = createLight(1, undefined, { type: 'Directional', color: [1, 0.5, 0], intensity: 1 });
    expect(sun.attenuation).toEqual([1, 0, 0]);
    expect(sun.outerConeAngle).toBe(360);
  });

  it('rejects inverted cones', () => {
    expect(() => createLight(2, undefined, { type: 'Spot', color: [1, 1, 1], intensity: 1, innerConeAngle: 50, outerConeAngle: 40 }))
      .toThrow('Light 2: cone angles must satisfy 0 <= inner <= outer <= 360, got 50 and 40');
  });

  it('widens a defaulted outer cone to an explicit inner one', () => {
    const wide = createLight(3, undefined, { type: 'Spot', color: [1, 1, 1], intensity: 1, innerConeAngle: 60 });
    expect(wide.innerConeAngle).toBe(60);
    expect(wide.outerConeAngle).toBe(60);
  });
});

describe('createMaterial', () => {
  it('splits attributes into named layers', () => {
    const material = createMaterial(0, 'Coat', {
      types: ['PbrMetallicRoughness', 'PbrClearCoat'],
      attributes: [
        { identity: builtinField('BaseColor'), value: { type: 'numeric', kind: vectorKind('Float', 4), components: [1, 1, 1, 1] } },
        { identity: customField(1337), value: { type: 'numeric', kind: scalarKind('UnsignedInt'), components: [2] } },
        { identity: builtinField('LayerName'), value: { type: 'string', value: 'ClearCoat' } },
        { identity: builtinField('LayerFactor'), value: { type: 'numeric', kind: scalarKind('Float'), components: [0.5] } },
      ],
      layerOffsets: [2, 4],
    });
    expect(material.layers.map((l) => [l.index, l.name, l.attributes.length])).toEqual([
      [0, undefined, 2],
      [1, 'ClearCoat', 2],
    ]);
    expect(material.layers[0].attributes[1]).toMatchObject({ name: undefined, label: 'Custom(1337)' });
  });

  it('validates offsets and component counts', () => {
    expect(() => createMaterial(4, undefined, {
      attributes: [{ identity: builtinField('DoubleSided'), value: { type: 'bool', value: true } }],
      layerOffsets: [0],
    })).toThrow('Material 4: last layer offset must equal the attribute count 1');
    expect(() => createMaterial(4, undefined, {
      attributes: [{ identity: builtinField('BaseColor'), value: { type: 'numeric', kind: vectorKind('Float', 4), components: [1, 1, 1] } }],
    })).toThrow('Material 4: attribute BaseColor has 3 components, Vector4 needs 4');
  });
});

describe('createMesh', () => {
  it('builds the vertex table', () => {
    const mesh = createMesh(0, 1, undefined, {
      primitive: 'Triangles',
      vertexCount: 2,
      indices: TypedView.fromArray(new Uint16Array([0, 1, 1]), scalarKind('UnsignedShort')),
      attributes: [{ identity: builtinField('Position'), data: TypedView.fromArray(new Float32Array(6), vectorKind('Float', 3)) }],
    });
    expect(mesh.level).toBe(1);
    expect(mesh.table.rowCount).toBe(2);
    expect(mesh.indices?.count).toBe(3);
  });

  it('rejects signed index types', () => {
    expect(() => createMesh(0, 0, undefined, {
      primitive: 'Triangles',
      vertexCount: 0,
      indices: TypedView.fromArray(new Int32Array([0]), scalarKind('Int')),
    })).toThrow(TypeMismatchError);
  });
});

describe('textures and images', () => {
  it('expands wrapping and maps the texture type to an image kind', () => {
    const texture = createTexture(0, undefined, {
      type: 'CubeMap',
      minificationFilter: 'Linear',
      magnificationFilter: 'Nearest',
      mipmapFilter: 'Base',
      wrapping: 'ClampToEdge',
      image: 1,
    });
    expect(texture.wrapping).toEqual(['ClampToEdge', 'ClampToEdge', 'ClampToEdge']);
    expect(texture.imageKind).toBe('image3d');
  });

  it('checks image level sizes against the dimension count', () => {
    expect(createImage(0, undefined, 'image2d', [{ format: 'RGBA8Unorm', size: [4, 4] }]).dimensions).toBe(2);
    expect(() => createImage(0, undefined, 'image2d', [{ format: 'RGBA8Unorm', size: [4, 4] }, { format: 'RGBA8Unorm', size: [2] }]))
      .toThrow('Image 0 level 1: expected a 2D size, got [2]');
  });
});
