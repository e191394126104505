import {
  componentCount,
  formatKind,
  isIntegerScalar,
  matrixKind,
  scalarKind,
  type ScalarKind,
} from '../view/element-kind';
import { TypeMismatchError, type Ownership, type TypedView } from '../view/typed-view';
import { AttributeTable, type AttributeEntry, type FieldNameResolver } from '../table/attribute-table';
import { builtinField, customLabel, type FieldIdentity } from '../table/field-identity';
import type {
  AnimationTarget,
  MaterialAttribute,
  MeshAttribute,
  SceneField,
  SkinField,
} from '../table/builtin-fields';
import type {
  AnimationData,
  Extrapolation,
  ImageData,
  Interpolation,
  LightData,
  LightType,
  MaterialData,
  MaterialType,
  MaterialValue,
  MeshData,
  MeshPrimitive,
  SamplerFilter,
  SamplerMipmap,
  SamplerWrapping,
  SceneData,
  SkinData,
  TextureData,
  TextureType,
} from './importer';

export type SkinKind = 'skin2d' | 'skin3d';
export type ImageKind = 'image1d' | 'image2d' | 'image3d';

export type EntityKind =
  | 'scene'
  | 'object'
  | 'animation'
  | SkinKind
  | 'light'
  | 'material'
  | 'mesh'
  | 'texture'
  | ImageKind;

interface Named {
  readonly id: number;
  readonly name?: string;
}

// ---------------------------------------------------------------------------
// Scenes
// ---------------------------------------------------------------------------

export interface Scene extends Named {
  readonly table: AttributeTable<SceneField>;
  readonly mappingKind: ScalarKind;
  readonly dimensions: 2 | 3 | undefined;
}

function sceneDimensions(table: AttributeTable<SceneField>): 2 | 3 | undefined {
  for (const { identity, data } of table.entries) {
    if (identity.type !== 'builtin') continue;
    const kind = data.kind;
    switch (identity.name) {
      case 'Transformation':
        if (kind.type === 'matrix' && kind.columns === 3 && kind.rows === 3) return 2;
        if (kind.type === 'matrix' && kind.columns === 4 && kind.rows === 4) return 3;
        break;
      case 'Translation':
      case 'Scaling':
        if (kind.type === 'vector' && kind.rank === 2) return 2;
        if (kind.type === 'vector' && kind.rank === 3) return 3;
        break;
      case 'Rotation':
        // Complex number vs quaternion
        if (kind.type === 'vector' && kind.rank === 2) return 2;
        if (kind.type === 'vector' && kind.rank === 4) return 3;
        break;
    }
  }
  return undefined;
}

export function createScene(
  id: number,
  name: string | undefined,
  data: SceneData,
  resolveName?: FieldNameResolver,
): Scene {
  if (!isIntegerScalar(data.mappingKind)) {
    throw new TypeMismatchError('an integer mapping kind', scalarKind(data.mappingKind));
  }
  const table = new AttributeTable<SceneField>({
    entries: data.fields,
    rowCount: data.mappingBound,
    mappingKind: data.mappingKind,
    ownership: data.ownership,
    resolveName,
  });
  return { id, name, table, mappingKind: data.mappingKind, dimensions: sceneDimensions(table) };
}

// ---------------------------------------------------------------------------
// Animations
// ---------------------------------------------------------------------------

export interface TrackInfo {
  readonly object: number;
  readonly interpolation: Interpolation;
  readonly before: Extrapolation;
  readonly after: Extrapolation;
}

export interface Animation extends Named {
  readonly table: AttributeTable<AnimationTarget, TrackInfo>;
  readonly duration: [number, number];
  readonly ownership: Ownership;
}

/** First and last key of a track, or undefined for an empty one. */
export function trackDuration(keys: TypedView): [number, number] | undefined {
  if (keys.count === 0) return undefined;
  const values = keys.values();
  return [values[0], values[values.length - 1]];
}

export function createAnimation(id: number, name: string | undefined, data: AnimationData): Animation {
  const entries: AttributeEntry<AnimationTarget, TrackInfo>[] = data.tracks.map((track) => ({
    identity: builtinField(track.target),
    mapping: track.keys,
    data: track.values,
    info: {
      object: track.object,
      interpolation: track.interpolation,
      before: track.before ?? 'Constant',
      after: track.after ?? 'Constant',
    },
  }));
  const ownership = data.ownership ?? 'owned';
  const table = new AttributeTable<AnimationTarget, TrackInfo>({ entries, mappingKind: 'Float', ownership });

  let duration = data.duration;
  if (!duration) {
    let start = Infinity;
    let end = -Infinity;
    for (const entry of table.entries) {
      const range = trackDuration(entry.mapping ?? entry.data);
      if (!range) continue;
      start = Math.min(start, range[0]);
      end = Math.max(end, range[1]);
    }
    duration = start <= end ? [start, end] : [0, 0];
  }
  return { id, name, table, duration, ownership };
}

// ---------------------------------------------------------------------------
// Skins
// ---------------------------------------------------------------------------

export interface Skin extends Named {
  readonly dimensions: 2 | 3;
  readonly table: AttributeTable<SkinField>;
}

export function createSkin(id: number, name: string | undefined, kind: SkinKind, data: SkinData): Skin {
  const dimensions = kind === 'skin2d' ? 2 : 3;
  const size = kind === 'skin2d' ? 3 : 4;
  const joints = data.joints.expect(scalarKind('UnsignedInt'));
  const matrices = data.inverseBindMatrices.expect(matrixKind('Float', size, size));
  if (joints.count !== matrices.count) {
    throw new Error(`Skin ${id}: ${joints.count} joints but ${matrices.count} inverse bind matrices`);
  }
  const table = new AttributeTable<SkinField>({
    rowCount: joints.count,
    ownership: joints.ownership,
    entries: [
      { identity: builtinField('Joint'), mapping: null, data: joints },
      { identity: builtinField('InverseBindMatrix'), mapping: null, data: matrices },
    ],
  });
  return { id, name, dimensions, table };
}

// ---------------------------------------------------------------------------
// Lights
// ---------------------------------------------------------------------------

export interface Light extends Named {
  readonly type: LightType;
  readonly color: [number, number, number];
  readonly intensity: number;
  readonly attenuation: [number, number, number];
  readonly range: number;
  readonly innerConeAngle: number;
  readonly outerConeAngle: number;
}

export function createLight(id: number, name: string | undefined, data: LightData): Light {
  const spot = data.type === 'Spot';
  const positional = spot || data.type === 'Point';
  const innerConeAngle = data.innerConeAngle ?? (spot ? 0 : 360);
  // A defaulted outer angle never ends up narrower than an explicit inner one.
  const outerConeAngle = data.outerConeAngle ?? (spot ? Math.max(45, innerConeAngle) : 360);
  if (!(innerConeAngle >= 0 && innerConeAngle <= outerConeAngle && outerConeAngle <= 360)) {
    throw new Error(`Light ${id}: cone angles must satisfy 0 <= inner <= outer <= 360, got ${innerConeAngle} and ${outerConeAngle}`);
  }
  return {
    id,
    name,
    type: data.type,
    color: data.color,
    intensity: data.intensity,
    attenuation: data.attenuation ?? (positional ? [1, 0, 1] : [1, 0, 0]),
    range: data.range ?? Infinity,
    innerConeAngle,
    outerConeAngle,
  };
}

// ---------------------------------------------------------------------------
// Materials
// ---------------------------------------------------------------------------

export interface MaterialAttributeEntry {
  readonly identity: FieldIdentity<MaterialAttribute>;
  /** Builtin name or resolved custom name; undefined for an unnamed custom attribute. */
  readonly name: string | undefined;
  readonly label: string;
  readonly value: MaterialValue;
}

export interface MaterialLayer {
  readonly index: number;
  readonly name?: string;
  readonly attributes: MaterialAttributeEntry[];
}

export interface Material extends Named {
  readonly types: MaterialType[];
  readonly layers: MaterialLayer[];
}

export function createMaterial(
  id: number,
  name: string | undefined,
  data: MaterialData,
  resolveName?: FieldNameResolver,
): Material {
  const count = data.attributes.length;
  const offsets = data.layerOffsets ?? [count];
  if (offsets.length === 0 || offsets[offsets.length - 1] !== count) {
    throw new Error(`Material ${id}: last layer offset must equal the attribute count ${count}`);
  }

  const entries = data.attributes.map(({ identity, value }): MaterialAttributeEntry => {
    let resolved: string | undefined;
    if (identity.type === 'builtin') resolved = identity.name;
    else resolved = resolveName?.(identity.id) || undefined;
    const label = resolved ?? (identity.type === 'custom' ? customLabel(identity.id) : identity.name);
    if (value.type === 'numeric' && value.components.length !== componentCount(value.kind)) {
      throw new Error(
        `Material ${id}: attribute ${label} has ${value.components.length} components, ` +
        `${formatKind(value.kind)} needs ${componentCount(value.kind)}`,
      );
    }
    return { identity, name: resolved, label, value };
  });

  const layers: MaterialLayer[] = [];
  let begin = 0;
  offsets.forEach((end, index) => {
    if (!Number.isInteger(end) || end < begin || end > count) {
      throw new Error(`Material ${id}: layer ${index} offset ${end} out of order`);
    }
    const attributes = entries.slice(begin, end);
    let layerName: string | undefined;
    for (const a of attributes) {
      if (a.identity.type === 'builtin' && a.identity.name === 'LayerName' && a.value.type === 'string') {
        layerName = a.value.value;
        break;
      }
    }
    layers.push({ index, name: layerName, attributes });
    begin = end;
  });

  return { id, name, types: data.types ?? [], layers };
}

// ---------------------------------------------------------------------------
// Meshes
// ---------------------------------------------------------------------------

export interface Mesh extends Named {
  readonly level: number;
  readonly primitive: MeshPrimitive;
  readonly vertexCount: number;
  readonly indices: TypedView | undefined;
  readonly table: AttributeTable<MeshAttribute>;
}

const INDEX_SCALARS: readonly ScalarKind[] = ['UnsignedByte', 'UnsignedShort', 'UnsignedInt'];

export function createMesh(
  id: number,
  level: number,
  name: string | undefined,
  data: MeshData,
  resolveName?: FieldNameResolver,
): Mesh {
  const indices = data.indices;
  if (indices && (indices.kind.type !== 'scalar' || !INDEX_SCALARS.includes(indices.kind.scalar))) {
    throw new TypeMismatchError('an UnsignedByte, UnsignedShort or UnsignedInt index type', indices.kind);
  }
  const table = new AttributeTable<MeshAttribute>({
    rowCount: data.vertexCount,
    ownership: data.vertexOwnership,
    resolveName,
    entries: (data.attributes ?? []).map(({ identity, data: view }) => ({ identity, mapping: null, data: view })),
  });
  return { id, level, name, primitive: data.primitive, vertexCount: data.vertexCount, indices, table };
}

// ---------------------------------------------------------------------------
// Textures and images
// ---------------------------------------------------------------------------

export const TEXTURE_IMAGE_KIND: Record<TextureType, ImageKind> = {
  Texture1D: 'image1d',
  Texture1DArray: 'image2d',
  Texture2D: 'image2d',
  Texture2DArray: 'image3d',
  Texture3D: 'image3d',
  CubeMap: 'image3d',
  CubeMapArray: 'image3d',
};

export interface Texture extends Named {
  readonly type: TextureType;
  readonly minificationFilter: SamplerFilter;
  readonly magnificationFilter: SamplerFilter;
  readonly mipmapFilter: SamplerMipmap;
  readonly wrapping: [SamplerWrapping, SamplerWrapping, SamplerWrapping];
  readonly image: number;
  readonly imageKind: ImageKind;
}

export function createTexture(id: number, name: string | undefined, data: TextureData): Texture {
  const wrapping: [SamplerWrapping, SamplerWrapping, SamplerWrapping] = typeof data.wrapping === 'string'
    ? [data.wrapping, data.wrapping, data.wrapping]
    : data.wrapping;
  return {
    id,
    name,
    type: data.type,
    minificationFilter: data.minificationFilter,
    magnificationFilter: data.magnificationFilter,
    mipmapFilter: data.mipmapFilter,
    wrapping,
    image: data.image,
    imageKind: TEXTURE_IMAGE_KIND[data.type],
  };
}

export const IMAGE_DIMENSIONS: Record<ImageKind, 1 | 2 | 3> = { image1d: 1, image2d: 2, image3d: 3 };

export interface Image extends Named {
  readonly kind: ImageKind;
  readonly dimensions: 1 | 2 | 3;
  readonly levels: ImageData[];
}

export function createImage(id: number, name: string | undefined, kind: ImageKind, levels: ImageData[]): Image {
  const dimensions = IMAGE_DIMENSIONS[kind];
  levels.forEach((level, i) => {
    if (level.size.length !== dimensions) {
      throw new Error(`Image ${id} level ${i}: expected a ${dimensions}D size, got [${level.size.join(', ')}]`);
    }
  });
  return { id, name, kind, dimensions, levels };
}
