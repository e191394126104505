import type { ScalarKind, ValueKind } from '../view/element-kind';
import type { Ownership, TypedView } from '../view/typed-view';
import type { FieldIdentity } from '../table/field-identity';
import type { AnimationTarget, MaterialAttribute, MeshAttribute, SceneField } from '../table/builtin-fields';

// Raw entity data as an importer backend hands it over. The bundle turns
// these into attribute tables and scalar records.

export interface SceneFieldData {
  identity: FieldIdentity<SceneField>;
  mapping: TypedView;
  data: TypedView;
  orderedMapping?: boolean;
}

export interface SceneData {
  /** Scalar kind of every field mapping. */
  mappingKind: ScalarKind;
  /** Number of object slots the mappings index into. */
  mappingBound: number;
  fields: SceneFieldData[];
  ownership?: Ownership;
}

export type Interpolation = 'Constant' | 'Linear' | 'Spline' | 'Custom';
export type Extrapolation = 'Extrapolated' | 'Constant' | 'DefaultConstructed';

export interface AnimationTrackData {
  target: AnimationTarget;
  /** Object the track animates. */
  object: number;
  /** Float keyframe times. */
  keys: TypedView;
  values: TypedView;
  interpolation: Interpolation;
  /** Default: 'Constant'. */
  before?: Extrapolation;
  /** Default: 'Constant'. */
  after?: Extrapolation;
}

export interface AnimationData {
  tracks: AnimationTrackData[];
  /** Default: union of all track durations. */
  duration?: [number, number];
  ownership?: Ownership;
}

export interface SkinData {
  /** UnsignedInt object ids. */
  joints: TypedView;
  /** Matrix3x3 (2D) or Matrix4x4 (3D) Float matrices, one per joint. */
  inverseBindMatrices: TypedView;
}

export type LightType = 'Ambient' | 'Directional' | 'Point' | 'Spot';

export interface LightData {
  type: LightType;
  color: [number, number, number];
  intensity: number;
  attenuation?: [number, number, number];
  range?: number;
  /** Degrees. */
  innerConeAngle?: number;
  /** Degrees. */
  outerConeAngle?: number;
}

export type MaterialType = 'Flat' | 'Phong' | 'PbrMetallicRoughness' | 'PbrSpecularGlossiness' | 'PbrClearCoat';

export type MaterialValue =
  | { readonly type: 'numeric'; readonly kind: ValueKind; readonly components: readonly number[] }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'string'; readonly value: string };

export interface MaterialAttributeData {
  identity: FieldIdentity<MaterialAttribute>;
  value: MaterialValue;
}

export interface MaterialData {
  types?: MaterialType[];
  attributes: MaterialAttributeData[];
  /** End offset of each layer into `attributes`. Default: one base layer. */
  layerOffsets?: number[];
}

export type MeshPrimitive =
  | 'Points'
  | 'Lines'
  | 'LineStrip'
  | 'LineLoop'
  | 'Triangles'
  | 'TriangleStrip'
  | 'TriangleFan'
  | 'Instances'
  | 'Faces'
  | 'Edges'
  | 'Meshlets';

export interface MeshAttributeData {
  identity: FieldIdentity<MeshAttribute>;
  data: TypedView;
}

export interface MeshData {
  primitive: MeshPrimitive;
  vertexCount: number;
  /** UnsignedByte, UnsignedShort or UnsignedInt index view. */
  indices?: TypedView;
  attributes?: MeshAttributeData[];
  vertexOwnership?: Ownership;
}

export type TextureType =
  | 'Texture1D'
  | 'Texture1DArray'
  | 'Texture2D'
  | 'Texture2DArray'
  | 'Texture3D'
  | 'CubeMap'
  | 'CubeMapArray';

export type SamplerFilter = 'Nearest' | 'Linear';
export type SamplerMipmap = 'Base' | 'Nearest' | 'Linear';
export type SamplerWrapping = 'Repeat' | 'MirroredRepeat' | 'ClampToEdge' | 'ClampToBorder' | 'MirrorClampToEdge';

export interface TextureData {
  type: TextureType;
  minificationFilter: SamplerFilter;
  magnificationFilter: SamplerFilter;
  mipmapFilter: SamplerMipmap;
  /** One mode for all axes, or one per axis. */
  wrapping: SamplerWrapping | [SamplerWrapping, SamplerWrapping, SamplerWrapping];
  image: number;
}

export interface ImageData {
  format: string;
  /** One extent per dimension. */
  size: number[];
  compressed?: boolean;
  ownership?: Ownership;
}

/**
 * Capability interface of an importer backend. Every method is optional; a
 * missing count means zero entities of that kind. Fetch methods return
 * `null` (or throw) when the entity cannot be produced; ids are always in
 * `[0, count)` and counts stay stable for one report.
 */
export interface SceneImporter {
  objectCount?(): number;
  objectName?(id: number): string | undefined;

  sceneCount?(): number;
  sceneName?(id: number): string | undefined;
  scene?(id: number): SceneData | null;
  sceneFieldName?(id: number): string | undefined;

  animationCount?(): number;
  animationName?(id: number): string | undefined;
  animation?(id: number): AnimationData | null;

  skin2DCount?(): number;
  skin2DName?(id: number): string | undefined;
  skin2D?(id: number): SkinData | null;

  skin3DCount?(): number;
  skin3DName?(id: number): string | undefined;
  skin3D?(id: number): SkinData | null;

  lightCount?(): number;
  lightName?(id: number): string | undefined;
  light?(id: number): LightData | null;

  materialCount?(): number;
  materialName?(id: number): string | undefined;
  material?(id: number): MaterialData | null;
  materialAttributeName?(id: number): string | undefined;

  meshCount?(): number;
  meshName?(id: number): string | undefined;
  /** Default: 1. */
  meshLevelCount?(id: number): number;
  mesh?(id: number, level: number): MeshData | null;
  meshAttributeName?(id: number): string | undefined;

  textureCount?(): number;
  textureName?(id: number): string | undefined;
  texture?(id: number): TextureData | null;

  image1DCount?(): number;
  image1DName?(id: number): string | undefined;
  image1DLevelCount?(id: number): number;
  image1D?(id: number, level: number): ImageData | null;

  image2DCount?(): number;
  image2DName?(id: number): string | undefined;
  image2DLevelCount?(id: number): number;
  image2D?(id: number, level: number): ImageData | null;

  image3DCount?(): number;
  image3DName?(id: number): string | undefined;
  image3DLevelCount?(id: number): number;
  image3D?(id: number, level: number): ImageData | null;
}
