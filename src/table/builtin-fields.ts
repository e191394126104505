// Closed builtin field sets, one per entity domain. Order is the display order.

export const SCENE_FIELDS = [
  'Parent',
  'Transformation',
  'Translation',
  'Rotation',
  'Scaling',
  'Mesh',
  'MeshMaterial',
  'Light',
  'Camera',
  'Skin',
  'ImporterState',
] as const;
export type SceneField = typeof SCENE_FIELDS[number];

export const MESH_ATTRIBUTES = [
  'Position',
  'Tangent',
  'Bitangent',
  'Normal',
  'TextureCoordinates',
  'Color',
  'JointIds',
  'Weights',
  'ObjectId',
] as const;
export type MeshAttribute = typeof MESH_ATTRIBUTES[number];

/** Mesh attributes whose component-wise min/max is reported in bounds mode. */
export const BOUNDED_MESH_ATTRIBUTES: ReadonlySet<MeshAttribute> = new Set<MeshAttribute>([
  'Position',
  'Normal',
  'Tangent',
  'Bitangent',
  'TextureCoordinates',
  'Color',
  'ObjectId',
]);

export const ANIMATION_TARGETS = [
  'Translation2D',
  'Translation3D',
  'Rotation2D',
  'Rotation3D',
  'Scaling2D',
  'Scaling3D',
] as const;
export type AnimationTarget = typeof ANIMATION_TARGETS[number];

export const SKIN_FIELDS = ['Joint', 'InverseBindMatrix'] as const;
export type SkinField = typeof SKIN_FIELDS[number];

export const MATERIAL_ATTRIBUTES = [
  'LayerName',
  'AlphaMask',
  'AlphaBlend',
  'DoubleSided',
  'AmbientColor',
  'AmbientTexture',
  'DiffuseColor',
  'DiffuseTexture',
  'SpecularColor',
  'SpecularTexture',
  'Shininess',
  'BaseColor',
  'BaseColorTexture',
  'Metalness',
  'MetalnessTexture',
  'Roughness',
  'RoughnessTexture',
  'RoughnessTextureMatrix',
  'RoughnessTextureSwizzle',
  'NoneRoughnessMetallicTexture',
  'Glossiness',
  'GlossinessTexture',
  'NormalTexture',
  'NormalTextureScale',
  'OcclusionTexture',
  'OcclusionTextureStrength',
  'EmissiveColor',
  'EmissiveTexture',
  'LayerFactor',
  'LayerFactorTexture',
  'TextureMatrix',
  'TextureCoordinates',
] as const;
export type MaterialAttribute = typeof MATERIAL_ATTRIBUTES[number];

/** Builtin material attributes whose value is a texture id. */
export const TEXTURE_REFERENCE_ATTRIBUTES: ReadonlySet<MaterialAttribute> = new Set<MaterialAttribute>([
  'AmbientTexture',
  'DiffuseTexture',
  'SpecularTexture',
  'BaseColorTexture',
  'MetalnessTexture',
  'RoughnessTexture',
  'NoneRoughnessMetallicTexture',
  'GlossinessTexture',
  'NormalTexture',
  'OcclusionTexture',
  'EmissiveTexture',
  'LayerFactorTexture',
]);
