export {
  scalarKind,
  vectorKind,
  matrixKind,
  arrayKind,
  scalarOf,
  componentCount,
  elementSize,
  isIntegerScalar,
  isUnsignedScalar,
  kindEquals,
  formatKind,
} from './view/element-kind';
export type { ScalarKind, Dimension, ElementKind, ValueKind, ScalarElement, VectorElement, MatrixElement, ArrayElement } from './view/element-kind';
export { TypedView, TypeMismatchError } from './view/typed-view';
export type { Ownership, TypedArray, TypedViewInit } from './view/typed-view';

export { builtinField, customField, isCustomId, identityEquals, compareIdentities, customLabel } from './table/field-identity';
export type { FieldIdentity } from './table/field-identity';
export { AttributeTable } from './table/attribute-table';
export type { AttributeEntry, AttributeTableInit, FieldNameResolver } from './table/attribute-table';
export {
  SCENE_FIELDS,
  MESH_ATTRIBUTES,
  BOUNDED_MESH_ATTRIBUTES,
  ANIMATION_TARGETS,
  SKIN_FIELDS,
  MATERIAL_ATTRIBUTES,
  TEXTURE_REFERENCE_ATTRIBUTES,
} from './table/builtin-fields';
export type { SceneField, MeshAttribute, AnimationTarget, SkinField, MaterialAttribute } from './table/builtin-fields';

// Importer contract
export type * from './bundle/importer';
export { EntityBundle, KIND_LABELS } from './bundle/entity-bundle';
export type { EntityBundleOptions, FetchFailure } from './bundle/entity-bundle';
export {
  createScene,
  createAnimation,
  createSkin,
  createLight,
  createMaterial,
  createMesh,
  createTexture,
  createImage,
  trackDuration,
  TEXTURE_IMAGE_KIND,
  IMAGE_DIMENSIONS,
} from './bundle/entities';
export type {
  EntityKind,
  SkinKind,
  ImageKind,
  Scene,
  TrackInfo,
  Animation,
  Skin,
  Light,
  MaterialAttributeEntry,
  MaterialLayer,
  Material,
  Mesh,
  Texture,
  Image,
} from './bundle/entities';

export { ReferenceCensus, CensusResult, REFERENCE_TARGETS, takeCensus, targetCounts } from './census/reference-census';
export type {
  ReferenceTarget,
  ReferenceSourceKind,
  ReferenceSource,
  OutOfRangeReference,
  CensusEntry,
  CensusOptions,
} from './census/reference-census';

export { validateConfig, REPORT_SECTIONS } from './config';
export type { InfoConfig, ResolvedInfoConfig, InfoFlag, ReportSection, TextureReference } from './config';
export { defaultLogger } from './logger';
export type { Logger, LogFn } from './logger';

// Report model
export { computeBounds } from './report/bounds';
export type { Bounds } from './report/bounds';
export { summarizeTable, materialValueKind } from './report/records';
export type * from './report/records';
export { ReportBuilder, objectUsage, recordsOf } from './report/report-builder';
export type { InfoReport, RecordDraft, ObjectDraft } from './report/report-builder';
export { buildInfoReport } from './report/inspect';
