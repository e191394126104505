import { formatKind, type ElementKind, type ScalarKind } from '../view/element-kind';
import type { Ownership } from '../view/typed-view';
import type { AttributeEntry, AttributeTable } from '../table/attribute-table';
import type { FieldIdentity } from '../table/field-identity';
import type {
  Extrapolation,
  Interpolation,
  LightType,
  MaterialType,
  MaterialValue,
  MeshPrimitive,
  SamplerFilter,
  SamplerMipmap,
  SamplerWrapping,
  TextureType,
} from '../bundle/importer';
import type { ImageKind, SkinKind } from '../bundle/entities';
import type { ReportSection } from '../config';
import { computeBounds, type Bounds } from './bounds';

/** Layout of one attribute table entry. */
export interface FieldSummary {
  identity: FieldIdentity;
  /** Resolved name, or `Custom(n)` for an unnamed custom field. */
  label: string;
  name?: string;
  /** Formatted element kind, e.g. `Vector3` or `Short[3]`. */
  kind: string;
  elementKind: ElementKind;
  count: number;
  /** Only for array attributes. */
  arity?: number;
  /** Occurrence index when the identity repeats within the table. */
  duplicate?: number;
  orderedMapping?: boolean;
  bounds?: Bounds;
}

/** How often a scene field maps an object. */
export interface ObjectUsage {
  identity: FieldIdentity;
  label: string;
  count: number;
}

interface RecordBase {
  id: number;
  name?: string;
  /** Census count. Set when the referring sections were walked. */
  references?: number;
}

export interface SceneRecord extends RecordBase {
  section: 'scenes';
  mappingKind: ScalarKind;
  mappingBound: number;
  dimensions?: 2 | 3;
  ownership: Ownership;
  fields: FieldSummary[];
}

export interface ObjectRecord extends RecordBase {
  section: 'objects';
  fields: ObjectUsage[];
  references: number;
  unreferenced: boolean;
}

export interface TrackSummary extends FieldSummary {
  object: number;
  interpolation: Interpolation;
  before: Extrapolation;
  after: Extrapolation;
  duration?: [number, number];
}

export interface AnimationRecord extends RecordBase {
  section: 'animations';
  duration: [number, number];
  ownership: Ownership;
  tracks: TrackSummary[];
}

export interface SkinRecord extends RecordBase {
  section: 'skins';
  kind: SkinKind;
  jointCount: number;
  ownership: Ownership;
  fields: FieldSummary[];
}

export interface LightRecord extends RecordBase {
  section: 'lights';
  type: LightType;
  color: [number, number, number];
  intensity: number;
  attenuation: [number, number, number];
  range: number;
  innerConeAngle: number;
  outerConeAngle: number;
}

export interface MaterialAttributeSummary {
  identity: FieldIdentity;
  label: string;
  name?: string;
  /** `Bool`, `String` or a formatted numeric kind. */
  kind: string;
  value: MaterialValue;
}

export interface MaterialLayerSummary {
  index: number;
  name?: string;
  attributes: MaterialAttributeSummary[];
}

export interface MaterialRecord extends RecordBase {
  section: 'materials';
  types: MaterialType[];
  layers: MaterialLayerSummary[];
}

export interface IndexSummary {
  kind: string;
  count: number;
  ownership: Ownership;
  bounds?: Bounds;
}

export interface MeshRecord extends RecordBase {
  section: 'meshes';
  level: number;
  primitive: MeshPrimitive;
  vertexCount: number;
  vertexOwnership: Ownership;
  indices?: IndexSummary;
  fields: FieldSummary[];
}

export interface TextureRecord extends RecordBase {
  section: 'textures';
  type: TextureType;
  minificationFilter: SamplerFilter;
  magnificationFilter: SamplerFilter;
  mipmapFilter: SamplerMipmap;
  wrapping: [SamplerWrapping, SamplerWrapping, SamplerWrapping];
  image: number;
  imageKind: ImageKind;
}

export interface ImageLevelSummary {
  format: string;
  size: number[];
  compressed: boolean;
}

export interface ImageRecord extends RecordBase {
  section: 'images';
  kind: ImageKind;
  levels: ImageLevelSummary[];
}

export type ReportRecord =
  | SceneRecord
  | ObjectRecord
  | AnimationRecord
  | SkinRecord
  | LightRecord
  | MaterialRecord
  | MeshRecord
  | TextureRecord
  | ImageRecord;

export type RecordOf<S extends ReportSection> = Extract<ReportRecord, { section: S }>;

/**
 * Summaries of every entry of a table, in table order. `withBounds`
 * selects the entries that get a min/max.
 */
export function summarizeTable<B extends string, X>(
  table: AttributeTable<B, X>,
  withBounds: (entry: AttributeEntry<B, X>) => boolean = () => false,
): FieldSummary[] {
  return table.entries.map((entry, i) => {
    const { identity, data } = entry;
    const summary: FieldSummary = {
      identity,
      label: table.label(identity),
      kind: formatKind(data.kind),
      elementKind: data.kind,
      count: data.count,
    };
    const name = table.resolveName(identity);
    if (name !== undefined) summary.name = name;
    if (data.kind.type === 'array') summary.arity = data.kind.arity;
    if (table.isDuplicated(i)) summary.duplicate = table.occurrence(i);
    if (entry.orderedMapping) summary.orderedMapping = true;
    if (withBounds(entry)) {
      const bounds = computeBounds(data);
      if (bounds) summary.bounds = bounds;
    }
    return summary;
  });
}

export function materialValueKind(value: MaterialValue): string {
  switch (value.type) {
    case 'bool': return 'Bool';
    case 'string': return 'String';
    case 'numeric': return formatKind(value.kind);
  }
}
