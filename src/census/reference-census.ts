import { isIntegerScalar } from '../view/element-kind';
import { TypeMismatchError } from '../view/typed-view';
import { TEXTURE_REFERENCE_ATTRIBUTES, type SceneField } from '../table/builtin-fields';
import type { FieldIdentity } from '../table/field-identity';
import type { TextureReference } from '../config';
import type { EntityBundle } from '../bundle/entity-bundle';
import type { ImageKind, Material, Scene, SkinKind, Texture } from '../bundle/entities';

/** Entity kinds a reference can point at. */
export type ReferenceTarget = 'object' | 'mesh' | 'material' | 'light' | SkinKind | 'texture' | ImageKind;

/** Entity kinds whose data holds references. */
export type ReferenceSourceKind = 'scene' | 'material' | 'texture';

const ALL_SOURCES: readonly ReferenceSourceKind[] = ['scene', 'material', 'texture'];

export const REFERENCE_TARGETS: readonly ReferenceTarget[] = [
  'object',
  'mesh',
  'material',
  'light',
  'skin2d',
  'skin3d',
  'texture',
  'image1d',
  'image2d',
  'image3d',
];

/** Where one reference value was read from. */
export interface ReferenceSource {
  readonly kind: ReferenceSourceKind;
  readonly id: number;
  /** Display label of the field or attribute. */
  readonly field: string;
  /** Field identity; absent for the texture image id, which is a plain record field. */
  readonly identity?: FieldIdentity;
  /** Element index within the field. */
  readonly index: number;
}

export interface OutOfRangeReference {
  readonly target: ReferenceTarget;
  /** Raw value; a bigint when a 64-bit value exceeds the safe integer range. */
  readonly value: number | bigint;
  readonly source: ReferenceSource;
  readonly reason: string;
}

export interface CensusEntry {
  readonly id: number;
  readonly count: number;
}

export interface CensusOptions {
  /** Custom material attributes counted as texture references. */
  textureReferences?: readonly TextureReference[];
  /** Source kinds the caller walks. Default: all of them. */
  sources?: readonly ReferenceSourceKind[];
}

const COVERED_BY: Record<ReferenceTarget, ReferenceSourceKind> = {
  object: 'scene',
  mesh: 'scene',
  material: 'scene',
  light: 'scene',
  skin2d: 'scene',
  skin3d: 'scene',
  texture: 'material',
  image1d: 'texture',
  image2d: 'texture',
  image3d: 'texture',
};

/** Immutable outcome of one census pass. */
export class CensusResult {
  constructor(
    private readonly targetCounts: Readonly<Record<ReferenceTarget, number>>,
    private readonly sourcesById: ReadonlyMap<ReferenceTarget, ReadonlyMap<number, readonly ReferenceSource[]>>,
    private readonly outOfRangeList: readonly OutOfRangeReference[],
    private readonly walked: ReadonlySet<ReferenceSourceKind>,
    private readonly occurrenceCounts: Readonly<Record<ReferenceTarget, number>>,
  ) {}

  /** Whether references to `target` were looked for at all. */
  covers(target: ReferenceTarget): boolean {
    return this.walked.has(COVERED_BY[target]);
  }

  /** Number of entities of the target kind. */
  targetCount(target: ReferenceTarget): number {
    return this.targetCounts[target];
  }

  count(target: ReferenceTarget, id: number): number {
    return this.sources(target, id).length;
  }

  /** In-range references to one target id, in walk order. */
  sources(target: ReferenceTarget, id: number): readonly ReferenceSource[] {
    return this.sourcesById.get(target)?.get(id) ?? [];
  }

  /** Referenced ids in ascending order. */
  entries(target: ReferenceTarget): CensusEntry[] {
    const byId = this.sourcesById.get(target);
    if (!byId) return [];
    return [...byId.keys()].sort((a, b) => a - b).map((id) => ({ id, count: this.count(target, id) }));
  }

  unreferenced(target: ReferenceTarget): number[] {
    const out: number[] = [];
    for (let id = 0; id < this.targetCounts[target]; id++) {
      if (this.count(target, id) === 0) out.push(id);
    }
    return out;
  }

  /** Ids referenced at least twice. */
  shared(target: ReferenceTarget): number[] {
    return this.entries(target).filter((e) => e.count >= 2).map((e) => e.id);
  }

  /** Out-of-range records in walk order, optionally for one target kind. */
  outOfRange(target?: ReferenceTarget): readonly OutOfRangeReference[] {
    if (target === undefined) return this.outOfRangeList;
    return this.outOfRangeList.filter((r) => r.target === target);
  }

  /** Every reference value walked for `target`, in range or not. */
  occurrences(target: ReferenceTarget): number {
    return this.occurrenceCounts[target];
  }
}

function sceneFieldTarget(field: SceneField, dimensions: 2 | 3 | undefined): ReferenceTarget | undefined {
  switch (field) {
    case 'Mesh': return 'mesh';
    case 'MeshMaterial': return 'material';
    case 'Light': return 'light';
    case 'Skin': return dimensions === 2 ? 'skin2d' : 'skin3d';
    default: return undefined;
  }
}

function zeroCounts(): Record<ReferenceTarget, number> {
  return {
    object: 0,
    mesh: 0,
    material: 0,
    light: 0,
    skin2d: 0,
    skin3d: 0,
    texture: 0,
    image1d: 0,
    image2d: 0,
    image3d: 0,
  };
}

/**
 * Single-pass accumulator of cross references. Feed it every scene,
 * material and texture, then call finalize() once.
 */
export class ReferenceCensus {
  private readonly targetCounts: Record<ReferenceTarget, number>;
  private readonly textureReferences: readonly TextureReference[];
  private readonly walked: Set<ReferenceSourceKind>;
  private readonly sourcesById = new Map<ReferenceTarget, Map<number, ReferenceSource[]>>();
  private readonly outOfRangeList: OutOfRangeReference[] = [];
  private readonly occurrenceCounts = zeroCounts();
  private finalized = false;

  constructor(targetCounts: Partial<Record<ReferenceTarget, number>>, options: CensusOptions = {}) {
    this.targetCounts = { ...zeroCounts(), ...targetCounts };
    this.textureReferences = options.textureReferences ?? [];
    this.walked = new Set<ReferenceSourceKind>(options.sources ?? ALL_SOURCES);
  }

  /**
   * Every mapping value references an object; Mesh, MeshMaterial, Light and
   * Skin values reference their entity kinds.
   */
  addScene(scene: Scene): void {
    this.open('scene');
    const { table } = scene;
    table.entries.forEach((entry, i) => {
      const field = table.label(entry.identity);
      const source = (index: number): ReferenceSource =>
        ({ kind: 'scene', id: scene.id, field, identity: entry.identity, index });

      const objects: Array<number | bigint> = entry.mapping ? entry.mapping.integers() : table.rows(i);
      objects.forEach((object, index) => this.add('object', object, source(index)));

      if (entry.identity.type !== 'builtin') return;
      const target = sceneFieldTarget(entry.identity.name, scene.dimensions);
      if (!target) return;
      entry.data.integers().forEach((value, index) => this.add(target, value, source(index)));
    });
  }

  /**
   * Builtin texture attributes, plus custom attributes listed in
   * `textureReferences` whose value is an UnsignedInt.
   */
  addMaterial(material: Material): void {
    this.open('material');
    let index = 0;
    for (const layer of material.layers) {
      for (const attribute of layer.attributes) {
        const { identity, value, label } = attribute;
        const source: ReferenceSource = { kind: 'material', id: material.id, field: label, identity, index: index++ };
        if (identity.type === 'builtin') {
          if (!TEXTURE_REFERENCE_ATTRIBUTES.has(identity.name)) continue;
          if (value.type !== 'numeric') {
            throw new TypeMismatchError(`an integer texture id for ${label}`, value.type === 'bool' ? 'Bool' : 'String');
          }
          if (value.kind.type !== 'scalar' || !isIntegerScalar(value.kind.scalar)) {
            throw new TypeMismatchError(`an integer texture id for ${label}`, value.kind);
          }
          this.add('texture', value.components[0], source);
        } else if (this.optedIn(identity.id, attribute.name)) {
          if (value.type !== 'numeric' || value.kind.type !== 'scalar' || value.kind.scalar !== 'UnsignedInt') continue;
          this.add('texture', value.components[0], source);
        }
      }
    }
  }

  addTexture(texture: Texture): void {
    this.open('texture');
    this.add(texture.imageKind, texture.image, { kind: 'texture', id: texture.id, field: 'image', index: 0 });
  }

  finalize(): CensusResult {
    this.finalized = true;
    return new CensusResult(
      { ...this.targetCounts },
      this.sourcesById,
      this.outOfRangeList,
      this.walked,
      { ...this.occurrenceCounts },
    );
  }

  private optedIn(id: number, name: string | undefined): boolean {
    return this.textureReferences.some((ref) => (typeof ref === 'number' ? ref === id : ref === name));
  }

  private open(kind: ReferenceSourceKind): void {
    if (this.finalized) throw new Error('Census already finalized');
    this.walked.add(kind);
  }

  private add(target: ReferenceTarget, value: number | bigint, source: ReferenceSource): void {
    this.occurrenceCounts[target]++;
    const count = this.targetCounts[target];
    if (typeof value === 'bigint' || !Number.isInteger(value) || value < 0 || value >= count) {
      this.outOfRangeList.push({ target, value, source, reason: `expected an id in [0, ${count})` });
      return;
    }
    let byId = this.sourcesById.get(target);
    if (!byId) {
      byId = new Map();
      this.sourcesById.set(target, byId);
    }
    const list = byId.get(value);
    if (list) list.push(source);
    else byId.set(value, [source]);
  }
}

/** Target counts as the bundle reports them. */
export function targetCounts(bundle: EntityBundle): Record<ReferenceTarget, number> {
  const counts = zeroCounts();
  for (const target of REFERENCE_TARGETS) counts[target] = bundle.count(target);
  return counts;
}

/**
 * Walk every scene, material and texture of a bundle. Entities that fail to
 * load are skipped; the bundle records the failure.
 */
export function takeCensus(bundle: EntityBundle, options: CensusOptions = {}): CensusResult {
  const sources = new Set<ReferenceSourceKind>(options.sources ?? ALL_SOURCES);
  const census = new ReferenceCensus(targetCounts(bundle), { ...options, sources: [...sources] });
  if (sources.has('scene')) {
    for (let id = 0; id < bundle.count('scene'); id++) {
      const scene = bundle.scene(id);
      if (scene) census.addScene(scene);
    }
  }
  if (sources.has('material')) {
    for (let id = 0; id < bundle.count('material'); id++) {
      const material = bundle.material(id);
      if (material) census.addMaterial(material);
    }
  }
  if (sources.has('texture')) {
    for (let id = 0; id < bundle.count('texture'); id++) {
      const texture = bundle.texture(id);
      if (texture) census.addTexture(texture);
    }
  }
  return census.finalize();
}
