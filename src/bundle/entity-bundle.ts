import { defaultLogger, type Logger } from '../logger';
import { TypeMismatchError } from '../view/typed-view';
import type { ImageData, SceneImporter } from './importer';
import {
  createAnimation,
  createImage,
  createLight,
  createMaterial,
  createMesh,
  createScene,
  createSkin,
  createTexture,
  type Animation,
  type EntityKind,
  type Image,
  type ImageKind,
  type Light,
  type Material,
  type Mesh,
  type Scene,
  type Skin,
  type SkinKind,
  type Texture,
} from './entities';

/** An entity the importer could not produce. */
export interface FetchFailure {
  readonly kind: EntityKind;
  readonly id: number;
  /** Set for multi-level entities. */
  readonly level?: number;
  readonly message: string;
}

export interface EntityBundleOptions {
  logger?: Logger;
  /** Millisecond clock used to time importer calls. Default: performance.now. */
  clock?: () => number;
}

export const KIND_LABELS: Record<EntityKind, string> = {
  scene: 'scene',
  object: 'object',
  animation: 'animation',
  skin2d: '2D skin',
  skin3d: '3D skin',
  light: 'light',
  material: 'material',
  mesh: 'mesh',
  texture: 'texture',
  image1d: '1D image',
  image2d: '2D image',
  image3d: '3D image',
};

const COUNTS: Record<EntityKind, (importer: SceneImporter) => number | undefined> = {
  scene: (i) => i.sceneCount?.(),
  object: (i) => i.objectCount?.(),
  animation: (i) => i.animationCount?.(),
  skin2d: (i) => i.skin2DCount?.(),
  skin3d: (i) => i.skin3DCount?.(),
  light: (i) => i.lightCount?.(),
  material: (i) => i.materialCount?.(),
  mesh: (i) => i.meshCount?.(),
  texture: (i) => i.textureCount?.(),
  image1d: (i) => i.image1DCount?.(),
  image2d: (i) => i.image2DCount?.(),
  image3d: (i) => i.image3DCount?.(),
};

const NAMES: Record<EntityKind, (importer: SceneImporter, id: number) => string | undefined> = {
  scene: (i, id) => i.sceneName?.(id),
  object: (i, id) => i.objectName?.(id),
  animation: (i, id) => i.animationName?.(id),
  skin2d: (i, id) => i.skin2DName?.(id),
  skin3d: (i, id) => i.skin3DName?.(id),
  light: (i, id) => i.lightName?.(id),
  material: (i, id) => i.materialName?.(id),
  mesh: (i, id) => i.meshName?.(id),
  texture: (i, id) => i.textureName?.(id),
  image1d: (i, id) => i.image1DName?.(id),
  image2d: (i, id) => i.image2DName?.(id),
  image3d: (i, id) => i.image3DName?.(id),
};

interface ImageAccess {
  levels(importer: SceneImporter, id: number): number | undefined;
  fetch(importer: SceneImporter, id: number, level: number): ImageData | null | undefined;
}

const IMAGES: Record<ImageKind, ImageAccess> = {
  image1d: { levels: (i, id) => i.image1DLevelCount?.(id), fetch: (i, id, l) => i.image1D?.(id, l) },
  image2d: { levels: (i, id) => i.image2DLevelCount?.(id), fetch: (i, id, l) => i.image2D?.(id, l) },
  image3d: { levels: (i, id) => i.image3DLevelCount?.(id), fetch: (i, id, l) => i.image3D?.(id, l) },
};

function validCount(value: number | undefined, what: string): number {
  const n = value ?? 0;
  if (!Number.isInteger(n) || n < 0) throw new Error(`Importer reported an invalid ${what} count: ${n}`);
  return n;
}

/**
 * Lazy view of everything an importer holds. Entities are fetched and
 * turned into tables or records on each request and not retained; a fetch
 * failure is recorded and logged once per entity and never stops the caller
 * from going on with the next one.
 */
export class EntityBundle {
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly failed = new Set<string>();
  private readonly failureList: FetchFailure[] = [];
  private elapsed = 0;

  constructor(private readonly importer: SceneImporter, options: EntityBundleOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => performance.now());
  }

  /** Failures in the order they happened. */
  get failures(): readonly FetchFailure[] {
    return this.failureList;
  }

  /** Time spent inside importer fetch calls. */
  get importMilliseconds(): number {
    return this.elapsed;
  }

  count(kind: EntityKind): number {
    return validCount(COUNTS[kind](this.importer), KIND_LABELS[kind]);
  }

  /** Display name; empty names are reported as absent. */
  name(kind: EntityKind, id: number): string | undefined {
    return NAMES[kind](this.importer, id) || undefined;
  }

  meshLevelCount(id: number): number {
    return validCount(this.importer.meshLevelCount?.(id) ?? 1, 'mesh level');
  }

  imageLevelCount(kind: ImageKind, id: number): number {
    return validCount(IMAGES[kind].levels(this.importer, id) ?? 1, `${KIND_LABELS[kind]} level`);
  }

  scene(id: number): Scene | null {
    return this.fetch('scene', id, undefined, () => this.importer.scene?.(id), (data) =>
      createScene(id, this.name('scene', id), data, (f) => this.importer.sceneFieldName?.(f)));
  }

  animation(id: number): Animation | null {
    return this.fetch('animation', id, undefined, () => this.importer.animation?.(id), (data) =>
      createAnimation(id, this.name('animation', id), data));
  }

  skin(kind: SkinKind, id: number): Skin | null {
    return this.fetch(
      kind,
      id,
      undefined,
      () => (kind === 'skin2d' ? this.importer.skin2D?.(id) : this.importer.skin3D?.(id)),
      (data) => createSkin(id, this.name(kind, id), kind, data),
    );
  }

  light(id: number): Light | null {
    return this.fetch('light', id, undefined, () => this.importer.light?.(id), (data) =>
      createLight(id, this.name('light', id), data));
  }

  material(id: number): Material | null {
    return this.fetch('material', id, undefined, () => this.importer.material?.(id), (data) =>
      createMaterial(id, this.name('material', id), data, (a) => this.importer.materialAttributeName?.(a)));
  }

  mesh(id: number, level = 0): Mesh | null {
    const levelKey = this.meshLevelCount(id) > 1 ? level : undefined;
    return this.fetch('mesh', id, levelKey, () => this.importer.mesh?.(id, level), (data) =>
      createMesh(id, level, this.name('mesh', id), data, (a) => this.importer.meshAttributeName?.(a)));
  }

  texture(id: number): Texture | null {
    return this.fetch('texture', id, undefined, () => this.importer.texture?.(id), (data) =>
      createTexture(id, this.name('texture', id), data));
  }

  /** All levels of an image; null if any level fails. */
  image(kind: ImageKind, id: number): Image | null {
    const count = this.imageLevelCount(kind, id);
    const levels: ImageData[] = [];
    for (let level = 0; level < count; level++) {
      const levelKey = count > 1 ? level : undefined;
      const data = this.fetch(kind, id, levelKey, () => IMAGES[kind].fetch(this.importer, id, level), (d) => d);
      if (!data) return null;
      levels.push(data);
    }
    return this.guard(kind, id, undefined, () => createImage(id, this.name(kind, id), kind, levels));
  }

  /**
   * Load raw data through the importer, timed, and turn it into an entity.
   * Null data and errors from either step become a failure.
   */
  private fetch<D, T>(
    kind: EntityKind,
    id: number,
    level: number | undefined,
    load: () => D | null | undefined,
    build: (data: D) => T,
  ): T | null {
    const start = this.clock();
    let data: D | null | undefined = null;
    try {
      data = this.guard(kind, id, level, load);
    } finally {
      this.elapsed += this.clock() - start;
    }
    if (!data) {
      this.fail(kind, id, level, undefined);
      return null;
    }
    const loaded = data;
    return this.guard(kind, id, level, () => build(loaded));
  }

  /** Run `step`; an error other than a kind mismatch is recorded as a failure. */
  private guard<T>(kind: EntityKind, id: number, level: number | undefined, step: () => T): T | null {
    try {
      return step();
    } catch (err) {
      // A kind mismatch is a broken importer contract, not a missing entity.
      if (err instanceof TypeMismatchError) throw err;
      this.fail(kind, id, level, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  private fail(kind: EntityKind, id: number, level: number | undefined, reason: string | undefined): void {
    const key = `${kind}:${id}:${level ?? ''}`;
    if (this.failed.has(key)) return;
    this.failed.add(key);

    let message = `Can't import ${KIND_LABELS[kind]} ${id}`;
    if (level !== undefined) message += ` level ${level}`;
    if (reason) message += `: ${reason}`;
    this.failureList.push(level !== undefined ? { kind, id, level, message } : { kind, id, message });
    this.logger.error(message);
  }
}
