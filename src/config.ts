import { isCustomId } from './table/field-identity';
import { defaultLogger, type Logger } from './logger';

export type InfoFlag =
  | 'info'
  | 'info-scenes'
  | 'info-objects'
  | 'info-animations'
  | 'info-skins'
  | 'info-lights'
  | 'info-materials'
  | 'info-meshes'
  | 'info-textures'
  | 'info-images'
  | 'bounds';

export type ReportSection =
  | 'scenes'
  | 'objects'
  | 'animations'
  | 'skins'
  | 'lights'
  | 'materials'
  | 'meshes'
  | 'textures'
  | 'images';

/** Sections in report order. */
export const REPORT_SECTIONS: readonly ReportSection[] = [
  'scenes',
  'objects',
  'animations',
  'skins',
  'lights',
  'materials',
  'meshes',
  'textures',
  'images',
];

const SECTION_FLAGS: Record<ReportSection, InfoFlag> = {
  scenes: 'info-scenes',
  objects: 'info-objects',
  animations: 'info-animations',
  skins: 'info-skins',
  lights: 'info-lights',
  materials: 'info-materials',
  meshes: 'info-meshes',
  textures: 'info-textures',
  images: 'info-images',
};

/**
 * A custom material attribute opted into the texture census, either by its
 * custom id or by the name the importer resolves it to.
 */
export type TextureReference = number | string;

/** Configuration for buildInfoReport(). */
export interface InfoConfig {
  flags?: Partial<Record<InfoFlag, boolean>>;
  textureReferences?: readonly TextureReference[];
  logger?: Logger;
}

/** Resolved config with all defaults applied. */
export interface ResolvedInfoConfig {
  sections: ReadonlySet<ReportSection>;
  /** Mesh attribute and index min/max. Only set when the meshes section runs. */
  bounds: boolean;
  textureReferences: readonly TextureReference[];
  logger: Logger;
}

export function validateConfig(config: InfoConfig = {}): ResolvedInfoConfig {
  const flags = config.flags ?? {};
  const logger = config.logger ?? defaultLogger;

  const sections = new Set<ReportSection>(
    flags.info ? REPORT_SECTIONS : REPORT_SECTIONS.filter((s) => flags[SECTION_FLAGS[s]]),
  );

  const textureReferences = config.textureReferences ?? [];
  for (const ref of textureReferences) {
    if (typeof ref === 'number' ? !isCustomId(ref) : ref.length === 0) {
      throw new Error(`textureReferences: invalid custom attribute ${JSON.stringify(ref)}`);
    }
  }

  const meshes = sections.has('meshes');
  if (flags.bounds && !meshes) {
    logger.warn('bounds has no effect unless the meshes section is printed');
  }

  return {
    sections,
    bounds: Boolean(flags.bounds) && meshes,
    textureReferences,
    logger,
  };
}
