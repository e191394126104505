import { formatKind } from '../view/element-kind';
import { validateConfig, type InfoConfig } from '../config';
import { BOUNDED_MESH_ATTRIBUTES } from '../table/builtin-fields';
import { EntityBundle } from '../bundle/entity-bundle';
import {
  trackDuration,
  type Animation,
  type Image,
  type ImageKind,
  type Material,
  type Mesh,
  type Scene,
  type Skin,
  type SkinKind,
} from '../bundle/entities';
import type { SceneImporter } from '../bundle/importer';
import { ReferenceCensus, targetCounts, type ReferenceSourceKind } from '../census/reference-census';
import { computeBounds } from './bounds';
import {
  materialValueKind,
  summarizeTable,
  type AnimationRecord,
  type ImageRecord,
  type IndexSummary,
  type MaterialRecord,
  type MeshRecord,
  type SceneRecord,
  type SkinRecord,
} from './records';
import { ReportBuilder, type InfoReport } from './report-builder';

const SKIN_KINDS: readonly SkinKind[] = ['skin2d', 'skin3d'];
const IMAGE_KINDS: readonly ImageKind[] = ['image1d', 'image2d', 'image3d'];

function sceneRecord(scene: Scene): SceneRecord {
  return {
    section: 'scenes',
    id: scene.id,
    name: scene.name,
    mappingKind: scene.mappingKind,
    mappingBound: scene.table.rowCount,
    dimensions: scene.dimensions,
    ownership: scene.table.ownership,
    fields: summarizeTable(scene.table),
  };
}

function animationRecord(animation: Animation): AnimationRecord {
  const { table } = animation;
  const tracks = summarizeTable(table).map((field, i) => {
    const entry = table.entries[i];
    return {
      ...field,
      ...entry.info,
      duration: trackDuration(entry.mapping ?? entry.data),
    };
  });
  return {
    section: 'animations',
    id: animation.id,
    name: animation.name,
    duration: animation.duration,
    ownership: animation.ownership,
    tracks,
  };
}

function skinRecord(kind: SkinKind, skin: Skin): SkinRecord {
  return {
    section: 'skins',
    kind,
    id: skin.id,
    name: skin.name,
    jointCount: skin.table.rowCount,
    ownership: skin.table.ownership,
    fields: summarizeTable(skin.table),
  };
}

function materialRecord(material: Material): MaterialRecord {
  return {
    section: 'materials',
    id: material.id,
    name: material.name,
    types: material.types,
    layers: material.layers.map((layer) => ({
      index: layer.index,
      name: layer.name,
      attributes: layer.attributes.map((a) => ({
        identity: a.identity,
        label: a.label,
        name: a.name,
        kind: materialValueKind(a.value),
        value: a.value,
      })),
    })),
  };
}

function meshRecord(mesh: Mesh, bounds: boolean): MeshRecord {
  let indices: IndexSummary | undefined;
  if (mesh.indices) {
    indices = { kind: formatKind(mesh.indices.kind), count: mesh.indices.count, ownership: mesh.indices.ownership };
    if (bounds) indices.bounds = computeBounds(mesh.indices);
  }
  return {
    section: 'meshes',
    id: mesh.id,
    level: mesh.level,
    name: mesh.name,
    primitive: mesh.primitive,
    vertexCount: mesh.vertexCount,
    vertexOwnership: mesh.table.ownership,
    indices,
    fields: summarizeTable(mesh.table, ({ identity }) =>
      bounds && identity.type === 'builtin' && BOUNDED_MESH_ATTRIBUTES.has(identity.name)),
  };
}

function imageRecord(image: Image): ImageRecord {
  return {
    section: 'images',
    kind: image.kind,
    id: image.id,
    name: image.name,
    levels: image.levels.map((l) => ({ format: l.format, size: [...l.size], compressed: l.compressed ?? false })),
  };
}

/**
 * Inspect everything an importer holds and build the report for the
 * selected sections. Runs in section order; each entity is fetched, fed to
 * the census and summarized before the next one is fetched. Import failures
 * are logged as they happen and make `ok` false, but never stop the walk.
 */
export function buildInfoReport(importer: SceneImporter, config: InfoConfig = {}): InfoReport {
  const { sections, bounds, textureReferences, logger } = validateConfig(config);
  const bundle = new EntityBundle(importer, { logger });
  const builder = new ReportBuilder(sections);

  const walkScenes = sections.has('scenes') || sections.has('objects');
  const walked: ReferenceSourceKind[] = [];
  if (walkScenes) walked.push('scene');
  if (sections.has('materials')) walked.push('material');
  if (sections.has('textures')) walked.push('texture');
  const census = new ReferenceCensus(targetCounts(bundle), { textureReferences, sources: walked });

  if (walkScenes) {
    const count = bundle.count('scene');
    if (sections.has('scenes')) builder.setCount('scene', count);
    for (let id = 0; id < count; id++) {
      const scene = bundle.scene(id);
      if (!scene) continue;
      census.addScene(scene);
      if (sections.has('scenes')) builder.add(sceneRecord(scene));
    }
  }

  if (sections.has('objects')) {
    const count = bundle.count('object');
    builder.setCount('object', count);
    for (let id = 0; id < count; id++) {
      builder.add({ section: 'objects', id, name: bundle.name('object', id) });
    }
  }

  if (sections.has('animations')) {
    const count = bundle.count('animation');
    builder.setCount('animation', count);
    for (let id = 0; id < count; id++) {
      const animation = bundle.animation(id);
      if (animation) builder.add(animationRecord(animation));
    }
  }

  if (sections.has('skins')) {
    for (const kind of SKIN_KINDS) {
      const count = bundle.count(kind);
      builder.setCount(kind, count);
      for (let id = 0; id < count; id++) {
        const skin = bundle.skin(kind, id);
        if (skin) builder.add(skinRecord(kind, skin));
      }
    }
  }

  if (sections.has('lights')) {
    const count = bundle.count('light');
    builder.setCount('light', count);
    for (let id = 0; id < count; id++) {
      const light = bundle.light(id);
      if (light) builder.add({ section: 'lights', ...light });
    }
  }

  if (sections.has('materials')) {
    const count = bundle.count('material');
    builder.setCount('material', count);
    for (let id = 0; id < count; id++) {
      const material = bundle.material(id);
      if (!material) continue;
      census.addMaterial(material);
      builder.add(materialRecord(material));
    }
  }

  if (sections.has('meshes')) {
    const count = bundle.count('mesh');
    builder.setCount('mesh', count);
    for (let id = 0; id < count; id++) {
      const levels = bundle.meshLevelCount(id);
      for (let level = 0; level < levels; level++) {
        const mesh = bundle.mesh(id, level);
        if (mesh) builder.add(meshRecord(mesh, bounds));
      }
    }
  }

  if (sections.has('textures')) {
    const count = bundle.count('texture');
    builder.setCount('texture', count);
    for (let id = 0; id < count; id++) {
      const texture = bundle.texture(id);
      if (!texture) continue;
      census.addTexture(texture);
      builder.add({ section: 'textures', ...texture });
    }
  }

  if (sections.has('images')) {
    for (const kind of IMAGE_KINDS) {
      const count = bundle.count(kind);
      builder.setCount(kind, count);
      for (let id = 0; id < count; id++) {
        const image = bundle.image(kind, id);
        if (image) builder.add(imageRecord(image));
      }
    }
  }

  return builder.build({
    census: census.finalize(),
    failures: bundle.failures,
    importMilliseconds: bundle.importMilliseconds,
  });
}
