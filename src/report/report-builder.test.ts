import { describe, it, expect } from 'vitest';
import { scalarKind } from '../view/element-kind';
import { TypedView } from '../view/typed-view';
import { builtinField, customField } from '../table/field-identity';
import { createScene } from '../bundle/entities';
import { ReferenceCensus } from '../census/reference-census';
import type { ReportSection } from '../config';
import { ReportBuilder, objectUsage, recordsOf } from './report-builder';
import type { LightRecord, TextureRecord } from './records';

const u32 = (values: number[]) => TypedView.fromArray(new Uint32Array(values), scalarKind('UnsignedInt'));

function sceneCensus() {
  const census = new ReferenceCensus({ object: 4, mesh: 2, light: 1, texture: 1 }, { sources: ['scene'] });
  census.addScene(createScene(0, undefined, {
    mappingKind: 'UnsignedInt',
    mappingBound: 4,
    fields: [
      { identity: customField(9), mapping: u32([2]), data: u32([0]) },
      { identity: builtinField('Mesh'), mapping: u32([2, 0]), data: u32([1, 1]) },
      { identity: builtinField('Parent'), mapping: u32([2]), data: u32([0]) },
    ],
  }));
  return census.finalize();
}

const light: LightRecord = {
  section: 'lights',
  id: 0,
  type: 'Ambient',
  color: [1, 1, 1],
  intensity: 1,
  attenuation: [1, 0, 0],
  range: Infinity,
  innerConeAngle: 360,
  outerConeAngle: 360,
};

const texture: TextureRecord = {
  section: 'textures',
  id: 0,
  type: 'Texture2D',
  minificationFilter: 'Linear',
  magnificationFilter: 'Linear',
  mipmapFilter: 'Base',
  wrapping: ['Repeat', 'Repeat', 'Repeat'],
  image: 0,
  imageKind: 'image2d',
};

const sections = (...names: ReportSection[]) => new Set<ReportSection>(names);

describe('objectUsage', () => {
  it('groups sources by field, builtins first', () => {
    expect(objectUsage(sceneCensus(), 2)).toEqual([
      { identity: builtinField('Parent'), label: 'Parent', count: 1 },
      { identity: builtinField('Mesh'), label: 'Mesh', count: 1 },
      { identity: customField(9), label: 'Custom(9)', count: 1 },
    ]);
  });
});

describe('ReportBuilder', () => {
  it('orders records by section', () => {
    const builder = new ReportBuilder(sections('objects', 'lights'));
    builder.add(light);
    builder.add({ section: 'objects', id: 3 });
    const report = builder.build({ census: sceneCensus() });
    expect(report.records.map((r) => r.section)).toEqual(['objects', 'lights']);
  });

  it('annotates objects from the census', () => {
    const builder = new ReportBuilder(sections('objects'));
    builder.add({ section: 'objects', id: 0 });
    builder.add({ section: 'objects', id: 3, name: 'Lamp' });
    const [first, second] = recordsOf(builder.build({ census: sceneCensus() }), 'objects');
    expect(first).toEqual({
      section: 'objects',
      id: 0,
      fields: [{ identity: builtinField('Mesh'), label: 'Mesh', count: 1 }],
      references: 1,
      unreferenced: false,
    });
    expect(second).toMatchObject({ id: 3, name: 'Lamp', fields: [], references: 0, unreferenced: true });
  });

  it('needs a scene census for object records', () => {
    const builder = new ReportBuilder(sections('objects'));
    builder.add({ section: 'objects', id: 0 });
    expect(() => builder.build()).toThrow('Object records need a census that walked the scenes');
  });

  it('adds reference counts only for covered targets', () => {
    const builder = new ReportBuilder(sections('lights', 'textures'));
    builder.add(light);
    builder.add(texture);
    const report = builder.build({ census: sceneCensus() });
    expect(recordsOf(report, 'lights')[0].references).toBe(0);
    expect(recordsOf(report, 'textures')[0].references).toBeUndefined();
  });

  it('rejects records of unselected sections', () => {
    const builder = new ReportBuilder(sections('lights'));
    expect(() => builder.add(texture)).toThrow('Section textures was not selected');
  });

  it('fails the report when any import failed', () => {
    const builder = new ReportBuilder(sections());
    builder.setCount('scene', 1);
    const report = builder.build({ failures: [{ kind: 'scene', id: 0, message: "Can't import scene 0" }], importMilliseconds: 3 });
    expect(report.ok).toBe(false);
    expect(report.counts).toEqual({ scene: 1 });
    expect(report.records).toEqual([]);
    expect(report.importMilliseconds).toBe(3);
  });
});
