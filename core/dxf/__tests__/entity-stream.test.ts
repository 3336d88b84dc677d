import fs from 'fs';
import os from 'os';
import path from 'path';
import { DxfErrorCode, MalformedValueError } from '../../errors/types';
import { ErrorReporterImpl, createErrorReporter } from '../../errors/reporter';
import { BUILT_IN_TABLES, circleTable, lineTable } from '../entities';
import { EntityStream, collectChains, entitiesEqual, readEntities } from '../entity-stream';
import { FileLineSource, StringLineSource } from '../io/line-source';
import { FileLineSink } from '../io/line-sink';
import { TagReader } from '../io/tag-reader';
import { formatTags } from '../io/tag-writer';
import { DxfEntity } from '../ownership/entity';
import { serialize, writeEntities } from '../serializer';
import { DescriptorTable, ListNodeValue } from '../types';
import { DxfVersion } from '../version';
import { TagPair, contextFor, readerFor } from './fixtures';

const R12 = contextFor(DxfVersion.R12);
const R2000 = contextFor(DxfVersion.R2000);

const MIXED: TagPair[] = [
  [0, 'LINE'],
  [8, 'A'],
  [10, '0'],
  [20, '0'],
  [30, '0'],
  [11, '1'],
  [21, '1'],
  [31, '0'],
  [0, 'SPLINE'],
  [8, 'B'],
  [70, '8'],
  [0, 'CIRCLE'],
  [8, 'C'],
  [10, '0'],
  [20, '0'],
  [30, '0'],
  [40, '2'],
  [0, 'LINE'],
  [8, 'D'],
  [0, 'ENDSEC'],
  [0, 'EOF']
];

/**
 * One populated instance of a kind: handle, layer, and one node in every list
 */
function sampleEntity(table: DescriptorTable, handle: number): DxfEntity {
  const entity = new DxfEntity(table);
  entity.set('handle', handle);
  if (entity.hasField('layer')) entity.set('layer', 'L1');
  for (const descriptor of table.fields) {
    if (descriptor.kind !== 'repeated') continue;
    const node: ListNodeValue = {};
    for (const listMember of descriptor.members) {
      node[listMember.key] = listMember.type === 'string' ? 'A1' : 2.5;
    }
    entity.list(descriptor.key).append(node);
  }
  for (const descriptor of table.fields) {
    if (descriptor.kind === 'scalar' && descriptor.countOf !== undefined) {
      entity.set(descriptor.key, entity.list(descriptor.countOf).length);
    }
  }
  return entity;
}

describe('EntityStream', () => {
  let reporter: ErrorReporterImpl;

  beforeEach(() => {
    reporter = createErrorReporter();
  });

  it('should read known kinds and skip unknown ones', () => {
    const stream = new EntityStream(readerFor(MIXED), R12, { reporter });

    const entities = Array.from(stream);

    expect(entities.map(entity => entity.kind)).toEqual(['LINE', 'CIRCLE', 'LINE']);
    expect(entities.map(entity => entity.getString('layer'))).toEqual(['A', 'C', 'D']);
    expect(stream.terminator).toBe('ENDSEC');
    const [warning] = reporter.getWarnings();
    expect(warning.code).toBe(DxfErrorCode.UNKNOWN_ENTITY_KIND);
    expect(warning.details).toMatchObject({ kind: 'SPLINE', lineNumber: 18 });
  });

  it('should stop at EOF', () => {
    const entities = readEntities(readerFor([[0, 'POINT'], [10, '1'], [20, '2'], [30, '3'], [0, 'EOF']]), R12, {
      reporter
    });

    expect(entities).toHaveLength(1);
    expect(entities[0].getPoint('location')).toEqual({ x: 1, y: 2, z: 3 });
  });

  it('should return nothing for empty input', () => {
    const stream = new EntityStream(new TagReader(new StringLineSource('')), R12, { reporter });
    expect(stream.next()).toBeNull();
    expect(stream.terminator).toBeNull();
  });

  it('should skip leading tags before the first group 0', () => {
    const entities = readEntities(readerFor([[8, 'X'], [0, 'LINE'], [8, 'A'], [0, 'EOF']]), R12, { reporter });

    expect(entities.map(entity => entity.kind)).toEqual(['LINE']);
    expect(reporter.getWarnings()[0].message).toBe('Expected group 0, found group 8');
  });

  it('should skip a malformed entity when recovering', () => {
    const pairs: TagPair[] = [[0, 'CIRCLE'], [40, 'bad'], [8, '0'], [0, 'LINE'], [8, 'L'], [0, 'EOF']];

    const entities = readEntities(readerFor(pairs), R12, { reporter, recover: true });

    expect(entities.map(entity => entity.kind)).toEqual(['LINE']);
    const [warning] = reporter.getWarnings();
    expect(warning.code).toBe(DxfErrorCode.ENTITY_SKIPPED);
    expect(warning.details).toMatchObject({ kind: 'CIRCLE', rawValue: 'bad' });
  });

  it('should stop on a malformed entity otherwise', () => {
    const pairs: TagPair[] = [[0, 'CIRCLE'], [40, 'bad'], [0, 'LINE'], [0, 'EOF']];
    const stream = new EntityStream(readerFor(pairs), R12, { reporter });

    expect(() => stream.next()).toThrow(MalformedValueError);
    expect(stream.next()).toBeNull();
  });

  it('should chain entities by kind in drawing order', () => {
    const entities = readEntities(readerFor(MIXED), R12, { reporter });

    const chains = collectChains(entities);

    expect(Array.from(chains.keys())).toEqual(['LINE', 'CIRCLE']);
    const lines = chains.get('LINE');
    expect(lines?.length).toBe(2);
    expect(lines?.first).toBe(entities[0]);
    expect(entities[0].next).toBe(entities[2]);
    expect(chains.get('CIRCLE')?.length).toBe(1);
  });
});

describe('round trip', () => {
  it.each(BUILT_IN_TABLES.map(table => [table.kind, table] as const))(
    'should read back a written %s unchanged',
    (_kind, table) => {
      const original = sampleEntity(table, 0x2a);
      const text = formatTags(serialize(original, table, R2000)) + '  0\nENDSEC\n';
      const reporter = createErrorReporter();

      const [copy, ...rest] = readEntities(new TagReader(new StringLineSource(text)), R2000, { reporter });

      expect(rest).toEqual([]);
      expect(entitiesEqual(copy, original)).toBe(true);
      expect(reporter.getAll()).toEqual([]);
    }
  );

  it('should keep elevation when written at R12', () => {
    const line = new DxfEntity(lineTable);
    line.set('elevation', 5);
    line.set('end', { x: 1, y: 1, z: 0 });
    const text = formatTags(serialize(line, lineTable, R12)) + '  0\nEOF\n';

    const [copy] = readEntities(new TagReader(new StringLineSource(text)), R12);

    expect(copy.getNumber('elevation')).toBe(5);
    expect(entitiesEqual(copy, line)).toBe(true);
  });

  it('should lose fields the target version lacks', () => {
    const circle = sampleEntity(circleTable, 0x10);
    circle.set('lineweight', 25);
    circle.set('softOwner', '1F');
    const text = formatTags(serialize(circle, circleTable, R12)) + '  0\nEOF\n';

    const [copy] = readEntities(new TagReader(new StringLineSource(text)), R12);

    expect(text).not.toContain('370\n');
    expect(copy.getNumber('lineweight')).toBe(-1);
    expect(copy.getString('softOwner')).toBe('');
    expect(copy.getString('layer')).toBe('L1');
  });

  describe('through files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dxf-stream-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write and read entities on disk', () => {
      const file = path.join(dir, 'drawing.dxf');
      const entities = BUILT_IN_TABLES.map((table, index) => sampleEntity(table, index + 1));
      const sink = new FileLineSink(file);
      writeEntities(sink, entities, R2000);
      sink.write('  0\nENDSEC\n');
      sink.close();

      const source = new FileLineSource(file, 128);
      const copies = readEntities(new TagReader(source), R2000, { reporter: createErrorReporter() });
      source.close();

      expect(copies.map(entity => entity.kind)).toEqual(BUILT_IN_TABLES.map(table => table.kind));
      copies.forEach((copy, index) => expect(entitiesEqual(copy, entities[index])).toBe(true));
    });
  });
});
