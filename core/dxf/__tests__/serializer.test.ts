import { DxfError, DxfErrorCode, MalformedValueError, VersionError } from '../../errors/types';
import { ErrorReporterImpl, createErrorReporter } from '../../errors/reporter';
import { assemble } from '../assembler';
import { defineTable, member, repeated } from '../descriptors/builders';
import { circleTable } from '../entities/circle';
import { imageTable } from '../entities/image';
import { lineTable } from '../entities/line';
import { lwpolylineTable } from '../entities/lwpolyline';
import { proxyEntityTable } from '../entities/proxy-entity';
import { StringLineSource } from '../io/line-source';
import { StringLineSink } from '../io/line-sink';
import { TagReader } from '../io/tag-reader';
import { formatTags } from '../io/tag-writer';
import { DxfEntity } from '../ownership/entity';
import { serialize, writeEntities, writeEntity } from '../serializer';
import { DescriptorTable, DxfTag } from '../types';
import { DxfVersion, VersionContext } from '../version';
import { contextFor, readerFor } from './fixtures';

const R12 = contextFor(DxfVersion.R12);
const R13 = contextFor(DxfVersion.R13);
const R14 = contextFor(DxfVersion.R14);
const R2000 = contextFor(DxfVersion.R2000);

function codes(tags: DxfTag[]): number[] {
  return tags.map(tag => tag.code);
}

function valueOf(tags: DxfTag[], code: number): string | undefined {
  return tags.find(tag => tag.code === code)?.value;
}

/**
 * Read serialized text back, consuming its own group 0 opener
 */
function reassemble(text: string, table: DescriptorTable, ctx: VersionContext): DxfEntity {
  const reader = new TagReader(new StringLineSource(`${text}  0\nENDSEC\n`));
  reader.nextTag();
  return assemble(reader, table, ctx, { reporter: createErrorReporter() }).entity;
}

describe('serialize', () => {
  let reporter: ErrorReporterImpl;

  beforeEach(() => {
    reporter = createErrorReporter();
  });

  it('should suppress explicit defaults and reproduce its own output', () => {
    const pairs: Array<[number, string]> = [
      [5, '1A'],
      [8, '0'],
      [6, 'BYLAYER'],
      [62, '256'],
      [10, '0'],
      [20, '0'],
      [30, '0'],
      [40, '5'],
      [0, 'EOF']
    ];
    const { entity } = assemble(readerFor(pairs), circleTable, R12, { reporter });

    const first = formatTags(serialize(entity, circleTable, R12, { reporter }));
    const second = formatTags(serialize(reassemble(first, circleTable, R12), circleTable, R12, { reporter }));

    expect(first).toBe('  0\nCIRCLE\n  5\n1A\n  8\n0\n 10\n0.000000\n 20\n0.000000\n 30\n0.000000\n 40\n5.000000\n');
    expect(second).toBe(first);
  });

  it('should write lineweight only from R2000 on', () => {
    const circle = new DxfEntity(circleTable);
    circle.set('lineweight', 25);

    expect(valueOf(serialize(circle, circleTable, R14, { reporter }), 370)).toBeUndefined();
    expect(valueOf(serialize(circle, circleTable, R2000, { reporter }), 370)).toBe('25');
  });

  it('should pick the graphics data size code from the context', () => {
    const proxy = new DxfEntity(proxyEntityTable);
    proxy.set('graphicsDataSize', 1024);

    const normal = serialize(proxy, proxyEntityTable, R2000, { reporter });
    const large = serialize(proxy, proxyEntityTable, contextFor(DxfVersion.R2000, { largeGraphicsDataSize: true }), {
      reporter
    });
    const old = serialize(proxy, proxyEntityTable, R14, { reporter });

    expect(valueOf(normal, 92)).toBe('1024');
    expect(valueOf(normal, 160)).toBeUndefined();
    expect(valueOf(large, 160)).toBe('1024');
    expect(valueOf(large, 92)).toBeUndefined();
    expect(codes(old)).not.toContain(92);
    expect(codes(old)).not.toContain(160);
  });

  it('should write the proxy class ids even at their defaults', () => {
    const proxy = new DxfEntity(proxyEntityTable);
    const tags = serialize(proxy, proxyEntityTable, R2000, { reporter });

    expect(valueOf(tags, 90)).toBe('498');
    expect(valueOf(tags, 91)).toBe('500');
  });

  it('should drop application groups below R14', () => {
    const circle = new DxfEntity(circleTable);
    circle.set('softOwner', '1F');

    expect(codes(serialize(circle, circleTable, R13, { reporter }))).not.toContain(102);
    expect(serialize(circle, circleTable, R14, { reporter }).slice(1, 5)).toEqual([
      { code: 5, value: '0' },
      { code: 102, value: '{ACAD_REACTORS' },
      { code: 330, value: '1F' },
      { code: 102, value: '}' }
    ]);
  });

  it('should refuse a kind the version lacks in strict mode', () => {
    const image = new DxfEntity(imageTable);
    const strict = contextFor(DxfVersion.R12, { strict: true });

    expect(() => serialize(image, imageTable, strict, { reporter })).toThrow(VersionError);
    expect(() => serialize(image, imageTable, strict, { reporter })).toThrow(
      'IMAGE does not exist in AC1009 (requires AC1014)'
    );
  });

  it('should warn and still write a kind the version lacks outside strict mode', () => {
    const image = new DxfEntity(imageTable);

    const tags = serialize(image, imageTable, R12, { reporter });

    expect(tags[0]).toEqual({ code: 0, value: 'IMAGE' });
    const [warning] = reporter.getWarnings();
    expect(warning.code).toBe(DxfErrorCode.VERSION_MISMATCH);
    expect(warning.details).toEqual({ kind: 'IMAGE', version: DxfVersion.R12 });
  });

  it('should reject a table of another kind', () => {
    let caught: unknown;
    try {
      serialize(new DxfEntity(lineTable), circleTable, R12, { reporter });
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof DxfError && caught.code).toBe(DxfErrorCode.FIELD_TYPE);
  });

  it('should write handles as hexadecimal', () => {
    const line = new DxfEntity(lineTable);
    line.set('handle', 255);
    expect(serialize(line, lineTable, R12, { reporter })[1]).toEqual({ code: 5, value: 'FF' });
  });

  it('should write the actual list length as the count', () => {
    const polyline = new DxfEntity(lwpolylineTable);
    polyline.set('vertexCount', 7);
    polyline.list('vertices').append({ x: 0, y: 0, startWidth: 0, endWidth: 0, bulge: 0 });
    polyline.list('vertices').append({ x: 2, y: 1.5, startWidth: 0, endWidth: 0, bulge: 0.25 });

    const tags = serialize(polyline, lwpolylineTable, R2000, { reporter });
    const start = tags.findIndex(tag => tag.code === 90);

    expect(tags[start]).toEqual({ code: 90, value: '2' });
    expect(tags.slice(-5)).toEqual([
      { code: 10, value: '0.000000' },
      { code: 20, value: '0.000000' },
      { code: 10, value: '2.000000' },
      { code: 20, value: '1.500000' },
      { code: 42, value: '0.250000' }
    ]);
  });

  it('should write vertex widths and bulge only when nonzero', () => {
    const polyline = new DxfEntity(lwpolylineTable);
    polyline.list('vertices').append({ x: 1, y: 2, startWidth: 0.5, endWidth: 0, bulge: 0 });
    polyline.list('vertices').append({ x: 3, y: 4, startWidth: 0, endWidth: 0.75, bulge: -1 });

    const tags = serialize(polyline, lwpolylineTable, R2000, { reporter });

    expect(tags.slice(-7)).toEqual([
      { code: 10, value: '1.000000' },
      { code: 20, value: '2.000000' },
      { code: 40, value: '0.500000' },
      { code: 10, value: '3.000000' },
      { code: 20, value: '4.000000' },
      { code: 41, value: '0.750000' },
      { code: 42, value: '-1.000000' }
    ]);
  });

  it('should refuse optional members in lists without an opening member', () => {
    const points = [member('x', 10), member('weight', 40, 'double', { optional: true })];
    const table: DescriptorTable = { kind: 'TRACE_PATH', fields: [repeated('points', points)], defaults: () => ({}) };

    expect(() => defineTable(table)).toThrow(
      'Invalid descriptor table TRACE_PATH: optional member "weight" of "points" needs another member to open nodes'
    );
    expect(defineTable({ ...table, fields: [repeated('points', points, { openOn: 10 })] }).kind).toBe('TRACE_PATH');
  });

  it('should write elevation as group 38 only up to R12', () => {
    const line = new DxfEntity(lineTable);
    line.set('elevation', 5);

    expect(valueOf(serialize(line, lineTable, R12, { reporter }), 38)).toBe('5.000000');
    expect(valueOf(serialize(line, lineTable, R13, { reporter }), 38)).toBeUndefined();
  });
});

describe('writing to a sink', () => {
  it('should leave the sink untouched when a value cannot be written', () => {
    const circle = new DxfEntity(circleTable);
    circle.set('radius', NaN);
    const sink = new StringLineSink('out');

    expect(() => writeEntity(sink, circle, R12)).toThrow(MalformedValueError);
    expect(sink.toString()).toBe('');
  });

  it('should write all entities or none', () => {
    const good = new DxfEntity(lineTable);
    const bad = new DxfEntity(circleTable);
    bad.set('radius', Infinity);
    const sink = new StringLineSink('out');

    expect(() => writeEntities(sink, [good, bad], R12)).toThrow(MalformedValueError);
    expect(sink.toString()).toBe('');

    writeEntities(sink, [good, new DxfEntity(circleTable)], R12);
    expect(sink.toString()).toBe(
      '  0\nLINE\n  5\n0\n  8\n0\n 10\n0.000000\n 20\n0.000000\n 30\n0.000000\n 11\n0.000000\n 21\n0.000000\n 31\n0.000000\n' +
        '  0\nCIRCLE\n  5\n0\n  8\n0\n 10\n0.000000\n 20\n0.000000\n 30\n0.000000\n 40\n0.000000\n'
    );
  });
});
