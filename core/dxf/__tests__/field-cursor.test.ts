import { circleTable } from '../entities/circle';
import { imageTable } from '../entities/image';
import { lwpolylineTable } from '../entities/lwpolyline';
import { proxyEntityTable } from '../entities/proxy-entity';
import { FieldCursor, lookup } from '../descriptors/field-cursor';
import { RepeatedDescriptor } from '../types';

function repeatedField(key: string, fields: typeof circleTable.fields): RepeatedDescriptor {
  const found = fields.find((descriptor): descriptor is RepeatedDescriptor =>
    descriptor.kind === 'repeated' && descriptor.key === key
  );
  if (!found) throw new Error(`missing repeated field ${key}`);
  return found;
}

describe('field lookup', () => {
  it('should resolve scalars and point axes', () => {
    const cursor = new FieldCursor();

    const radius = lookup(circleTable, 40, cursor);
    expect(radius.type === 'scalar' && radius.descriptor.key).toBe('radius');

    const centerY = lookup(circleTable, 20, cursor);
    expect(centerY.type).toBe('point');
    if (centerY.type === 'point') {
      expect(centerY.descriptor.key).toBe('center');
      expect(centerY.axis).toBe('y');
    }

    const extrusionZ = lookup(circleTable, 230, cursor);
    expect(extrusionZ.type === 'point' && extrusionZ.axis).toBe('z');
  });

  it('should classify comments, groups and markers', () => {
    const cursor = new FieldCursor();

    expect(lookup(circleTable, 999, cursor, 'note')).toEqual({ type: 'comment' });
    expect(lookup(circleTable, 102, cursor, '{ACAD_REACTORS')).toEqual({ type: 'group-open', name: 'ACAD_REACTORS' });
    expect(lookup(circleTable, 102, cursor, '}')).toEqual({ type: 'group-close' });
    expect(lookup(circleTable, 102, cursor, 'stray')).toEqual({ type: 'unknown' });

    const known = lookup(circleTable, 100, cursor, 'AcDbCircle');
    expect(known.type === 'marker' && known.descriptor?.value).toBe('AcDbCircle');
    expect(lookup(circleTable, 100, cursor, 'AcDbLine')).toEqual({ type: 'marker', descriptor: null });
  });

  it('should report codes the table does not declare', () => {
    const cursor = new FieldCursor();
    expect(lookup(circleTable, 1001, cursor)).toEqual({ type: 'unknown' });
    expect(lookup(circleTable, 11, cursor)).toEqual({ type: 'unknown' });
  });

  it('should prefer the field declared for the open application group', () => {
    const cursor = new FieldCursor();

    const outside = lookup(proxyEntityTable, 330, cursor);
    expect(outside.type === 'member' && outside.descriptor.key).toBe('softPointers');

    cursor.enterGroup('ACAD_REACTORS');
    const inside = lookup(proxyEntityTable, 330, cursor);
    expect(inside.type === 'scalar' && inside.descriptor.key).toBe('softOwner');

    cursor.leaveGroup();
    expect(cursor.openGroup).toBeNull();
    const imageReactor = lookup(imageTable, 360, cursor);
    expect(imageReactor.type === 'scalar' && imageReactor.descriptor.key).toBe('imageDefReactor');
  });
});

describe('FieldCursor', () => {
  it('should close nodes on their last member', () => {
    const cursor = new FieldCursor();
    const clip = repeatedField('clipVertices', imageTable.fields);
    const [x, y] = clip.members;

    expect(cursor.advance(clip, x)).toBe(true);
    expect(cursor.advance(clip, y)).toBe(false);
    expect(cursor.advance(clip, x)).toBe(true);
    expect(cursor.advance(clip, y)).toBe(false);
  });

  it('should open a node on every opener code', () => {
    const cursor = new FieldCursor();
    const vertices = repeatedField('vertices', lwpolylineTable.fields);
    const [x, y, , , bulge] = vertices.members;

    expect(cursor.advance(vertices, x)).toBe(true);
    expect(cursor.advance(vertices, y)).toBe(false);
    expect(cursor.advance(vertices, bulge)).toBe(false);
    expect(cursor.advance(vertices, x)).toBe(true);
    expect(cursor.advance(vertices, y)).toBe(false);
  });

  it('should start a node when a member repeats before the node closes', () => {
    const cursor = new FieldCursor();
    const clip = repeatedField('clipVertices', imageTable.fields);
    const [x] = clip.members;

    expect(cursor.advance(clip, x)).toBe(true);
    expect(cursor.advance(clip, x)).toBe(true);
  });
});
