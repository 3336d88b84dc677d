import { DescriptorTable } from '../types';
import { DxfVersion } from '../version';
import { marker, member, repeated, scalar } from '../descriptors/builders';
import { ownerDefaults, ownerFields } from '../descriptors/common';

export const dictionaryTable: DescriptorTable = {
  kind: 'DICTIONARY',
  minVersion: DxfVersion.R13,
  isObject: true,
  fields: [
    ...ownerFields(),
    marker('AcDbDictionary'),
    scalar('hardOwnerFlag', 280, 'integer', { minVersion: DxfVersion.R2000, allowed: [0, 1] }),
    scalar('cloningFlag', 281, 'integer', { minVersion: DxfVersion.R2000, range: { min: 0, max: 5 } }),
    repeated('entries', [member('name', 3, 'string'), member('handle', 350, 'string')])
  ],
  defaults: () => ({
    ...ownerDefaults(),
    hardOwnerFlag: 0,
    cloningFlag: 1
  })
};
