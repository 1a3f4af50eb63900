import { describe, it, expect } from 'vitest';
import { Layout } from '../../../src/domain/model/Layout.js';
import type { LayoutDefinition } from '../../../src/domain/model/LayoutDefinition.js';
import { RecordFileError } from '../../../src/domain/model/RecordFileError.js';
import { catchError, FRANCE_LINE, worldDefinition, worldLayout } from '../../helpers.js';

function minimal(overrides: Partial<LayoutDefinition> = {}): LayoutDefinition {
  return {
    fieldTypes: [{ name: 'A/N', description: 'string' }],
    records: [
      {
        name: 'HDR1',
        description: 'Header',
        fields: [{ name: 'ID', description: 'Id', type: 'A/N', length: 4 }],
      },
    ],
    ...overrides,
  };
}

describe('Layout', () => {
  describe('build()', () => {
    it('should build one template per record type, in schema order', () => {
      const layout = worldLayout();

      expect(layout.name).toBe('world');
      expect(layout.description).toBe('Continents and countries');
      expect(layout.meta).toEqual({ version: '1.0', description: 'Continents and countries' });
      expect(layout.size).toBe(2);
      expect(layout.keys()).toEqual(['CONT', 'COUN']);
      expect([...layout].map((r) => r.name)).toEqual(['CONT', 'COUN']);
    });

    it('should compute record lengths from field lengths', () => {
      const layout = worldLayout();

      expect(layout.get('CONT').length).toBe(79);
      expect(layout.get('COUN').length).toBe(84);
      expect(layout.get('COUN').lookupByName('BALANCE')[0]?.offset).toBe(79);
    });

    it('should share one FieldType instance across fields declaring it', () => {
      const layout = worldLayout();
      const [contName] = layout.get('CONT').lookupByName('NAME');
      const [counName] = layout.get('COUN').lookupByName('NAME');

      expect(contName?.type).toBe(counName?.type);
      expect(layout.fieldTypes.get('A/N')).toBe(contName?.type);
    });

    it('should carry the date format of a field type', () => {
      expect(worldLayout().fieldTypes.get('D')?.format).toBe('YYYYMMDD');
    });

    it('should default name, description and meta', () => {
      const layout = Layout.build(minimal());

      expect(layout.name).toBe('');
      expect(layout.description).toBe('');
      expect(layout.meta).toEqual({});
    });

    it('should accept a field of length zero', () => {
      const def = minimal();
      const layout = Layout.build({
        ...def,
        records: [
          {
            name: 'R',
            description: '',
            fields: [
              { name: 'A', description: '', type: 'A/N', length: 2 },
              { name: 'EMPTY', description: '', type: 'A/N', length: 0 },
              { name: 'B', description: '', type: 'A/N', length: 2 },
            ],
          },
        ],
      });
      const record = layout.get('R');

      record.decode('xxyy');
      expect(record.length).toBe(4);
      expect(record.arrayOf('value')).toEqual(['xx', '', 'yy']);
    });

    it('should reject a field type declared twice', () => {
      const err = catchError(() =>
        Layout.build(
          minimal({
            fieldTypes: [
              { name: 'A/N', description: 'string' },
              { name: 'A/N', description: 'integer' },
            ],
          }),
        ),
      );

      expect(err).toBeInstanceOf(RecordFileError);
      expect(err).toMatchObject({ code: 'DUPLICATE_FIELD_TYPE', category: 'SCHEMA' });
    });

    it('should reject a record declared twice', () => {
      const def = minimal();
      const [hdr] = def.records;
      const err = catchError(() => Layout.build({ ...def, records: hdr ? [hdr, hdr] : [] }));

      expect(err).toMatchObject({ code: 'DUPLICATE_RECORD_NAME', metadata: { record: 'HDR1' } });
    });

    it('should reject a field referring to an undeclared type', () => {
      const err = catchError(() =>
        Layout.build(
          minimal({
            records: [
              { name: 'HDR1', description: '', fields: [{ name: 'ID', description: '', type: 'X', length: 4 }] },
            ],
          }),
        ),
      );

      expect(err).toMatchObject({
        code: 'INVALID_FIELD_REFERENCE',
        metadata: { record: 'HDR1', field: 'ID', fieldType: 'X' },
      });
    });

    it('should reject an unknown type description', () => {
      const err = catchError(() => Layout.build(minimal({ fieldTypes: [{ name: 'A/N', description: 'text' }] })));

      expect(err).toMatchObject({ code: 'UNKNOWN_FIELD_TYPE' });
    });

    it('should reject an empty record name', () => {
      const err = catchError(() => Layout.build(minimal({ records: [{ name: '', description: '', fields: [] }] })));

      expect(err).toMatchObject({ code: 'EMPTY_RECORD_NAME' });
    });

    it('should build independent templates from the same definition', () => {
      const def = worldDefinition();
      const a = Layout.build(def);
      const b = Layout.build(def);

      a.get('COUN').decode(FRANCE_LINE);
      expect(a.get('COUN').getFirstValue('NAME')).toBe('France');
      expect(b.get('COUN').getFirstValue('NAME')).toBe('');
    });
  });

  describe('lookup', () => {
    it('should fail get() with UNKNOWN_RECORD_TYPE', () => {
      const err = catchError(() => worldLayout().get('XXXX'));

      expect(err).toMatchObject({ code: 'UNKNOWN_RECORD_TYPE', category: 'ACCESS', metadata: { key: 'XXXX' } });
    });

    it('should tell whether a record type exists', () => {
      const layout = worldLayout();

      expect(layout.contains('CONT')).toBe(true);
      expect(layout.contains('cont')).toBe(false);
    });

    it('should tell whether any record declares a field', () => {
      const layout = worldLayout();

      expect(layout.containsField('CAPITAL')).toBe(true);
      expect(layout.containsField('DENSITY')).toBe(true);
      expect(layout.containsField('FOO')).toBe(false);
    });
  });

  describe('reshaping', () => {
    it('should keep only the listed record types', () => {
      const layout = worldLayout();
      layout.keep(['COUN', 'NONE']);

      expect(layout.keys()).toEqual(['COUN']);
    });

    it('should delete the listed record types', () => {
      const layout = worldLayout();
      layout.delete(['COUN']);

      expect(layout.keys()).toEqual(['CONT']);
      expect(layout.containsField('CAPITAL')).toBe(false);
    });

    it('should prune fields from every record type', () => {
      const layout = worldLayout();
      layout.prune(['ID', 'POPULATION']);

      expect(layout.get('CONT').arrayOf('name')).toEqual(['NAME', 'AREA', 'DENSITY', 'CITY']);
      expect(layout.get('COUN').arrayOf('name')).toEqual(['NAME', 'CAPITAL', 'AREA', 'CURRENCY', 'BALANCE']);
      expect(layout.get('COUN').length).toBe(84);
    });

    it('should simplify to the selected records and fields', () => {
      const layout = worldLayout();
      layout.simplify(['COUN: NAME, CAPITAL']);

      expect(layout.keys()).toEqual(['COUN']);
      const coun = layout.get('COUN');
      expect(coun.arrayOf('name')).toEqual(['NAME', 'CAPITAL']);

      coun.decode(FRANCE_LINE);
      expect(coun.toObject()).toEqual({ NAME: 'France', CAPITAL: 'Paris' });
    });

    it('should reject a selection without a record separator', () => {
      expect(catchError(() => worldLayout().simplify(['COUN']))).toMatchObject({ code: 'INVALID_FILTER' });
    });

    it('should reject a selection naming an unknown record', () => {
      expect(catchError(() => worldLayout().simplify(['XXXX:ID']))).toMatchObject({ code: 'UNKNOWN_RECORD_TYPE' });
    });
  });
});
