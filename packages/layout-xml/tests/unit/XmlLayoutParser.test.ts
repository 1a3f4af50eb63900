import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { Layout, RecordFileError } from '@fixedrec/core';
import { loadLayout, parseLayoutXml } from '../../src/index.js';

const WORLD_XML = fileURLToPath(new URL('../fixtures/world.xml', import.meta.url));
const WORLD_JSON = fileURLToPath(new URL('../../../core/tests/fixtures/world.layout.json', import.meta.url));

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('parseLayoutXml', () => {
  it('should produce the same definition as the equivalent JSON layout', () => {
    const fromXml = parseLayoutXml(readFileSync(WORLD_XML, 'utf-8'), { name: 'world' });
    const fromJson: unknown = JSON.parse(readFileSync(WORLD_JSON, 'utf-8'));

    expect(fromXml).toEqual(fromJson);
  });

  it('should keep every meta attribute and take the description from it', () => {
    const def = parseLayoutXml('<rbfile><meta version="2.1" description="Orders" schema="ord"/></rbfile>');

    expect(def.name).toBe('');
    expect(def.description).toBe('Orders');
    expect(def.meta).toEqual({ version: '2.1', description: 'Orders', schema: 'ord' });
    expect(def.fieldTypes).toEqual([]);
    expect(def.records).toEqual([]);
  });

  it('should accept a document without meta', () => {
    const def = parseLayoutXml(
      '<rbfile><fieldtype name="A/N" type="string"/><record name="R1"><field name="F" length="2" type="A/N"/></record></rbfile>',
    );

    expect(def.meta).toEqual({});
    expect(def.records).toEqual([
      { name: 'R1', description: '', fields: [{ name: 'F', description: '', type: 'A/N', length: 2 }] },
    ]);
  });

  it('should read a single field type, record and field as lists', () => {
    const def = parseLayoutXml(
      '<rbfile><meta/><fieldtype name="I" type="integer"/><record name="R1" description="One"><field name="N" description="Num" length="3" type="I"/></record></rbfile>',
    );

    expect(def.fieldTypes).toEqual([{ name: 'I', description: 'integer', format: undefined }]);
    expect(def.records[0]?.fields).toHaveLength(1);
  });

  it('should keep duplicate field names in document order', () => {
    const def = parseLayoutXml(`<rbfile>
      <fieldtype name="A/N" type="string"/>
      <record name="R1" description="">
        <field name="F" description="first" length="1" type="A/N"/>
        <field name="G" description="" length="1" type="A/N"/>
        <field name="F" description="second" length="1" type="A/N"/>
      </record>
    </rbfile>`);

    expect(def.records[0]?.fields.map((f) => `${f.name}:${f.description}`)).toEqual(['F:first', 'G:', 'F:second']);
  });

  it('should decode entities in attributes', () => {
    const def = parseLayoutXml('<rbfile><meta description="Sales &amp; returns"/></rbfile>');

    expect(def.description).toBe('Sales & returns');
  });

  it('should reject malformed XML', () => {
    const err = catchError(() => parseLayoutXml('<rbfile><record name="R1"></rbfile>'));

    expect(err).toBeInstanceOf(RecordFileError);
    expect(err).toMatchObject({ code: 'INVALID_LAYOUT', category: 'SCHEMA' });
  });

  it('should reject a document without the rbfile root', () => {
    expect(catchError(() => parseLayoutXml('<layout><meta/></layout>'))).toMatchObject({ code: 'INVALID_LAYOUT' });
  });

  it('should reject a non-numeric field length', () => {
    const err = catchError(() =>
      parseLayoutXml(
        '<rbfile><fieldtype name="A/N" type="string"/><record name="R1"><field name="F" length="ten" type="A/N"/></record></rbfile>',
      ),
    );

    expect(err).toMatchObject({ code: 'INVALID_LAYOUT' });
    expect(err).toHaveProperty('message', expect.stringContaining('length must be a non-negative integer'));
  });

  it('should reject a field without a type', () => {
    const err = catchError(() =>
      parseLayoutXml('<rbfile><record name="R1"><field name="F" length="1"/></record></rbfile>'),
    );

    expect(err).toMatchObject({ code: 'INVALID_LAYOUT' });
  });
});

describe('loadLayout', () => {
  it('should build a layout named after the file', async () => {
    const layout = await loadLayout(WORLD_XML);

    expect(layout).toBeInstanceOf(Layout);
    expect(layout.name).toBe('world.xml');
    expect(layout.description).toBe('Continents and countries');
    expect(layout.keys()).toEqual(['CONT', 'COUN']);
    expect(layout.get('CONT').length).toBe(79);
    expect(layout.get('COUN').length).toBe(84);
  });

  it('should raise schema errors from Layout.build', async () => {
    const xml = '<rbfile><record name="R1"><field name="F" length="1" type="X"/></record></rbfile>';
    const file = join(tmpdir(), `fixedrec-bad-layout-${String(process.pid)}.xml`);
    await writeFile(file, xml, 'utf-8');

    try {
      await expect(loadLayout(file)).rejects.toMatchObject({ code: 'INVALID_FIELD_REFERENCE' });
    } finally {
      await rm(file, { force: true });
    }
  });

  it('should fail with SOURCE_UNAVAILABLE for a missing file', async () => {
    const missing = join(tmpdir(), 'fixedrec-no-such-layout.xml');

    await expect(loadLayout(missing)).rejects.toMatchObject({
      code: 'SOURCE_UNAVAILABLE',
      metadata: { path: missing },
    });
  });
});
