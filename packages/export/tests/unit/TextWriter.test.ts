import { describe, it, expect } from 'vitest';
import { Field, FieldType, Record } from '@fixedrec/core';
import { TextWriter } from '../../src/index.js';

const alnum = new FieldType('A/N', 'string');

function record1(): Record {
  const rec = new Record('RECORD1', 'Description of record 1');
  rec.append(new Field('LONG_FIELD1', 'Description of field 1', alnum, 10));
  rec.append(new Field('LONG_FIELD2', 'Description of field 2', alnum, 5));
  rec.append(new Field('LONG_FIELD2', 'Description of field 2', alnum, 5));
  rec.append(new Field('LONG_FIELD3', 'Description of field 3', alnum, 10));
  rec.decode('A'.repeat(10) + 'B'.repeat(5) + 'C'.repeat(5) + 'D'.repeat(10));
  return rec;
}

describe('TextWriter', async () => {
  it('should write name="value" pairs in tag style', async () => {
    const writer = new TextWriter({ style: 'tag' });

    await writer.write(record1());

    expect(writer.toString()).toBe(
      'RECORD1:LONG_FIELD1="AAAAAAAAAA" LONG_FIELD2="BBBBB" LONG_FIELD2="CCCCC" LONG_FIELD3="DDDDDDDDDD"\n',
    );
  });

  it('should write an aligned table by default', async () => {
    const rec = new Record('R');
    rec.append(new Field('ID', '', alnum, 4));
    rec.append(new Field('NAME', '', alnum, 2));
    rec.decode('AB  xy');
    const writer = new TextWriter();

    await writer.write(rec);

    expect(writer.toString()).toBe('ID  |NAME\n---------\nAB  |xy  \n\n');
  });

  it('should size columns by the longer of name and length', async () => {
    const writer = new TextWriter({ style: 'table' });

    await writer.write(record1());

    const [header, rule, values, blank] = writer.toString().split('\n');
    expect(header).toBe('LONG_FIELD1|LONG_FIELD2|LONG_FIELD2|LONG_FIELD3');
    expect(rule).toBe('-'.repeat(47));
    expect(values).toBe('AAAAAAAAAA |BBBBB      |CCCCC      |DDDDDDDDDD ');
    expect(blank).toBe('');
  });
});
