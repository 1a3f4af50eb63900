import { describe, it, expect } from 'vitest';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { collect } from '../../helpers.js';

describe('BufferSource', () => {
  describe('read()', () => {
    it('should yield a string as a single chunk', async () => {
      const source = new BufferSource('HDR1abc\nDET1xyz\n');

      expect(await collect(source.read())).toEqual(['HDR1abc\nDET1xyz\n']);
    });

    it('should yield a Buffer unchanged', async () => {
      const data = Buffer.from('HDR1abc\n', 'utf-8');
      const [chunk] = await collect(new BufferSource(data).read());

      expect(chunk).toBe(data);
    });

    it('should be readable more than once', async () => {
      const source = new BufferSource('line\n');

      await collect(source.read());
      expect(await collect(source.read())).toEqual(['line\n']);
    });
  });

  describe('metadata()', () => {
    it('should default the file name and count bytes', () => {
      expect(new BufferSource('añb').metadata()).toEqual({ fileName: 'buffer-input', fileSize: 4 });
    });

    it('should take a custom file name', () => {
      const meta = new BufferSource(Buffer.alloc(10), { fileName: 'orders.dat' }).metadata();

      expect(meta).toEqual({ fileName: 'orders.dat', fileSize: 10 });
    });
  });
});
