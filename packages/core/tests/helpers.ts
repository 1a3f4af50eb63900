import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Layout } from '../src/domain/model/Layout.js';
import type { LayoutDefinition } from '../src/domain/model/LayoutDefinition.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function worldDefinition(): LayoutDefinition {
  const parsed: LayoutDefinition = JSON.parse(readFileSync(fixturePath('world.layout.json'), 'utf-8'));
  return parsed;
}

export function worldLayout(): Layout {
  return Layout.build(worldDefinition());
}

export const CONT_LINE = 'CONTEurope         001018000000074200000000072.90Moscow                        ';
export const FRANCE_LINE = 'COUNFrance                        Paris               0000670000000000643801EUR0012A';
export const ITALY_LINE = 'COUNItaly                         Rome                0000590000000000301340EUR0004}';

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}
