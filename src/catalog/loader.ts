import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { SelectorCatalog } from '../types/index.js';
import { SelectorCatalogSchema } from '../schemas/index.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('./selectors.json', import.meta.url));

/**
 * Load the selector catalog and freeze it. The catalog is shared by every
 * automated window, so nothing downstream may mutate it.
 */
export async function loadSelectorCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<SelectorCatalog> {
  const raw = await readFile(path, 'utf-8');
  const catalog: SelectorCatalog = SelectorCatalogSchema.parse(JSON.parse(raw));
  return deepFreeze(catalog);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
