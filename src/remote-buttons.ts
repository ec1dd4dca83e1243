import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export interface RemoteButton {
  id: string;
  name: string;
  icon: string;
}

const DEFAULT_ICON = 'mdi:remote';

// data/ sits beside src/ in the repository and beside dist/ once built
const CATALOG_CANDIDATES = [
  new URL('../data/remote-buttons.json', import.meta.url),
  new URL('../../data/remote-buttons.json', import.meta.url)
];

function parseEntry(entry: unknown, index: number): RemoteButton {
  if (typeof entry !== 'object' || entry === null) {
    throw new Error(`Remote button catalog entry ${index} is not an object`);
  }
  const id = 'id' in entry ? entry.id : undefined;
  const name = 'name' in entry ? entry.name : undefined;
  const icon = 'icon' in entry ? entry.icon : undefined;
  if (typeof id !== 'string' || typeof name !== 'string') {
    throw new Error(`Remote button catalog entry ${index} needs string id and name`);
  }
  return { id, name, icon: typeof icon === 'string' ? icon : DEFAULT_ICON };
}

export function loadButtonCatalog(path?: string): RemoteButton[] {
  const file = path ?? CATALOG_CANDIDATES.map(url => fileURLToPath(url)).find(candidate => existsSync(candidate));
  if (!file) {
    throw new Error('Remote button catalog (data/remote-buttons.json) not found');
  }
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Remote button catalog ${file} must be an array`);
  }
  return parsed.map(parseEntry);
}

let catalog: readonly RemoteButton[] | undefined;

/**
 * Buttons of the streamer's IR remote, in remote layout order
 */
export function getButtonCatalog(): readonly RemoteButton[] {
  if (!catalog) {
    catalog = Object.freeze(loadButtonCatalog());
  }
  return catalog;
}
