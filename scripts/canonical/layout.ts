import type { Dirent } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { IoFailureError, describeError } from '@shared/errors';
import { normaliseText } from '@shared/text-normalizer';
import type { CanonicalLocation, NamedIndex } from '@shared/types';

const NUMBERED_NAME = /^(\d+)_(.+)$/;
const YAML_EXTENSION = '.yaml';

export interface NamedAddress {
  kanda: string;
  varga: string;
  adhikaar?: string | null;
}

export interface NumericAddress {
  khanda: number;
  varga: number;
  adhikaar?: number | null;
}

interface VargaNode {
  index: NamedIndex;
  filePath: string | null;
  adhikaars: Map<string, CanonicalLocation>;
}

interface KandaNode {
  index: NamedIndex;
  vargas: Map<string, VargaNode>;
}

export function parseNumberedName(name: string): NamedIndex | null {
  const match = NUMBERED_NAME.exec(name);
  if (!match) {
    return null;
  }
  return { id: Number.parseInt(match[1], 10), name: match[2] };
}

function nameKey(value: string | null | undefined): string {
  return normaliseText(value) ?? '';
}

async function listDirectory(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => {
      const left = parseNumberedName(a.name)?.id ?? Number.MAX_SAFE_INTEGER;
      const right = parseNumberedName(b.name)?.id ?? Number.MAX_SAFE_INTEGER;
      return left - right || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
    });
  } catch (error) {
    throw new IoFailureError(`Unable to list ${dir}: ${describeError(error)}`, dir, { cause: error });
  }
}

/**
 * Index of the canonical data tree. Kandas are `<id>_<name>/` directories;
 * a varga is either `<id>_<name>.yaml` or a `<id>_<name>/` directory of
 * `<id>_<adhikaar>.yaml` files. Lookups work by names (as review records
 * carry them) or by numeric ids (as text numbers carry them).
 */
export class CanonicalLayout {
  readonly root: string;
  readonly warnings: string[] = [];
  private readonly kandas = new Map<string, KandaNode>();

  private constructor(root: string) {
    this.root = root;
  }

  static async load(root: string): Promise<CanonicalLayout> {
    const layout = new CanonicalLayout(root);
    try {
      const stats = await fs.stat(root);
      if (!stats.isDirectory()) {
        throw new IoFailureError(`Canonical root is not a directory`, root);
      }
    } catch (error) {
      if (error instanceof IoFailureError) {
        throw error;
      }
      throw new IoFailureError(`Canonical root not found: ${describeError(error)}`, root, { cause: error });
    }

    for (const entry of await listDirectory(root)) {
      const kanda = entry.isDirectory() ? parseNumberedName(entry.name) : null;
      if (!kanda) {
        continue;
      }
      const node: KandaNode = { index: kanda, vargas: new Map() };
      if (!layout.claim(layout.kandas, nameKey(kanda.name), node, path.join(root, entry.name))) {
        continue;
      }
      await layout.scanKanda(node, path.join(root, entry.name));
    }

    return layout;
  }

  private claim<T>(map: Map<string, T>, key: string, value: T, location: string): boolean {
    if (map.has(key)) {
      this.warnings.push(`Duplicate name "${key}" at ${location}; keeping the first occurrence`);
      return false;
    }
    map.set(key, value);
    return true;
  }

  private async scanKanda(kanda: KandaNode, dir: string): Promise<void> {
    for (const entry of await listDirectory(dir)) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isFile() && entry.name.endsWith(YAML_EXTENSION)) {
        const varga = parseNumberedName(entry.name.slice(0, -YAML_EXTENSION.length));
        if (!varga) {
          continue;
        }
        const existing = kanda.vargas.get(nameKey(varga.name));
        if (existing && existing.filePath === null && existing.index.id === varga.id) {
          existing.filePath = entryPath;
          continue;
        }
        this.claim(kanda.vargas, nameKey(varga.name), { index: varga, filePath: entryPath, adhikaars: new Map() }, entryPath);
        continue;
      }

      if (!entry.isDirectory()) {
        continue;
      }
      const varga = parseNumberedName(entry.name);
      if (!varga) {
        continue;
      }
      let node = kanda.vargas.get(nameKey(varga.name));
      if (!node || node.index.id !== varga.id) {
        node = { index: varga, filePath: null, adhikaars: new Map() };
        if (!this.claim(kanda.vargas, nameKey(varga.name), node, entryPath)) {
          continue;
        }
      }
      await this.scanVarga(kanda, node, entryPath);
    }
  }

  private async scanVarga(kanda: KandaNode, varga: VargaNode, dir: string): Promise<void> {
    for (const entry of await listDirectory(dir)) {
      if (!entry.isFile() || !entry.name.endsWith(YAML_EXTENSION)) {
        continue;
      }
      const adhikaar = parseNumberedName(entry.name.slice(0, -YAML_EXTENSION.length));
      if (!adhikaar) {
        continue;
      }
      const filePath = path.join(dir, entry.name);
      this.claim(
        varga.adhikaars,
        nameKey(adhikaar.name),
        { kanda: kanda.index, varga: varga.index, adhikaar, filePath },
        filePath,
      );
    }
  }

  resolve(address: NamedAddress): CanonicalLocation | null {
    const kanda = this.kandas.get(nameKey(address.kanda));
    const varga = kanda?.vargas.get(nameKey(address.varga));
    if (!kanda || !varga) {
      return null;
    }

    const adhikaar = nameKey(address.adhikaar);
    if (adhikaar) {
      return varga.adhikaars.get(adhikaar) ?? null;
    }
    if (!varga.filePath) {
      return null;
    }
    return { kanda: kanda.index, varga: varga.index, adhikaar: null, filePath: varga.filePath };
  }

  /** Maps the integer coordinate of a text number onto the named tree. */
  resolveCoordinate(address: NumericAddress): CanonicalLocation | null {
    const kanda = Array.from(this.kandas.values()).find((node) => node.index.id === address.khanda);
    const varga = kanda ? Array.from(kanda.vargas.values()).find((node) => node.index.id === address.varga) : undefined;
    if (!kanda || !varga) {
      return null;
    }
    if (address.adhikaar !== undefined && address.adhikaar !== null) {
      return Array.from(varga.adhikaars.values()).find((location) => location.adhikaar?.id === address.adhikaar) ?? null;
    }
    return this.resolve({ kanda: kanda.index.name, varga: varga.index.name });
  }

  locations(): CanonicalLocation[] {
    const result: CanonicalLocation[] = [];
    for (const kanda of this.kandas.values()) {
      for (const varga of kanda.vargas.values()) {
        if (varga.filePath) {
          result.push({ kanda: kanda.index, varga: varga.index, adhikaar: null, filePath: varga.filePath });
        }
        result.push(...varga.adhikaars.values());
      }
    }
    return result;
  }
}

export function loadCanonicalLayout(root: string): Promise<CanonicalLayout> {
  return CanonicalLayout.load(root);
}
