/**
 * Snapshot files in a data directory, one `<database>.tick` per database.
 * Saves go through a temporary file and a rename.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { decodeSnapshot, encodeSnapshot } from '../codec/snapshotCodec.ts';
import type { DatabaseSnapshot } from '../codec/snapshotCodec.ts';

export const SNAPSHOT_EXTENSION = '.tick';

export class SnapshotStore {
  constructor(readonly dir: string) {}

  private path(name: string): string {
    return join(this.dir, `${name}${SNAPSHOT_EXTENSION}`);
  }

  /** Database names with a snapshot on disk. */
  async list(): Promise<string[]> {
    await mkdir(this.dir, { recursive: true });
    const entries = await readdir(this.dir);
    return entries
      .filter((f) => f.endsWith(SNAPSHOT_EXTENSION))
      .map((f) => f.slice(0, -SNAPSHOT_EXTENSION.length))
      .sort();
  }

  async load(name: string): Promise<DatabaseSnapshot> {
    return decodeSnapshot(await readFile(this.path(name)));
  }

  async save(name: string, snap: DatabaseSnapshot): Promise<number> {
    await mkdir(this.dir, { recursive: true });
    const bytes = encodeSnapshot(snap);
    const tmp = `${this.path(name)}.tmp`;
    await writeFile(tmp, bytes);
    await rename(tmp, this.path(name));
    return bytes.length;
  }

  async remove(name: string): Promise<void> {
    await rm(this.path(name), { force: true });
  }
}
