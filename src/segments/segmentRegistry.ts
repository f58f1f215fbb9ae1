import path from 'path';
import fs from 'fs';
import { DuplicateSegmentError } from '../utils/errors';
import { normalizeSegmentUid } from '../chapters/segmentUid';
import type { LogSink } from '../utils/logger';
import type { SegmentProbe, SegmentRegistryEntry } from './types';

/**
 * Lookup from segment UID to the sibling file that carries it.
 * Immutable once built.
 */
export class SegmentRegistry {
  private entries: ReadonlyMap<string, SegmentRegistryEntry>;

  constructor(entries: SegmentRegistryEntry[]) {
    const map = new Map<string, SegmentRegistryEntry>();

    for (const entry of entries) {
      const id = normalizeSegmentUid(entry.id, 'hex');
      const existing = map.get(id);
      if (existing) {
        throw new DuplicateSegmentError(id, existing.file, entry.file);
      }
      map.set(id, { ...entry, id, file: path.resolve(entry.file) });
    }

    this.entries = map;
  }

  /**
   * Probes every file once and registers the ones that report a segment UID
   */
  static async build(files: string[], probe: SegmentProbe, log?: LogSink): Promise<SegmentRegistry> {
    const entries: SegmentRegistryEntry[] = [];

    for (const file of files) {
      const info = await probe(file);
      if (!info || !info.id) {
        log?.debug(`no segment UID in ${path.basename(file)}`);
        continue;
      }
      log?.debug(`segment ${info.id} -> ${path.basename(file)}`);
      entries.push({ ...info, file });
    }

    return new SegmentRegistry(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Resolves a normalized UID. The file currently being processed never
   * resolves to itself.
   */
  resolve(id: string, currentFile?: string): SegmentRegistryEntry | undefined {
    const entry = this.entries.get(normalizeSegmentUid(id, 'hex'));
    if (!entry) return undefined;
    if (currentFile && entry.file === path.resolve(currentFile)) return undefined;
    return entry;
  }
}

/**
 * Lists the Matroska files of a directory in name order
 */
export async function listContainerFiles(directory: string): Promise<string[]> {
  const names = await fs.promises.readdir(directory);
  return names
    .filter((name) => path.extname(name).toLowerCase() === '.mkv')
    .sort()
    .map((name) => path.join(directory, name));
}

/**
 * Builds one registry per directory on first use and hands the same
 * instance to every linked file of that directory. Keep one cache per batch.
 */
export class SegmentRegistryCache {
  private registries = new Map<string, Promise<SegmentRegistry>>();

  constructor(
    private probe: SegmentProbe,
    private log?: LogSink,
    private listFiles: (directory: string) => Promise<string[]> = listContainerFiles
  ) {}

  forDirectory(directory: string): Promise<SegmentRegistry> {
    const key = path.resolve(directory);
    let registry = this.registries.get(key);

    if (!registry) {
      this.log?.info(`scanning ${key} for segments`);
      registry = this.listFiles(key).then((files) => SegmentRegistry.build(files, this.probe, this.log));
      // Failed scans are retried by the next file of the directory
      registry.catch(() => this.registries.delete(key));
      this.registries.set(key, registry);
    }

    return registry;
  }

  forFile(file: string): Promise<SegmentRegistry> {
    return this.forDirectory(path.dirname(path.resolve(file)));
  }
}
