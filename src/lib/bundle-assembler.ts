/**
 * Bundle Assembler
 *
 * Copies the cached tiles of a scope into one zip with a flat
 * {zoom}/{x}/{y}.png layout, then reads the archive back and checks its
 * membership against the addresses the scope expects. Missing tiles are
 * reported, never fetched.
 */

import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { AssemblyResult, Scope, TileAddress } from '@/models';
import { AreaCalculator } from './area-calculator';
import { ArchiveError, TileBundlerError } from './errors';
import { logger } from './logger';
import type { StorageManager } from './storage-manager';
import { StreamZip, type ArchiveEntry, type StreamZipOptions, type ZipProgress, type ZipResult } from './stream-zip';
import { compareTiles, parseTileKey, tileKey } from './tile-utils';

export interface BundleAssemblerOptions extends StreamZipOptions {
  onProgress?: (progress: ZipProgress) => void;
}

/**
 * Archive path of a tile, e.g. "7/100/63.png"
 */
export function archiveEntryName(address: TileAddress): string {
  return `${tileKey(address)}.png`;
}

export class BundleAssembler {
  private streamZip = new StreamZip();

  constructor(
    private storage: StorageManager,
    private options: BundleAssemblerOptions = {}
  ) {}

  /**
   * Build the archive for a scope and classify it as complete or partial
   */
  async assemble(scope: Scope, outputPath: string): Promise<AssemblyResult> {
    const archivePath = resolve(outputPath);
    const { expected } = AreaCalculator.buildManifest(scope);

    await this.storage.init();

    let written: ZipResult;
    try {
      await mkdir(dirname(archivePath), { recursive: true });
      written = await this.streamZip.writeZip(
        this.readEntries(scope),
        archivePath,
        this.options,
        this.options.onProgress
      );
    } catch (error) {
      if (error instanceof TileBundlerError) throw error;
      throw new ArchiveError(`Cannot write archive ${archivePath}`, archivePath, error);
    }

    const members = await this.readMembership(archivePath);
    const missing = [...expected.entries()]
      .filter(([key]) => !members.has(key))
      .map(([, address]) => address)
      .sort(compareTiles);

    logger.info(`Bundled ${written.entryCount}/${expected.size} tiles into ${archivePath}`);

    if (missing.length === 0) {
      return { status: 'complete', archivePath, entryCount: written.entryCount, bytes: written.bytes };
    }
    return { status: 'partial', archivePath, entryCount: written.entryCount, bytes: written.bytes, missing };
  }

  private async *readEntries(scope: Scope): AsyncGenerator<ArchiveEntry> {
    for await (const entry of this.storage.iterate(scope)) {
      const data = await this.storage.read(entry.address);
      // Removed or emptied since it was listed
      if (!data) continue;
      yield { name: archiveEntryName(entry.address), data };
    }
  }

  private async readMembership(archivePath: string): Promise<Set<string>> {
    let names: string[];
    try {
      names = await StreamZip.listEntries(archivePath);
    } catch (error) {
      throw new ArchiveError(`Cannot read back archive ${archivePath}`, archivePath, error);
    }

    const members = new Set<string>();
    for (const name of names) {
      const address = parseTileKey(name);
      if (address) members.add(tileKey(address));
    }
    return members;
  }
}
