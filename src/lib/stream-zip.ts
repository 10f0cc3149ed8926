/**
 * Stream ZIP module for creating ZIP archives without loading all data in memory
 * Uses @zip.js/zip.js with file-backed readers and writers
 */

import { randomUUID } from 'node:crypto';
import { open, rename, rm, type FileHandle } from 'node:fs/promises';
import { configure, Reader, Uint8ArrayReader, Writer, ZipReader, ZipWriter } from '@zip.js/zip.js';
import { logger } from './logger';

// Node has no web workers for zip.js to spawn
configure({ useWebWorkers: false });

/** Timestamp written on every entry so rebuilt archives are byte-identical */
export const ARCHIVE_EPOCH = new Date(2000, 0, 1, 0, 0, 0);

export interface ArchiveEntry {
  name: string;
  data: Uint8Array;
}

export interface StreamZipOptions {
  compressionLevel?: number;     // 0 = store (tiles are already compressed)
  lastModDate?: Date;
}

export interface ZipProgress {
  current: number;
  currentFile: string;
}

export interface ZipResult {
  path: string;
  entryCount: number;
  bytes: number;
}

/**
 * zip.js writer appending to an open file; getData() yields bytes written
 */
class FileHandleWriter extends Writer<number> {
  private written = 0;

  constructor(private handle: FileHandle) {
    super();
  }

  async writeUint8Array(array: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < array.byteLength) {
      const { bytesWritten } = await this.handle.write(array, offset, array.byteLength - offset);
      offset += bytesWritten;
    }
    this.written += array.byteLength;
  }

  async getData(): Promise<number> {
    return this.written;
  }
}

/**
 * zip.js random-access reader over an open file
 */
class FileHandleReader extends Reader<FileHandle> {
  constructor(private handle: FileHandle) {
    super(handle);
  }

  async init(): Promise<void> {
    const info = await this.handle.stat();
    this.size = info.size;
  }

  async readUint8Array(index: number, length: number): Promise<Uint8Array> {
    const buffer = new Uint8Array(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, index);
    return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
  }
}

export class StreamZip {
  /**
   * Write entries to a ZIP file one at a time.
   * The archive is built in a temp file beside outputPath and renamed into
   * place, so a failed build never leaves a truncated archive behind.
   */
  async writeZip(
    entries: AsyncIterable<ArchiveEntry>,
    outputPath: string,
    options: StreamZipOptions = {},
    onProgress?: (progress: ZipProgress) => void
  ): Promise<ZipResult> {
    const tempPath = `${outputPath}.${randomUUID()}.tmp`;
    const handle = await open(tempPath, 'w');
    let entryCount = 0;
    let bytes = 0;

    try {
      const zipWriter = new ZipWriter(new FileHandleWriter(handle));
      const addOptions = {
        level: options.compressionLevel ?? 0,
        lastModDate: options.lastModDate ?? ARCHIVE_EPOCH,
        extendedTimestamp: false,
      };

      try {
        for await (const entry of entries) {
          await zipWriter.add(entry.name, new Uint8ArrayReader(entry.data), addOptions);
          entryCount++;
          onProgress?.({ current: entryCount, currentFile: entry.name });
        }
      } catch (error) {
        // Release the writer before reporting the entry failure
        try {
          await zipWriter.close();
        } catch (closeError) {
          logger.debug('Failed to close ZIP writer after error:', closeError);
        }
        throw error;
      }

      bytes = await zipWriter.close();
      await handle.sync();
    } catch (error) {
      await handle.close();
      await rm(tempPath, { force: true });
      throw error;
    }

    await handle.close();
    await rename(tempPath, outputPath);

    return { path: outputPath, entryCount, bytes };
  }

  /**
   * List the file entries of a ZIP archive
   */
  static async listEntries(path: string): Promise<string[]> {
    const handle = await open(path, 'r');
    try {
      const zipReader = new ZipReader(new FileHandleReader(handle));
      try {
        const entries = await zipReader.getEntries();
        return entries.filter(entry => !entry.directory).map(entry => entry.filename);
      } finally {
        await zipReader.close();
      }
    } finally {
      await handle.close();
    }
  }
}

