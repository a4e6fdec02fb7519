import { readFile } from 'fs/promises';
import { unzipSync } from 'fflate';
import { DataFormatError, NotFoundError } from './errors.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * A GTFS static feed held as an unzipped set of tables.
 * Tables may sit at the archive root or inside a single top-level folder.
 */
export class GTFSArchive {
  private constructor(
    private readonly files: Readonly<Record<string, Uint8Array>>,
    readonly source: string
  ) {}

  /**
   * Read and unzip an archive from disk
   */
  static async open(path: string): Promise<GTFSArchive> {
    let data: Uint8Array;
    try {
      data = await readFile(path);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`GTFS archive not found: ${path}`, path, { cause: error });
      }
      throw error;
    }
    return GTFSArchive.fromBuffer(data, path);
  }

  /**
   * Unzip an archive already in memory
   */
  static fromBuffer(data: Uint8Array, source = '<memory>'): GTFSArchive {
    let files: Record<string, Uint8Array>;
    try {
      files = unzipSync(data);
    } catch (error) {
      throw new DataFormatError(`${source} is not a readable zip archive`, source, { cause: error });
    }
    return new GTFSArchive(files, source);
  }

  /**
   * Names of the tables in the archive, folder prefixes removed
   */
  tableNames(): string[] {
    return Object.keys(this.files)
      .filter((name) => !name.endsWith('/'))
      .map((name) => name.slice(name.lastIndexOf('/') + 1));
  }

  has(table: string): boolean {
    return this.entryFor(table) !== undefined;
  }

  /**
   * Decode a table as UTF-8 text
   */
  readText(table: string): string {
    const entry = this.entryFor(table);
    if (entry === undefined) {
      throw new NotFoundError(`${table} not found in ${this.source}`, table);
    }
    return new TextDecoder('utf-8').decode(entry);
  }

  private entryFor(table: string): Uint8Array | undefined {
    const direct = this.files[table];
    if (direct) return direct;

    const nested = Object.keys(this.files).find((name) => name.endsWith(`/${table}`));
    return nested === undefined ? undefined : this.files[nested];
  }
}
