import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import AdmZip from 'adm-zip';
import { IngestionInputError, errorMessage } from '../../core/exception/custom-exceptions';

/**
 * An input that can be read from the start more than once. Every `open()`
 * yields a fresh stream. Sources that cannot be reopened, such as stdin or a
 * network stream, are not supported.
 */
export interface ResettableSource {
  readonly name: string;
  open(): Readable;
}

export async function assertReadableFile(path: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new IngestionInputError(`${path} is not a file`);
    }
  } catch (error) {
    if (error instanceof IngestionInputError) {
      throw error;
    }
    throw new IngestionInputError(`cannot read ${path}: ${errorMessage(error)}`);
  }
}

export function fileSource(path: string): ResettableSource {
  return {
    name: path,
    open: () => createReadStream(path),
  };
}

export function openZip(path: string): AdmZip {
  try {
    return new AdmZip(path);
  } catch (error) {
    throw new IngestionInputError(`cannot open archive ${path}: ${errorMessage(error)}`);
  }
}

/**
 * Archive entries whose name ends with one of `extensions`, in archive order.
 * An entry is inflated again on every `open()`, and each time the whole entry
 * is held in one Buffer. Entries larger than `buffer.constants.MAX_LENGTH`
 * cannot be read; for very large line-delimited data use a plain file.
 */
export function zipEntrySources(zip: AdmZip, extensions: ReadonlyArray<string>): ResettableSource[] {
  return zip
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .filter((entry) => {
      const name = entry.entryName.toLowerCase();
      return extensions.some((ext) => name.endsWith(ext));
    })
    .map((entry) => ({
      name: entry.entryName,
      open: () => Readable.from([entry.getData()]),
    }));
}
