import * as fs from 'fs';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { glob } from 'glob';
import { ValidationError, wrapError } from './errors';

export const ARCHIVE_EXTENSION = '.zip';

// DOS epoch, the earliest time a zip header can hold
export const ARCHIVE_ENTRY_TIME = new Date(1980, 0, 1);

/**
 * Zip the contents of `sourceDir` into `<sourceDir>.zip` next to it.
 *
 * Entry names are relative to `sourceDir` and use forward slashes.
 * Directories get their own entry with a trailing slash, so empty
 * directories survive the round trip. Entries are sorted and carry a fixed
 * timestamp, so the same tree always yields the same bytes. The caller
 * removes the archive.
 */
export async function archiveDirectory(sourceDir: string): Promise<string> {
  const absDir = path.resolve(sourceDir);

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(absDir);
  } catch (error) {
    throw new ValidationError(`source directory does not exist: ${absDir}`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new ValidationError(`source path is not a directory: ${absDir}`);
  }

  const entries = await glob('**', { cwd: absDir, dot: true, withFileTypes: true });
  const sorted = entries
    .map(entry => ({ name: entry.relativePosix(), isDirectory: entry.isDirectory(), fullpath: entry.fullpath() }))
    .filter(entry => entry.name !== '' && entry.name !== '.')
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const zip = new AdmZip();
  for (const entry of sorted) {
    const entryName = entry.isDirectory ? `${entry.name}/` : entry.name;
    let content: Buffer = Buffer.alloc(0);
    if (!entry.isDirectory) {
      try {
        content = await fs.promises.readFile(entry.fullpath);
      } catch (error) {
        throw wrapError(`reading ${entry.name}`, error);
      }
    }
    zip.addFile(entryName, content);
    const added = zip.getEntry(entryName);
    if (added) {
      added.header.time = ARCHIVE_ENTRY_TIME;
    }
  }

  const zipPath = absDir + ARCHIVE_EXTENSION;
  try {
    await fs.promises.writeFile(zipPath, zip.toBuffer());
  } catch (error) {
    await fs.promises.rm(zipPath, { force: true });
    throw wrapError('writing archive', error);
  }

  return zipPath;
}
