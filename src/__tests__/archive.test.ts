import * as fs from 'fs';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ARCHIVE_ENTRY_TIME, archiveDirectory } from '../archive';
import { ValidationError } from '../errors';
import { makeTempDir, removeDir } from './helpers';

describe('archiveDirectory', () => {
  let tmp: string;
  let bundle: string;

  beforeEach(() => {
    tmp = makeTempDir('archive');
    bundle = path.join(tmp, 'bundle');
    fs.mkdirSync(bundle);
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('writes every file and directory with paths relative to the source', async () => {
    fs.writeFileSync(path.join(bundle, 'index.android.bundle'), 'console.log(1);');
    fs.writeFileSync(path.join(bundle, '.hidden'), 'dot');
    fs.mkdirSync(path.join(bundle, 'assets', 'img'), { recursive: true });
    fs.writeFileSync(path.join(bundle, 'assets', 'img', 'logo.png'), Buffer.from([0, 1, 2, 255]));
    fs.mkdirSync(path.join(bundle, 'assets', 'empty'));

    const zipPath = await archiveDirectory(bundle);

    expect(zipPath).toBe(`${bundle}.zip`);
    const names = new AdmZip(zipPath)
      .getEntries()
      .map(entry => entry.entryName)
      .sort();
    expect(names).toEqual(
      ['.hidden', 'assets/', 'assets/empty/', 'assets/img/', 'assets/img/logo.png', 'index.android.bundle'].sort()
    );
  });

  it('keeps file contents byte for byte', async () => {
    const bytes = Buffer.from([0, 1, 2, 255, 128, 10]);
    fs.writeFileSync(path.join(bundle, 'main.jsbundle'), bytes);

    const zip = new AdmZip(await archiveDirectory(bundle));

    expect(zip.getEntry('main.jsbundle')?.getData()).toEqual(bytes);
  });

  it('marks directory entries as directories', async () => {
    fs.mkdirSync(path.join(bundle, 'assets'));

    const zip = new AdmZip(await archiveDirectory(bundle));

    expect(zip.getEntry('assets/')?.isDirectory).toBe(true);
  });

  it('stamps every entry with the same fixed time', async () => {
    fs.writeFileSync(path.join(bundle, 'main.jsbundle'), 'x');
    fs.mkdirSync(path.join(bundle, 'assets'));

    const zip = new AdmZip(await archiveDirectory(bundle));

    expect(zip.getEntries().map(entry => entry.header.time.getTime())).toEqual([
      ARCHIVE_ENTRY_TIME.getTime(),
      ARCHIVE_ENTRY_TIME.getTime(),
    ]);
  });

  it('produces the same bytes for the same tree', async () => {
    const file = path.join(bundle, 'main.jsbundle');
    fs.writeFileSync(file, 'console.log("same");');
    fs.mkdirSync(path.join(bundle, 'assets'));

    const first = fs.readFileSync(await archiveDirectory(bundle));
    fs.rmSync(`${bundle}.zip`);
    fs.utimesSync(file, new Date(2021, 5, 1), new Date(2021, 5, 1));
    const second = fs.readFileSync(await archiveDirectory(bundle));

    expect(second.equals(first)).toBe(true);
  });

  it('produces an empty archive for an empty directory', async () => {
    const zip = new AdmZip(await archiveDirectory(bundle));

    expect(zip.getEntries()).toHaveLength(0);
  });

  it('rejects a missing directory without creating an archive', async () => {
    const missing = path.join(tmp, 'missing');

    await expect(archiveDirectory(missing)).rejects.toThrow(`source directory does not exist: ${missing}`);
    expect(fs.existsSync(`${missing}.zip`)).toBe(false);
  });

  it('rejects a regular file', async () => {
    const file = path.join(tmp, 'bundle.js');
    fs.writeFileSync(file, 'x');

    await expect(archiveDirectory(file)).rejects.toBeInstanceOf(ValidationError);
    expect(fs.existsSync(`${file}.zip`)).toBe(false);
  });
});
