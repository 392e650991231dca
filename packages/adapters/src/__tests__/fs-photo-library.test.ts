import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, mkdir, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { FsPhotoLibrary, isImageFile } from '../fs/fs-photo-library.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'photo-library-'));
  await writeFile(path.join(root, 'b.JPG'), 'jpeg');
  await writeFile(path.join(root, 'a.heic'), 'heic');
  await writeFile(path.join(root, 'notes.txt'), 'text');
  await mkdir(path.join(root, 'gpx'));
  await mkdir(path.join(root, 'no_gps'));
  await writeFile(path.join(root, 'no_gps', 'c.jpg'), 'jpeg');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('isImageFile', () => {
  it.each(['x.jpg', 'x.JPEG', 'x.nef', 'x.Cr2', 'x.tif'])('accepts %p', (name) => {
    expect(isImageFile(name)).toBe(true);
  });

  it.each(['x.gpx', 'x.txt', 'jpg', 'x.jpg.bak'])('rejects %p', (name) => {
    expect(isImageFile(name)).toBe(false);
  });
});

describe('FsPhotoLibrary', () => {
  it('lists top-level images sorted by name', async () => {
    const library = new FsPhotoLibrary(root);
    expect(await library.listPhotos()).toEqual([path.join(root, 'a.heic'), path.join(root, 'b.JPG')]);
  });

  it('resolves plain filenames of existing files only', async () => {
    const library = new FsPhotoLibrary(root);
    expect(await library.resolve('a.heic')).toBe(path.join(root, 'a.heic'));
    expect(await library.resolve('missing.jpg')).toBeNull();
    expect(await library.resolve('gpx')).toBeNull();
    expect(await library.resolve('../a.heic')).toBeNull();
    expect(await library.resolve('no_gps/c.jpg')).toBeNull();
    expect(await library.resolve('..')).toBeNull();
  });

  it('moves quarantined photos into no_gps/', async () => {
    const library = new FsPhotoLibrary(root);
    const moved = await library.quarantine(path.join(root, 'b.JPG'));

    expect(moved).toBe(path.join(root, 'no_gps', 'b.JPG'));
    expect((await stat(moved)).isFile()).toBe(true);
    expect(await library.listPhotos()).toEqual([path.join(root, 'a.heic')]);
  });

  it('reports whether the root exists', async () => {
    expect(await new FsPhotoLibrary(root).isAvailable()).toBe(true);
    expect(await new FsPhotoLibrary(path.join(root, 'nope')).isAvailable()).toBe(false);
  });
});
