import { mkdir, readdir, rename, stat } from 'node:fs/promises';
import path from 'node:path';
import type { PhotoLibraryPort } from '@geotagger/domain';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.heic',
  '.heif',
  '.png',
  '.tiff',
  '.tif',
  '.dng',
  '.arw',
  '.cr2',
  '.nef',
]);

export const QUARANTINE_DIR_NAME = 'no_gps';

export function isImageFile(filename: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

/** A flat folder of photos; subfolders (gpx/, no_gps/) are never listed. */
export class FsPhotoLibrary implements PhotoLibraryPort {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async isAvailable(): Promise<boolean> {
    try {
      return (await stat(this.rootDir)).isDirectory();
    } catch {
      return false;
    }
  }

  async listPhotos(): Promise<string[]> {
    const entries = await readdir(this.rootDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && isImageFile(e.name))
      .map((e) => e.name)
      .sort()
      .map((name) => path.join(this.rootDir, name));
  }

  async resolve(filename: string): Promise<string | null> {
    if (
      filename === '' ||
      filename === '.' ||
      filename === '..' ||
      filename.includes('/') ||
      filename.includes('\\')
    ) {
      return null;
    }
    const filePath = path.join(this.rootDir, filename);
    try {
      return (await stat(filePath)).isFile() ? filePath : null;
    } catch {
      return null;
    }
  }

  async quarantine(filePath: string): Promise<string> {
    const targetDir = path.join(this.rootDir, QUARANTINE_DIR_NAME);
    await mkdir(targetDir, { recursive: true });
    const target = path.join(targetDir, path.basename(filePath));
    await rename(filePath, target);
    return target;
  }
}
