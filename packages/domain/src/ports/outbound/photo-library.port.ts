export interface PhotoLibraryPort {
  readonly rootDir: string;
  isAvailable(): Promise<boolean>;
  /** Absolute paths of the library's image files, sorted by name. */
  listPhotos(): Promise<string[]>;
  /** Absolute path of a plain filename inside the library, or null when absent. */
  resolve(filename: string): Promise<string | null>;
  /** Moves a photo aside into the library's unmatched folder; returns the new path. */
  quarantine(filePath: string): Promise<string>;
}
