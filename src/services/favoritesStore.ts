import fs from 'fs';
import path from 'path';

import type { FavoriteDirectory } from '../types/favorite';
import { FavoriteValidationError, isErrnoException } from './errors';

/**
 * Saved output folders, kept in a JSON file next to the rest of the storage.
 * Loaded once at startup and written after every change.
 */
export class FavoritesStore {
  private favorites: FavoriteDirectory[] = [];

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<FavoriteDirectory[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.favorites = [];
        return this.list();
      }
      throw error;
    }

    try {
      this.favorites = parseFavorites(JSON.parse(content));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown parse error';
      console.warn(`Ignoring malformed favorites file ${this.filePath}: ${message}`);
      this.favorites = [];
    }

    return this.list();
  }

  list(): FavoriteDirectory[] {
    return this.favorites.map((favorite) => ({ ...favorite }));
  }

  get(label: string): FavoriteDirectory | undefined {
    const favorite = this.favorites.find((entry) => entry.label === label.trim());
    return favorite ? { ...favorite } : undefined;
  }

  async add(label: string, directoryPath: string): Promise<FavoriteDirectory> {
    const trimmedLabel = label.trim();
    if (!trimmedLabel) {
      throw new FavoriteValidationError('Favorite label must not be empty.');
    }

    if (!path.isAbsolute(directoryPath)) {
      throw new FavoriteValidationError('Favorite path must be absolute.');
    }

    const stats = await fs.promises.stat(directoryPath).catch(() => undefined);
    if (!stats?.isDirectory()) {
      throw new FavoriteValidationError(`"${directoryPath}" is not an existing directory.`);
    }

    const favorite: FavoriteDirectory = { label: trimmedLabel, path: path.normalize(directoryPath) };
    const index = this.favorites.findIndex((entry) => entry.label === trimmedLabel);
    if (index === -1) {
      this.favorites = [...this.favorites, favorite];
    } else {
      this.favorites = this.favorites.map((entry, position) => (position === index ? favorite : entry));
    }

    await this.save();
    return { ...favorite };
  }

  async remove(label: string): Promise<boolean> {
    const trimmedLabel = label.trim();
    const remaining = this.favorites.filter((entry) => entry.label !== trimmedLabel);
    if (remaining.length === this.favorites.length) {
      return false;
    }

    this.favorites = remaining;
    await this.save();
    return true;
  }

  private async save(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const temporaryPath = `${this.filePath}.tmp`;
    await fs.promises.writeFile(temporaryPath, JSON.stringify(this.favorites, null, 2), 'utf8');
    await fs.promises.rename(temporaryPath, this.filePath);
  }
}

function parseFavorites(data: unknown): FavoriteDirectory[] {
  if (!Array.isArray(data)) {
    throw new Error('expected an array of { label, path } entries');
  }

  const entries: unknown[] = data;
  const favorites: FavoriteDirectory[] = [];
  for (const entry of entries) {
    if (
      entry &&
      typeof entry === 'object' &&
      'label' in entry &&
      'path' in entry &&
      typeof entry.label === 'string' &&
      typeof entry.path === 'string'
    ) {
      favorites.push({ label: entry.label, path: entry.path });
    }
  }
  return favorites;
}
