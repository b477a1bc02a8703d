import fs from 'fs';
import path from 'path';

export interface StoragePaths {
  root: string;
  uploadsDir: string;
  downloadsDir: string;
  workDir: string;
  convertedDir: string;
  favoritesFile: string;
}

export function resolveStoragePaths(root = process.env.STORAGE_DIR ?? path.resolve(process.cwd(), 'storage')): StoragePaths {
  const storageRoot = path.resolve(root);

  return {
    root: storageRoot,
    uploadsDir: path.join(storageRoot, 'uploads'),
    downloadsDir: path.join(storageRoot, 'downloads'),
    workDir: path.join(storageRoot, 'work'),
    convertedDir: path.join(storageRoot, 'converted'),
    favoritesFile: path.join(storageRoot, 'favorites.json')
  };
}

export async function ensureStorageDirectories(paths: StoragePaths): Promise<void> {
  await fs.promises.mkdir(paths.root, { recursive: true });
  await Promise.all([
    fs.promises.mkdir(paths.uploadsDir, { recursive: true }),
    fs.promises.mkdir(paths.downloadsDir, { recursive: true }),
    fs.promises.mkdir(paths.workDir, { recursive: true }),
    fs.promises.mkdir(paths.convertedDir, { recursive: true })
  ]);
}
