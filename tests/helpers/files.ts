import fs from 'fs';
import os from 'os';
import path from 'path';

import type { ConverterConfig } from '../../src/config/converter';

export const FAKE_MARKER_SCRIPT = path.join(__dirname, '..', 'fixtures', 'fake-marker.js');

export function fakeMarkerConfig(overrides: Partial<ConverterConfig> = {}): ConverterConfig {
  return {
    executablePath: process.execPath,
    baseArgs: [FAKE_MARKER_SCRIPT],
    killTimeoutMs: 2000,
    ...overrides
  };
}

export async function makeTempDir(prefix = 'marker-desk-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function writePdf(dir: string, fileName: string, content = '%PDF-1.4\n% test document\n'): Promise<string> {
  await fs.promises.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  await fs.promises.writeFile(filePath, content, 'utf8');
  return filePath;
}

/** Lays out a folder the way marker writes it: `<root>/<stem>/<stem>.md` plus meta and an image. */
export async function writeRawOutput(root: string, stem: string): Promise<string> {
  const dir = path.join(root, stem);
  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(path.join(dir, `${stem}.md`), `# ${stem}\n`, 'utf8');
  await fs.promises.writeFile(path.join(dir, `${stem}_meta.json`), '{}', 'utf8');
  await fs.promises.writeFile(path.join(dir, '_page_0_Picture_1.jpeg'), 'image', 'utf8');
  return dir;
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.promises.readdir(dir)).sort();
}

export function exists(target: string): boolean {
  return fs.existsSync(target);
}
