import fs from 'fs';
import path from 'path';

import { resolveConverterConfig } from '../src/config/converter';
import { resolveStoragePaths } from '../src/config/storage';
import { makeTempDir, removeDir } from './helpers/files';

describe('resolveConverterConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(cwd);
  });

  it('falls back to marker_single on the PATH', () => {
    expect(resolveConverterConfig({}, cwd)).toEqual({
      executablePath: 'marker_single',
      baseArgs: [],
      killTimeoutMs: 5000
    });
  });

  it('prefers MARKER_PATH over everything else', () => {
    const config = resolveConverterConfig({ MARKER_PATH: ' /opt/marker/bin/marker_single ', MARKER_KILL_TIMEOUT_MS: '750' }, cwd);

    expect(config.executablePath).toBe('/opt/marker/bin/marker_single');
    expect(config.killTimeoutMs).toBe(750);
  });

  it('finds marker installed in the project virtualenv', async () => {
    const binDir = path.join(cwd, '.venv', process.platform === 'win32' ? 'Scripts' : 'bin');
    const executable = path.join(binDir, process.platform === 'win32' ? 'marker_single.exe' : 'marker_single');
    await fs.promises.mkdir(binDir, { recursive: true });
    await fs.promises.writeFile(executable, '', 'utf8');

    expect(resolveConverterConfig({ MARKER_KILL_TIMEOUT_MS: 'soon' }, cwd)).toEqual({
      executablePath: executable,
      baseArgs: [],
      killTimeoutMs: 5000
    });
  });
});

describe('resolveStoragePaths', () => {
  it('lays out storage folders under the root', () => {
    const root = path.resolve('/srv/marker-desk');

    expect(resolveStoragePaths(root)).toEqual({
      root,
      uploadsDir: path.join(root, 'uploads'),
      downloadsDir: path.join(root, 'downloads'),
      workDir: path.join(root, 'work'),
      convertedDir: path.join(root, 'converted'),
      favoritesFile: path.join(root, 'favorites.json')
    });
  });
});
