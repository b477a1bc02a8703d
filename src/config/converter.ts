import fs from 'fs';
import path from 'path';

export interface ConverterConfig {
  executablePath: string;
  /** Arguments placed before the input path, e.g. a script for an interpreter. */
  baseArgs: string[];
  killTimeoutMs: number;
}

const DEFAULT_EXECUTABLE = 'marker_single';
const DEFAULT_KILL_TIMEOUT_MS = 5000;

/**
 * MARKER_PATH wins; otherwise a marker install in the project's .venv; otherwise PATH lookup.
 */
export function resolveConverterConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ConverterConfig {
  const configured = env.MARKER_PATH?.trim();
  const killTimeout = Number(env.MARKER_KILL_TIMEOUT_MS);

  return {
    executablePath: configured || findVenvExecutable(cwd) || DEFAULT_EXECUTABLE,
    baseArgs: [],
    killTimeoutMs: Number.isFinite(killTimeout) && killTimeout > 0 ? killTimeout : DEFAULT_KILL_TIMEOUT_MS
  };
}

function findVenvExecutable(cwd: string): string | undefined {
  const isWindows = process.platform === 'win32';
  const candidate = path.join(
    cwd,
    '.venv',
    isWindows ? 'Scripts' : 'bin',
    isWindows ? `${DEFAULT_EXECUTABLE}.exe` : DEFAULT_EXECUTABLE
  );

  return fs.existsSync(candidate) ? candidate : undefined;
}
