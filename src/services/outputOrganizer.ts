import fs from 'fs';
import path from 'path';

import type { ConversionRequest, OrganizedOutput } from '../types/request';
import { FilesystemError, isErrnoException, toFilesystemError } from './errors';

export const OWNERSHIP_FILE = '.marker-desk.json';
export const CONVERTER_OUTPUT_SUFFIX = '_marker_output';

interface OwnershipRecord {
  requestId: string;
  source: string;
  organizedAt: string;
}

const UNSAFE_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(UNSAFE_CHARACTERS, '_').trim().replace(/[. ]+$/, '');
  return cleaned || 'output';
}

/** "Name", "Name (2)", "Name (3)", ... with the extension kept at the end. */
export function numberedName(fileName: string, counter: number): string {
  if (counter <= 1) {
    return fileName;
  }

  const extension = path.extname(fileName);
  const stem = extension ? fileName.slice(0, -extension.length) : fileName;
  return `${stem} (${counter})${extension}`;
}

export class OutputOrganizer {
  async organize(request: ConversionRequest, rawOutputDir: string): Promise<OrganizedOutput> {
    const name = sanitizeFileName(request.outputName);

    try {
      await fs.promises.mkdir(request.outputDirectory, { recursive: true });
    } catch (error) {
      throw toFilesystemError(error, `create output directory "${request.outputDirectory}"`);
    }

    const folder = (await this.findOwnedFolder(request, name)) ?? (await this.claimFolder(request, name));
    const converterDir = request.layout.projectFolder
      ? path.join(folder, `${name}${CONVERTER_OUTPUT_SUFFIX}`)
      : folder;

    await this.placeConverterOutput(rawOutputDir, converterDir, name);

    const output: OrganizedOutput = { location: folder };
    const markdownPath = path.join(converterDir, `${name}.md`);
    if (await pathExists(markdownPath)) {
      output.markdownPath = markdownPath;
    }

    if (request.layout.projectFolder && request.layout.moveOriginal) {
      output.originalPath = await this.placeOriginal(request, folder);
    }

    return output;
  }

  private async findOwnedFolder(request: ConversionRequest, name: string): Promise<string | undefined> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(request.outputDirectory);
    } catch (error) {
      throw toFilesystemError(error, `read output directory "${request.outputDirectory}"`);
    }

    const pattern = new RegExp(`^${escapeRegExp(name)}( \\(\\d+\\))?$`);
    for (const entry of entries.filter((candidate) => pattern.test(candidate))) {
      const folder = path.join(request.outputDirectory, entry);
      const record = await readOwnershipRecord(folder).catch((error: unknown) => {
        throw toFilesystemError(error, `read ownership record in "${folder}"`);
      });
      if (record?.requestId === request.id) {
        return folder;
      }
    }

    return undefined;
  }

  private async claimFolder(request: ConversionRequest, name: string): Promise<string> {
    for (let counter = 1; ; counter += 1) {
      const folder = path.join(request.outputDirectory, numberedName(name, counter));
      try {
        await fs.promises.mkdir(folder);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          continue;
        }
        throw toFilesystemError(error, `create folder "${folder}"`);
      }

      const record: OwnershipRecord = {
        requestId: request.id,
        source: request.source.kind === 'url' ? request.source.url : request.source.path,
        organizedAt: new Date().toISOString()
      };
      try {
        await fs.promises.writeFile(path.join(folder, OWNERSHIP_FILE), JSON.stringify(record, null, 2), 'utf8');
      } catch (error) {
        throw toFilesystemError(error, `write ownership record in "${folder}"`);
      }
      return folder;
    }
  }

  private async placeConverterOutput(rawOutputDir: string, targetDir: string, name: string): Promise<void> {
    if (!(await pathExists(rawOutputDir))) {
      if (await pathExists(path.join(targetDir, `${name}.md`))) {
        return;
      }
      throw new FilesystemError(`Converter output not found at "${rawOutputDir}".`, 'ENOENT');
    }

    // marker names its files after the input PDF; the folder it writes is named the same way.
    const stem = path.basename(rawOutputDir);

    try {
      await fs.promises.mkdir(targetDir, { recursive: true });
      const entries = await fs.promises.readdir(rawOutputDir);

      for (const entry of entries) {
        const source = path.join(rawOutputDir, entry);
        const destinationName = renameForOutput(entry, stem, name);
        const destination = await this.resolveDestination(source, targetDir, destinationName);
        if (destination) {
          await movePath(source, destination);
        } else {
          await fs.promises.rm(source, { recursive: true, force: true });
        }
      }

      await fs.promises.rm(rawOutputDir, { recursive: true, force: true });
    } catch (error) {
      throw toFilesystemError(error, `move converter output into "${targetDir}"`);
    }
  }

  private async placeOriginal(request: ConversionRequest, folder: string): Promise<string> {
    const sourcePath = request.source.path;
    const fileName = request.source.kind === 'upload'
      ? sanitizeFileName(request.source.originalName)
      : path.basename(sourcePath);
    const placed = path.join(folder, fileName);

    try {
      if (!(await pathExists(sourcePath))) {
        if (await pathExists(placed)) {
          return placed;
        }
        throw new FilesystemError(`Original PDF "${sourcePath}" no longer exists.`, 'ENOENT');
      }

      const destination = await this.resolveDestination(sourcePath, folder, fileName);
      if (!destination) {
        await fs.promises.rm(sourcePath, { force: true });
        return placed;
      }

      await movePath(sourcePath, destination);
      return destination;
    } catch (error) {
      throw toFilesystemError(error, `move original PDF into "${folder}"`);
    }
  }

  /**
   * Free destination for `source`, or undefined when a byte-identical file is already there
   * (a previous attempt copied it but did not finish removing the source).
   */
  private async resolveDestination(source: string, directory: string, fileName: string): Promise<string | undefined> {
    const sourceStats = await fs.promises.stat(source);

    for (let counter = 1; ; counter += 1) {
      const candidate = path.join(directory, numberedName(fileName, counter));
      const existing = await statOrUndefined(candidate);
      if (!existing) {
        return candidate;
      }
      if (
        counter === 1 &&
        sourceStats.isFile() &&
        existing.isFile() &&
        existing.size === sourceStats.size &&
        (await sameContent(source, candidate))
      ) {
        return undefined;
      }
    }
  }
}

function renameForOutput(entry: string, stem: string, name: string): string {
  if (stem === name || !entry.startsWith(stem)) {
    return entry;
  }

  const rest = entry.slice(stem.length);
  return rest.startsWith('.') || rest.startsWith('_') ? `${name}${rest}` : entry;
}

async function movePath(source: string, destination: string): Promise<void> {
  try {
    await fs.promises.rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await fs.promises.cp(source, destination, { recursive: true, errorOnExist: true, force: false });
    await fs.promises.rm(source, { recursive: true, force: true });
  }
}

async function readOwnershipRecord(folder: string): Promise<OwnershipRecord | undefined> {
  try {
    const content = await fs.promises.readFile(path.join(folder, OWNERSHIP_FILE), 'utf8');
    const data: unknown = JSON.parse(content);
    if (data && typeof data === 'object' && 'requestId' in data && typeof data.requestId === 'string') {
      return {
        requestId: data.requestId,
        source: 'source' in data && typeof data.source === 'string' ? data.source : '',
        organizedAt: 'organizedAt' in data && typeof data.organizedAt === 'string' ? data.organizedAt : ''
      };
    }
  } catch (error) {
    const missing = isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
    if (!missing && !(error instanceof SyntaxError)) {
      throw error;
    }
  }
  return undefined;
}

async function sameContent(first: string, second: string): Promise<boolean> {
  const [left, right] = await Promise.all([fs.promises.readFile(first), fs.promises.readFile(second)]);
  return left.equals(right);
}

async function statOrUndefined(target: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

async function pathExists(target: string): Promise<boolean> {
  return (await statOrUndefined(target)) !== undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
