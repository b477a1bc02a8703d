import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import type { ConversionRequest, OutputLayout, PageRange, RequestSource } from '../types/request';
import { DownloadError, PageRangeError, SourceValidationError, ValidationError, describeError } from './errors';
import type { FavoritesStore } from './favoritesStore';
import type { JobOrchestrator, RequestPatch } from './jobOrchestrator';
import { sanitizeFileName } from './outputOrganizer';
import { ALL_PAGES, parsePageRange } from './pageRange';
import type { PdfInspector } from './pdfInspector';
import type { SourceAcquisition } from './sourceAcquisition';

/** Raw, unvalidated request options as they arrive from JSON bodies or multipart fields. */
export interface RequestOptionsInput {
  outputName?: unknown;
  outputDirectory?: unknown;
  favorite?: unknown;
  pageRange?: unknown;
  projectFolder?: unknown;
  moveOriginal?: unknown;
}

export interface UploadedFile {
  path: string;
  originalName: string;
}

export interface ConversionServiceOptions {
  defaultOutputDirectory: string;
  acquisition: SourceAcquisition;
  favorites: FavoritesStore;
  inspector?: PdfInspector;
}

const DEFAULT_LAYOUT: OutputLayout = { projectFolder: true, moveOriginal: false };

export class ConversionService {
  private readonly defaultOutputDirectory: string;
  private readonly acquisition: SourceAcquisition;
  private readonly favorites: FavoritesStore;
  private readonly inspector?: PdfInspector;

  constructor(private readonly orchestrator: JobOrchestrator, options: ConversionServiceOptions) {
    this.defaultOutputDirectory = options.defaultOutputDirectory;
    this.acquisition = options.acquisition;
    this.favorites = options.favorites;
    this.inspector = options.inspector;
  }

  async addLocalFile(sourcePath: unknown, input: RequestOptionsInput): Promise<ConversionRequest> {
    if (typeof sourcePath !== 'string' || !sourcePath.trim()) {
      throw new SourceValidationError('sourcePath is required.');
    }

    const resolvedPath = await this.acquisition.resolveLocalFile(sourcePath.trim());
    return this.enqueue({ kind: 'file', path: resolvedPath }, path.dirname(resolvedPath), input);
  }

  async addUpload(file: UploadedFile, input: RequestOptionsInput): Promise<ConversionRequest> {
    if (path.extname(file.originalName).toLowerCase() !== '.pdf') {
      await fs.promises.rm(file.path, { force: true });
      throw new SourceValidationError(`"${file.originalName}" is not a PDF file.`);
    }

    try {
      return await this.enqueue(
        { kind: 'upload', path: file.path, originalName: file.originalName },
        this.defaultOutputDirectory,
        input
      );
    } catch (error) {
      await fs.promises.rm(file.path, { force: true });
      throw error;
    }
  }

  /** Downloads first; a failed download is recorded as a failed request that never runs. */
  async addUrl(url: unknown, input: RequestOptionsInput): Promise<ConversionRequest> {
    if (typeof url !== 'string' || !url.trim()) {
      throw new SourceValidationError('url is required.');
    }

    const trimmedUrl = url.trim();
    const options = this.parseOptions(input);

    try {
      const downloaded = await this.acquisition.download(trimmedUrl);
      try {
        return await this.enqueue({ kind: 'url', url: trimmedUrl, path: downloaded.path }, this.defaultOutputDirectory, input);
      } catch (error) {
        await this.acquisition.discard(downloaded.path);
        throw error;
      }
    } catch (error) {
      if (!(error instanceof DownloadError)) {
        throw error;
      }

      console.warn(error.message);
      return this.orchestrator.recordFailure(
        {
          id: randomUUID(),
          source: { kind: 'url', url: trimmedUrl, path: '' },
          outputName: options.outputName ?? outputNameFromUrl(trimmedUrl),
          outputDirectory: options.outputDirectory ?? this.defaultOutputDirectory,
          pageRange: options.pageRange ?? ALL_PAGES,
          layout: { ...DEFAULT_LAYOUT, ...options.layout }
        },
        { kind: error.kind, message: error.message }
      );
    }
  }

  async updateRequest(id: string, input: RequestOptionsInput): Promise<ConversionRequest> {
    const current = this.orchestrator.get(id);
    const options = this.parseOptions(input);
    const patch: RequestPatch = {};

    if (options.outputName !== undefined) {
      patch.outputName = options.outputName;
    }
    if (options.outputDirectory !== undefined) {
      patch.outputDirectory = options.outputDirectory;
    }
    if (options.pageRange !== undefined) {
      if (current) {
        await this.checkPageRange(current.source.path, options.pageRange);
      }
      patch.pageRange = options.pageRange;
    }
    if (current && (options.layout.projectFolder !== undefined || options.layout.moveOriginal !== undefined)) {
      patch.layout = { ...current.layout, ...options.layout };
    }

    return this.orchestrator.update(id, patch);
  }

  private async enqueue(source: RequestSource, fallbackDirectory: string, input: RequestOptionsInput): Promise<ConversionRequest> {
    const options = this.parseOptions(input);
    const pageRange = options.pageRange ?? ALL_PAGES;
    await this.checkPageRange(source.path, pageRange);

    const sourceName = source.kind === 'upload' ? source.originalName : path.basename(source.path);
    const request = this.orchestrator.enqueue({
      id: randomUUID(),
      source,
      outputName: options.outputName ?? path.parse(sourceName).name,
      outputDirectory: options.outputDirectory ?? fallbackDirectory,
      pageRange,
      layout: { ...DEFAULT_LAYOUT, ...options.layout }
    });

    console.log(`Queued ${sourceName} as ${request.id}`);
    return request;
  }

  private parseOptions(input: RequestOptionsInput): {
    outputName?: string;
    outputDirectory?: string;
    pageRange?: PageRange;
    layout: Partial<OutputLayout>;
  } {
    const layout: Partial<OutputLayout> = {};
    const projectFolder = parseBoolean(input.projectFolder, 'projectFolder');
    const moveOriginal = parseBoolean(input.moveOriginal, 'moveOriginal');
    if (projectFolder !== undefined) {
      layout.projectFolder = projectFolder;
    }
    if (moveOriginal !== undefined) {
      layout.moveOriginal = moveOriginal;
    }

    return {
      outputName: parseOutputName(input.outputName),
      outputDirectory: this.parseOutputDirectory(input),
      pageRange: input.pageRange === undefined || input.pageRange === '' ? undefined : parsePageRange(input.pageRange),
      layout
    };
  }

  private parseOutputDirectory(input: RequestOptionsInput): string | undefined {
    if (input.favorite !== undefined && input.favorite !== '') {
      if (typeof input.favorite !== 'string') {
        throw new ValidationError('favorite must be a label.');
      }
      const favorite = this.favorites.get(input.favorite);
      if (!favorite) {
        throw new ValidationError(`No favorite folder named "${input.favorite}".`);
      }
      return favorite.path;
    }

    if (input.outputDirectory === undefined || input.outputDirectory === '') {
      return undefined;
    }

    if (typeof input.outputDirectory !== 'string' || !path.isAbsolute(input.outputDirectory)) {
      throw new ValidationError('outputDirectory must be an absolute path.');
    }

    return path.normalize(input.outputDirectory);
  }

  private async checkPageRange(sourcePath: string, pageRange: PageRange): Promise<void> {
    if (pageRange.kind === 'all' || !this.inspector || !sourcePath) {
      return;
    }

    let pageCount: number;
    try {
      pageCount = await this.inspector.countPages(sourcePath);
    } catch (error) {
      const message = describeError(error, 'unknown error');
      console.warn(`Could not read page count of ${sourcePath}: ${message}`);
      return;
    }

    if (pageRange.end > pageCount) {
      throw new PageRangeError(`Page range ends at ${pageRange.end} but the document has ${pageCount} pages.`);
    }
  }
}

function parseOutputName(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError('outputName must be a non-empty string.');
  }

  return value.trim();
}

function parseBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }

  throw new ValidationError(`${field} must be true or false.`);
}

function outputNameFromUrl(url: string): string {
  try {
    const segment = new URL(url).pathname.split('/').filter(Boolean).pop();
    return segment ? sanitizeFileName(segment.replace(/\.pdf$/i, '')) : 'download';
  } catch (_error) {
    return 'download';
  }
}
