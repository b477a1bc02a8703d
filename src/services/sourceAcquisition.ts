import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import { DownloadError, SourceValidationError, describeError, isErrnoException } from './errors';
import { sanitizeFileName } from './outputOrganizer';
import type { RequestSource } from '../types/request';

export interface SourceAcquisitionOptions {
  downloadDirectory: string;
  /** Where uploads are stored; uploaded sources inside it are deleted on release. */
  uploadDirectory?: string;
  fetchImpl?: typeof fetch;
}

export interface DownloadedSource {
  path: string;
  fileName: string;
}

const PDF_SIGNATURE = '%PDF-';

export class SourceAcquisition {
  private readonly downloadDirectory: string;
  private readonly uploadDirectory?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SourceAcquisitionOptions) {
    this.downloadDirectory = options.downloadDirectory;
    this.uploadDirectory = options.uploadDirectory;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async resolveLocalFile(filePath: string): Promise<string> {
    if (!path.isAbsolute(filePath)) {
      throw new SourceValidationError('sourcePath must be an absolute path.');
    }

    if (path.extname(filePath).toLowerCase() !== '.pdf') {
      throw new SourceValidationError(`"${path.basename(filePath)}" is not a PDF file.`);
    }

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new SourceValidationError(`File not found: ${filePath}`);
      }
      throw error;
    }

    if (!stats.isFile()) {
      throw new SourceValidationError(`"${filePath}" is not a regular file.`);
    }

    return path.normalize(filePath);
  }

  async download(url: string): Promise<DownloadedSource> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (_error) {
      throw new DownloadError(url, 'not a valid URL');
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new DownloadError(url, `unsupported protocol "${parsed.protocol}"`);
    }

    let body: Buffer;
    let disposition: string | null;
    try {
      const response = await this.fetchImpl(parsed, { redirect: 'follow' });
      if (!response.ok) {
        throw new DownloadError(url, `server responded with ${response.status} ${response.statusText}`.trim());
      }
      disposition = response.headers.get('content-disposition');
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(url, describeError(error, 'unknown network error'));
    }

    if (body.subarray(0, PDF_SIGNATURE.length).toString('latin1') !== PDF_SIGNATURE) {
      throw new DownloadError(url, 'response is not a PDF document');
    }

    const fileName = resolveDownloadName(parsed, disposition);
    const directory = path.join(this.downloadDirectory, randomUUID());
    const target = path.join(directory, fileName);

    try {
      await fs.promises.mkdir(directory, { recursive: true });
      await fs.promises.writeFile(target, body);
    } catch (error) {
      await fs.promises.rm(directory, { recursive: true, force: true });
      throw new DownloadError(url, describeError(error, 'could not save file'));
    }

    return { path: target, fileName };
  }

  /** Removes the temporary folder of a downloaded source. */
  async discard(downloadedPath: string): Promise<void> {
    const directory = path.dirname(downloadedPath);
    if (!isInside(this.downloadDirectory, directory)) {
      return;
    }

    await fs.promises.rm(directory, { recursive: true, force: true });
  }

  /** Deletes what this service stored for a source: a download or an upload. Local files are left alone. */
  async release(source: RequestSource): Promise<void> {
    if (source.kind === 'url' && source.path) {
      await this.discard(source.path);
    } else if (source.kind === 'upload' && this.uploadDirectory && isInside(this.uploadDirectory, source.path)) {
      await fs.promises.rm(source.path, { force: true });
    }
  }
}

function isInside(directory: string, target: string): boolean {
  const relative = path.relative(directory, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export function resolveDownloadName(url: URL, contentDisposition: string | null): string {
  const fromHeader = contentDisposition ? parseDispositionFilename(contentDisposition) : undefined;
  const fromPath = decodeSegment(url.pathname.split('/').filter(Boolean).pop());
  const candidate = fromHeader ?? fromPath ?? 'download';

  const stem = sanitizeFileName(candidate.replace(/\.pdf$/i, ''));
  return `${stem}.pdf`;
}

function parseDispositionFilename(header: string): string | undefined {
  const encoded = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(header);
  if (encoded) {
    return decodeSegment(encoded[1].trim().replace(/^"|"$/g, ''));
  }

  const plain = /filename\s*=\s*("?)([^";]+)\1/i.exec(header);
  return plain ? plain[2].trim() : undefined;
}

function decodeSegment(segment: string | undefined): string | undefined {
  if (!segment) {
    return undefined;
  }

  try {
    return decodeURIComponent(segment);
  } catch (_error) {
    return segment;
  }
}
