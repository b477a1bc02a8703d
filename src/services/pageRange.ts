import { PageRangeError } from './errors';
import type { PageRange } from '../types/request';

export const ALL_PAGES: PageRange = { kind: 'all' };

export function createPageRange(start: number, end: number): PageRange {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new PageRangeError('Page numbers must be whole numbers.');
  }

  if (start < 1 || end < start) {
    throw new PageRangeError('Start page must be >= 1 and <= end page.');
  }

  return { kind: 'range', start, end };
}

/**
 * Accepts `"all"`, `{ start, end }` or a `"start-end"` string, with numbers or numeric strings.
 */
export function parsePageRange(value: unknown): PageRange {
  if (value === undefined || value === null || value === 'all') {
    return ALL_PAGES;
  }

  if (typeof value === 'string') {
    const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(value);
    if (!match) {
      throw new PageRangeError(`Invalid page range "${value}". Use "all" or "start-end".`);
    }
    return createPageRange(Number(match[1]), Number(match[2]));
  }

  if (typeof value === 'object' && 'start' in value && 'end' in value) {
    return createPageRange(toPageNumber(value.start), toPageNumber(value.end));
  }

  throw new PageRangeError('Invalid page range. Use "all" or { start, end }.');
}

/** The converter counts pages from zero. */
export function toConverterPageRange(range: PageRange): string | undefined {
  if (range.kind === 'all') {
    return undefined;
  }

  return `${range.start - 1}-${range.end - 1}`;
}

export function describePageRange(range: PageRange): string {
  return range.kind === 'all' ? 'all pages' : `pages ${range.start}-${range.end}`;
}

function toPageNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }

  return Number.NaN;
}
