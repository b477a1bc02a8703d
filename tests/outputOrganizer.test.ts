import fs from 'fs';
import path from 'path';

import { FilesystemError } from '../src/services/errors';
import {
  OWNERSHIP_FILE,
  OutputOrganizer,
  numberedName,
  sanitizeFileName
} from '../src/services/outputOrganizer';
import type { ConversionRequest, OutputLayout } from '../src/types/request';
import { exists, listDir, makeTempDir, removeDir, writePdf, writeRawOutput } from './helpers/files';

describe('sanitizeFileName', () => {
  it('replaces characters that are not allowed in file names', () => {
    expect(sanitizeFileName('a/b:c?')).toBe('a_b_c_');
  });

  it('trims surrounding spaces and trailing dots', () => {
    expect(sanitizeFileName('  Report. ')).toBe('Report');
  });

  it('falls back to a default for names with nothing left', () => {
    expect(sanitizeFileName('...')).toBe('output');
  });
});

describe('numberedName', () => {
  it('keeps the first name and numbers the following ones', () => {
    expect(numberedName('Report', 1)).toBe('Report');
    expect(numberedName('Report', 2)).toBe('Report (2)');
    expect(numberedName('A.pdf', 3)).toBe('A (3).pdf');
  });
});

describe('OutputOrganizer', () => {
  let root: string;
  let outputDir: string;
  let stagingDir: string;
  const organizer = new OutputOrganizer();

  beforeEach(async () => {
    root = await makeTempDir();
    outputDir = path.join(root, 'out');
    stagingDir = path.join(root, 'staging');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function buildRequest(sourcePath: string, outputName: string, layout: OutputLayout): ConversionRequest {
    const now = new Date();
    return {
      id: `request-${outputName}`,
      source: { kind: 'file', path: sourcePath },
      outputName,
      outputDirectory: outputDir,
      pageRange: { kind: 'all' },
      layout,
      status: 'running',
      logs: [],
      createdAt: now,
      updatedAt: now
    };
  }

  it('moves the converter output into a project folder subfolder', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: false });

    const output = await organizer.organize(request, raw);

    const projectDir = path.join(outputDir, 'Report');
    expect(output).toEqual({
      location: projectDir,
      markdownPath: path.join(projectDir, 'Report_marker_output', 'Report.md')
    });
    expect(await listDir(projectDir)).toEqual([OWNERSHIP_FILE, 'Report_marker_output']);
    expect(await listDir(path.join(projectDir, 'Report_marker_output'))).toEqual([
      'Report.md',
      'Report_meta.json',
      '_page_0_Picture_1.jpeg'
    ]);
    expect(exists(raw)).toBe(false);
    expect(exists(source)).toBe(true);
  });

  it('moves the original PDF into the project folder when asked to', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: true });

    const output = await organizer.organize(request, raw);

    expect(output.originalPath).toBe(path.join(outputDir, 'Report', 'Report.pdf'));
    expect(exists(source)).toBe(false);
    expect(await fs.promises.readFile(path.join(outputDir, 'Report', 'Report.pdf'), 'utf8')).toBe(
      '%PDF-1.4\n% test document\n'
    );
  });

  it('numbers the project folder instead of reusing an existing one', async () => {
    await fs.promises.mkdir(path.join(outputDir, 'Report'), { recursive: true });
    await fs.promises.writeFile(path.join(outputDir, 'Report', 'notes.txt'), 'keep me', 'utf8');
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: false });

    const output = await organizer.organize(request, raw);

    expect(output.location).toBe(path.join(outputDir, 'Report (2)'));
    expect(exists(path.join(outputDir, 'Report (2)', 'Report_marker_output', 'Report.md'))).toBe(true);
    expect(await listDir(path.join(outputDir, 'Report'))).toEqual(['notes.txt']);
  });

  it('renames the converter files to the chosen output name', async () => {
    const source = await writePdf(path.join(root, 'in'), 'scan_0042.pdf');
    const raw = await writeRawOutput(stagingDir, 'scan_0042');
    const request = buildRequest(source, 'Quarterly: Q3', { projectFolder: true, moveOriginal: false });

    const output = await organizer.organize(request, raw);

    const converterDir = path.join(outputDir, 'Quarterly_ Q3', 'Quarterly_ Q3_marker_output');
    expect(output.markdownPath).toBe(path.join(converterDir, 'Quarterly_ Q3.md'));
    expect(await listDir(converterDir)).toEqual(['Quarterly_ Q3.md', 'Quarterly_ Q3_meta.json', '_page_0_Picture_1.jpeg']);
  });

  it('places the output directly in a folder named after the output when project folders are off', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: false, moveOriginal: true });

    const output = await organizer.organize(request, raw);

    expect(output).toEqual({
      location: path.join(outputDir, 'Report'),
      markdownPath: path.join(outputDir, 'Report', 'Report.md')
    });
    expect(await listDir(path.join(outputDir, 'Report'))).toEqual([
      OWNERSHIP_FILE,
      'Report.md',
      'Report_meta.json',
      '_page_0_Picture_1.jpeg'
    ]);
    expect(exists(source)).toBe(true);
  });

  it('treats a second call for the same request as already organized', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: true });

    const first = await organizer.organize(request, raw);
    const second = await organizer.organize(request, raw);

    expect(second).toEqual(first);
    expect(await listDir(outputDir)).toEqual(['Report']);
    expect(await listDir(path.join(outputDir, 'Report'))).toEqual([OWNERSHIP_FILE, 'Report.pdf', 'Report_marker_output']);
    expect(await listDir(path.join(outputDir, 'Report', 'Report_marker_output'))).toEqual([
      'Report.md',
      'Report_meta.json',
      '_page_0_Picture_1.jpeg'
    ]);
  });

  it('finishes a partially organized request on retry', async () => {
    const source = path.join(root, 'in', 'Report.pdf');
    const raw = await writeRawOutput(stagingDir, 'Report');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: true });

    await expect(organizer.organize(request, raw)).rejects.toBeInstanceOf(FilesystemError);
    expect(exists(path.join(outputDir, 'Report', 'Report_marker_output', 'Report.md'))).toBe(true);

    await writePdf(path.join(root, 'in'), 'Report.pdf');
    const output = await organizer.organize(request, raw);

    expect(output.location).toBe(path.join(outputDir, 'Report'));
    expect(output.originalPath).toBe(path.join(outputDir, 'Report', 'Report.pdf'));
    expect(await listDir(outputDir)).toEqual(['Report']);
  });

  it('moves a downloaded source into the project folder and leaves its download folder empty', async () => {
    const downloadFolder = path.join(root, 'downloads', 'a1b2');
    const downloaded = await writePdf(downloadFolder, 'paper.pdf');
    const raw = await writeRawOutput(stagingDir, 'paper');
    const request: ConversionRequest = {
      ...buildRequest(downloaded, 'paper', { projectFolder: true, moveOriginal: true }),
      source: { kind: 'url', url: 'https://example.com/papers/paper.pdf', path: downloaded }
    };

    const output = await organizer.organize(request, raw);

    expect(output.originalPath).toBe(path.join(outputDir, 'paper', 'paper.pdf'));
    expect(await listDir(downloadFolder)).toEqual([]);
    const record = JSON.parse(await fs.promises.readFile(path.join(outputDir, 'paper', OWNERSHIP_FILE), 'utf8'));
    expect(record.source).toBe('https://example.com/papers/paper.pdf');
  });

  it('keeps a different file of the same size and moves the original next to it', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: false });
    await organizer.organize(request, await writeRawOutput(stagingDir, 'Report'));
    const lookalike = await writePdf(path.join(outputDir, 'Report'), 'Report.pdf', '%PDF-1.4\n% TEST DOCUMENT\n');

    const output = await organizer.organize(
      { ...request, layout: { projectFolder: true, moveOriginal: true } },
      path.join(stagingDir, 'Report')
    );

    expect(output.originalPath).toBe(path.join(outputDir, 'Report', 'Report (2).pdf'));
    expect(exists(source)).toBe(false);
    expect(await fs.promises.readFile(lookalike, 'utf8')).toBe('%PDF-1.4\n% TEST DOCUMENT\n');
    expect(await fs.promises.readFile(path.join(outputDir, 'Report', 'Report (2).pdf'), 'utf8')).toBe(
      '%PDF-1.4\n% test document\n'
    );
  });

  it('reports missing converter output as a filesystem error', async () => {
    const source = await writePdf(path.join(root, 'in'), 'Report.pdf');
    const request = buildRequest(source, 'Report', { projectFolder: true, moveOriginal: false });

    await expect(organizer.organize(request, path.join(stagingDir, 'Report'))).rejects.toThrow(
      `Converter output not found at "${path.join(stagingDir, 'Report')}".`
    );
  });
});
