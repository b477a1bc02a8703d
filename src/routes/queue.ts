import express, { type Request, type Response } from 'express';
import multer from 'multer';
import path from 'path';
import { randomUUID } from 'crypto';

import type { ConversionService, RequestOptionsInput } from '../services/conversionService';
import { describeError } from '../services/errors';
import type { JobOrchestrator } from '../services/jobOrchestrator';
import type { ConversionRequest } from '../types/request';
import { respondWithError } from './errors';

export interface QueueRouterOptions {
  uploadsDirectory: string;
}

type RequestBody = Record<string, unknown>;

export function serializeRequest(request: ConversionRequest, includeLogs = false) {
  return {
    id: request.id,
    status: request.status,
    source: request.source,
    outputName: request.outputName,
    outputDirectory: request.outputDirectory,
    pageRange: request.pageRange,
    layout: request.layout,
    output: request.output,
    failure: request.failure,
    logLines: request.logs.length,
    logs: includeLogs ? request.logs : undefined,
    createdAt: request.createdAt,
    updatedAt: request.updatedAt,
    startedAt: request.startedAt,
    finishedAt: request.finishedAt
  };
}

function readBody(req: Request): RequestBody {
  const body: unknown = req.body;
  return body && typeof body === 'object' ? { ...body } : {};
}

function readOptions(body: RequestBody): RequestOptionsInput {
  return {
    outputName: body.outputName,
    outputDirectory: body.outputDirectory,
    favorite: body.favorite,
    pageRange: body.pageRange,
    projectFolder: body.projectFolder,
    moveOriginal: body.moveOriginal
  };
}

export function createQueueRouter(
  orchestrator: JobOrchestrator,
  conversionService: ConversionService,
  options: QueueRouterOptions
): express.Router {
  const router = express.Router();
  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, options.uploadsDirectory);
    },
    filename: (_req, file, cb) => {
      const extension = path.extname(file.originalname);
      const uniqueName = `${Date.now()}-${randomUUID()}${extension}`;
      cb(null, uniqueName);
    }
  });
  const upload = multer({ storage });

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      paused: orchestrator.isPaused(),
      running: orchestrator.isRunning(),
      currentRequestId: orchestrator.currentRequestId(),
      requests: orchestrator.list().map((request) => serializeRequest(request))
    });
  });

  router.post('/', async (req: Request, res: Response) => {
    const body = readBody(req);

    try {
      const request = await conversionService.addLocalFile(body.sourcePath, readOptions(body));
      return res.status(201).json({ message: 'Conversion request queued.', request: serializeRequest(request) });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  router.post('/upload', upload.single('file'), async (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ message: 'File is required.' });
    }

    const body = readBody(req);

    try {
      const request = await conversionService.addUpload(
        { path: req.file.path, originalName: req.file.originalname },
        readOptions(body)
      );
      return res.status(201).json({ message: 'Conversion request queued.', request: serializeRequest(request) });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  router.post('/url', async (req: Request, res: Response) => {
    const body = readBody(req);

    try {
      const request = await conversionService.addUrl(body.url, readOptions(body));
      if (request.status === 'failed') {
        return res.status(502).json({
          message: request.failure?.message ?? 'Download failed.',
          request: serializeRequest(request, true)
        });
      }
      return res.status(201).json({ message: 'Conversion request queued.', request: serializeRequest(request) });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  router.post('/start', (_req: Request, res: Response) => {
    void orchestrator.start().catch((error: unknown) => {
      const message = describeError(error);
      console.error('Conversion queue stopped unexpectedly:', message);
    });

    return res.status(202).json({ message: 'Conversion queue started.', running: orchestrator.isRunning() });
  });

  router.post('/cancel', (_req: Request, res: Response) => {
    const requestId = orchestrator.currentRequestId();
    const cancelled = orchestrator.cancelCurrent();
    return res.json({ cancelled, requestId: cancelled ? requestId : undefined });
  });

  router.post('/cancel-all', (_req: Request, res: Response) => {
    orchestrator.cancelAll();
    return res.json({ message: 'All conversions cancelled.' });
  });

  router.get('/:id', (req: Request, res: Response) => {
    const request = orchestrator.get(req.params.id);
    if (!request) {
      return res.status(404).json({ message: 'Conversion request not found.' });
    }

    return res.json({ request: serializeRequest(request, true) });
  });

  router.patch('/:id', async (req: Request, res: Response) => {
    try {
      const request = await conversionService.updateRequest(req.params.id, readOptions(readBody(req)));
      return res.json({ request: serializeRequest(request) });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      await orchestrator.remove(req.params.id);
      return res.status(204).end();
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  return router;
}
