import express, { type Request, type Response } from 'express';

import type { JobOrchestrator, OrchestratorEvent } from '../services/jobOrchestrator';
import { serializeRequest } from './queue';

const HEARTBEAT_INTERVAL_MS = 15000;

export function formatServerSentEvent(event: OrchestratorEvent): string {
  const payload = event.type === 'status'
    ? { ...event, request: serializeRequest(event.request) }
    : event;

  return `event: ${event.type}\ndata: ${JSON.stringify(payload)}\n\n`;
}

/** Status changes and converter output as Server-Sent Events, for the log panel. */
export function createEventsRouter(orchestrator: JobOrchestrator): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const unsubscribe = orchestrator.subscribe((event) => {
      res.write(formatServerSentEvent(event));
    });
    const heartbeat = setInterval(() => {
      res.write(': heartbeat\n\n');
    }, HEARTBEAT_INTERVAL_MS);

    res.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  });

  return router;
}
