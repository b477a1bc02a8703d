import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';

import type {
  ConversionRequest,
  OrganizedOutput,
  OutputLayout,
  PageRange,
  QueueSummary,
  RequestFailure,
  RequestStatus
} from '../types/request';
import {
  CancellationError,
  ConversionError,
  JobError,
  RequestStateError,
  ResourceExhaustedError,
  describeError,
  toFilesystemError
} from './errors';
import type { OutputOrganizer } from './outputOrganizer';
import { describePageRange } from './pageRange';
import type { ConverterInvocation, ConverterRun, ConverterRunner, RunExit } from './processRunner';
import type { CreateRequestPayload, RequestQueue } from './requestQueue';

export type OrchestratorEvent =
  | { type: 'status'; request: ConversionRequest; previousStatus: RequestStatus }
  | { type: 'log'; requestId: string; line: string }
  | { type: 'organized'; requestId: string; output: OrganizedOutput }
  | { type: 'paused'; requestId: string; reason: string }
  | { type: 'drained'; summary: QueueSummary };

export type OrchestratorListener = (event: OrchestratorEvent) => void;

export interface RequestPatch {
  outputName?: string;
  outputDirectory?: string;
  pageRange?: PageRange;
  layout?: OutputLayout;
}

export interface JobOrchestratorOptions {
  workDirectory: string;
  /** Called once a request is settled, e.g. to delete a downloaded temporary file. */
  releaseSource?: (request: ConversionRequest) => Promise<void>;
  diagnosticLines?: number;
}

interface ActiveJob {
  requestId: string;
  run?: ConverterRun;
  cancelRequested: boolean;
}

const DEFAULT_DIAGNOSTIC_LINES = 20;
const EVENT_NAME = 'event';

/**
 * Runs queued requests one at a time against the converter.
 * The only writer of request status and logs; observers receive every change through `subscribe`.
 */
export class JobOrchestrator {
  private readonly emitter = new EventEmitter();
  private readonly workDirectory: string;
  private readonly releaseSource?: (request: ConversionRequest) => Promise<void>;
  private readonly diagnosticLines: number;
  private loop?: Promise<void>;
  private active?: ActiveJob;
  private paused = false;

  constructor(
    private readonly queue: RequestQueue,
    private readonly runner: ConverterRunner,
    private readonly organizer: OutputOrganizer,
    options: JobOrchestratorOptions
  ) {
    this.workDirectory = options.workDirectory;
    this.releaseSource = options.releaseSource;
    this.diagnosticLines = options.diagnosticLines ?? DEFAULT_DIAGNOSTIC_LINES;
    this.emitter.setMaxListeners(0);
  }

  /** A listener that throws is logged and skipped; it never stops the queue. */
  subscribe(listener: OrchestratorListener): () => void {
    const guarded = (event: OrchestratorEvent): void => {
      try {
        listener(event);
      } catch (error) {
        const message = describeError(error);
        console.error(`Event listener failed on ${event.type}: ${message}`);
      }
    };

    this.emitter.on(EVENT_NAME, guarded);
    return () => {
      this.emitter.off(EVENT_NAME, guarded);
    };
  }

  list(): ConversionRequest[] {
    return this.queue.list();
  }

  get(id: string): ConversionRequest | undefined {
    return this.queue.get(id);
  }

  isPaused(): boolean {
    return this.paused;
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  currentRequestId(): string | undefined {
    return this.active?.requestId;
  }

  enqueue(payload: CreateRequestPayload): ConversionRequest {
    return this.queue.create(payload);
  }

  /** Records a request that failed before it could be queued, e.g. a failed download. */
  recordFailure(payload: CreateRequestPayload, failure: RequestFailure): ConversionRequest {
    const request = this.queue.create(payload);
    this.log(request.id, `✗ ${failure.message}`);
    this.transition(request.id, 'failed', { failure, finishedAt: new Date() });
    return this.queue.require(request.id);
  }

  update(id: string, patch: RequestPatch): ConversionRequest {
    const request = this.queue.require(id);
    if (request.status !== 'pending') {
      throw new RequestStateError(`Only pending requests can be edited; "${request.outputName}" is ${request.status}.`);
    }

    return this.queue.update(id, patch);
  }

  async remove(id: string): Promise<ConversionRequest> {
    const request = this.queue.require(id);
    if (request.status === 'running') {
      throw new RequestStateError(`"${request.outputName}" is running; cancel it before removing.`);
    }

    this.queue.remove(id);
    if (request.status === 'pending') {
      await this.release(request);
    }
    return request;
  }

  /**
   * Processes pending requests in queue order. Returns the promise of the active loop,
   * which settles when the queue is drained or the orchestrator pauses.
   */
  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }

    this.paused = false;
    if (!this.queue.nextPending()) {
      return Promise.resolve();
    }

    const loop = this.drain();
    this.loop = loop;
    return loop;
  }

  whenIdle(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  cancelCurrent(): boolean {
    const active = this.active;
    if (!active || active.cancelRequested) {
      return false;
    }

    active.cancelRequested = true;
    active.run?.cancel();
    return true;
  }

  cancelAll(): void {
    for (const request of this.queue.withStatus('pending')) {
      this.log(request.id, '⚠ Cancelled before it started.');
      this.transition(request.id, 'cancelled', { finishedAt: new Date() });
      void this.release(request);
    }

    this.cancelCurrent();
  }

  private async drain(): Promise<void> {
    const summary: QueueSummary = { succeeded: 0, failed: 0, cancelled: 0 };
    let position = 0;

    try {
      while (!this.paused) {
        const next = this.queue.nextPending();
        if (!next) {
          break;
        }

        position += 1;
        const total = position + this.queue.withStatus('pending').length - 1;
        const status = await this.process(next, position, total);
        if (status === 'succeeded' || status === 'failed' || status === 'cancelled') {
          summary[status] += 1;
        }
      }
    } finally {
      // Cleared before `drained` so a listener can start a new loop.
      this.loop = undefined;
    }

    this.emit({ type: 'drained', summary });
  }

  private async process(request: ConversionRequest, position: number, total: number): Promise<RequestStatus> {
    const active: ActiveJob = { requestId: request.id, cancelRequested: false };
    this.active = active;

    const stagingDir = path.join(this.workDirectory, request.id);
    const sourceName = displayName(request);
    let finalStatus: RequestStatus;

    try {
      this.transition(request.id, 'running', { startedAt: new Date(), failure: undefined });
      this.log(request.id, `[${position}/${total}] Converting: ${sourceName} (${describePageRange(request.pageRange)})`);

      try {
        await fs.promises.rm(stagingDir, { recursive: true, force: true });
        await fs.promises.mkdir(stagingDir, { recursive: true });
      } catch (error) {
        throw toFilesystemError(error, `prepare working folder "${stagingDir}"`);
      }

      const invocation: ConverterInvocation = {
        sourcePath: request.source.path,
        outputDirectory: stagingDir,
        pageRange: request.pageRange
      };
      this.log(request.id, `$ ${this.runner.describe(invocation)}`);

      const exit = await this.runConverter(active, invocation);
      if (active.cancelRequested || exit.cancelled) {
        throw new CancellationError();
      }
      if (exit.exitCode !== 0) {
        const reason = exit.signal
          ? `Converter was terminated by ${exit.signal}.`
          : `Converter failed with exit code ${exit.exitCode}.`;
        throw new ConversionError(reason, exit.exitCode);
      }

      const rawOutput = await locateRawOutput(stagingDir, request.source.path);
      const output = await this.organizer.organize(this.queue.require(request.id), rawOutput);
      this.emit({ type: 'organized', requestId: request.id, output });

      if (active.cancelRequested) {
        this.log(request.id, `⚠ Cancelled after the output was written to ${output.location}.`);
        finalStatus = 'cancelled';
        this.transition(request.id, 'cancelled', { output, finishedAt: new Date() });
      } else {
        this.log(request.id, `✓ ${sourceName} completed successfully! Output: ${output.location}`);
        finalStatus = 'succeeded';
        this.transition(request.id, 'succeeded', { output, finishedAt: new Date() });
      }
      console.log(`Conversion ${request.id} finished: ${finalStatus}`);
    } catch (error) {
      finalStatus = this.settleError(request.id, error);
    } finally {
      this.active = undefined;
      await fs.promises.rm(stagingDir, { recursive: true, force: true }).catch((error: unknown) => {
        const message = describeError(error);
        console.warn(`Could not remove working folder ${stagingDir}: ${message}`);
      });
    }

    await this.release(this.queue.get(request.id) ?? request);
    return finalStatus;
  }

  private async runConverter(active: ActiveJob, invocation: ConverterInvocation): Promise<RunExit> {
    if (active.cancelRequested) {
      throw new CancellationError();
    }

    const run = await this.runner.run(invocation);
    active.run = run;
    if (active.cancelRequested) {
      run.cancel();
    }

    let exit: RunExit | undefined;
    for await (const event of run) {
      if (event.type === 'line') {
        this.log(active.requestId, event.line);
      } else {
        exit = event;
      }
    }

    if (!exit) {
      throw new ConversionError('Converter output ended without an exit status.');
    }
    return exit;
  }

  private settleError(requestId: string, error: unknown): RequestStatus {
    if (error instanceof CancellationError) {
      this.log(requestId, `⚠ ${error.message}`);
      this.transition(requestId, 'cancelled', { finishedAt: new Date() });
      console.log(`Conversion ${requestId} cancelled`);
      return 'cancelled';
    }

    const failure = this.describeFailure(requestId, error);
    this.log(requestId, `✗ ${failure.message}`);
    this.transition(requestId, 'failed', { failure, finishedAt: new Date() });
    console.error(`Conversion ${requestId} failed (${failure.kind}): ${failure.message}`);

    if (error instanceof ResourceExhaustedError) {
      this.paused = true;
      this.emit({ type: 'paused', requestId, reason: failure.message });
      console.error('Queue paused until it is started again.');
    }

    return 'failed';
  }

  private describeFailure(requestId: string, error: unknown): RequestFailure {
    const logs = this.queue.get(requestId)?.logs ?? [];
    const diagnostic = logs.slice(-this.diagnosticLines);

    if (error instanceof ConversionError) {
      return { kind: error.kind, message: error.message, exitCode: error.exitCode, diagnostic };
    }

    if (error instanceof JobError) {
      return { kind: error.kind, message: error.message };
    }

    return { kind: 'unknown', message: describeError(error, 'Unknown conversion error') };
  }

  private async release(request: ConversionRequest): Promise<void> {
    if (!this.releaseSource) {
      return;
    }

    try {
      await this.releaseSource(request);
    } catch (error) {
      const message = describeError(error);
      console.warn(`Could not release source of ${request.id}: ${message}`);
    }
  }

  private transition(
    id: string,
    status: RequestStatus,
    updates: Partial<Pick<ConversionRequest, 'startedAt' | 'finishedAt' | 'output' | 'failure'>>
  ): void {
    const previousStatus = this.queue.require(id).status;
    const request = this.queue.updateStatus(id, status, updates);
    this.emit({ type: 'status', request, previousStatus });
  }

  private log(id: string, line: string): void {
    this.queue.appendLog(id, line);
    this.emit({ type: 'log', requestId: id, line });
  }

  private emit(event: OrchestratorEvent): void {
    this.emitter.emit(EVENT_NAME, event);
  }
}

function displayName(request: ConversionRequest): string {
  return request.source.kind === 'upload' ? request.source.originalName : path.basename(request.source.path);
}

/** marker writes `<outputDir>/<pdf stem>/`; fall back to the only folder it created. */
async function locateRawOutput(stagingDir: string, sourcePath: string): Promise<string> {
  const expected = path.join(stagingDir, path.parse(sourcePath).name);
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(stagingDir, { withFileTypes: true });
  } catch (error) {
    throw toFilesystemError(error, `read working folder "${stagingDir}"`);
  }

  const folders = entries.filter((entry) => entry.isDirectory()).map((entry) => path.join(stagingDir, entry.name));
  if (folders.includes(expected)) {
    return expected;
  }
  if (folders.length === 1) {
    return folders[0];
  }

  throw new ConversionError(`Converter exited cleanly but wrote no output to "${stagingDir}".`, 0);
}
