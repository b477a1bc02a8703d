import { spawn, type ChildProcessByStdio } from 'child_process';
import readline from 'readline';
import { PassThrough, type Readable } from 'stream';

import type { ConverterConfig } from '../config/converter';
import type { PageRange } from '../types/request';
import { LaunchError, RunnerBusyError } from './errors';
import { toConverterPageRange } from './pageRange';

export interface ConverterInvocation {
  sourcePath: string;
  outputDirectory: string;
  pageRange: PageRange;
}

export interface RunExit {
  type: 'exit';
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  cancelled: boolean;
}

export type RunEvent = { type: 'line'; line: string } | RunExit;

/** One converter process: a single-use stream of output lines ending in an exit event. */
export interface ConverterRun extends AsyncIterable<RunEvent> {
  cancel(): void;
}

export interface ConverterRunner {
  run(invocation: ConverterInvocation): Promise<ConverterRun>;
  describe(invocation: ConverterInvocation): string;
}

type ConverterChild = ChildProcessByStdio<null, Readable, Readable>;

export class ProcessRun implements ConverterRun {
  readonly exited: Promise<RunExit>;
  private readonly lines: readline.Interface;
  private readonly pending: AsyncIterator<string>;
  private cancelled = false;
  private settled = false;
  private consumed = false;
  private killTimer?: NodeJS.Timeout;

  constructor(private readonly child: ConverterChild, private readonly killTimeoutMs: number) {
    const merged = new PassThrough();
    let openStreams = 2;
    for (const stream of [child.stdout, child.stderr]) {
      stream.once('close', () => {
        openStreams -= 1;
        if (openStreams === 0) {
          merged.end();
        }
      });
      stream.pipe(merged, { end: false });
    }

    this.lines = readline.createInterface({ input: merged, crlfDelay: Infinity });
    // Buffers lines from now on, before anyone starts iterating.
    this.pending = this.lines[Symbol.asyncIterator]();
    this.exited = new Promise<RunExit>((resolve) => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.settled = true;
        if (this.killTimer) {
          clearTimeout(this.killTimer);
        }
        resolve({ type: 'exit', exitCode: code, signal, cancelled: this.cancelled });
      });
    });
    child.on('error', (error: Error) => {
      console.error(`Converter process ${child.pid ?? '?'} error: ${error.message}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get isRunning(): boolean {
    return !this.settled;
  }

  cancel(): void {
    if (this.settled || this.cancelled) {
      return;
    }

    this.cancelled = true;
    this.child.kill('SIGTERM');
    this.killTimer = setTimeout(() => {
      if (!this.settled) {
        this.child.kill('SIGKILL');
      }
    }, this.killTimeoutMs);
    this.killTimer.unref();
  }

  [Symbol.asyncIterator](): AsyncIterator<RunEvent> {
    if (this.consumed) {
      throw new Error('A converter run can only be iterated once.');
    }
    this.consumed = true;
    return this.events();
  }

  private async *events(): AsyncGenerator<RunEvent> {
    try {
      for (let next = await this.pending.next(); !next.done; next = await this.pending.next()) {
        yield { type: 'line', line: next.value };
      }
      yield await this.exited;
    } finally {
      // Consumer stopped early: do not leave the child behind.
      if (!this.settled) {
        this.cancel();
      }
      this.lines.close();
      await this.exited;
    }
  }
}

export class ProcessRunner implements ConverterRunner {
  private active?: ProcessRun;

  constructor(private readonly config: ConverterConfig) {}

  getExecutablePath(): string {
    return this.config.executablePath;
  }

  buildArgs(invocation: ConverterInvocation): string[] {
    const args = [...this.config.baseArgs, invocation.sourcePath, '--output_dir', invocation.outputDirectory];
    const pageRange = toConverterPageRange(invocation.pageRange);

    if (pageRange) {
      args.push('--page_range', pageRange);
    }

    return args;
  }

  describe(invocation: ConverterInvocation): string {
    return [this.config.executablePath, ...this.buildArgs(invocation)]
      .map((part) => (/\s/.test(part) ? `"${part}"` : part))
      .join(' ');
  }

  async run(invocation: ConverterInvocation): Promise<ProcessRun> {
    if (this.active?.isRunning) {
      throw new RunnerBusyError();
    }

    const child = spawn(this.config.executablePath, this.buildArgs(invocation), {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, PYTHONUNBUFFERED: '1' }
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: NodeJS.ErrnoException): void => {
        child.off('spawn', onSpawn);
        const reason = error.code === 'ENOENT'
          ? 'executable not found. Install marker-pdf or set MARKER_PATH to the marker_single location.'
          : error.message;
        reject(new LaunchError(this.config.executablePath, reason));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    const run = new ProcessRun(child, this.config.killTimeoutMs);
    this.active = run;
    return run;
  }

  /** Cancels the active run, if any. */
  cancel(): void {
    this.active?.cancel();
  }
}
