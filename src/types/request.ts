export type RequestStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

/** Inclusive, 1-based page selection. */
export type PageRange =
  | { kind: 'all' }
  | { kind: 'range'; start: number; end: number };

export type RequestSource =
  | { kind: 'file'; path: string }
  | { kind: 'upload'; path: string; originalName: string }
  | { kind: 'url'; url: string; path: string };

export interface OutputLayout {
  projectFolder: boolean;
  moveOriginal: boolean;
}

export type FailureKind = 'launch' | 'conversion' | 'filesystem' | 'download' | 'resource' | 'unknown';

export interface RequestFailure {
  kind: FailureKind;
  message: string;
  exitCode?: number | null;
  /** Tail of the captured log at the time of failure. */
  diagnostic?: string[];
}

export interface OrganizedOutput {
  location: string;
  markdownPath?: string;
  originalPath?: string;
}

export interface ConversionRequest {
  id: string;
  source: RequestSource;
  outputName: string;
  outputDirectory: string;
  pageRange: PageRange;
  layout: OutputLayout;
  status: RequestStatus;
  logs: string[];
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  output?: OrganizedOutput;
  failure?: RequestFailure;
}

export interface QueueSummary {
  succeeded: number;
  failed: number;
  cancelled: number;
}
