import { RequestNotFoundError } from './errors';
import type {
  ConversionRequest,
  OutputLayout,
  PageRange,
  RequestSource,
  RequestStatus
} from '../types/request';

export interface CreateRequestPayload {
  id: string;
  source: RequestSource;
  outputName: string;
  outputDirectory: string;
  pageRange: PageRange;
  layout: OutputLayout;
}

export type RequestUpdates = Partial<Omit<ConversionRequest, 'id' | 'status' | 'createdAt' | 'updatedAt'>>;

export const MAX_LOG_LINES = 5000;

/**
 * In-memory, insertion-ordered store of conversion requests.
 * Map iteration order is the processing order.
 */
export class RequestQueue {
  private readonly requests = new Map<string, ConversionRequest>();

  create(payload: CreateRequestPayload): ConversionRequest {
    const now = new Date();
    const request: ConversionRequest = {
      ...payload,
      status: 'pending',
      logs: [],
      createdAt: now,
      updatedAt: now
    };

    this.requests.set(payload.id, request);
    return request;
  }

  updateStatus(id: string, status: RequestStatus, updates: RequestUpdates = {}): ConversionRequest {
    return this.replace(id, { ...updates, status });
  }

  update(id: string, updates: RequestUpdates): ConversionRequest {
    return this.replace(id, updates);
  }

  appendLog(id: string, line: string): ConversionRequest {
    const request = this.require(id);
    const logs = request.logs.length >= MAX_LOG_LINES
      ? [...request.logs.slice(request.logs.length - MAX_LOG_LINES + 1), line]
      : [...request.logs, line];

    return this.replace(id, { logs });
  }

  get(id: string): ConversionRequest | undefined {
    return this.requests.get(id);
  }

  require(id: string): ConversionRequest {
    const request = this.requests.get(id);
    if (!request) {
      throw new RequestNotFoundError(id);
    }
    return request;
  }

  list(): ConversionRequest[] {
    return [...this.requests.values()];
  }

  withStatus(status: RequestStatus): ConversionRequest[] {
    return this.list().filter((request) => request.status === status);
  }

  nextPending(): ConversionRequest | undefined {
    for (const request of this.requests.values()) {
      if (request.status === 'pending') {
        return request;
      }
    }
    return undefined;
  }

  remove(id: string): ConversionRequest {
    const request = this.require(id);
    this.requests.delete(id);
    return request;
  }

  private replace(id: string, updates: RequestUpdates & { status?: RequestStatus }): ConversionRequest {
    const request = this.require(id);
    const nextRequest: ConversionRequest = {
      ...request,
      ...updates,
      updatedAt: new Date()
    };

    this.requests.set(id, nextRequest);
    return nextRequest;
  }
}
