import type { Response } from 'express';

import { RequestNotFoundError, RequestStateError, ValidationError, describeError } from '../services/errors';

export function statusForError(error: unknown): number {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof RequestNotFoundError) {
    return 404;
  }
  if (error instanceof RequestStateError) {
    return 409;
  }
  return 500;
}

export function respondWithError(res: Response, error: unknown): Response {
  const status = statusForError(error);
  const message = describeError(error, 'Unknown error.');

  if (status === 500) {
    console.error('Request failed:', message);
  }

  return res.status(status).json({ message });
}
