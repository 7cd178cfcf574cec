// server/src/routes/httpErrors.ts

import type { Response } from 'express';
import { isSimulationError } from '../simulation/errors.js';

export function statusFor(error: unknown): number {
  if (!isSimulationError(error)) return 500;
  switch (error.kind) {
    case 'configuration':
      return 400;
    case 'not-found':
      return 404;
    case 'insufficient-data':
    case 'invalid-profile':
      return 422;
    case 'aborted':
      return 500;
  }
}

export function sendError(res: Response, error: unknown, label: string) {
  const status = statusFor(error);
  if (status >= 500) console.error(`${label}:`, error);
  if (isSimulationError(error)) {
    return res.status(status).json(error.toJSON());
  }
  return res.status(status).json({ error: label, kind: 'internal', details: {} });
}
