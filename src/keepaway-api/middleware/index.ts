import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { isSimulationError } from '@core/errors';
import type { ErrorCode, ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  PARSE_ERROR: 400,
  OVERFLOW: 422,
  ROUTING_ERROR: 422,
  INSUFFICIENT_DATA: 422,
  STATE_ERROR: 500,
};

/** 4xx status carried by body-parser errors from express.json. */
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorCodeFor(err: unknown): ErrorCode | undefined {
  if (isSimulationError(err)) return err.code;
  const isBodyParseFailure =
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
  return isBodyParseFailure ? 'PARSE_ERROR' : undefined;
}

export function statusForError(err: unknown): number {
  if (isSimulationError(err)) return STATUS_BY_CODE[err.code];
  return clientStatus(err) ?? 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusForError(err);
  console.error(`[ERROR] ${err.name}: ${err.message}`);

  const body: ApiResponse = { success: false, error: err.message };
  const code = errorCodeFor(err);
  if (code) {
    body.code = code;
  }
  res.status(status).json(body);
}
