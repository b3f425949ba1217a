import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { isGameError, type GameErrorCode } from '@noughts/engine';
import type { Logger } from './logger.js';

export class HttpError extends Error {
  readonly status: number;
  readonly title: string;

  constructor(status: number, title: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.title = title;
  }
}

export interface ErrorBody {
  success: false;
  error: string;
  message: string;
}

interface Failure {
  status: number;
  body: ErrorBody;
}

const GAME_FAILURES: Record<GameErrorCode, Failure> = {
  INVALID_MOVE: {
    status: 400,
    body: {
      success: false,
      error: 'Invalid move',
      message: 'That position is already taken or move is not valid',
    },
  },
  NOT_AI_TURN: {
    status: 400,
    body: {
      success: false,
      error: 'Not the computer\'s turn',
      message: 'The computer cannot move right now',
    },
  },
  MALFORMED_STATE: {
    status: 400,
    body: {
      success: false,
      error: 'Invalid game data',
      message: 'Game session corrupted. Please start a new game.',
    },
  },
};

function failure(status: number, error: string, message: string): Failure {
  return { status, body: { success: false, error, message } };
}

// body-parser attaches `type` and `status` to the errors it raises.
function bodyParserType(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return null;
}

function describeZodError(err: ZodError): string {
  const [first] = err.issues;
  if (!first) {
    return 'Request body is not valid';
  }
  const path = first.path.join('.');
  return path ? `${path}: ${first.message}` : first.message;
}

export function toFailure(err: unknown): Failure | null {
  if (isGameError(err)) {
    return GAME_FAILURES[err.code];
  }
  if (err instanceof HttpError) {
    return failure(err.status, err.title, err.message);
  }
  if (err instanceof ZodError) {
    return failure(400, 'Invalid input', describeZodError(err));
  }
  const parserType = bodyParserType(err);
  if (parserType === 'entity.too.large') {
    return failure(413, 'Invalid input', 'Request body too large');
  }
  if (parserType === 'entity.parse.failed') {
    return failure(400, 'Invalid JSON', 'Request body must be valid JSON');
  }
  return null;
}

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found',
      message: 'The requested endpoint does not exist',
    } satisfies ErrorBody);
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const known = toFailure(err);
    if (known) {
      logger.info('Request rejected', {
        method: req.method,
        path: req.path,
        status: known.status,
        reason: err instanceof Error ? err.message : String(err),
      });
      res.status(known.status).json(known.body);
      return;
    }
    logger.error('Unhandled error', {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.stack ?? err.message : String(err),
    });
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      message: 'An unexpected error occurred',
    } satisfies ErrorBody);
  };
}
