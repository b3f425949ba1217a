import type { RequestHandler, Response } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

export const SESSION_HEADER = 'X-Session-Id';

/** Reuses the caller's session id when it is a valid uuid, otherwise issues one. */
export function sessionMiddleware(): RequestHandler {
  return (req, res, next) => {
    const supplied = req.get(SESSION_HEADER);
    const sessionId = supplied && isUuid(supplied) ? supplied : uuidv4();
    res.locals.sessionId = sessionId;
    res.set(SESSION_HEADER, sessionId);
    next();
  };
}

export function sessionIdOf(res: Response): string {
  const sessionId: unknown = res.locals.sessionId;
  if (typeof sessionId !== 'string') {
    throw new Error('sessionMiddleware must run before the game routes');
  }
  return sessionId;
}
