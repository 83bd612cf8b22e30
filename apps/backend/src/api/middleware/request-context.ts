import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Tag every request with an id, echoed back in `x-request-id`.
 *
 * A caller-supplied id is kept when it is a short printable token, so a
 * proxy's id can be traced through the logs; anything else is replaced.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers[REQUEST_ID_HEADER];
  const supplied = Array.isArray(header) ? header[0] : header;
  const requestId =
    supplied && supplied.length <= MAX_REQUEST_ID_LENGTH && /^[\w.:-]+$/.test(supplied) ? supplied : uuid();

  req.id = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}
