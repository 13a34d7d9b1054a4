import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import '../shared/types';

/** Reuses a caller-supplied UUID so job logs can be correlated with the proxy's. */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header('X-Request-Id');
  const id = incoming && isUuid(incoming) ? incoming : uuidv4();
  req.id = id;
  res.setHeader('X-Request-Id', id);
  next();
}
