import { timingSafeEqual } from 'node:crypto';
import type { RequestHandler } from 'express';

import { createLogger } from '../util/logger';

const logger = createLogger('auth');

export const extractBearerToken = (header: string | undefined): string | undefined => {
  if (!header) {
    return undefined;
  }

  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  const token = (match ? match[1] : header).trim();

  return token || undefined;
};

export const tokensMatch = (provided: string, expected: string): boolean => {
  const left = Buffer.from(provided, 'utf8');
  const right = Buffer.from(expected, 'utf8');

  return left.length === right.length && timingSafeEqual(left, right);
};

export const isAuthorized = (header: string | undefined, expected: string): boolean => {
  const token = extractBearerToken(header);
  return token !== undefined && tokensMatch(token, expected);
};

export const requireBearerToken = (expected: string): RequestHandler => (req, res, next) => {
  if (!isAuthorized(req.headers.authorization, expected)) {
    logger.warn('Unauthorized access attempt.', { path: req.originalUrl });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  next();
};
