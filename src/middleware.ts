import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { VisitorRegistry } from './visitors.js';

// The parts of a request the client key is read from
export type ClientAddressSource = {
  ip?: string | undefined;
  socket: { remoteAddress?: string | undefined };
}

export type ClientKeyResolver = (req: ClientAddressSource) => string | undefined;

const IPV4_MAPPED_PREFIX = '::ffff:';

/**
 * Client key is the caller's address: req.ip (honours `trust proxy`), else the socket peer.
 * IPv4-mapped IPv6 addresses are reduced to their IPv4 form.
 * @returns undefined when no address is available
 */
export const extractClientKey: ClientKeyResolver = (req) => {
  const address = (req.ip || req.socket.remoteAddress || '').trim();
  if (!address) return undefined;

  if (address.startsWith(IPV4_MAPPED_PREFIX) && address.includes('.')) {
    return address.slice(IPV4_MAPPED_PREFIX.length);
  }
  return address;
}

/**
 * Admission gate in front of every route: one token per request per client key.
 * Requests whose client key cannot be determined are refused without touching the registry.
 */
export const rateLimit = (visitors: VisitorRegistry, resolveKey: ClientKeyResolver = extractClientKey): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const key = resolveKey(req);
    if (!key) {
      res.status(500).json({
        error: 'Internal server error',
        message: 'Unable to determine client address',
      });
      return;
    }

    if (!visitors.checkAndAdmit(key)) {
      res.status(429).json({ error: 'Too many requests' });
      return;
    }

    next();
  };
}
