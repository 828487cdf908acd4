import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AddressTree } from '../models/addressTree.js';
import { QueryResolver, attributeFromQuery } from '../services/resolver.js';
import { logger } from '../utils/logger.js';
import { stringifyWire } from '../utils/wireJson.js';

function rawQuery(originalUrl: string): string {
  const mark = originalUrl.indexOf('?');
  return mark === -1 ? '' : originalUrl.slice(mark + 1);
}

// URL path to OSC address. A segment that fails to decode, or decodes to
// something holding "/", is matched as written.
function addressOf(urlPath: string): string {
  return urlPath
    .split('/')
    .map((segment) => {
      try {
        const decoded = decodeURIComponent(segment);
        return decoded.includes('/') ? segment : decoded;
      } catch {
        return segment;
      }
    })
    .join('/');
}

// Every GET path is an OSC address; "?ATTR" narrows the answer to one attribute.
export function oscQueryRouter(tree: AddressTree): Router {
  const router = Router();
  const resolver = new QueryResolver(tree);

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') return next();

    const attribute = attributeFromQuery(rawQuery(req.originalUrl));
    const address = addressOf(req.path);
    const outcome = resolver.resolve(address, attribute);

    if (outcome.ok) {
      res.status(200).type('application/json').send(stringifyWire(outcome.document));
      return;
    }

    const { error } = outcome;
    logger.debug('OSCQuery lookup failed', { address, attribute, code: error.code });
    switch (error.code) {
      case 'NOT_FOUND':
        res.status(404).json({ error: 'Not Found' });
        return;
      default:
        res.status(error.status).json({ error: 'Bad Request', message: error.message });
    }
  });

  return router;
}

export default oscQueryRouter;
