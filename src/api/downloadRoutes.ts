import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { pipeline } from 'node:stream/promises';
import { AppError, NotFoundError } from '../domain/errors.js';
import type { LocalStorageBackend } from '../infra/storage/LocalStorageBackend.js';

class InvalidDownloadLinkError extends AppError {
  constructor() {
    super('Download link is invalid or has expired', 'FORBIDDEN', 403);
  }
}

function sendInline(res: Response, path: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.sendFile(path, { headers: { 'Content-Disposition': 'inline' } }, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

/**
 * Serves published files for the local backend through signed, expiring links.
 * `inline=1` streams for in-browser preview with byte-range support.
 */
export function createDownloadRouter(storage: LocalStorageBackend): Router {
  const router = Router();

  router.get('/*', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = decodeURIComponent(req.path.replace(/^\//, ''));
      const expires = Number(req.query.expires);
      const signature = typeof req.query.signature === 'string' ? req.query.signature : '';

      if (!storage.verifyDownload(key, expires, signature)) {
        throw new InvalidDownloadLinkError();
      }

      if (!(await storage.exists(key))) {
        throw new NotFoundError('Stored file', key);
      }

      if (req.query.inline === '1') {
        await sendInline(res, storage.resolvePath(key));
        return;
      }

      const body = await storage.read(key);
      res.setHeader('Content-Type', 'video/mp4');
      res.setHeader('Content-Disposition', `attachment; filename="${key.split('/').pop() ?? 'video.mp4'}"`);
      await pipeline(body, res);
    } catch (error) {
      if (res.headersSent) {
        res.destroy();
        return;
      }
      next(error);
    }
  });

  return router;
}
