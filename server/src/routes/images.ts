import express, { Router } from 'express';

export const NO_CACHE = 'no-store, no-cache, must-revalidate, max-age=0';

/** Serves frame files. Frames are rewritten under the same names, so nothing is cached. */
export function createImagesRouter(frameDirectory: string): Router {
  const router = Router();

  router.use(
    express.static(frameDirectory, {
      index: false,
      dotfiles: 'ignore',
      etag: false,
      lastModified: false,
      setHeaders: (res) => {
        res.setHeader('Cache-Control', NO_CACHE);
      },
    }),
  );

  router.use((_req, res) => {
    res.status(404).json({ error: 'NOT_FOUND' });
  });

  return router;
}
