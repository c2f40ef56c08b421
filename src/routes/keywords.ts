import { Router } from 'express';
import { keywordHelp } from '../engine/keywordHelp';
import type { DataDirectories } from '../engine/resolvers/types';

export function createKeywordsRouter(dirs: DataDirectories): Router {
  const router = Router();

  router.get('/help', (_req, res) => {
    res.json({ success: true, markdown: keywordHelp(dirs) });
  });

  return router;
}
