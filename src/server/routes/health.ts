import { Router } from 'express';
import type { RetrievalPipeline } from '../../retrieval/pipeline.js';

export function createHealthRouter(pipeline: RetrievalPipeline): Router {
  const router = Router();

  /**
   * GET /api/health: liveness plus the size of the loaded corpus.
   */
  router.get('/', (_req, res) => {
    res.json({ status: 'ok', corpusSize: pipeline.corpusSize });
  });

  return router;
}
