import { Router } from 'express';
import type { AppContext } from '../app.js';
import { lenientJson } from '../middleware/lenientJson.js';
import { errorMessage } from '../../project/errors.js';

export function createStateRouter({ store }: AppContext) {
  const stateRouter = Router();

  stateRouter.get('/', (_req, res) => {
    res.json(store.getSnapshot());
  });

  // Partial update: only the fields present in the body change.
  stateRouter.post('/', lenientJson, async (req, res) => {
    try {
      const state = await store.applyPartialUpdate(req.body);
      res.json({ ok: true, state });
    } catch (err) {
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  return stateRouter;
}
