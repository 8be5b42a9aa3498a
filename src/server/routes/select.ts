import { Router } from 'express';
import type { AppContext } from '../app.js';
import { lenientJson } from '../middleware/lenientJson.js';
import { ProjectNotFoundError, errorMessage } from '../../project/errors.js';

export function createSelectRouter({ store }: AppContext) {
  const selectRouter = Router();

  selectRouter.post('/', lenientJson, async (req, res) => {
    const projectId: unknown = req.body.projectId;
    try {
      const state = await store.selectProject(typeof projectId === 'string' ? projectId : '');
      res.json({ ok: true, state });
    } catch (err) {
      if (err instanceof ProjectNotFoundError) {
        res.status(404).json({ ok: false, code: err.code, error: err.message });
        return;
      }
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  return selectRouter;
}
