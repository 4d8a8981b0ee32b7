import { Router, Request, Response } from 'express';
import { formatTerminal } from '@crash-triage/symbolizer';
import { reportStore } from '../store.js';

const router = Router();

/**
 * GET /api/reports/:id
 * Stored analysis result as JSON.
 */
router.get('/:id', (req: Request, res: Response) => {
  const result = reportStore.get(String(req.params.id));
  if (!result) {
    return res.status(404).json({ error: `Report ${req.params.id} not found or expired` });
  }
  res.json(result);
});

/**
 * GET /api/reports/:id/text
 * Terminal-style rendering. ?detail=1 expands every instance.
 */
router.get('/:id/text', (req: Request, res: Response) => {
  const result = reportStore.get(String(req.params.id));
  if (!result) {
    return res.status(404).json({ error: `Report ${req.params.id} not found or expired` });
  }
  const detail = req.query.detail === '1' || req.query.detail === 'true';
  res.type('text/plain').send(formatTerminal(result, { detail }));
});

export default router;
