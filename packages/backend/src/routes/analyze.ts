import { Router, Request, Response, NextFunction } from 'express';
import crypto from 'node:crypto';
import { parseDay } from '@crash-triage/symbolizer';
import { getConfig } from '../config.js';
import {
  AnalysisRequest,
  createSymbolSource,
  emptyResult,
  parseAnalysisQuery,
  runAnalysis,
} from '../analysis-service.js';
import { reportStore } from '../store.js';
import { findUpload } from './upload.js';

const router = Router();

function validateDates(request: AnalysisRequest): string | undefined {
  try {
    if (request.since) parseDay(request.since);
    if (request.until) parseDay(request.until);
    return undefined;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

async function analyzeAndStore(source: string, req: Request, res: Response): Promise<void> {
  const request = parseAnalysisQuery(req.query);
  const invalid = validateDates(request);
  if (invalid) {
    res.status(400).json({ error: invalid });
    return;
  }

  const result = (await runAnalysis(source, request, createSymbolSource())) ?? emptyResult();
  const reportId = crypto.randomUUID();
  reportStore.set(reportId, result);

  console.log(`[analyze] ${result.totalCrashes} crashes, ${result.totalSignatures} signatures → report ${reportId}`);
  res.json({ reportId, result });
}

/**
 * GET /api/analyze
 * Analyze the configured telemetry data directory.
 * Query params: since, until, version, platform, sig
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    await analyzeAndStore(getConfig().dataDir, req, res);
  } catch (err) {
    next(err);
  }
});

/**
 * GET /api/analyze/:id
 * Analyze a previously uploaded telemetry export.
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  const id = String(req.params.id);
  const source = findUpload(id);
  if (!source) {
    res.status(404).json({ error: `Upload ${id} not found` });
    return;
  }

  try {
    await analyzeAndStore(source, req, res);
  } catch (err) {
    next(err);
  }
});

export default router;
