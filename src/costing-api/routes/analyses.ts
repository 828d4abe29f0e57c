import { Router } from 'express';
import { z } from 'zod';
import { createAnalysisContext } from '@core/context';
import { runAnalysis } from '@core/pipeline';
import type { AnalysisReport, ApiResponse } from '@shared/types';
import { getServices } from '../services';

const router = Router();

export const analysisRequestSchema = z.object({
  claims: z.array(z.unknown()).min(1, 'claims must contain at least one claim'),
});

// POST /analyses -- cost every claim of one proposal
router.post('/', async (req, res, next) => {
  const parsed = analysisRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res
      .status(400)
      .json({ success: false, error: parsed.error.issues.map((i) => i.message).join('; ') });
  }

  const services = getServices(req.app);
  const context = createAnalysisContext({
    catalog: services.catalog,
    sink: services.createSink(),
    fallbackTimeoutMs: services.fallbackTimeoutMs,
    concurrency: services.analysisConcurrency,
  });

  try {
    const report = await runAnalysis(parsed.data.claims, context);
    const response: ApiResponse<AnalysisReport> = { success: true, data: report };
    res.status(201).json(response);
  } catch (err) {
    next(err);
  }
});

export default router;
