import { Router } from 'express';
import { COSTING_CORE_VERSION } from '@core/index';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (_req, res) => {
  const response: ApiResponse = {
    success: true,
    data: { status: 'healthy', coreVersion: COSTING_CORE_VERSION },
  };
  res.json(response);
});

export default router;
