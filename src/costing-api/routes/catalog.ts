import { Router } from 'express';
import { toCatalogEntryRecord } from '@core/catalog';
import type { ApiResponse } from '@shared/types';
import { getServices } from '../services';

const router = Router();

router.get('/', (req, res) => {
  const { catalog } = getServices(req.app);
  const response: ApiResponse = {
    success: true,
    data: catalog.list().map(toCatalogEntryRecord),
  };
  res.json(response);
});

export { router as catalogRouter };
