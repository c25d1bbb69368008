import { Router } from 'express';
import { KEEPAWAY_CORE_VERSION } from '@core/index';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({ success: true, data: { status: 'ok', version: KEEPAWAY_CORE_VERSION } });
});

export default router;
