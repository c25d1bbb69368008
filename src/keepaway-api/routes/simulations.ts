import { Router } from 'express';
import { toDefinition } from '@core/definition';
import type { ApiResponse } from '@shared/types';
import { config } from '../config';
import { parseSimulationRequest, runSimulationRequest } from '../simulation-request';

const router = Router();

// POST /simulations/parse -- validate troop text and echo its definition
router.post('/parse', (req, res) => {
  const simulation = parseSimulationRequest(req.body);
  const response: ApiResponse = { success: true, data: toDefinition(simulation) };
  res.json(response);
});

// POST /simulations -- run a troop to completion
router.post('/', (req, res) => {
  const report = runSimulationRequest(req.body, {
    maxRounds: config.maxRounds,
    maxHistoryRounds: config.maxHistoryRounds,
  });
  console.warn(
    `[SIM] ${report.preset} run: ${report.rounds} rounds, ${report.relief}, monkey business ${report.monkeyBusiness}`,
  );
  const response: ApiResponse = { success: true, data: report };
  res.json(response);
});

export default router;
