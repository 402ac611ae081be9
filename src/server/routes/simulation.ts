/**
 * Simulation routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';
import { simulateRequest, sweepRequest } from '../services/SimulationService.js';

export function registerSimulationRoutes(router: Router): void {
  // Run one year
  router.add('POST', '/api/simulate', async (req, res) => {
    const body = await parseJsonBody(req);
    if (body === null) {
      sendError(res, 400, 'Invalid JSON body');
      return;
    }

    const result = simulateRequest(body);
    sendJson(res, 200, result);
  });

  // Run one year per value of a capacity parameter
  router.add('POST', '/api/sweep', async (req, res) => {
    const body = await parseJsonBody(req);
    if (body === null) {
      sendError(res, 400, 'Invalid JSON body');
      return;
    }

    sendJson(res, 200, sweepRequest(body));
  });
}
