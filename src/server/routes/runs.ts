/**
 * Stored run routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, requireDb, parseRunId } from '../utils/http.js';
import { state } from '../state.js';

export function registerRunRoutes(router: Router): void {
  // Get database stats
  router.add('GET', '/api/runs/stats', (_req, res) => {
    if (!requireDb(state.database, res)) return;

    sendJson(res, 200, { stats: state.database.getStats() });
  });

  // Get recent runs
  router.add('GET', '/api/runs', (_req, res) => {
    if (!requireDb(state.database, res)) return;

    sendJson(res, 200, { runs: state.database.listRuns() });
  });

  // Get one run with its per-crop results
  router.addParam('GET', '/api/runs/:runId', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parseRunId(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    const run = state.database.getRun(runId);
    if (!run) {
      sendError(res, 404, `Run ${runId} not found`);
      return;
    }
    sendJson(res, 200, { run });
  });
}
