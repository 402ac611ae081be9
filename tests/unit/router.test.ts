/**
 * Router and HTTP Utility Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { Router, type RouteParams } from '../../src/server/routes/router.js';
import { matchPath, parseRunId } from '../../src/server/utils/http.js';
import { ConfigValidationError } from '../../src/config/validation.js';
import { SimulationError } from '../../src/core/errors.js';

function createExchange(method: string) {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  const res = new ServerResponse(req);
  const end = vi.spyOn(res, 'end').mockImplementation(() => res);
  return { req, res, end };
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Router', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefer exact routes', () => {
    const router = new Router();
    const seen: string[] = [];
    router.add('GET', '/api/runs/stats', () => {
      seen.push('exact');
    });
    router.addParam('GET', '/api/runs/:runId', () => {
      seen.push('param');
    });
    const { req, res } = createExchange('GET');

    expect(router.handle(req, res, '/api/runs/stats')).toBe(true);
    expect(seen).toEqual(['exact']);
  });

  it('should pass path parameters and named groups', () => {
    const router = new Router();
    const captured: RouteParams[] = [];
    router.addParam('GET', '/api/runs/:runId', (_req, _res, params) => {
      captured.push(params);
    });
    router.addRegex('GET', /^\/api\/crops\/(?<cropId>[a-z]+)$/, (_req, _res, params) => {
      captured.push(params);
    });

    router.handle(createExchange('GET').req, createExchange('GET').res, '/api/runs/7');
    router.handle(createExchange('GET').req, createExchange('GET').res, '/api/crops/starfruit');

    expect(captured).toEqual([{ runId: '7' }, { cropId: 'starfruit' }]);
  });

  it('should not handle unmatched paths or unknown methods', () => {
    const router = new Router();
    router.add('GET', '/health', () => {});

    const post = createExchange('POST');
    const options = createExchange('OPTIONS');
    expect(router.handle(post.req, post.res, '/health')).toBe(false);
    expect(router.handle(options.req, options.res, '/health')).toBe(false);
    expect(router.getStats()).toEqual({ exact: 1, param: 0, regex: 0 });
  });

  it('should answer validation errors with 400', () => {
    const router = new Router();
    router.add('POST', '/api/simulate', () => {
      throw new ConfigValidationError('must be >= 0 (got -1)', 'tiles');
    });
    const { req, res, end } = createExchange('POST');

    router.handle(req, res, '/api/simulate');

    expect(res.statusCode).toBe(400);
    expect(end).toHaveBeenCalledWith(JSON.stringify({ error: 'tiles: must be >= 0 (got -1)' }));
  });

  it('should include the code of simulation errors', () => {
    const router = new Router();
    router.add('POST', '/api/simulate', () => {
      throw new SimulationError('Day 0 is outside the year', 'DAY_OUT_OF_RANGE');
    });
    const { req, res, end } = createExchange('POST');

    router.handle(req, res, '/api/simulate');

    expect(res.statusCode).toBe(400);
    expect(end).toHaveBeenCalledWith(
      JSON.stringify({ error: 'DAY_OUT_OF_RANGE: Day 0 is outside the year' })
    );
  });

  it('should answer rejected handlers with 500', async () => {
    const router = new Router();
    router.add('GET', '/boom', async () => {
      throw new Error('disk full');
    });
    const { req, res, end } = createExchange('GET');

    router.handle(req, res, '/boom');
    await nextTick();

    expect(res.statusCode).toBe(500);
    expect(end).toHaveBeenCalledWith(JSON.stringify({ error: 'Internal server error' }));
  });
});

describe('http utils', () => {
  it('should match path patterns', () => {
    expect(matchPath('/api/runs/12', '/api/runs/:runId')).toEqual({ runId: '12' });
    expect(matchPath('/api/runs/12/crops', '/api/runs/:runId')).toBeNull();
    expect(matchPath('/api/other/12', '/api/runs/:runId')).toBeNull();
  });

  it('should accept only digits as run ids', () => {
    expect(parseRunId('42')).toBe(42);
    expect(parseRunId('4x')).toBeNull();
    expect(parseRunId('-1')).toBeNull();
    expect(parseRunId(undefined)).toBeNull();
  });
});
