import { describe, it, expect } from 'vitest';
import healthRouter from '../../../src/costing-api/routes/health';

describe('health router', () => {
  it('exports a router', () => {
    expect(healthRouter).toBeDefined();
    expect(healthRouter.stack).toBeDefined();
  });

  it('serves GET /health', () => {
    expect(healthRouter.stack).toHaveLength(1);
    expect(healthRouter.stack[0]).toMatchObject({ route: { path: '/health', methods: { get: true } } });
  });
});
