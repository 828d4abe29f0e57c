import { describe, it, expect } from 'vitest';
import { catalogRouter } from '../../../src/costing-api/routes/catalog';
import apiRouter from '../../../src/costing-api/routes/index';

describe('catalog router', () => {
  it('serves GET /', () => {
    expect(catalogRouter.stack).toHaveLength(1);
    expect(catalogRouter.stack[0]).toMatchObject({ route: { path: '/', methods: { get: true } } });
  });
});

describe('api router', () => {
  it('mounts health, catalog and analyses', () => {
    expect(apiRouter.stack).toHaveLength(3);
  });
});
