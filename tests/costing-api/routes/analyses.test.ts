import { describe, it, expect } from 'vitest';
import analysesRouter, { analysisRequestSchema } from '../../../src/costing-api/routes/analyses';

describe('analyses router', () => {
  it('serves POST /', () => {
    expect(analysesRouter.stack).toHaveLength(1);
    expect(analysesRouter.stack[0]).toMatchObject({ route: { path: '/', methods: { post: true } } });
  });
});

describe('analysisRequestSchema', () => {
  it('accepts a non-empty list of raw claims', () => {
    const parsed = analysisRequestSchema.safeParse({ claims: [{ id: 'c1' }, 'anything'] });
    expect(parsed.success).toBe(true);
  });

  it('rejects an empty list', () => {
    const parsed = analysisRequestSchema.safeParse({ claims: [] });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0].message).toBe('claims must contain at least one claim');
  });

  it('rejects a body without claims', () => {
    expect(analysisRequestSchema.safeParse({ claim: {} }).success).toBe(false);
  });
});
