import { afterEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { unsupportedClaim } from '@core/calculation-engine';
import {
  FileUnsupportedClaimSink,
  MemoryUnsupportedClaimSink,
  UnsupportedClaimLog,
  runKey,
} from '@core/unsupported-log';
import { fixedClock } from './fixtures';

const RUN_ID = '12345678-aaaa-4bbb-8ccc-123456789abc';
const STARTED_AT = '2026-01-01T00:00:00.000Z';

function entry(id: string) {
  return unsupportedClaim({ id, text: `Claim ${id}` }, 'no_formula', {}, fixedClock);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runKey', () => {
  it('combines a filesystem-safe timestamp with the run id prefix', () => {
    expect(runKey(STARTED_AT, RUN_ID)).toBe('2026-01-01T00-00-00-000Z_12345678');
  });
});

describe('UnsupportedClaimLog', () => {
  it('persists one batch per run', async () => {
    const sink = new MemoryUnsupportedClaimSink();
    const log = new UnsupportedClaimLog(RUN_ID, STARTED_AT, sink);
    log.append(entry('a'));
    log.append(entry('b'));

    await log.persist();
    await log.persist();

    expect(sink.batches).toEqual([
      {
        run_id: RUN_ID,
        run_started_at: STARTED_AT,
        entries: [
          { claim_id: 'a', text: 'Claim a', reason: 'no formula', timestamp: STARTED_AT },
          { claim_id: 'b', text: 'Claim b', reason: 'no formula', timestamp: STARTED_AT },
        ],
      },
    ]);
    expect(log.isPersisted).toBe(true);
  });

  it('refuses entries after the batch is persisted', async () => {
    const log = new UnsupportedClaimLog(RUN_ID, STARTED_AT, new MemoryUnsupportedClaimSink());
    await log.persist();
    expect(() => log.append(entry('late'))).toThrow(
      `Unsupported-claim log for run ${RUN_ID} is already persisted`,
    );
  });

  it('allows a retry after the sink fails', async () => {
    const sink = new MemoryUnsupportedClaimSink();
    const writeBatch = vi
      .spyOn(sink, 'writeBatch')
      .mockRejectedValueOnce(new Error('disk full'));
    const log = new UnsupportedClaimLog(RUN_ID, STARTED_AT, sink);
    log.append(entry('a'));

    await expect(log.persist()).rejects.toThrow('disk full');
    expect(log.isPersisted).toBe(false);

    await log.persist();

    expect(writeBatch).toHaveBeenCalledTimes(2);
    expect(sink.batches).toHaveLength(1);
    expect(sink.batches[0].entries.map((e) => e.claim_id)).toEqual(['a']);
  });

  it('hands out copies of its entries', () => {
    const log = new UnsupportedClaimLog(RUN_ID, STARTED_AT, new MemoryUnsupportedClaimSink());
    log.append(entry('a'));
    const listed = log.list();
    log.append(entry('b'));

    expect(listed).toHaveLength(1);
    expect(log.size).toBe(2);
  });
});

describe('FileUnsupportedClaimSink', () => {
  let tmpDir: string | null = null;

  afterEach(async () => {
    if (tmpDir) await rm(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('writes each batch to its own file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'unsupported-'));
    const directory = path.join(tmpDir, 'logs', 'unsupported');
    const sink = new FileUnsupportedClaimSink(directory);
    const log = new UnsupportedClaimLog(RUN_ID, STARTED_AT, sink);
    log.append(entry('a'));

    await log.persist();

    const file = path.join(directory, 'unsupported_2026-01-01T00-00-00-000Z_12345678.json');
    expect(await readdir(directory)).toEqual(['unsupported_2026-01-01T00-00-00-000Z_12345678.json']);
    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual(log.toBatch());
    expect(warn).toHaveBeenCalledWith(`[UNSUPPORTED] Wrote 1 entries to ${file}`);
  });

  it('never rewrites an existing batch', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'unsupported-'));
    const sink = new FileUnsupportedClaimSink(tmpDir);
    const batch = { run_id: RUN_ID, run_started_at: STARTED_AT, entries: [] };

    await sink.writeBatch(batch);
    await expect(sink.writeBatch(batch)).rejects.toThrow();
  });
});
