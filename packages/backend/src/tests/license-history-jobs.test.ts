import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLicenseHistoryProcessor,
  type LicenseHistoryResult,
} from '../jobs/processors/license-history.processor.js';
import { QueuedHistorySink } from '../jobs/history-sink.js';
import { historyJobId, type LicenseHistoryJobData } from '../jobs/queue.js';
import { openDatabase, type SqliteDatabase } from '../lib/db.js';
import { SqliteHistoryRepository } from '../repositories/history.repository.js';
import { mockData } from './setup.js';

const borrowedAt = new Date(Date.UTC(2026, 0, 5, 9, 0, 1));
const returnedAt = new Date(Date.UTC(2026, 0, 5, 9, 30, 0));

describe('license history jobs', () => {
  let db: SqliteDatabase;
  let repository: SqliteHistoryRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new SqliteHistoryRepository(db);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it('turns ledger transitions into job payloads', async () => {
    const jobs: LicenseHistoryJobData[] = [];
    const sink = new QueuedHistorySink(async (data) => {
      jobs.push(data);
    });
    const borrow = { id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt, isOverage: true };

    await sink.poolSaved({ ...mockData.pool(), active: true });
    await sink.borrowed(borrow, {
      id: 'c-1',
      poolName: 'cad-suite',
      borrowId: 'b-1',
      holder: 'alice',
      chargedAt: borrowedAt,
      amount: 500,
    });
    await sink.returned({ ...borrow, returnedAt });

    expect(jobs).toEqual([
      { type: 'pool_saved', pool: { ...mockData.pool(), active: true } },
      {
        type: 'borrowed',
        borrow: {
          id: 'b-1',
          poolName: 'cad-suite',
          holder: 'alice',
          borrowedAt: '2026-01-05T09:00:01.000Z',
          isOverage: true,
        },
        charge: {
          id: 'c-1',
          poolName: 'cad-suite',
          borrowId: 'b-1',
          holder: 'alice',
          chargedAt: '2026-01-05T09:00:01.000Z',
          amount: 500,
        },
      },
      { type: 'returned', borrowId: 'b-1', returnedAt: '2026-01-05T09:30:00.000Z' },
    ]);
    expect(jobs.map(historyJobId)).toEqual([undefined, 'borrowed-b-1', 'returned-b-1']);
  });

  it('applies queued jobs to the store in order', async () => {
    const jobs: LicenseHistoryJobData[] = [];
    const sink = new QueuedHistorySink(async (data) => {
      jobs.push(data);
    });
    const processJob = createLicenseHistoryProcessor(repository);

    await sink.poolSaved({ ...mockData.pool(), active: true });
    await sink.borrowed(
      { id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt, isOverage: true },
      { id: 'c-1', poolName: 'cad-suite', borrowId: 'b-1', holder: 'alice', chargedAt: borrowedAt, amount: 500 }
    );
    await sink.borrowed({ id: 'b-2', poolName: 'cad-suite', holder: 'bob', borrowedAt, isOverage: false });
    await sink.returned({ id: 'b-2', poolName: 'cad-suite', holder: 'bob', borrowedAt, isOverage: false, returnedAt });

    const results: LicenseHistoryResult[] = [];
    for (const [index, data] of jobs.entries()) {
      results.push(await processJob({ id: String(index + 1), data }));
    }

    expect(results.map((r) => r.type)).toEqual(['pool_saved', 'borrowed', 'borrowed', 'returned']);
    expect((await repository.listOutstanding()).map((b) => b.id)).toEqual(['b-1']);
    expect(await repository.listOverageCharges()).toEqual([
      { id: 'c-1', poolName: 'cad-suite', borrowId: 'b-1', holder: 'alice', chargedAt: borrowedAt, amount: 500 },
    ]);
  });

  it('fails the job when the store rejects the write', async () => {
    const processJob = createLicenseHistoryProcessor(repository);

    // No pool row yet, so the borrow violates its foreign key
    await expect(
      processJob({
        id: '1',
        data: {
          type: 'borrowed',
          borrow: { id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: borrowedAt.toISOString(), isOverage: false },
        },
      })
    ).rejects.toThrow(/FOREIGN KEY/);
  });
});
