import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../lib/db.js';
import { SqliteHistoryRepository } from '../repositories/history.repository.js';
import { DirectHistorySink } from '../services/history-sink.js';
import { hydrateFromRepository } from '../core.js';
import { mockData } from './setup.js';

const at = (seconds: number) => new Date(Date.UTC(2026, 0, 5, 9, 0, seconds));

describe('SqliteHistoryRepository', () => {
  let db: SqliteDatabase;
  let repository: SqliteHistoryRepository;

  beforeEach(async () => {
    db = openDatabase(':memory:');
    repository = new SqliteHistoryRepository(db);
    await repository.savePool({ ...mockData.pool(), active: true });
  });

  afterEach(() => {
    db.close();
  });

  it('upserts pools', async () => {
    await repository.savePool({ ...mockData.pool({ totalCapacity: 25 }), active: false });
    await repository.savePool({ ...mockData.pool({ name: 'sim-lab', overageUnitPrice: 0 }), active: true });

    expect(await repository.loadPools()).toEqual([
      { ...mockData.pool({ totalCapacity: 25 }), active: false },
      { ...mockData.pool({ name: 'sim-lab', overageUnitPrice: 0 }), active: true },
    ]);
  });

  it('tracks outstanding borrows until they are returned', async () => {
    await repository.recordBorrow({ id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: at(1), isOverage: false });
    await repository.recordBorrow({ id: 'b-2', poolName: 'cad-suite', holder: 'bob', borrowedAt: at(2), isOverage: true });
    await repository.recordReturn('b-1', at(3));

    expect(await repository.listOutstanding()).toEqual([
      { id: 'b-2', poolName: 'cad-suite', holder: 'bob', borrowedAt: at(2), isOverage: true },
    ]);
  });

  it('keeps the first return time of a borrow', async () => {
    await repository.recordBorrow({ id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: at(1), isOverage: false });
    await repository.recordReturn('b-1', at(3));
    await repository.recordReturn('b-1', at(9));

    const row = db.prepare<[string], { returned_at: string }>('SELECT returned_at FROM borrows WHERE id = ?').get('b-1');
    expect(row?.returned_at).toBe(at(3).toISOString());
  });

  it('lists overage charges newest first and totals them per pool', async () => {
    const sink = new DirectHistorySink(repository);
    await sink.borrowed(
      { id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: at(1), isOverage: true },
      { id: 'c-1', poolName: 'cad-suite', borrowId: 'b-1', holder: 'alice', chargedAt: at(1), amount: 500 }
    );
    await sink.borrowed(
      { id: 'b-2', poolName: 'cad-suite', holder: 'bob', borrowedAt: at(2), isOverage: true },
      { id: 'c-2', poolName: 'cad-suite', borrowId: 'b-2', holder: 'bob', chargedAt: at(2), amount: 500 }
    );
    await sink.returned({ id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: at(1), isOverage: true, returnedAt: at(5) });

    expect((await repository.listOverageCharges()).map((c) => c.id)).toEqual(['c-2', 'c-1']);
    expect(await repository.listOverageCharges('sim-lab')).toEqual([]);
    expect(await repository.overageTotals()).toEqual([
      { poolName: 'cad-suite', overageBorrows: 2, accruedOverageCost: 1000 },
    ]);
  });

  it('hydrates ledger seeds from stored state and seeds missing pools', async () => {
    await repository.recordBorrow({ id: 'b-1', poolName: 'cad-suite', holder: 'alice', borrowedAt: at(1), isOverage: true });
    await repository.recordOverageCharge({ id: 'c-1', poolName: 'cad-suite', borrowId: 'b-1', holder: 'alice', chargedAt: at(1), amount: 500 });

    const hydrated = await hydrateFromRepository(repository, [
      mockData.pool({ totalCapacity: 99 }),
      mockData.pool({ name: 'sim-lab', totalCapacity: 4, commitQuantity: 4, maxOverage: 0 }),
    ]);

    expect(hydrated.seeded).toEqual(['sim-lab']);
    expect(hydrated.pools).toEqual([
      { ...mockData.pool(), active: true, accruedOverageCost: 500, overageBorrows: 1 },
      {
        ...mockData.pool({ name: 'sim-lab', totalCapacity: 4, commitQuantity: 4, maxOverage: 0 }),
        active: true,
        accruedOverageCost: 0,
        overageBorrows: 0,
      },
    ]);
    expect(hydrated.outstanding.map((b) => b.id)).toEqual(['b-1']);
    expect((await repository.loadPools()).map((p) => p.name)).toEqual(['cad-suite', 'sim-lab']);
  });
});
