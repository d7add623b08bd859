import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { PoolConfig } from '../../engine/ledger/types.js';

/** Default seed file shipped with the service. */
export const DEFAULT_POOL_SEED_FILE = fileURLToPath(new URL('../../../config/pools.json', import.meta.url));

const seedEntrySchema = z
  .object({
    tool: z.string().min(1),
    total: z.number().int().min(0),
    commit_qty: z.number().int().min(0),
    max_overage: z.number().int().min(0),
    commit_price: z.number().min(0).default(0),
    overage_price_per_license: z.number().min(0).default(0),
  })
  .refine((entry) => entry.commit_qty <= entry.total, {
    message: 'commit_qty cannot exceed total',
    path: ['commit_qty'],
  });

export const poolSeedFileSchema = z.array(seedEntrySchema);

export type PoolSeedEntry = z.infer<typeof seedEntrySchema>;

export function toPoolConfig(entry: PoolSeedEntry): PoolConfig {
  return {
    name: entry.tool,
    totalCapacity: entry.total,
    commitQuantity: entry.commit_qty,
    maxOverage: entry.max_overage,
    commitFee: entry.commit_price,
    overageUnitPrice: entry.overage_price_per_license,
  };
}

/**
 * Parse pool definitions from seed JSON text. Duplicate tool names are
 * rejected.
 */
export function parsePoolSeeds(text: string, source = 'pool seed'): PoolConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${source} is not valid JSON`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = poolSeedFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${source} is invalid`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const seen = new Set<string>();
  for (const entry of parsed.data) {
    if (seen.has(entry.tool)) {
      throw new ValidationError(`${source} defines '${entry.tool}' more than once`);
    }
    seen.add(entry.tool);
  }

  return parsed.data.map(toPoolConfig);
}

export async function loadPoolSeeds(path: string = DEFAULT_POOL_SEED_FILE): Promise<PoolConfig[]> {
  const text = await readFile(path, 'utf8');
  return parsePoolSeeds(text, path);
}
