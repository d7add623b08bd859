import { FastifyInstance } from 'fastify';
import {
  borrowSchema,
  returnSchema,
  borrowFiltersSchema,
  overageChargeFiltersSchema,
  toolParamsSchema,
} from '../schemas/licenses.schema.js';
import { toPoolStatusMessage } from '../engine/streaming/snapshot.js';
import type { Borrow, OverageCharge } from '../engine/ledger/types.js';

function toBorrowRecord(borrow: Borrow) {
  return {
    id: borrow.id,
    tool: borrow.poolName,
    user: borrow.holder,
    borrowed_at: borrow.borrowedAt.toISOString(),
    is_overage: borrow.isOverage,
  };
}

function toChargeRecord(charge: OverageCharge) {
  return {
    id: charge.id,
    tool: charge.poolName,
    borrow_id: charge.borrowId,
    user: charge.holder,
    charged_at: charge.chargedAt.toISOString(),
    amount: charge.amount,
  };
}

export async function licensesRoutes(fastify: FastifyInstance): Promise<void> {
  const { ledger } = fastify.licenseCore;

  // POST /api/licenses/borrow — take one seat from a pool
  fastify.post<{ Body: unknown }>('/api/licenses/borrow', async (request, reply) => {
    const data = borrowSchema.parse(request.body);
    const result = await ledger.borrow(data.tool, data.user);
    return reply.code(200).send({
      id: result.borrowId,
      tool: result.poolName,
      user: result.holder,
      borrowed_at: result.borrowedAt.toISOString(),
      is_overage: result.isOverage,
    });
  });

  // POST /api/licenses/return — give a seat back
  fastify.post<{ Body: unknown }>('/api/licenses/return', async (request, reply) => {
    const data = returnSchema.parse(request.body);
    const returned = await ledger.return(data.id);
    return reply.code(200).send({ status: 'ok', tool: returned.poolName });
  });

  // GET /api/licenses/status — every pool
  fastify.get('/api/licenses/status', async (_request, reply) => {
    const statuses = await ledger.statusAll();
    return reply.code(200).send(statuses.map(toPoolStatusMessage));
  });

  // GET /api/licenses/:tool/status — one pool
  fastify.get<{ Params: { tool: string } }>('/api/licenses/:tool/status', async (request, reply) => {
    const { tool } = toolParamsSchema.parse(request.params);
    const status = await ledger.status(tool);
    return reply.code(200).send(toPoolStatusMessage(status));
  });

  // GET /api/borrows — outstanding borrows, newest first
  fastify.get<{ Querystring: Record<string, unknown> }>('/api/borrows', async (request, reply) => {
    const filters = borrowFiltersSchema.parse(request.query);
    return reply.code(200).send(ledger.listBorrows(filters.user).map(toBorrowRecord));
  });

  // GET /api/overage-charges — recorded charges, newest first
  fastify.get<{ Querystring: Record<string, unknown> }>('/api/overage-charges', async (request, reply) => {
    const filters = overageChargeFiltersSchema.parse(request.query);
    const charges = await fastify.historyRepository.listOverageCharges(filters.tool);
    return reply.code(200).send({ charges: charges.map(toChargeRecord) });
  });
}
