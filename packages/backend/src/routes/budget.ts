import { FastifyInstance } from 'fastify';
import { budgetConfigSchema } from '../schemas/budget.schema.js';
import { toolParamsSchema } from '../schemas/licenses.schema.js';

export async function budgetRoutes(fastify: FastifyInstance): Promise<void> {
  const { ledger } = fastify.licenseCore;

  // GET /api/config/budget — capacity split and prices of every pool
  fastify.get('/api/config/budget', async (_request, reply) => {
    const statuses = await ledger.statusAll();
    return reply.code(200).send({
      tools: statuses.map((status) => ({
        tool: status.name,
        total: status.total,
        borrowed: status.borrowed,
        commit: status.commit,
        max_overage: status.maxOverage,
        commit_price: status.commitFee,
        overage_price_per_license: status.overageUnitPrice,
        active: status.active,
      })),
    });
  });

  // PUT /api/config/budget — provision a pool or update its budget
  fastify.put<{ Body: unknown }>('/api/config/budget', async (request, reply) => {
    const data = budgetConfigSchema.parse(request.body);
    await ledger.provision({
      name: data.tool,
      totalCapacity: data.total,
      commitQuantity: data.commit,
      maxOverage: data.max_overage,
      commitFee: data.commit_price,
      overageUnitPrice: data.overage_price_per_license,
    });
    return reply.code(200).send({ status: 'ok', tool: data.tool });
  });

  // DELETE /api/config/budget/:tool — soft deactivate
  fastify.delete<{ Params: { tool: string } }>('/api/config/budget/:tool', async (request, reply) => {
    const { tool } = toolParamsSchema.parse(request.params);
    await ledger.deactivate(tool);
    return reply.code(204).send();
  });
}
