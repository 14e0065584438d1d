import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { BaselineStore } from '../baseline/store.js';

interface BaselineParams {
  packageName: string;
}

const PACKAGE_NAME = /^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/;

export function createBaselineRoutes(store: BaselineStore) {
  return async function registerBaselineRoutes(server: FastifyInstance): Promise<void> {
    server.get(
      '/v1/baselines',
      {
        schema: {
          tags: ['Baselines'],
          summary: 'List stored app baselines',
          response: {
            200: { type: 'object', additionalProperties: true },
          },
        },
      },
      async (_request: FastifyRequest, reply: FastifyReply) => {
        const baselines = await store.listBaselines();
        return reply.send({ count: baselines.length, baselines });
      },
    );

    server.get<{ Params: BaselineParams }>(
      '/v1/baselines/:packageName',
      {
        schema: {
          tags: ['Baselines'],
          summary: 'Get the stored baseline of one package',
          params: {
            type: 'object',
            properties: { packageName: { type: 'string', description: 'Package name, e.g. com.example.app' } },
            required: ['packageName'],
          },
          response: {
            200: { type: 'object', additionalProperties: true, description: 'Baseline record' },
            400: { type: 'object', properties: { error: { type: 'string' }, message: { type: 'string' } } },
            404: { type: 'object', properties: { error: { type: 'string' }, message: { type: 'string' } } },
          },
        },
      },
      async (request: FastifyRequest<{ Params: BaselineParams }>, reply: FastifyReply) => {
        const { packageName } = request.params;
        if (!PACKAGE_NAME.test(packageName)) {
          return reply.status(400).send({
            error: 'Bad Request',
            message: `Invalid package name: ${packageName}`,
          });
        }

        const baseline = await store.getBaseline(packageName);
        if (!baseline) {
          return reply.status(404).send({
            error: 'Not Found',
            message: `No baseline stored for package: ${packageName}`,
          });
        }
        return reply.send(baseline);
      },
    );
  };
}
