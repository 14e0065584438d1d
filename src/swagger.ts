import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

export async function registerSwagger(server: FastifyInstance): Promise<void> {
  await server.register(swagger, {
    openapi: {
      info: {
        title: 'Trust & Risk Decision Engine',
        description: 'Evidence-based trust scoring, baseline tracking and incident resolution for installed apps',
        version: '0.1.0',
      },
      tags: [
        { name: 'Scan', description: 'App inventory evaluation' },
        { name: 'Baselines', description: 'Stored per-package baselines' },
        { name: 'Incidents', description: 'Root-cause resolution and install timelines' },
        { name: 'Health', description: 'Health and readiness checks' },
        { name: 'Metrics', description: 'Observability' },
      ],
    },
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });
}
