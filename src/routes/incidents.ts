import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ResolveRequestSchema } from '../scan/request.js';
import type { ScanService } from '../scan/service.js';
import { formatZodError } from './scan.js';

export function createIncidentRoute(service: ScanService) {
  return async function registerIncidentRoute(server: FastifyInstance): Promise<void> {
    server.post(
      '/v1/incidents/resolve',
      {
        schema: {
          tags: ['Incidents'],
          summary: 'Resolve security events into incidents',
          description:
            'Builds an incident with ranked root-cause hypotheses and recommended actions for each event, ' +
            'using what the last scans learned about the affected apps.',
          body: { type: 'object', additionalProperties: true },
          response: {
            200: { type: 'object', additionalProperties: true },
            400: { type: 'object', properties: { error: { type: 'string' }, message: { type: 'string' } } },
          },
        },
      },
      async (request: FastifyRequest, reply: FastifyReply) => {
        const parsed = ResolveRequestSchema.safeParse(request.body);
        if (!parsed.success) {
          return reply.status(400).send({
            error: 'Bad Request',
            message: formatZodError(parsed.error),
          });
        }

        const incidents = await service.resolveEvents(parsed.data);
        return reply.send({ incidents });
      },
    );
  };
}
