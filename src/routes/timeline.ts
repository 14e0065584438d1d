import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { TimelineRequestSchema } from '../scan/request.js';
import type { ScanService } from '../scan/service.js';
import { formatZodError } from './scan.js';

export function createTimelineRoute(service: ScanService) {
  return async function registerTimelineRoute(server: FastifyInstance): Promise<void> {
    server.post(
      '/v1/timeline/analyze',
      {
        schema: {
          tags: ['Incidents'],
          summary: 'Score recently installed apps for dropper behaviour',
          body: { type: 'object', additionalProperties: true },
          response: {
            200: { type: 'object', additionalProperties: true },
            400: { type: 'object', properties: { error: { type: 'string' }, message: { type: 'string' } } },
          },
        },
      },
      async (request: FastifyRequest, reply: FastifyReply) => {
        const parsed = TimelineRequestSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
          return reply.status(400).send({
            error: 'Bad Request',
            message: formatZodError(parsed.error),
          });
        }

        const timelines = await service.analyzeTimelines(parsed.data);
        return reply.send({ timelines });
      },
    );
  };
}
