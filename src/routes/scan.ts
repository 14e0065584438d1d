import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { ScanRequestSchema } from '../scan/request.js';
import type { ScanService } from '../scan/service.js';

export function formatZodError(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ');
}

export function createScanRoute(service: ScanService) {
  return async function registerScanRoute(server: FastifyInstance): Promise<void> {
    server.post(
      '/v1/scan',
      {
        schema: {
          tags: ['Scan'],
          summary: 'Evaluate installed apps',
          description:
            'Runs trust evidence, baseline comparison and risk evaluation for every app in the inventory, ' +
            'records the resulting security events and resolves the notable ones into incidents.',
          body: { type: 'object', additionalProperties: true },
          response: {
            200: { type: 'object', additionalProperties: true, description: 'Verdicts, incidents and scan summary' },
            400: { type: 'object', properties: { error: { type: 'string' }, message: { type: 'string' } } },
          },
        },
      },
      async (request: FastifyRequest, reply: FastifyReply) => {
        const parsed = ScanRequestSchema.safeParse(request.body);
        if (!parsed.success) {
          return reply.status(400).send({
            error: 'Bad Request',
            message: formatZodError(parsed.error),
          });
        }

        const result = await service.scan(parsed.data);
        return reply.send(result);
      },
    );
  };
}
