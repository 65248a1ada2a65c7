import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { enabledTools } from '../../tools/definitions.js';
import { ERROR_STATUS } from '../../utils/errors.js';

interface CancelBody {
  requestId: string;
}

export async function toolRoutes(fastify: FastifyInstance): Promise<void> {
  const dispatcher = fastify.dispatcher;

  fastify.get('/', async () => {
    return { tools: enabledTools(dispatcher.allowedTools) };
  });

  // POST /tools/call - the body is checked for shape here and for meaning by
  // the dispatcher, so a wrong shape is a protocol error and a bad tool call
  // comes back as a ToolResult.
  fastify.post(
    '/call',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            tool: { type: 'string' },
            sessionId: { type: 'string' },
            params: { type: 'object' },
            requestId: { type: 'string' },
            timeoutMs: { type: 'integer' },
          },
          required: ['tool', 'sessionId'],
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const result = await dispatcher.dispatch(request.body);
      const status = result.ok ? 200 : ERROR_STATUS[result.error.kind];
      return reply.status(status).send(result);
    },
  );

  fastify.post<{ Body: CancelBody }>(
    '/cancel',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            requestId: { type: 'string', minLength: 1 },
          },
          required: ['requestId'],
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Body: CancelBody }>) => {
      const { requestId } = request.body;
      return { requestId, status: dispatcher.cancel(requestId) };
    },
  );
}
