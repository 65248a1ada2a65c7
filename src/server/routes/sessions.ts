import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

interface CreateSessionBody {
  headless?: boolean;
  profileDir?: string;
}

export async function sessionRoutes(fastify: FastifyInstance): Promise<void> {
  const sm = fastify.sessionManager;

  // POST /sessions - launch a browser on a profile
  fastify.post<{ Body: CreateSessionBody }>(
    '/',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            headless: { type: 'boolean' },
            profileDir: { type: 'string', minLength: 1 },
          },
          additionalProperties: false,
        },
      },
    },
    async (request: FastifyRequest<{ Body: CreateSessionBody }>, reply: FastifyReply) => {
      const { headless, profileDir } = request.body ?? {};

      const session = await sm.createSession({ headless, profileDir });

      return reply.status(201).send({
        id: session.id,
        profileDir: session.profile.path,
        headless: session.headless,
        state: session.state,
        createdAt: session.createdAt,
      });
    },
  );

  fastify.get('/', async () => {
    return { sessions: sm.listSessions() };
  });

  // DELETE /sessions/:id - repeated deletes of a closed session succeed
  fastify.delete<{ Params: { id: string } }>(
    '/:id',
    {
      schema: {
        params: {
          type: 'object',
          properties: {
            id: { type: 'string' },
          },
          required: ['id'],
        },
      },
    },
    async (request: FastifyRequest<{ Params: { id: string } }>) => {
      await sm.closeSession(request.params.id);
      return { id: request.params.id, state: 'closed' };
    },
  );
}
