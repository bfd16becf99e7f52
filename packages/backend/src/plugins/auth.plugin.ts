import fp from 'fastify-plugin';
import { jwtVerify } from 'jose';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { UnauthorizedError } from '../lib/errors.js';
import { getConfig } from '../lib/config.js';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
  interface FastifyRequest {
    /** Set by `authenticate`: the user id from the token's `sub`. */
    actorId: number;
  }
}

function parseSubject(sub: string | undefined): number {
  const id = sub !== undefined && /^\d+$/.test(sub) ? Number(sub) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new UnauthorizedError('Invalid token: missing or malformed sub claim');
  }
  return id;
}

async function authPlugin(fastify: FastifyInstance): Promise<void> {
  const { jwt } = getConfig();

  fastify.decorateRequest('actorId', 0);

  /**
   * Verifies an HS256 bearer token and stores its subject as the actor id.
   * Whether that user still exists is decided per operation by the services.
   */
  fastify.decorate(
    'authenticate',
    async function (request: FastifyRequest, _reply: FastifyReply) {
      const authHeader = request.headers.authorization;
      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new UnauthorizedError('Access token required');
      }

      const token = authHeader.slice(7);
      let subject: string | undefined;
      try {
        const { payload } = await jwtVerify(token, jwt.secret, {
          algorithms: ['HS256'],
          issuer: jwt.issuer,
          audience: jwt.audience,
        });
        subject = payload.sub;
      } catch (err) {
        request.log.debug({ err }, 'Token verification failed');
        throw new UnauthorizedError('Invalid or expired access token');
      }

      request.actorId = parseSubject(subject);
    }
  );
}

export default fp(authPlugin, {
  name: 'auth',
});
