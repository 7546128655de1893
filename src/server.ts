import Fastify, { type FastifyReply, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import { z } from 'zod';
import { ActorIdSchema, type CooldownEngine, type CooldownStatus } from './cooldown-engine.js';
import { AuthError, CooldownError } from './errors.js';
import { PERMISSIONS } from './permissions.js';
import { type ActorIdentity, type ActorTokenVerifier, parseBearer, requirePermission } from './verifier.js';

export interface ServerDeps {
  engine: CooldownEngine;
  verifier: ActorTokenVerifier;
  /** Whether the last settings load passed validation without warnings. */
  configValid?: () => boolean;
}

const ActorParamsSchema = z.object({ actorId: ActorIdSchema });

const toSeconds = (ms: number) => Math.ceil(ms / 1000);

function statusBody(actorId: string, status: CooldownStatus) {
  if (status.state === 'available') {
    return { actor_id: actorId, state: status.state, remaining_seconds: 0 };
  }
  return {
    actor_id: actorId,
    state: status.state,
    remaining_seconds: toSeconds(status.remainingMs),
    expires_at: Math.floor(status.expiresAt / 1000),
  };
}

function sendAuthError(reply: FastifyReply, error: AuthError) {
  const status = error.code === 'forbidden' ? 403 : 401;
  return reply.status(status).send({ error: error.code, message: error.message });
}

export function buildServer(deps: ServerDeps, options: FastifyServerOptions = {}) {
  const app = Fastify({ ...options, logger: options.logger ?? true });
  const { engine, verifier } = deps;

  async function authenticate(request: FastifyRequest): Promise<ActorIdentity> {
    return verifier.verify(parseBearer(request.headers.authorization));
  }

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AuthError) {
      request.log.warn({ code: error.code }, 'request rejected');
      return sendAuthError(reply, error);
    }
    request.log.error({ err: error }, 'request_failed');
    return reply.status(500).send({ error: 'server_error' });
  });

  app.addHook('onClose', async () => {
    await engine.shutdown();
  });

  app.post('/trigger', async (request, reply) => {
    const identity = await authenticate(request);
    const bypass = identity.permissions.has(PERMISSIONS.bypass);
    const result = engine.tryReserve(identity.actorId, bypass);

    if (result.allowed) {
      return reply.status(200).send({ allowed: true });
    }

    const remainingSeconds = toSeconds(result.remainingMs);
    return reply
      .status(429)
      .header('retry-after', String(remainingSeconds))
      .send({ allowed: false, error: 'cooldown_active', remaining_seconds: remainingSeconds });
  });

  app.get('/cooldowns/me', async (request, reply) => {
    const identity = await authenticate(request);
    return reply.send(statusBody(identity.actorId, engine.queryStatus(identity.actorId)));
  });

  app.get('/cooldowns/:actorId', async (request, reply) => {
    const identity = await authenticate(request);
    const params = ActorParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_request', message: 'actorId must be a UUID' });
    }
    if (params.data.actorId !== identity.actorId) {
      requirePermission(identity, PERMISSIONS.check);
    }
    return reply.send(statusBody(params.data.actorId, engine.queryStatus(params.data.actorId)));
  });

  app.delete('/cooldowns/:actorId', async (request, reply) => {
    const identity = await authenticate(request);
    requirePermission(identity, PERMISSIONS.reset);
    const params = ActorParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_request', message: 'actorId must be a UUID' });
    }
    engine.reset(params.data.actorId);
    request.log.info({ actorId: params.data.actorId, by: identity.actorId }, 'cooldown reset');
    return reply.status(204).send();
  });

  app.get('/info', async (request, reply) => {
    const identity = await authenticate(request);
    requirePermission(identity, PERMISSIONS.info);
    const cooldowns = [...engine.activeCooldowns()].map(([actorId, remainingMs]) => ({
      actor_id: actorId,
      remaining_seconds: toSeconds(remainingMs),
    }));
    return reply.send({
      active_cooldowns: engine.activeCount(),
      cooldown_seconds: engine.cooldownSeconds,
      config_valid: deps.configValid?.() ?? true,
      cooldowns,
    });
  });

  app.post('/reload', async (request, reply) => {
    const identity = await authenticate(request);
    requirePermission(identity, PERMISSIONS.reload);
    try {
      const settings = await engine.reload();
      return reply.send({ reloaded: true, cooldown_seconds: settings.cooldownSeconds });
    } catch (error) {
      if (error instanceof CooldownError) {
        request.log.warn({ err: error, details: error.details }, 'reload failed');
        return reply.status(500).send({ error: 'reload_failed', message: error.message, details: error.details });
      }
      throw error;
    }
  });

  return app;
}
