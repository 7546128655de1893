import { importJWK, jwtVerify } from 'jose';
import { describe, expect, test } from 'vitest';
import { ActorTokenRequestSchema, issueActorToken } from './issuer.js';
import { InMemorySigningKeyProvider } from './signing.js';

const ACTOR = '11111111-1111-4111-8111-111111111111';
const keyProvider = new InMemorySigningKeyProvider();
const issuerOptions = { issuer: 'http://localhost:4000', audience: 'action-cooldown', keyProvider };

describe('issueActorToken', () => {
  test('issues a signed token with expected claims', async () => {
    const response = await issueActorToken({ sub: ACTOR, perms: ['cooldown.bypass'], ttl: 30 }, issuerOptions);

    expect(response.token).toBeTypeOf('string');
    expect(response.expires_in).toBe(30);

    const publicKey = await importJWK(await keyProvider.getPublicJwk(), 'ES256');
    const { payload, protectedHeader } = await jwtVerify(response.token, publicKey, {
      issuer: 'http://localhost:4000',
      audience: 'action-cooldown',
      subject: ACTOR,
    });

    expect(payload.perms).toEqual(['cooldown.bypass']);
    expect(payload.exp).toBe(response.expires_at);
    expect(protectedHeader.alg).toBe('ES256');
  });

  test('defaults to no permissions and a one hour lifetime', async () => {
    const response = await issueActorToken({ sub: ACTOR }, { ...issuerOptions, nowProvider: () => 1_700_000_000 });

    expect(response.expires_at).toBe(1_700_003_600);
    expect(response.expires_in).toBe(3600);
  });

  test('rejects unknown permissions and non-actor subjects via schema', () => {
    expect(ActorTokenRequestSchema.safeParse({ sub: ACTOR, perms: ['cooldown.everything'] }).success).toBe(false);
    expect(ActorTokenRequestSchema.safeParse({ sub: 'agent-123' }).success).toBe(false);
    expect(ActorTokenRequestSchema.safeParse({ sub: ACTOR, ttl: 0 }).success).toBe(false);
  });
});
