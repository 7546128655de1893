import { generateKeyPair, SignJWT } from 'jose';
import { beforeAll, describe, expect, test } from 'vitest';
import { AuthError } from './errors.js';
import { issueActorToken } from './issuer.js';
import type { Permission } from './permissions.js';
import { InMemorySigningKeyProvider } from './signing.js';
import { ActorTokenVerifier, parseBearer, requirePermission } from './verifier.js';

const ACTOR = '11111111-1111-4111-8111-111111111111';
const ISSUER = 'http://localhost:4000';
const AUDIENCE = 'action-cooldown';

describe('ActorTokenVerifier', () => {
  const keyProvider = new InMemorySigningKeyProvider();
  let verifier: ActorTokenVerifier;

  beforeAll(async () => {
    verifier = new ActorTokenVerifier({
      issuer: ISSUER,
      audience: AUDIENCE,
      issuerPublicJwk: await keyProvider.getPublicJwk(),
    });
  });

  test('accepts a valid token and returns the actor and permissions', async () => {
    const { token } = await issueActorToken(
      { sub: ACTOR, perms: ['cooldown.reset', 'cooldown.check'] },
      { issuer: ISSUER, audience: AUDIENCE, keyProvider },
    );

    const identity = await verifier.verify(token);

    expect(identity.actorId).toBe(ACTOR);
    expect([...identity.permissions].sort()).toEqual(['cooldown.check', 'cooldown.reset']);
  });

  test('ignores permissions it does not know', async () => {
    const token = await new SignJWT({ perms: ['cooldown.check', 'cooldown.future'] })
      .setProtectedHeader({ alg: 'ES256' })
      .setIssuer(ISSUER)
      .setAudience(AUDIENCE)
      .setSubject(ACTOR)
      .setIssuedAt()
      .setExpirationTime('5m')
      .sign(await keyProvider.getPrivateKey());

    const identity = await verifier.verify(token);

    expect([...identity.permissions]).toEqual(['cooldown.check']);
  });

  test('rejects expired tokens', async () => {
    const { token } = await issueActorToken(
      { sub: ACTOR, ttl: 1 },
      { issuer: ISSUER, audience: AUDIENCE, keyProvider, nowProvider: () => 1_700_000_000 },
    );

    await expect(verifier.verify(token)).rejects.toMatchObject({ code: 'expired_token' });
  });

  test('rejects tokens signed by another key', async () => {
    const other = await generateKeyPair('ES256');
    const token = await new SignJWT({ perms: [] })
      .setProtectedHeader({ alg: 'ES256' })
      .setIssuer(ISSUER)
      .setAudience(AUDIENCE)
      .setSubject(ACTOR)
      .setExpirationTime('5m')
      .sign(other.privateKey);

    await expect(verifier.verify(token)).rejects.toMatchObject({ code: 'invalid_token' });
  });

  test('rejects a subject that is not an actor id', async () => {
    const token = await new SignJWT({ perms: [] })
      .setProtectedHeader({ alg: 'ES256' })
      .setIssuer(ISSUER)
      .setAudience(AUDIENCE)
      .setSubject('agent-1')
      .setExpirationTime('5m')
      .sign(await keyProvider.getPrivateKey());

    await expect(verifier.verify(token)).rejects.toMatchObject({ code: 'invalid_token' });
  });

  test('returns the subject in lower case', async () => {
    const token = await new SignJWT({ perms: [] })
      .setProtectedHeader({ alg: 'ES256' })
      .setIssuer(ISSUER)
      .setAudience(AUDIENCE)
      .setSubject('AAAAAAAA-AAAA-4AAA-8AAA-AAAAAAAAAAAA')
      .setExpirationTime('5m')
      .sign(await keyProvider.getPrivateKey());

    const identity = await verifier.verify(token);

    expect(identity.actorId).toBe('aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa');
  });

  test('rejects a wrong audience', async () => {
    const { token } = await issueActorToken({ sub: ACTOR }, { issuer: ISSUER, audience: 'someone-else', keyProvider });

    await expect(verifier.verify(token)).rejects.toBeInstanceOf(AuthError);
  });
});

describe('bearer parsing and permissions', () => {
  test('parseBearer extracts the token', () => {
    expect(parseBearer('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearer('bearer abc')).toBe('abc');
  });

  test('parseBearer rejects missing or malformed headers', () => {
    expect(() => parseBearer(undefined)).toThrowError(AuthError);
    expect(() => parseBearer('Basic dXNlcg==')).toThrowError(/bearer token/);
    expect(() => parseBearer('Bearer')).toThrowError(/bearer token/);
  });

  test('requirePermission throws when the permission is missing', () => {
    const identity = { actorId: ACTOR, permissions: new Set<Permission>(['cooldown.check']) };

    expect(() => requirePermission(identity, 'cooldown.check')).not.toThrow();
    expect(() => requirePermission(identity, 'cooldown.reset')).toThrowError('missing permission cooldown.reset');
  });
});
