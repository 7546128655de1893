import { SignJWT } from 'jose';
import { z } from 'zod';
import { ActorIdSchema } from './cooldown-engine.js';
import { PermissionSchema } from './permissions.js';
import { SIGNING_ALG, signingKeyProvider, type SigningKeyProvider } from './signing.js';

export const ActorTokenRequestSchema = z.object({
  sub: ActorIdSchema,
  perms: z.array(PermissionSchema).default([]),
  ttl: z.coerce.number().int().min(1).max(86_400).default(3600),
});

export type ActorTokenRequest = z.input<typeof ActorTokenRequestSchema>;

export interface IssuerOptions {
  issuer: string;
  audience: string;
  keyProvider?: SigningKeyProvider;
  nowProvider?: () => number; // unix seconds
}

export interface ActorTokenResponse {
  token: string;
  expires_at: number;
  expires_in: number;
}

const defaultNow = () => Math.floor(Date.now() / 1000);

export async function issueActorToken(request: ActorTokenRequest, options: IssuerOptions): Promise<ActorTokenResponse> {
  const parsed = ActorTokenRequestSchema.parse(request);
  const keyProvider = options.keyProvider ?? signingKeyProvider;
  const now = (options.nowProvider ?? defaultNow)();
  const exp = now + parsed.ttl;

  const privateKey = await keyProvider.getPrivateKey();
  const token = await new SignJWT({ perms: parsed.perms })
    .setProtectedHeader({ alg: SIGNING_ALG, typ: 'JWT' })
    .setIssuer(options.issuer)
    .setAudience(options.audience)
    .setSubject(parsed.sub)
    .setIssuedAt(now)
    .setExpirationTime(exp)
    .sign(privateKey);

  return { token, expires_at: exp, expires_in: parsed.ttl };
}
