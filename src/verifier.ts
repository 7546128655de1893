import { errors, importJWK, type JWK, jwtVerify, type KeyLike } from 'jose';
import { ActorIdSchema } from './cooldown-engine.js';
import { AuthError } from './errors.js';
import { PermissionSchema, type Permission } from './permissions.js';
import { SIGNING_ALG } from './signing.js';

export interface VerifierOptions {
  issuer: string;
  audience: string;
  issuerPublicJwk: JWK;
  clockToleranceSeconds?: number;
  nowProvider?: () => number; // unix seconds
}

export interface ActorIdentity {
  actorId: string;
  permissions: ReadonlySet<Permission>;
}

const defaultNow = () => Math.floor(Date.now() / 1000);

export function parseBearer(header: string | undefined): string {
  if (!header) {
    throw new AuthError('invalid_request', 'authorization header missing');
  }
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    throw new AuthError('invalid_request', 'authorization header must be a bearer token');
  }
  return token;
}

export class ActorTokenVerifier {
  private readonly publicKeyPromise: Promise<KeyLike | Uint8Array>;
  private readonly now: () => number;
  private readonly clockTolerance: number;

  constructor(private readonly options: VerifierOptions) {
    this.publicKeyPromise = importJWK(options.issuerPublicJwk, SIGNING_ALG);
    this.now = options.nowProvider ?? defaultNow;
    this.clockTolerance = options.clockToleranceSeconds ?? 5;
  }

  async verify(token: string): Promise<ActorIdentity> {
    if (!token) {
      throw new AuthError('invalid_request', 'token is required');
    }

    const publicKey = await this.publicKeyPromise;
    const { payload } = await jwtVerify(token, publicKey, {
      issuer: this.options.issuer,
      audience: this.options.audience,
      algorithms: [SIGNING_ALG],
      clockTolerance: this.clockTolerance,
      currentDate: new Date(this.now() * 1000),
    }).catch((err: unknown) => {
      if (err instanceof errors.JWTExpired) {
        throw new AuthError('expired_token', 'actor token expired');
      }
      throw new AuthError('invalid_token', 'actor token verification failed', {
        cause: err instanceof Error ? err.message : String(err),
      });
    });

    const actorId = ActorIdSchema.safeParse(payload.sub);
    if (!actorId.success) {
      throw new AuthError('invalid_token', 'sub claim must be an actor id');
    }

    const permissions = new Set<Permission>();
    const perms: unknown = payload.perms ?? [];
    if (!Array.isArray(perms)) {
      throw new AuthError('invalid_token', 'perms claim must be an array');
    }
    for (const entry of perms) {
      const parsed = PermissionSchema.safeParse(entry);
      // unknown permissions are ignored so issuers can grant newer ones
      if (parsed.success) {
        permissions.add(parsed.data);
      }
    }

    return { actorId: actorId.data, permissions };
  }
}

export function requirePermission(identity: ActorIdentity, permission: Permission): void {
  if (!identity.permissions.has(permission)) {
    throw new AuthError('forbidden', `missing permission ${permission}`);
  }
}
