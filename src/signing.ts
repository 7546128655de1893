import { exportJWK, generateKeyPair, type JWK, type KeyLike } from 'jose';

export const SIGNING_ALG = 'ES256';

export interface SigningKeyProvider {
  getPrivateKey(): Promise<KeyLike>;
  getPublicJwk(): Promise<JWK>;
}

/** Process-local key pair for development and tests; tokens die with the process. */
export class InMemorySigningKeyProvider implements SigningKeyProvider {
  private keyPairPromise: Promise<{ privateKey: KeyLike; publicKey: KeyLike }>;

  constructor() {
    this.keyPairPromise = generateKeyPair(SIGNING_ALG);
  }

  async getPrivateKey(): Promise<KeyLike> {
    const { privateKey } = await this.keyPairPromise;
    return privateKey;
  }

  async getPublicJwk(): Promise<JWK> {
    const { publicKey } = await this.keyPairPromise;
    return await exportJWK(publicKey);
  }
}

export const signingKeyProvider: SigningKeyProvider = new InMemorySigningKeyProvider();
