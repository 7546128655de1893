import type { JWK } from 'jose';
import { pino } from 'pino';
import { type AppConfig, config } from './config.js';
import { FileCooldownStore } from './cooldown-store.js';
import { CooldownEngine } from './cooldown-engine.js';
import { buildServer } from './server.js';
import { FileSettingsSource } from './settings.js';
import { signingKeyProvider } from './signing.js';
import { ActorTokenVerifier } from './verifier.js';

export async function startService(appConfig: AppConfig) {
  const logger = pino({ name: 'action-cooldown', level: appConfig.LOG_LEVEL });

  const settings = new FileSettingsSource(appConfig.SETTINGS_FILE, logger);
  await settings.load();

  const engine = await CooldownEngine.create({
    store: new FileCooldownStore(appConfig.DATA_FILE),
    settings,
    logger: logger.child({ component: 'engine' }),
  });

  let issuerPublicJwk: JWK | undefined = appConfig.ISSUER_PUBLIC_JWK;
  if (!issuerPublicJwk) {
    logger.warn('ISSUER_PUBLIC_JWK not set, using an in-process development signing key');
    issuerPublicJwk = await signingKeyProvider.getPublicJwk();
  }

  const verifier = new ActorTokenVerifier({
    issuer: appConfig.ISSUER_URL,
    audience: appConfig.AUDIENCE,
    issuerPublicJwk,
  });

  const app = buildServer(
    { engine, verifier, configValid: () => settings.configValid },
    { logger: { level: appConfig.LOG_LEVEL } },
  );

  engine.start();
  await app.listen({ port: appConfig.PORT, host: appConfig.HOST });
  app.log.info(`cooldown service listening on ${appConfig.PORT}`);

  const close = (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startService(config).catch((err: unknown) => {
    pino({ name: 'action-cooldown' }).fatal({ err }, 'failed to start cooldown service');
    process.exit(1);
  });
}
