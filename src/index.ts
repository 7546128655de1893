export { CooldownEngine, ActorIdSchema } from './cooldown-engine.js';
export type { CooldownEngineOptions, CooldownStatus, FlushResult, ReservationResult } from './cooldown-engine.js';
export { FileCooldownStore, InMemoryCooldownStore } from './cooldown-store.js';
export type { CooldownStore, RawRecords, RecordSet } from './cooldown-store.js';
export { FileSettingsSource, StaticSettings, SettingsSchema, DEFAULT_SETTINGS } from './settings.js';
export type { CooldownSettings, SettingsSource } from './settings.js';
export { PinoAuditLogger } from './audit.js';
export type { CooldownAuditEvent, CooldownAuditLogger } from './audit.js';
export { AuthError, CooldownError } from './errors.js';
export type { AuthErrorCode, CooldownErrorCode } from './errors.js';
export { PERMISSIONS } from './permissions.js';
export type { Permission } from './permissions.js';
export { ActorTokenVerifier } from './verifier.js';
export { issueActorToken } from './issuer.js';
export { buildServer } from './server.js';
export { CooldownClient } from './client/cooldown-client.js';
