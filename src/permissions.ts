import { z } from 'zod';

export const ALL_PERMISSIONS = [
  'cooldown.bypass',
  'cooldown.check',
  'cooldown.reset',
  'cooldown.reload',
  'cooldown.info',
] as const;

export type Permission = (typeof ALL_PERMISSIONS)[number];

export const PermissionSchema = z.enum(ALL_PERMISSIONS);

export const PERMISSIONS = {
  bypass: 'cooldown.bypass',
  check: 'cooldown.check',
  reset: 'cooldown.reset',
  reload: 'cooldown.reload',
  info: 'cooldown.info',
} as const satisfies Record<string, Permission>;
