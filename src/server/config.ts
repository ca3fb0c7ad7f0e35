/**
 * Environment configuration for the server entry point.
 */

import { z } from 'zod';
import type { GameServerConfig } from './ws-server.js';

const intFromEnv = (fallback: number) =>
  z.string().trim().regex(/^\d+$/, 'must be a non-negative integer').transform(Number).optional()
    .transform(value => value ?? fallback);

const EnvSchema = z.object({
  PORT: intFromEnv(3000),
  HOST: z.string().trim().min(1).optional(),
  ROOM_GRACE_PERIOD_MS: intFromEnv(5 * 60_000),
  HEARTBEAT_INTERVAL_MS: intFromEnv(30_000),
  GAME_SEED: z.string().trim().regex(/^-?\d+$/, 'must be an integer').transform(Number).optional(),
});

/**
 * Read server settings from environment variables. Throws with every
 * offending variable named when validation fails.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GameServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const { PORT, HOST, ROOM_GRACE_PERIOD_MS, HEARTBEAT_INTERVAL_MS, GAME_SEED } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    roomGracePeriodMs: ROOM_GRACE_PERIOD_MS,
    heartbeatIntervalMs: HEARTBEAT_INTERVAL_MS,
    seed: GAME_SEED,
  };
}
