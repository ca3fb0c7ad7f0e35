/**
 * Inbound message decoding.
 *
 * Every client frame is JSON matching one variant of `ClientMessage`.
 * Anything else is rejected with an `invalid_message` ValidationError.
 */

import { z } from 'zod';
import { CARD_MAX, CARD_MIN, MAX_PLAYERS, MIN_PLAYERS } from '../types.js';
import { ValidationError } from '../errors.js';
import type { ClientMessage } from './types.js';

const displayName = z.string().trim().min(1).max(20);

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('create-room'),
    name: z.string().trim().min(1).max(40),
    capacity: z.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS),
    playerName: displayName.optional(),
  }),
  z.object({
    type: z.literal('join-room'),
    roomId: z.string().trim().min(1).transform(id => id.toUpperCase()),
    playerName: displayName,
  }),
  z.object({ type: z.literal('resume-session'), sessionToken: z.string().min(1) }),
  z.object({ type: z.literal('leave-room') }),
  z.object({ type: z.literal('list-rooms') }),
  z.object({
    type: z.literal('play-card'),
    card: z.number().int().min(CARD_MIN).max(CARD_MAX),
  }),
  z.object({ type: z.literal('use-star') }),
  z.object({ type: z.literal('advance-level') }),
]);

/**
 * Decode a raw frame. Throws ValidationError for malformed JSON, unknown
 * message types and out-of-range fields.
 */
export function parseClientMessage(raw: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ValidationError('Invalid JSON', 'invalid_message');
  }

  const parsed = clientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`Invalid message: ${where}${issue?.message ?? 'unrecognized shape'}`, 'invalid_message');
  }
  return parsed.data;
}
