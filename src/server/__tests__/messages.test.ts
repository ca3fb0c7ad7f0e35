import { describe, it, expect } from 'vitest';
import { parseClientMessage } from '../messages.js';
import { ValidationError } from '../../errors.js';

describe('parseClientMessage', () => {
  it('decodes a create-room request', () => {
    expect(parseClientMessage('{"type":"create-room","name":" Den ","capacity":4,"playerName":"Ana"}')).toEqual({
      type: 'create-room',
      name: 'Den',
      capacity: 4,
      playerName: 'Ana',
    });
  });

  it('upper-cases room codes on join', () => {
    expect(parseClientMessage('{"type":"join-room","roomId":"abc234","playerName":"Ben"}')).toEqual({
      type: 'join-room',
      roomId: 'ABC234',
      playerName: 'Ben',
    });
  });

  it.each([
    ['{"type":"use-star"}', { type: 'use-star' }],
    ['{"type":"advance-level"}', { type: 'advance-level' }],
    ['{"type":"leave-room"}', { type: 'leave-room' }],
    ['{"type":"list-rooms"}', { type: 'list-rooms' }],
    ['{"type":"play-card","card":42}', { type: 'play-card', card: 42 }],
  ])('decodes %s', (raw, expected) => {
    expect(parseClientMessage(raw)).toEqual(expected);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseClientMessage('{')).toThrow('Invalid JSON');
  });

  it('rejects unknown message types', () => {
    expect(() => parseClientMessage('{"type":"shuffle"}')).toThrow(ValidationError);
  });

  it.each([0, 101, 4.5, '12'])('rejects card %s', (card) => {
    expect(() => parseClientMessage(JSON.stringify({ type: 'play-card', card }))).toThrow(/^Invalid message: card: /);
  });

  it.each([1, 5])('rejects capacity %i', (capacity) => {
    expect(() => parseClientMessage(JSON.stringify({ type: 'create-room', name: 'Den', capacity }))).toThrow(
      /^Invalid message: capacity: /,
    );
  });

  it('rejects blank and overlong display names', () => {
    const join = (playerName: string) => JSON.stringify({ type: 'join-room', roomId: 'ABC234', playerName });
    expect(() => parseClientMessage(join('   '))).toThrow(/playerName/);
    expect(() => parseClientMessage(join('x'.repeat(21)))).toThrow(/playerName/);
  });

  it('tags every rejection as an invalid message', () => {
    try {
      parseClientMessage('[]');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ code: 'invalid_message' });
    }
  });
});
