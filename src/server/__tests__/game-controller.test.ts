import { describe, it, expect } from 'vitest';
import type { Room, ServerMessage, Connection, StateUpdateMessage } from '../types.js';
import type { ConnectionRegistry } from '../game-controller.js';
import {
  startGame,
  handleGameAction,
  broadcastState,
  handleReconnection,
  handleDisconnection,
} from '../game-controller.js';
import { createRoom, joinRoom, disconnectPlayer } from '../room.js';
import { createRng } from '../../deck.js';

// -- Test Helpers --

interface MockConnection extends Connection {
  messages: ServerMessage[];
}

function createMockRegistry(room: Room): {
  registry: ConnectionRegistry;
  connections: Map<string, MockConnection>;
} {
  const connections = new Map<string, MockConnection>();

  for (const playerId of room.playerIds) {
    connections.set(playerId, {
      playerId,
      roomId: room.id,
      messages: [],
      send(msg: ServerMessage) {
        this.messages.push(msg);
      },
    });
  }

  const registry: ConnectionRegistry = {
    broadcast(room: Room, message: ServerMessage) {
      for (const pid of room.playerIds) {
        if (room.connectedPlayerIds.has(pid)) {
          connections.get(pid)?.messages.push(message);
        }
      }
    },
    sendTo(playerId: string, message: ServerMessage) {
      connections.get(playerId)?.messages.push(message);
    },
  };

  return { registry, connections };
}

function createTestRoom(playerCount: number = 2): Room {
  const room = createRoom('ROOM22', { name: 'Den', capacity: playerCount, rng: createRng(5) });
  for (let i = 0; i < playerCount; i++) {
    joinRoom(room, `player-${i}`, `Player${i}`);
  }
  return room;
}

/** Start the game, then replace the deal with known hands. */
function startWithHands(room: Room, registry: ConnectionRegistry, hands: number[][]): void {
  startGame(room, registry);
  if (!room.gameState) throw new Error('game did not start');
  room.gameState = { ...room.gameState, hands };
}

function getConnection(connections: Map<string, MockConnection>, playerId: string): MockConnection {
  const conn = connections.get(playerId);
  if (!conn) throw new Error(`no connection for ${playerId}`);
  return conn;
}

function getLastMessage(conn: MockConnection): ServerMessage | undefined {
  return conn.messages[conn.messages.length - 1];
}

function getStateUpdates(conn: MockConnection): StateUpdateMessage[] {
  return conn.messages.filter((m): m is StateUpdateMessage => m.type === 'state-update');
}

describe('startGame', () => {
  it('deals level 1 and sends each seat its own view', () => {
    const room = createTestRoom(3);
    const { registry, connections } = createMockRegistry(room);

    startGame(room, registry);

    expect(room.status).toBe('playing');
    expect(room.gameState?.level).toBe(1);
    expect(room.gameState?.status).toBe('in-progress');
    expect(room.lastMessage).toBe('Level 1 started.');

    room.playerIds.forEach((playerId, slot) => {
      const updates = getStateUpdates(getConnection(connections, playerId));
      expect(updates).toHaveLength(1);
      expect(updates[0].message).toBe('Level 1 started.');
      expect(updates[0].state.self.slot).toBe(slot);
      expect(updates[0].state.self.hand).toEqual(room.gameState?.hands[slot]);
      expect(updates[0].state.opponents.map(o => o.handCount)).toEqual([1, 1]);
      expect(updates[0].state.lastEffect).toEqual({ type: 'level-started', level: 1 });
    });
  });
});

describe('handleGameAction', () => {
  it('broadcasts an accepted play to every seat', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startWithHands(room, registry, [[50], [10]]);

    const outcome = handleGameAction(room, 'player-1', { type: 'play-card', card: 10 }, registry);

    expect(outcome.accepted).toBe(true);
    for (const playerId of room.playerIds) {
      const last = getLastMessage(getConnection(connections, playerId));
      expect(last?.type).toBe('state-update');
      if (last?.type !== 'state-update') continue;
      expect(last.message).toBe('Card 10 played.');
      expect(last.state.pile).toEqual([10]);
    }
    expect(room.lastEffect).toEqual({ type: 'card-played', playerIndex: 1, card: 10, levelClear: false });
  });

  it('reports a rejected action to the actor only', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startWithHands(room, registry, [[50], [10]]);
    const before = room.gameState;
    const otherCount = getConnection(connections, 'player-1').messages.length;

    const outcome = handleGameAction(room, 'player-0', { type: 'play-card', card: 10 }, registry);

    expect(outcome.accepted).toBe(false);
    if (!outcome.accepted) expect(outcome.error.code).toBe('invalid_move');
    expect(getLastMessage(getConnection(connections, 'player-0'))).toEqual({
      type: 'error',
      code: 'invalid_move',
      message: 'Player 0 does not have card 10',
    });
    expect(getConnection(connections, 'player-1').messages).toHaveLength(otherCount);
    expect(room.gameState).toBe(before);
  });

  it('rejects actions before the game starts', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);

    const outcome = handleGameAction(room, 'player-0', { type: 'use-star' }, registry);

    expect(outcome.accepted).toBe(false);
    expect(getLastMessage(getConnection(connections, 'player-0'))).toMatchObject({
      type: 'error',
      code: 'game_not_started',
    });
  });

  it('rejects players without a seat', () => {
    const room = createTestRoom(2);
    const { registry } = createMockRegistry(room);
    startGame(room, registry);

    const outcome = handleGameAction(room, 'intruder', { type: 'use-star' }, registry);
    expect(outcome.accepted).toBe(false);
    if (!outcome.accepted) expect(outcome.error.code).toBe('player_not_found');
  });

  it('finishes the room when the last life is lost', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startWithHands(room, registry, [[30], [5, 50]]);
    if (room.gameState) room.gameState = { ...room.gameState, lives: 1 };

    const outcome = handleGameAction(room, 'player-0', { type: 'play-card', card: 30 }, registry);

    expect(outcome.accepted).toBe(true);
    expect(room.status).toBe('finished');
    expect(room.gameState?.status).toBe('lost');

    handleGameAction(room, 'player-1', { type: 'play-card', card: 50 }, registry);
    expect(getLastMessage(getConnection(connections, 'player-1'))).toEqual({
      type: 'error',
      code: 'game_over',
      message: 'Game already lost',
    });
  });

  it('advances to the next level once cleared', () => {
    const room = createTestRoom(2);
    const { registry } = createMockRegistry(room);
    startWithHands(room, registry, [[50], [10]]);
    handleGameAction(room, 'player-1', { type: 'play-card', card: 10 }, registry);
    handleGameAction(room, 'player-0', { type: 'play-card', card: 50 }, registry);
    expect(room.gameState?.status).toBe('level-clear');

    const outcome = handleGameAction(room, 'player-0', { type: 'advance-level' }, registry);

    expect(outcome.accepted).toBe(true);
    expect(room.gameState?.level).toBe(2);
    expect(room.gameState?.hands.map(h => h.length)).toEqual([2, 2]);
    expect(room.lastMessage).toBe('Level 2 started.');
  });

  it('wraps unexpected failures as internal errors', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startWithHands(room, registry, [[], []]);
    if (room.gameState) room.gameState = { ...room.gameState, status: 'level-clear' };
    room.rng = () => {
      throw new Error('rng exhausted');
    };

    const outcome = handleGameAction(room, 'player-0', { type: 'advance-level' }, registry);

    expect(outcome.accepted).toBe(false);
    expect(getLastMessage(getConnection(connections, 'player-0'))).toEqual({
      type: 'error',
      code: 'internal_error',
      message: 'rng exhausted',
    });
  });
});

describe('broadcastState', () => {
  it('skips disconnected seats', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startGame(room, registry);
    disconnectPlayer(room, 'player-1');

    broadcastState(room, registry);

    expect(getStateUpdates(getConnection(connections, 'player-0'))).toHaveLength(2);
    expect(getStateUpdates(getConnection(connections, 'player-1'))).toHaveLength(1);
  });
});

describe('connection changes', () => {
  it('resends the full state on reconnection, then tells the room', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startWithHands(room, registry, [[50], [10]]);
    const conn = getConnection(connections, 'player-1');
    conn.messages = [];

    handleReconnection(room, 'player-1', registry);

    expect(conn.messages).toHaveLength(2);
    expect(conn.messages[0].type).toBe('state-update');
    if (conn.messages[0].type === 'state-update') {
      expect(conn.messages[0].state.self.hand).toEqual([10]);
    }
    expect(conn.messages[1]).toEqual({ type: 'player-reconnected', playerSlot: 1 });
    expect(getLastMessage(getConnection(connections, 'player-0'))).toEqual({
      type: 'player-reconnected',
      playerSlot: 1,
    });
  });

  it('announces a disconnection to the remaining seats', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    startGame(room, registry);
    disconnectPlayer(room, 'player-0');

    handleDisconnection(room, 'player-0', registry);

    expect(getLastMessage(getConnection(connections, 'player-1'))).toEqual({
      type: 'player-disconnected',
      playerSlot: 0,
    });
    expect(getLastMessage(getConnection(connections, 'player-0'))?.type).toBe('state-update');
  });

  it('ignores players without a seat', () => {
    const room = createTestRoom(2);
    const { registry, connections } = createMockRegistry(room);
    handleReconnection(room, 'ghost', registry);
    handleDisconnection(room, 'ghost', registry);
    expect(getConnection(connections, 'player-0').messages).toEqual([]);
  });
});
