/**
 * Connection liveness and room eviction.
 *
 * A dropped connection only marks its seat disconnected. When the last seat
 * of a room detaches, the room is scheduled for eviction under the active
 * `EvictionPolicy`; any reattach or join before the timer fires cancels it.
 * Heartbeats ping every tracked socket and terminate the ones that stayed
 * silent since the previous ping.
 */

import type { Room } from './types.js';
import type { RoomCoordinator } from './room-coordinator.js';
import { allPlayersDisconnected } from './room.js';
import { log } from '../logger.js';

export interface EvictionPolicy {
  /** Delay between the last detach and the eviction check. */
  gracePeriodMs: number;
  shouldEvict(room: Room, now: number): boolean;
}

/**
 * Evict a room once nobody has been attached for `gracePeriodMs`.
 */
export function gracePeriodEviction(gracePeriodMs: number): EvictionPolicy {
  return {
    gracePeriodMs,
    shouldEvict(room, now) {
      return allPlayersDisconnected(room)
        && room.emptySince !== null
        && now - room.emptySince >= gracePeriodMs;
    },
  };
}

export const neverEvict: EvictionPolicy = {
  gracePeriodMs: 0,
  shouldEvict: () => false,
};

/** The parts of a `ws` socket the heartbeat needs. */
export interface LivenessSocket {
  ping(): void;
  terminate(): void;
  on(event: 'pong', listener: () => void): unknown;
}

export interface LifecycleOptions {
  policy: EvictionPolicy;
  /** Ping interval in ms. 0 = no heartbeat. */
  heartbeatIntervalMs: number;
}

export class LifecycleManager {
  private readonly evictionTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly alive = new Map<LivenessSocket, boolean>();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly coordinator: RoomCoordinator,
    private readonly options: LifecycleOptions,
  ) {}

  start(): void {
    if (this.options.heartbeatIntervalMs > 0 && !this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => this.heartbeat(), this.options.heartbeatIntervalMs);
    }
  }

  stop(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    for (const timer of this.evictionTimers.values()) {
      clearTimeout(timer);
    }
    this.evictionTimers.clear();
    this.alive.clear();
  }

  // -- Liveness --

  track(socket: LivenessSocket): void {
    this.alive.set(socket, true);
    socket.on('pong', () => {
      if (this.alive.has(socket)) this.alive.set(socket, true);
    });
  }

  untrack(socket: LivenessSocket): void {
    this.alive.delete(socket);
  }

  /** Number of sockets the heartbeat is watching. */
  get trackedSockets(): number {
    return this.alive.size;
  }

  /**
   * Terminate sockets that missed the last ping, then ping the rest.
   * Termination fires the socket's close handler, which detaches its seat.
   */
  heartbeat(): void {
    for (const [socket, isAlive] of this.alive) {
      if (!isAlive) {
        this.alive.delete(socket);
        log.lifecycle.info('terminating unresponsive connection');
        socket.terminate();
        continue;
      }
      this.alive.set(socket, false);
      socket.ping();
    }
  }

  // -- Eviction --

  scheduleEviction(roomId: string): void {
    const { gracePeriodMs } = this.options.policy;
    if (gracePeriodMs <= 0) return;

    this.cancelEviction(roomId);
    const timer = setTimeout(() => {
      this.evictionTimers.delete(roomId);
      this.evictIfIdle(roomId)
        .then((evicted) => {
          // Policy declined but the room is still empty: check again later.
          const room = this.coordinator.getRoom(roomId);
          if (!evicted && room && allPlayersDisconnected(room)) {
            this.scheduleEviction(roomId);
          }
        })
        .catch((err: unknown) => {
          log.lifecycle.error({ err, roomId }, 'eviction failed');
        });
    }, gracePeriodMs);
    this.evictionTimers.set(roomId, timer);
  }

  cancelEviction(roomId: string): void {
    const timer = this.evictionTimers.get(roomId);
    if (timer) {
      clearTimeout(timer);
      this.evictionTimers.delete(roomId);
    }
  }

  hasPendingEviction(roomId: string): boolean {
    return this.evictionTimers.has(roomId);
  }

  /**
   * Close the room if the policy still wants it gone once the room's queue
   * reaches this check.
   */
  async evictIfIdle(roomId: string, now: () => number = Date.now): Promise<boolean> {
    const evicted = await this.coordinator.closeRoomIf(roomId, room =>
      this.options.policy.shouldEvict(room, now()),
    );
    if (evicted) log.lifecycle.info({ roomId }, 'room evicted');
    return evicted;
  }
}
