import type {
  ComplexResource,
  ExplorerDeathCause,
  ExplorerId,
  PlanetId,
  RejectionReason,
} from './models';

// ── Event Definitions ────────────────────────────────────────────

/** A planet's energy store hit zero and it left the galaxy. */
export interface PlanetDestroyedEvent {
  type: 'planet_destroyed';
  tick: number;
  planetId: PlanetId;
  wasCritical: boolean;
  connected: boolean; // topology state after removal
}

export interface ExplorerDiedEvent {
  type: 'explorer_died';
  tick: number;
  explorerId: ExplorerId;
  cause: ExplorerDeathCause;
}

/** An adaptive explorer gave up on its target. */
export interface TargetSwitchedEvent {
  type: 'target_switched';
  tick: number;
  explorerId: ExplorerId;
  from: ComplexResource;
  to: ComplexResource;
  reason: RejectionReason;
}

export interface TargetProducedEvent {
  type: 'target_produced';
  tick: number;
  explorerId: ExplorerId;
  target: ComplexResource;
  count: number; // units of this target produced so far
}

/** A held rocket absorbed an asteroid. */
export interface AsteroidDeflectedEvent {
  type: 'asteroid_deflected';
  tick: number;
  planetId: PlanetId;
}

export interface TickCompletedEvent {
  type: 'tick_completed';
  tick: number;
  livePlanets: number;
  liveExplorers: number;
}

/**
 * Discriminated union of all simulation events.
 *
 * Add new event interfaces above, then include them in this union.
 * The bus emits synchronously from the orchestrator's tick.
 */
export type SimEvent =
  | PlanetDestroyedEvent
  | ExplorerDiedEvent
  | TargetSwitchedEvent
  | TargetProducedEvent
  | AsteroidDeflectedEvent
  | TickCompletedEvent;

// ── Event Bus ────────────────────────────────────────────────────

/**
 * Map from event type string to the concrete event interface.
 * Enables type-safe handlers: `on('planet_destroyed', (e) => e.planetId)`.
 */
export type SimEventMap = {
  [E in SimEvent as E['type']]: E;
};

type EventHandler<T extends SimEvent = SimEvent> = (event: T) => void;

export interface EventBus {
  /** Subscribe to one event type. Returns an unsubscribe function. */
  on<K extends keyof SimEventMap>(
    eventType: K,
    handler: EventHandler<SimEventMap[K]>
  ): () => void;
  /** Call every handler for the event, in registration order. */
  emit(event: SimEvent): void;
  clearAllListeners(): void;
}

export function createEventBus(): EventBus {
  let handlers: Record<string, EventHandler[]> = {};

  return {
    on(eventType, handler) {
      if (!handlers[eventType]) {
        handlers[eventType] = [];
      }
      const list = handlers[eventType];
      // Safe cast: handlers are always called with the matching event type via emit()
      list.push(handler as EventHandler);

      return () => {
        const idx = list.indexOf(handler as EventHandler);
        if (idx !== -1) list.splice(idx, 1);
      };
    },

    emit(event) {
      const list = handlers[event.type];
      if (!list || list.length === 0) return;
      for (const handler of [...list]) {
        handler(event);
      }
    },

    clearAllListeners() {
      handlers = {};
    },
  };
}
