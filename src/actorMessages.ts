import type {
  ExplorerReplyMap,
  ExplorerRequestMap,
  ExplorerRequestType,
  PlanetReplyMap,
  PlanetRequestMap,
  PlanetRequestType,
  RejectionReason,
} from './models';
import type { Mailbox } from './mailbox';
import { reject } from './simErrors';
import { delay } from './utils';

/**
 * Request/reply envelopes for the actor mailboxes.
 *
 * Every request travels with its own reply callback, typed to the request
 * kind, so a handler that switches on `type` can only answer with the
 * matching reply shape.
 */

type PlanetEnvelopeMap = {
  [K in PlanetRequestType]: {
    type: K;
    request: PlanetRequestMap[K];
    reply: (reply: PlanetReplyMap[K]) => void;
  };
};

export type PlanetEnvelope = PlanetEnvelopeMap[PlanetRequestType];

type ExplorerEnvelopeMap = {
  [K in ExplorerRequestType]: {
    type: K;
    request: ExplorerRequestMap[K];
    reply: (reply: ExplorerReplyMap[K]) => void;
  };
};

export type ExplorerEnvelope = ExplorerEnvelopeMap[ExplorerRequestType];

/** Send a request to a planet and wait for its reply. */
export function askPlanet<K extends PlanetRequestType>(
  mailbox: Mailbox<PlanetEnvelope>,
  type: K,
  request: PlanetRequestMap[K]
): Promise<PlanetReplyMap[K]> {
  return new Promise((resolve) => {
    const envelope: PlanetEnvelopeMap[K] = { type, request, reply: resolve };
    mailbox.send(envelope).then(
      (queued) => {
        if (!queued) {
          rejectPlanetEnvelope(envelope, 'PlanetUnavailable', 'planet has stopped');
        }
      },
      (err: unknown) => {
        rejectPlanetEnvelope(envelope, 'PlanetUnavailable', String(err));
      }
    );
  });
}

/** Send a request to an explorer and wait for its reply. */
export function askExplorer<K extends ExplorerRequestType>(
  mailbox: Mailbox<ExplorerEnvelope>,
  type: K,
  request: ExplorerRequestMap[K]
): Promise<ExplorerReplyMap[K]> {
  return new Promise((resolve) => {
    const envelope: ExplorerEnvelopeMap[K] = { type, request, reply: resolve };
    mailbox.send(envelope).then(
      (queued) => {
        if (!queued) {
          rejectExplorerEnvelope(envelope, 'ExplorerDead', 'explorer has stopped');
        }
      },
      (err: unknown) => {
        rejectExplorerEnvelope(envelope, 'ExplorerDead', String(err));
      }
    );
  });
}

/**
 * Answer a planet request with a rejection. Combination inputs that came
 * from the requester are handed back.
 */
export function rejectPlanetEnvelope(
  envelope: PlanetEnvelope,
  error: RejectionReason,
  message: string
): void {
  const rejection = reject(error, message);
  switch (envelope.type) {
    case 'request_combine': {
      const { a, b, source } = envelope.request;
      envelope.reply({
        ...rejection,
        returned: source === 'explorer' ? [a, b] : [],
      });
      return;
    }
    case 'generate_resource':
      envelope.reply(rejection);
      return;
    case 'request_rocket':
      envelope.reply(rejection);
      return;
    case 'explorer_harvest':
      envelope.reply(rejection);
      return;
    case 'sunray_arrival':
      envelope.reply(rejection);
      return;
    case 'asteroid_arrival':
      envelope.reply(rejection);
      return;
    case 'query_state':
      envelope.reply(rejection);
      return;
    case 'stop':
      envelope.reply(rejection);
      return;
  }
}

export function rejectExplorerEnvelope(
  envelope: ExplorerEnvelope,
  error: RejectionReason,
  message: string
): void {
  const rejection = reject(error, message);
  switch (envelope.type) {
    case 'tick':
      envelope.reply(rejection);
      return;
    case 'query_state':
      envelope.reply(rejection);
      return;
    case 'planet_destroyed':
      envelope.reply(rejection);
      return;
    case 'galaxy_map':
      envelope.reply(rejection);
      return;
    case 'configure':
      envelope.reply(rejection);
      return;
    case 'reset':
      envelope.reply(rejection);
      return;
    case 'kill':
      envelope.reply(rejection);
      return;
    case 'stop':
      envelope.reply(rejection);
      return;
  }
}

/**
 * Wait for a reply for at most `timeoutMs`. Resolves undefined on timeout;
 * the timer is always cleared.
 */
export async function withTimeout<T>(
  pending: Promise<T>,
  timeoutMs: number
): Promise<T | undefined> {
  const timer = delay(timeoutMs);
  try {
    return await Promise.race([pending, timer.promise.then(() => undefined)]);
  } finally {
    timer.cancel();
  }
}
