/**
 * Bounded Mailbox
 *
 * FIFO channel between actors. Capacity is fixed: `send` waits while the
 * queue is full (backpressure). A closed mailbox accepts nothing more and
 * hands back whatever was still undelivered so the owner can answer it.
 */

export interface Mailbox<T> {
  readonly capacity: number;
  /** Resolves true once queued, false if the mailbox is (or becomes) closed first. */
  send(item: T): Promise<boolean>;
  /** Next item in arrival order; undefined once closed and drained. */
  receive(): Promise<T | undefined>;
  /** Stop accepting items and return everything not yet received. */
  close(): T[];
  isClosed(): boolean;
  size(): number;
}

interface BlockedSender<T> {
  item: T;
  resolve: (queued: boolean) => void;
}

export function createMailbox<T>(capacity: number): Mailbox<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Mailbox capacity must be a positive integer: ${capacity}`);
  }

  const queue: T[] = [];
  const receivers: Array<(item: T | undefined) => void> = [];
  const blocked: Array<BlockedSender<T>> = [];
  let closed = false;

  function deliver(item: T): boolean {
    const receiver = receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }
    if (queue.length < capacity) {
      queue.push(item);
      return true;
    }
    return false;
  }

  return {
    capacity,

    send(item) {
      if (closed) return Promise.resolve(false);
      if (deliver(item)) return Promise.resolve(true);
      return new Promise<boolean>((resolve) => {
        blocked.push({ item, resolve });
      });
    },

    receive() {
      const item = queue.shift();
      if (item !== undefined) {
        // A slot freed up: admit the longest-waiting sender
        const waiting = blocked.shift();
        if (waiting) {
          queue.push(waiting.item);
          waiting.resolve(true);
        }
        return Promise.resolve(item);
      }
      if (closed) return Promise.resolve(undefined);
      return new Promise<T | undefined>((resolve) => {
        receivers.push(resolve);
      });
    },

    close() {
      if (closed) return [];
      closed = true;
      for (const receiver of receivers.splice(0)) receiver(undefined);
      const undelivered = queue.splice(0);
      // Blocked senders count as delivered: the owner answers their items
      for (const waiting of blocked.splice(0)) {
        undelivered.push(waiting.item);
        waiting.resolve(true);
      }
      return undelivered;
    },

    isClosed() {
      return closed;
    },

    size() {
      return queue.length;
    },
  };
}
