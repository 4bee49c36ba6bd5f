export interface Channel<T> extends AsyncIterable<T> {
  /** Resolves once the message is buffered or handed to a waiting receiver. */
  send: (message: T) => Promise<void>;
  close: () => void;
  readonly closed: boolean;
}

/**
 * Bounded many-producer, single-consumer queue. Senders wait while the buffer
 * is full; the consumer drains it with `for await`, which ends after `close()`
 * once buffered messages are delivered.
 */
export const createChannel = <T>(capacity: number): Channel<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: Array<{ message: T }> = [];
  const receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  const senders: Array<() => void> = [];
  let closed = false;

  const send = async (message: T) => {
    while (!closed && buffer.length >= capacity && receivers.length === 0) {
      await new Promise<void>((resolve) => {
        senders.push(resolve);
      });
    }
    if (closed) {
      throw new Error('Cannot send on a closed channel');
    }
    const receiver = receivers.shift();
    if (receiver) {
      receiver({ value: message, done: false });
      return;
    }
    buffer.push({ message });
  };

  const receive = (): Promise<IteratorResult<T, undefined>> => {
    const next = buffer.shift();
    if (next) {
      senders.shift()?.();
      return Promise.resolve({ value: next.message, done: false });
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      receivers.push(resolve);
    });
  };

  const close = () => {
    if (closed) return;
    closed = true;
    receivers.splice(0).forEach((resolve) => resolve({ value: undefined, done: true }));
    senders.splice(0).forEach((wake) => wake());
  };

  return {
    send,
    close,
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator]: () => ({ next: receive }),
  };
};
