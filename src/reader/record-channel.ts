/**
 * Bounded hand-off between a reader's producer and the consumer
 */

interface PendingSend<T> {
  value: T;
  resolve: (delivered: boolean) => void;
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Asynchronous channel with a fixed capacity.
 *
 * A send on a full channel stays pending until the consumer takes a value,
 * so a producer can never run further ahead than `capacity` records.
 * Once closed, sends resolve to `false` without delivering; values already
 * buffered are still handed to the consumer before it sees the end.
 */
export class RecordChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values not yet received */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Sends a value, waiting while the buffer is full.
   *
   * @returns true once the value is buffered or received, false if the channel closed first
   */
  send(value: T): Promise<boolean> {
    if (this.isClosed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      this.senders.push({ value, resolve });
    });
  }

  /**
   * Receives the next value, waiting while the channel is empty
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.promoteSender();
      return Promise.resolve({ value, done: false });
    }

    // Unbuffered hand-off when a sender is parked and nothing is buffered
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Closes the channel. Safe to call more than once.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }

  private promoteSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.value);
      sender.resolve(true);
    }
  }
}
