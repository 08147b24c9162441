export class ChannelClosedError extends Error {
  constructor() {
    super('cannot publish to a closed progress channel');
    this.name = 'ChannelClosedError';
  }
}

export class ProgressBroadcaster<E> {
  private readonly history: E[] = [];
  private readonly subscribers = new Set<Subscription<E>>();
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get events(): readonly E[] {
    return this.history;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  publish(event: E): void {
    if (this.closed) throw new ChannelClosedError();
    this.history.push(event);
    for (const subscriber of this.subscribers) subscriber.push(event);
  }

  // false when already closed
  close(terminal: E): boolean {
    if (this.closed) return false;
    this.history.push(terminal);
    this.closed = true;
    for (const subscriber of this.subscribers) {
      subscriber.push(terminal);
      subscriber.end();
    }
    this.subscribers.clear();
    return true;
  }

  subscribe(): AsyncIterableIterator<E> {
    const subscription: Subscription<E> = new Subscription(this.history, this.closed, () => {
      this.subscribers.delete(subscription);
    });
    if (!this.closed) this.subscribers.add(subscription);
    return subscription;
  }
}

class Subscription<E> implements AsyncIterableIterator<E> {
  private readonly queue: E[];
  private readonly waiting: Array<(result: IteratorResult<E>) => void> = [];
  private ended: boolean;
  private detached = false;

  constructor(replay: readonly E[], ended: boolean, private readonly onDetach: () => void) {
    this.queue = [...replay];
    this.ended = ended;
  }

  push(event: E): void {
    if (this.detached) return;
    const resolve = this.waiting.shift();
    if (resolve) {
      resolve({ value: event, done: false });
      return;
    }
    this.queue.push(event);
  }

  end(): void {
    this.ended = true;
    if (this.queue.length > 0) return;
    for (const resolve of this.waiting.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<E>> {
    if (this.queue.length > 0) {
      const event = this.queue.shift();
      if (event !== undefined) return Promise.resolve({ value: event, done: false });
    }
    if (this.ended || this.detached) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  // Detaches this subscriber only.
  return(): Promise<IteratorResult<E>> {
    if (!this.detached) {
      this.detached = true;
      this.queue.length = 0;
      this.onDetach();
      this.end();
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<E> {
    return this;
  }
}
