/**
 * Request, notification and stream types shared by the tests.
 */

import {
  Command,
  Notification,
  Request,
  StreamRequest,
  type CacheableRequest,
  type CachePriority,
} from '../../src/dispatch/types.js';

export class Echo extends Request<string> {
  constructor(readonly text: string) {
    super();
  }
}

export class Add extends Request<number> {
  constructor(readonly a: number, readonly b: number) {
    super();
  }
}

export class Ping extends Command {
  constructor(readonly target: string) {
    super();
  }
}

export class GetValue extends Request<string> implements CacheableRequest {
  readonly cacheExpirationMs = 5 * 60_000;

  constructor(readonly key: string, readonly cachePriority?: CachePriority) {
    super();
  }

  get cacheKey(): string {
    return this.key;
  }
}

/** Same declared cache key as GetValue, different type. */
export class GetLabel extends Request<string> implements CacheableRequest {
  readonly cacheExpirationMs = 60_000;

  constructor(readonly cacheKey: string) {
    super();
  }
}

export class CreateUser extends Request<number> {
  constructor(readonly name: string, readonly email: string) {
    super();
  }
}

export class CountTo extends StreamRequest<number> {
  constructor(readonly limit: number) {
    super();
  }
}

export class Ticks extends StreamRequest<number> {}

export class UserCreated extends Notification {
  constructor(readonly userId: number) {
    super();
  }
}

/** A promise whose settlement the test controls. */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending microtasks and one macrotask turn run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
