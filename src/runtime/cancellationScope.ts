export type ScopeState = 'active' | 'cancelling' | 'completed';

export type ScopeParent = CancellationScope | AbortSignal;

export class CancellationError extends Error {
  code: string;

  constructor(message = 'Scope was cancelled', code = 'SCOPE_CANCELLED') {
    super(message);
    this.name = 'CancellationError';
    this.code = code;
  }
}

export interface CancellationScopeOptions {
  parent?: ScopeParent;
  name?: string;
}

/**
 * A cancellation context for cooperatively cancelled work. Cancelling a scope
 * aborts its `signal` with the cause and cancels every live child; work sees
 * the cause at its next suspension point (`ensureActive`, `guard`, `delay`).
 */
export class CancellationScope {
  readonly name: string;
  #controller = new AbortController();
  #state: ScopeState = 'active';
  #cause: unknown = undefined;
  #children = new Set<CancellationScope>();
  #unlinkParent: (() => void) | null = null;

  constructor(options: CancellationScopeOptions = {}) {
    this.name = options.name ?? 'scope';
    if (options.parent) {
      this.#link(options.parent);
    }
  }

  get state(): ScopeState {
    return this.#state;
  }

  get isActive(): boolean {
    return this.#state === 'active';
  }

  /** The error this scope was cancelled with, if any. */
  get cause(): unknown {
    return this.#cause;
  }

  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  cancel(cause: unknown = new CancellationError()): boolean {
    if (this.#state !== 'active') {
      return false;
    }
    this.#state = 'cancelling';
    this.#cause = cause;
    this.#controller.abort(cause);
    for (const child of [...this.#children]) {
      child.cancel(cause);
    }
    return true;
  }

  complete(): void {
    if (this.#state === 'completed') {
      return;
    }
    this.#state = 'completed';
    this.#unlinkParent?.();
    this.#unlinkParent = null;
  }

  child(name?: string): CancellationScope {
    return new CancellationScope({ parent: this, name });
  }

  ensureActive(): void {
    if (this.#state === 'cancelling') {
      throw this.#cause;
    }
  }

  /** Settles like `promise`, or rejects with the cause as soon as the scope is cancelled. */
  guard<T>(promise: PromiseLike<T>): Promise<T> {
    if (this.#state === 'cancelling') {
      return Promise.reject(this.#cause);
    }
    const { signal } = this;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      Promise.resolve(promise).then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /** Sleeps for `ms`, rejecting with the cause if the scope is cancelled first. */
  delay(ms: number): Promise<void> {
    if (this.#state === 'cancelling') {
      return Promise.reject(this.#cause);
    }
    const { signal } = this;
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal.reason);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  toString(): string {
    return `${this.name}{${this.#state}}`;
  }

  #link(parent: ScopeParent): void {
    if (parent instanceof CancellationScope) {
      const owner: CancellationScope = parent;
      if (owner.state === 'cancelling') {
        this.cancel(owner.cause);
        return;
      }
      if (owner.state === 'completed') {
        return;
      }
      owner.#children.add(this);
      this.#unlinkParent = () => {
        owner.#children.delete(this);
      };
      return;
    }

    const signal: AbortSignal = parent;
    const propagateAbort = () => {
      this.cancel(signal.reason);
    };
    if (signal.aborted) {
      propagateAbort();
      return;
    }
    signal.addEventListener('abort', propagateAbort, { once: true });
    this.#unlinkParent = () => {
      signal.removeEventListener('abort', propagateAbort);
    };
  }
}
