/**
 * Fixed-size pool of stateful sessions. A session is held by one caller at a
 * time and always goes back to the pool when the callback settles.
 */
export class SessionPool<T> {
  private readonly idle: T[];
  private readonly waiters: ((session: T) => void)[] = [];

  constructor(sessions: T[]) {
    if (sessions.length === 0) {
      throw new Error("SessionPool needs at least one session");
    }
    this.idle = [...sessions];
  }

  get available(): number {
    return this.idle.length;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<T> {
    const session = this.idle.pop();
    if (session !== undefined) return Promise.resolve(session);
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  private release(session: T): void {
    const next = this.waiters.shift();
    if (next) {
      next(session);
    } else {
      this.idle.push(session);
    }
  }

  async withSession<R>(fn: (session: T) => Promise<R>): Promise<R> {
    const session = await this.acquire();
    try {
      return await fn(session);
    } finally {
      this.release(session);
    }
  }
}
