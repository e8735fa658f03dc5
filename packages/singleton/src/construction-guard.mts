import { IllegalConstructionError } from "./errors.mjs";

/**
 * Proof that a constructor is being called from its guard's `authorize`.
 * Only tokens issued by a guard are accepted; anything else, including a
 * hand-made `ConstructionToken`, is rejected at runtime.
 */
export class ConstructionToken {
  constructor(readonly typeName: string) {}
}

export interface ConstructionGuardOptions {
  /**
   * How many instances `authorize` may produce. Defaults to 1.
   * Types whose holders are injectable pass `Infinity` and rely on each
   * holder constructing once.
   */
  limit?: number;
}

/**
 * Rejects construction of a type outside its holder's factory.
 *
 * @example
 * ```ts
 * const guard = new ConstructionGuard("Registry");
 *
 * class Registry {
 *   private constructor(token: ConstructionToken) {
 *     guard.redeem(token);
 *   }
 *
 *   static readonly holder = new SingletonHolder(() =>
 *     guard.authorize((token) => new Registry(token)),
 *   );
 * }
 * ```
 */
export class ConstructionGuard {
  private readonly issued = new WeakSet<ConstructionToken>();
  private readonly redeemed = new WeakSet<ConstructionToken>();
  private readonly limit: number;
  private count = 0;

  constructor(
    readonly typeName: string,
    options: ConstructionGuardOptions = {},
  ) {
    this.limit = options.limit ?? 1;
  }

  /** Instances successfully built through `authorize` */
  get constructed(): number {
    return this.count;
  }

  /**
   * Issues a single-use token and passes it to `build`, which must call the
   * guarded constructor synchronously. The token is revoked when `build`
   * returns or throws; only a successful `build` counts towards the limit.
   */
  authorize<T>(build: (token: ConstructionToken) => T): T {
    if (this.count >= this.limit) {
      throw new IllegalConstructionError(this.typeName, "limit-reached");
    }

    const token = new ConstructionToken(this.typeName);
    this.issued.add(token);
    try {
      const instance = build(token);
      this.count++;
      return instance;
    } finally {
      this.issued.delete(token);
    }
  }

  /**
   * Called first thing in the guarded constructor.
   */
  redeem(token: unknown): void {
    if (!(token instanceof ConstructionToken)) {
      throw new IllegalConstructionError(this.typeName, "external");
    }
    if (this.redeemed.has(token)) {
      throw new IllegalConstructionError(this.typeName, "token-reused");
    }
    if (!this.issued.has(token)) {
      throw new IllegalConstructionError(this.typeName, "external");
    }
    this.redeemed.add(token);
  }
}
