import type { ClaimSet } from './codec.js';

export interface AuthenticationContext {
  /** Principal identifier taken from the `sub` / `subject` claim. */
  readonly subject: string;
  /** Authorities resolved from the configured claim paths; empty when none. */
  readonly authorities: ReadonlySet<string>;
  /** Token issue timestamp when available. */
  readonly issuedAt?: Date;
  readonly expiresAt: Date;
  /** Full decoded payload for downstream checks. */
  readonly claims: Readonly<ClaimSet>;
}

/** Read-only view over a copy of the resolved authorities. */
export class AuthoritySet implements ReadonlySet<string> {
  readonly #values: Set<string>;

  constructor(values: Iterable<string>) {
    this.#values = new Set(values);
    Object.freeze(this);
  }

  get size(): number {
    return this.#values.size;
  }

  has(value: string): boolean {
    return this.#values.has(value);
  }

  forEach(callback: (value: string, key: string, set: ReadonlySet<string>) => void, thisArg?: unknown): void {
    this.#values.forEach((value) => callback.call(thisArg, value, value, this));
  }

  entries() {
    return this.#values.entries();
  }

  keys() {
    return this.#values.keys();
  }

  values() {
    return this.#values.values();
  }

  [Symbol.iterator]() {
    return this.#values[Symbol.iterator]();
  }
}
