/**
 * Context — the key-value facts a tree is evaluated against.
 *
 * A fresh context is supplied for every evaluation call. Predicates read it;
 * outcome actions may write to it. Nodes never hold on to one.
 */

export class Context {
  private values: Map<string, unknown>;

  constructor(initial?: Record<string, unknown>) {
    this.values = new Map();
    if (initial) {
      this.applyUpdates(initial);
    }
  }

  /** Wrap a plain record, or return an existing Context unchanged. */
  static from(source: Context | Record<string, unknown>): Context {
    if (source instanceof Context) return source;
    return new Context(source);
  }

  /** Set a value in the context. */
  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  /** Get a value from the context with optional default. */
  get<T = unknown>(key: string, defaultValue?: T): T | undefined {
    if (this.values.has(key)) {
      return this.values.get(key) as T;
    }
    return defaultValue;
  }

  /**
   * Get a numeric value. Missing keys and values of any other type
   * (including numeric strings) yield the default.
   */
  getNumber(key: string, defaultValue: number = 0): number {
    const value = this.values.get(key);
    return typeof value === "number" ? value : defaultValue;
  }

  /** Get a boolean value; anything that is not a boolean yields the default. */
  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.values.get(key);
    return typeof value === "boolean" ? value : defaultValue;
  }

  /** Get a string value with a default. */
  getString(key: string, defaultValue: string = ""): string {
    const value = this.values.get(key);
    if (value === undefined || value === null) return defaultValue;
    return String(value);
  }

  /**
   * Returns a serializable shallow copy of all values.
   */
  snapshot(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of this.values) {
      result[key] = value;
    }
    return result;
  }

  /** Shallow copy; values are shared, keys are not. */
  clone(): Context {
    const ctx = new Context();
    for (const [key, value] of this.values) {
      ctx.values.set(key, value);
    }
    return ctx;
  }

  /**
   * Make `target` mirror this context: every key is written and keys
   * absent from the context are removed.
   */
  copyTo(target: Record<string, unknown>): void {
    for (const key of Object.keys(target)) {
      if (!this.values.has(key)) {
        delete target[key];
      }
    }
    for (const [key, value] of this.values) {
      target[key] = value;
    }
  }

  /**
   * Merge a dictionary of updates into the context.
   */
  applyUpdates(updates: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(updates)) {
      this.values.set(key, value);
    }
  }

  /** Check if a key exists. */
  has(key: string): boolean {
    return this.values.has(key);
  }

  /** Delete a key. */
  delete(key: string): boolean {
    return this.values.delete(key);
  }

  /** Get the number of entries. */
  get size(): number {
    return this.values.size;
  }
}
