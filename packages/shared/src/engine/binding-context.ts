// ─── Binding Context ───────────────────────────────────────────────
// The mutable name → value map of a single evaluation. Caller inputs
// seed it; `let` declarations and assignments write into it.

/** Variable bindings as supplied by callers. */
export type Bindings = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

function isBindingMap(bindings: Bindings): bindings is ReadonlyMap<string, number> {
  return bindings instanceof Map;
}

/** The `[name, value]` pairs of either binding shape. */
export function bindingEntries(bindings: Bindings): Iterable<readonly [string, number]> {
  return isBindingMap(bindings) ? bindings.entries() : Object.entries(bindings);
}

/**
 * Owned scratch storage for one evaluation.
 * The caller's bindings are copied in, never written back.
 */
export class BindingContext {
  private readonly values = new Map<string, number>();

  constructor(bindings?: Bindings) {
    if (bindings) this.assign(bindings);
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: number): void {
    this.values.set(name, value);
  }

  /** Copies every binding in, overwriting existing names. */
  assign(bindings: Bindings): this {
    for (const [name, value] of bindingEntries(bindings)) {
      this.values.set(name, value);
    }
    return this;
  }

  /** Drops every binding, then seeds the context with `bindings`. */
  reset(bindings?: Bindings): this {
    this.values.clear();
    if (bindings) this.assign(bindings);
    return this;
  }

  get size(): number {
    return this.values.size;
  }

  /** A detached copy of the current bindings. */
  snapshot(): ReadonlyMap<string, number> {
    return new Map(this.values);
  }
}
