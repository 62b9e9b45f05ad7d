import type { Params } from "../ir/jaxpr";

export type WrappedBody = (args: unknown[], params: Params) => unknown[];

/** Wraps the body seen so far; the most recently added transform runs outermost. */
export type FunTransform = (inner: WrappedBody) => WrappedBody;

/** Single-assignment slot for auxiliary output produced during a call. */
export class Store<T> {
  private slot: { value: T } | undefined;

  store(value: T): void {
    if (this.slot) {
      throw new Error("Store already filled: wrapped function called twice");
    }
    this.slot = { value };
  }

  get val(): T {
    if (!this.slot) {
      throw new Error("Store read before the wrapped function was called");
    }
    return this.slot.value;
  }
}

/**
 * A suspended function plus the transforms that will run around it when it is
 * finally called. Used as the leading operand of call primitives.
 */
export class WrappedFun {
  constructor(
    readonly f: WrappedBody,
    readonly transforms: readonly FunTransform[] = [],
    readonly label = f.name || "fun",
  ) {}

  wrap(transform: FunTransform): WrappedFun {
    return new WrappedFun(this.f, [...this.transforms, transform], this.label);
  }

  callWrapped(args: unknown[], params: Params = {}): unknown[] {
    let body = this.f;
    for (const transform of this.transforms) {
      body = transform(body);
    }
    return body(args, params);
  }

  toString(): string {
    return `WrappedFun(${this.label})`;
  }
}

export function wrapInit(f: WrappedBody, label?: string): WrappedFun {
  return new WrappedFun(f, [], label);
}

/**
 * Add a transform that also emits an auxiliary value. The returned thunk
 * yields it after the wrapped function has run exactly once.
 */
export function transformWithAux<A>(
  fun: WrappedFun,
  transform: (inner: WrappedBody, emit: (aux: A) => void) => WrappedBody,
): [WrappedFun, () => A] {
  const store = new Store<A>();
  const wrapped = fun.wrap((inner) => transform(inner, (aux) => store.store(aux)));
  return [wrapped, () => store.val];
}
