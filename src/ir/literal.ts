import { type Constructor, typeKeyOf } from "../core/abstract-value";

type Surrogate = (val: unknown) => readonly [unknown, string] | undefined;

const literalableTypes = new Map<unknown, Surrogate>();

/**
 * Mark instances of `ctor` as embeddable by value. `surrogate` maps an
 * instance to a stable `(payload, tag)` pair used for equality and hashing.
 */
export function registerLiteralable<T>(
  ctor: Constructor<T>,
  surrogate: (val: T) => readonly [unknown, string],
): void {
  literalableTypes.set(ctor, (val) => (val instanceof ctor ? surrogate(val) : undefined));
}

export function isLiteralable(val: unknown): boolean {
  return literalableTypes.has(typeKeyOf(val));
}

function isByValue(val: unknown): boolean {
  return (typeof val !== "object" && typeof val !== "function") || val === null;
}

function surrogateOf(val: unknown): readonly [unknown, string] | undefined {
  const surrogate = literalableTypes.get(typeKeyOf(val));
  if (!surrogate) return undefined;
  try {
    return surrogate(val);
  } catch (err) {
    // A surrogate that cannot describe this instance leaves it unhashable.
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

/** Only by-value payloads give a key; anything else compares by identity. */
function literalKey(val: unknown): string | undefined {
  if (isByValue(val)) {
    return `${typeof val}:${String(val)}`;
  }
  const pair = surrogateOf(val);
  if (!pair) return undefined;
  const [payload, tag] = pair;
  if (!isByValue(payload)) return undefined;
  return `${tag}:${typeof payload}:${String(payload)}`;
}

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

const identityIds = new WeakMap<object, number>();
let nextIdentityId = 1;

function identityHash(val: object): number {
  let id = identityIds.get(val);
  if (id === undefined) {
    id = nextIdentityId++;
    identityIds.set(val, id);
  }
  return id;
}

/** A constant embedded directly in a graph in place of a variable. */
export class Literal {
  readonly hashKey: string | undefined;

  constructor(readonly val: unknown) {
    this.hashKey = literalKey(val);
  }

  get hashable(): boolean {
    return this.hashKey !== undefined;
  }

  hashCode(): number {
    if (this.hashKey !== undefined) return fnv1a(this.hashKey);
    const val = this.val;
    // Unhashable values are always objects.
    if (typeof val === "function" || (typeof val === "object" && val !== null)) {
      return identityHash(val);
    }
    return 0;
  }

  equals(other: Literal): boolean {
    if (this.hashKey === undefined || other.hashKey === undefined) {
      return this.val === other.val;
    }
    if (isByValue(this.val) || isByValue(other.val)) {
      return this.val === other.val;
    }
    return this.hashKey === other.hashKey;
  }

  toString(): string {
    if (!this.hashable) {
      return `Literal(val=${String(this.val)}, hashable=false)`;
    }
    return String(this.val);
  }
}
