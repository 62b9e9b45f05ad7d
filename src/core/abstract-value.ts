import { InvalidOperandError } from "./errors";

/**
 * Static description of a value. Descriptions of the same variant form a
 * join-semilattice; `bot` sits below every variant.
 */
export interface AbstractValue {
  readonly kind: string;
  join(other: AbstractValue): AbstractValue;
  toString(): string;
}

export class Bot implements AbstractValue {
  readonly kind = "bot";

  join(other: AbstractValue): AbstractValue {
    return other;
  }

  toString(): string {
    return "Bot()";
  }
}

export const bot = new Bot();

export class AbstractUnit implements EqualityAval {
  readonly kind = "unit";

  /** Units compare equal to anything else described by `abstractUnit`. */
  get equality(): EqualityRules {
    return unitEquality;
  }

  join(_other: AbstractValue): AbstractValue {
    return this;
  }

  toString(): string {
    return "AbstractUnit()";
  }
}

export const abstractUnit = new AbstractUnit();

/**
 * Least upper bound of two descriptions. `undefined` acts as the identity so
 * callers can fold over an empty accumulator.
 */
export function latticeJoin(
  x: AbstractValue | undefined,
  y: AbstractValue | undefined,
): AbstractValue | undefined {
  if (x === undefined) return y;
  if (y === undefined) return x;
  if (x.kind === "bot") return y;
  if (y.kind === "bot") return x;
  if (x.kind !== y.kind) {
    throw new InvalidOperandError(`Cannot join ${x} with ${y}`);
  }
  return y.join(x);
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Operator rules for values whose description supports arithmetic. A rule
 * receives the traced operand first and typically binds a primitive.
 */
export interface ArithmeticRules {
  add(x: unknown, y: unknown): unknown;
  sub(x: unknown, y: unknown): unknown;
  mul(x: unknown, y: unknown): unknown;
  div(x: unknown, y: unknown): unknown;
  pow(x: unknown, y: unknown): unknown;
  neg(x: unknown): unknown;
  abs(x: unknown): unknown;
}

export interface ArithmeticAval extends AbstractValue {
  readonly arithmetic: ArithmeticRules;
}

export interface EqualityRules {
  eq(x: unknown, y: unknown): unknown;
  ne(x: unknown, y: unknown): unknown;
}

export interface EqualityAval extends AbstractValue {
  readonly equality: EqualityRules;
}

export interface OrderingRules {
  lt(x: unknown, y: unknown): unknown;
  le(x: unknown, y: unknown): unknown;
  gt(x: unknown, y: unknown): unknown;
  ge(x: unknown, y: unknown): unknown;
}

export interface OrderedAval extends AbstractValue {
  readonly ordering: OrderingRules;
}

export function hasArithmetic(aval: AbstractValue): aval is ArithmeticAval {
  return "arithmetic" in aval;
}

export function hasEquality(aval: AbstractValue): aval is EqualityAval {
  return "equality" in aval;
}

export function hasOrdering(aval: AbstractValue): aval is OrderedAval {
  return "ordering" in aval;
}

/** Description of a tracer or registered value; `undefined` for anything else. */
function describedBy(x: unknown): unknown {
  if (typeof x === "object" && x !== null && "aval" in x) return x.aval;
  return isValidValue(x) ? concreteAval(x) : undefined;
}

const unitEquality: EqualityRules = {
  eq: (_x, y) => describedBy(y) === abstractUnit,
  ne: (_x, y) => describedBy(y) !== abstractUnit,
};

// ============================================================================
// Abstraction registry
// ============================================================================

type PrimitiveTag = "number" | "boolean" | "bigint" | "string";

interface PrimitiveTypes {
  number: number;
  boolean: boolean;
  bigint: bigint;
  string: string;
}

export type Constructor<T> = abstract new (...args: never[]) => T;

type Abstraction = (x: unknown) => AbstractValue | undefined;

const primitiveGuards: {
  [K in PrimitiveTag]: (x: unknown) => x is PrimitiveTypes[K];
} = {
  number: (x): x is number => typeof x === "number",
  boolean: (x): x is boolean => typeof x === "boolean",
  bigint: (x): x is bigint => typeof x === "bigint",
  string: (x): x is string => typeof x === "string",
};

const avalMappings = new Map<unknown, Abstraction>();

/** Register the abstraction of a JS primitive type, keyed by its `typeof` tag. */
export function registerPrimitiveAbstraction<K extends PrimitiveTag>(
  tag: K,
  fn: (x: PrimitiveTypes[K]) => AbstractValue,
): void {
  const guard = primitiveGuards[tag];
  avalMappings.set(tag, (x) => (guard(x) ? fn(x) : undefined));
}

/** Register the abstraction of instances whose exact class is `ctor`. */
export function registerAbstraction<T>(
  ctor: Constructor<T>,
  fn: (x: T) => AbstractValue,
): void {
  avalMappings.set(ctor, (x) => (x instanceof ctor ? fn(x) : undefined));
}

export function unregisterAbstraction(key: PrimitiveTag | Constructor<unknown>): boolean {
  return avalMappings.delete(key);
}

/** `typeof` tag for JS primitives, exact constructor for objects. */
export function typeKeyOf(x: unknown): unknown {
  if (x === null) return "null";
  if (typeof x === "object" || typeof x === "function") {
    const proto: unknown = Object.getPrototypeOf(x);
    if (proto === null || typeof proto !== "object") return undefined;
    return "constructor" in proto ? proto.constructor : undefined;
  }
  return typeof x;
}

export function describeValue(x: unknown): string {
  if (x === null) return "null";
  if (typeof x === "object" || typeof x === "function") {
    const key = typeKeyOf(x);
    return typeof key === "function" ? key.name || "anonymous object" : "object";
  }
  return typeof x;
}

export function concreteAval(x: unknown): AbstractValue {
  const fn = avalMappings.get(typeKeyOf(x));
  const aval = fn?.(x);
  if (!aval) {
    throw new InvalidOperandError(
      `${describeValue(x)} is not a valid value for this system`,
    );
  }
  return aval;
}

export function isValidValue(x: unknown): boolean {
  const fn = avalMappings.get(typeKeyOf(x));
  return fn?.(x) !== undefined;
}
