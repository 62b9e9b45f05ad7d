import {
  type AbstractValue,
  type ArithmeticAval,
  concreteAval,
  type EqualityAval,
  type OrderedAval,
} from "../core/abstract-value";
import { LeakedTraceError, LiftingError, UnimplementedRuleError } from "../core/errors";
import type { Primitive } from "../core/primitive";
import type { WrappedFun } from "../core/wrapped-fun";
import type { Params } from "../ir/jaxpr";
import type { MasterTrace, Sublevel, TraceContext } from "./context";

/** Rewraps call outputs at the caller's level once the call has returned. */
export type CallTodo = (outs: unknown[]) => unknown[];

/**
 * One interpreter: a transformation bound to an activation (`master`) and a
 * sublevel. Subclasses define how values enter the trace and how primitives
 * and calls execute under it.
 */
export abstract class Trace {
  readonly level: number;

  constructor(
    readonly master: MasterTrace,
    readonly sublevel: Sublevel,
  ) {
    this.level = master.level;
  }

  /** Wrap a concrete value. */
  abstract pure(val: unknown): Tracer;
  /** Adopt a tracer from a lower level. */
  abstract lift(tracer: Tracer): Tracer;
  /** Adopt a tracer of this activation from an older sublevel. */
  abstract sublift(tracer: Tracer): Tracer;

  abstract processPrimitive(
    primitive: Primitive,
    tracers: Tracer[],
    params: Params,
  ): unknown;

  abstract processCall(
    primitive: Primitive,
    f: WrappedFun,
    tracers: Tracer[],
    params: Params,
  ): unknown[];

  /**
   * Handle call outputs that belong to this trace although the call was made
   * at a lower level. Returns the outputs to hand back to the caller's level
   * and a todo that restores them afterwards.
   */
  postProcessCall(
    primitive: Primitive,
    _outTracers: Tracer[],
    _params: Params,
  ): [unknown[], CallTodo] {
    throw new UnimplementedRuleError(
      primitive.name,
      "post_process_call",
      `${this.constructor.name} cannot post-process call '${primitive.name}'`,
    );
  }

  /** Reconcile `val` onto this trace following the (level, sublevel) order. */
  fullRaise(val: unknown): Tracer {
    if (!(val instanceof Tracer)) {
      return this.pure(val);
    }
    assertUsable(val, this.master.context);
    const source = val.trace;
    if (source.master === this.master) {
      if (source.sublevel.value === this.sublevel.value) {
        return val;
      }
      if (source.sublevel.value < this.sublevel.value) {
        return this.sublift(val);
      }
      throw new LiftingError(
        `Can't lift sublevels ${source.sublevel} to ${this.sublevel}`,
        String(source),
        String(this),
      );
    }
    if (source.level < this.level) {
      if (source.sublevel.value > this.sublevel.value) {
        throw new LiftingError(
          `Incompatible sublevel: ${source}, (${this.level}, ${this.sublevel})`,
          String(source),
          String(this),
        );
      }
      return this.lift(val);
    }
    if (source.level > this.level) {
      throw new LiftingError(`Can't lift ${val} to ${this}`, String(source), String(this));
    }
    throw new LiftingError(
      `Different traces at same level: ${val}, ${this}`,
      String(source),
      String(this),
    );
  }

  toString(): string {
    return `${this.constructor.name}(level=${this.level}/${this.sublevel})`;
  }
}

/**
 * A value owned by exactly one trace. Introspection goes through `aval`;
 * operators are available only where the description carries the matching
 * capability.
 */
export abstract class Tracer<A extends AbstractValue = AbstractValue> {
  constructor(readonly trace: Trace) {}

  abstract get aval(): A;

  /** Strip this wrapper when it carries nothing for this value. */
  fullLower(): unknown {
    return this;
  }

  add(this: Tracer<ArithmeticAval>, other: unknown): unknown {
    return this.aval.arithmetic.add(this, other);
  }

  sub(this: Tracer<ArithmeticAval>, other: unknown): unknown {
    return this.aval.arithmetic.sub(this, other);
  }

  mul(this: Tracer<ArithmeticAval>, other: unknown): unknown {
    return this.aval.arithmetic.mul(this, other);
  }

  div(this: Tracer<ArithmeticAval>, other: unknown): unknown {
    return this.aval.arithmetic.div(this, other);
  }

  pow(this: Tracer<ArithmeticAval>, other: unknown): unknown {
    return this.aval.arithmetic.pow(this, other);
  }

  neg(this: Tracer<ArithmeticAval>): unknown {
    return this.aval.arithmetic.neg(this);
  }

  abs(this: Tracer<ArithmeticAval>): unknown {
    return this.aval.arithmetic.abs(this);
  }

  eq(this: Tracer<EqualityAval>, other: unknown): unknown {
    return this.aval.equality.eq(this, other);
  }

  ne(this: Tracer<EqualityAval>, other: unknown): unknown {
    return this.aval.equality.ne(this, other);
  }

  lt(this: Tracer<OrderedAval>, other: unknown): unknown {
    return this.aval.ordering.lt(this, other);
  }

  le(this: Tracer<OrderedAval>, other: unknown): unknown {
    return this.aval.ordering.le(this, other);
  }

  gt(this: Tracer<OrderedAval>, other: unknown): unknown {
    return this.aval.ordering.gt(this, other);
  }

  ge(this: Tracer<OrderedAval>, other: unknown): unknown {
    return this.aval.ordering.ge(this, other);
  }

  toString(): string {
    return `Traced<${this.aval}>with<${this.trace}>`;
  }
}

function assertUsable(tracer: Tracer, ctx: TraceContext): void {
  const { master } = tracer.trace;
  if (master.context !== ctx) {
    throw new LiftingError(
      `Tracer ${tracer} belongs to another trace context`,
      String(tracer.trace),
      String(ctx.traceStack),
    );
  }
  if (ctx.options.checkLeaks && master.retired) {
    throw new LeakedTraceError(String(master), String(ctx.traceStack));
  }
}

export function fullLower(val: unknown): unknown {
  return val instanceof Tracer ? val.fullLower() : val;
}

export function getAval(x: unknown): AbstractValue {
  return x instanceof Tracer ? x.aval : concreteAval(x);
}

/**
 * Trace of the highest-level tracer among `xs`, instantiated afresh on the
 * same activation at the context's current sublevel. `undefined` when no
 * operand is traced.
 */
export function findTopTrace(ctx: TraceContext, xs: readonly unknown[]): Trace | undefined {
  let top: Tracer | undefined;
  for (const x of xs) {
    if (!(x instanceof Tracer)) continue;
    assertUsable(x, ctx);
    if (!top || x.trace.level > top.trace.level) {
      top = x;
    }
  }
  if (!top) return undefined;
  const { master } = top.trace;
  return new master.traceType(master, ctx.curSublevel());
}
