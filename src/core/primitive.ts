import type { Params } from "../ir/jaxpr";
import type { TraceContext } from "../trace/context";
import { findTopTrace, fullLower, Tracer } from "../trace/trace";
import { type AbstractValue, describeValue, isValidValue } from "./abstract-value";
import { InvalidOperandError, UnimplementedRuleError } from "./errors";

export type ImplRule = (args: unknown[], params: Params) => unknown;

export type AbstractEvalRule = (
  avals: AbstractValue[],
  params: Params,
) => AbstractValue | AbstractValue[];

export type BindRule = (ctx: TraceContext, args: unknown[], params: Params) => unknown;

export type PrimitiveRules = {
  impl?: ImplRule;
  abstractEval?: AbstractEvalRule;
};

/**
 * A named operation. Rule slots are filled once during registration; every
 * invocation goes through `bind`, which routes it to the top active trace.
 */
export class Primitive {
  private implRule: ImplRule | undefined;
  private abstractEvalRule: AbstractEvalRule | undefined;
  private customBind: BindRule | undefined;

  constructor(
    readonly name: string,
    readonly multipleResults = false,
  ) {}

  defImpl(impl: ImplRule): ImplRule {
    this.implRule = impl;
    return impl;
  }

  defAbstractEval(abstractEval: AbstractEvalRule): AbstractEvalRule {
    this.abstractEvalRule = abstractEval;
    return abstractEval;
  }

  defCustomBind(bind: BindRule): BindRule {
    this.customBind = bind;
    return bind;
  }

  get rules(): PrimitiveRules {
    return { impl: this.implRule, abstractEval: this.abstractEvalRule };
  }

  /** Replace both evaluation rules at once; `undefined` clears a slot. */
  setRules(rules: PrimitiveRules): void {
    this.implRule = rules.impl;
    this.abstractEvalRule = rules.abstractEval;
  }

  impl(args: unknown[], params: Params = {}): unknown {
    if (!this.implRule) {
      throw new UnimplementedRuleError(this.name, "impl");
    }
    return this.implRule(args, params);
  }

  abstractEvaluate(avals: AbstractValue[], params: Params = {}): AbstractValue | AbstractValue[] {
    if (!this.abstractEvalRule) {
      throw new UnimplementedRuleError(this.name, "abstract_eval");
    }
    return this.abstractEvalRule(avals, params);
  }

  bind(ctx: TraceContext, args: unknown[], params: Params = {}): unknown {
    if (this.customBind) {
      return this.customBind(ctx, args, params);
    }
    return defaultBind(ctx, this, args, params);
  }

  /** `bind` for multi-result primitives. */
  bindAll(ctx: TraceContext, args: unknown[], params: Params = {}): unknown[] {
    const outs = this.bind(ctx, args, params);
    if (!Array.isArray(outs)) {
      throw new InvalidOperandError(`Primitive '${this.name}' did not return multiple results`);
    }
    return outs;
  }

  toString(): string {
    return this.name;
  }
}

function defaultBind(
  ctx: TraceContext,
  primitive: Primitive,
  args: unknown[],
  params: Params,
): unknown {
  if (!ctx.options.skipChecks) {
    args.forEach((arg, i) => {
      if (!(arg instanceof Tracer) && !isValidValue(arg)) {
        throw new InvalidOperandError(
          `${describeValue(arg)} is not a valid value for this system ` +
            `(operand ${i} of '${primitive.name}')`,
        );
      }
    });
  }

  const topTrace = findTopTrace(ctx, args);
  if (!topTrace) {
    return primitive.impl(args, params);
  }

  const tracers = args.map((arg) => topTrace.fullRaise(arg));
  const out = topTrace.processPrimitive(primitive, tracers, params);
  if (primitive.multipleResults) {
    if (!Array.isArray(out)) {
      throw new InvalidOperandError(
        `${topTrace} returned a single result for multi-result primitive '${primitive.name}'`,
      );
    }
    return out.map(fullLower);
  }
  return fullLower(out);
}

// ============================================================================
// Registry
// ============================================================================

const primitives = new Map<string, Primitive>();

/** Create a primitive and make it discoverable by name. Names are unique. */
export function definePrimitive(name: string, options: { multipleResults?: boolean } = {}): Primitive {
  if (primitives.has(name)) {
    throw new Error(`Primitive '${name}' already defined`);
  }
  const primitive = new Primitive(name, options.multipleResults ?? false);
  primitives.set(name, primitive);
  return primitive;
}

export function getPrimitive(name: string): Primitive | undefined {
  return primitives.get(name);
}

export function listPrimitives(): string[] {
  return Array.from(primitives.keys());
}

export const identityP = definePrimitive("id");
identityP.defImpl(([x]) => x);
identityP.defCustomBind((_ctx, [x]) => x);
