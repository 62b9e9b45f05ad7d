import { MalformedProgramError } from "../core/errors";
import { unit, unitVar } from "../core/unit";
import { wrapInit } from "../core/wrapped-fun";
import type { TraceContext } from "../trace/context";
import type { Atom, Binder, Jaxpr, TypedJaxpr } from "./jaxpr";
import { Literal } from "./literal";
import { ppJaxpr } from "./pretty";

/**
 * Run a well-formed graph. Every primitive goes through `bind`, so evaluating
 * under active traces retraces the graph into them.
 */
export function evalJaxpr(
  ctx: TraceContext,
  jaxpr: Jaxpr,
  consts: readonly unknown[],
  freevarVals: readonly unknown[],
  args: readonly unknown[],
): unknown[] {
  const env = new Map<Binder, unknown>();

  const fail = (message: string, variable?: Atom): never => {
    throw new MalformedProgramError(
      message,
      variable === undefined ? undefined : String(variable),
      ppJaxpr(jaxpr),
    );
  };

  const read = (v: Atom): unknown => {
    if (v instanceof Literal) return v.val;
    if (!env.has(v)) fail(`Variable '${v}' not defined`, v);
    return env.get(v);
  };

  const writeAll = (group: string, vars: readonly Binder[], vals: readonly unknown[]): void => {
    if (vars.length !== vals.length) {
      fail(`Expected ${vars.length} ${group}, got ${vals.length}`);
    }
    vars.forEach((v, i) => env.set(v, vals[i]));
  };

  env.set(unitVar, unit);
  writeAll("constants", jaxpr.constvars, consts);
  writeAll("arguments", jaxpr.invars, args);
  writeAll("free variable values", jaxpr.freevars, freevarVals);

  for (const eqn of jaxpr.eqns) {
    const inVals = eqn.invars.map(read);
    const subfuns = eqn.boundSubjaxprs.map(({ jaxpr: sub, constvars, freevars }) => {
      const constVals = constvars.map(read);
      const freeVals = freevars.map(read);
      return wrapInit((subArgs) => evalJaxpr(ctx, sub, constVals, freeVals, subArgs), "jaxpr");
    });
    const ans = eqn.primitive.bind(ctx, [...subfuns, ...inVals], eqn.params);
    if (eqn.primitive.multipleResults) {
      if (!Array.isArray(ans)) {
        fail(`Primitive '${eqn.primitive.name}' returned a single result`);
      } else {
        writeAll(`results of '${eqn.primitive.name}'`, eqn.outvars, ans);
      }
    } else {
      if (eqn.outvars.length !== 1) {
        fail(`Primitive '${eqn.primitive.name}' writes exactly one variable`);
      }
      env.set(eqn.outvars[0], ans);
    }
  }
  return jaxpr.outvars.map(read);
}

/** Curry a typed graph into a plain function of its inputs. */
export function jaxprAsFun(
  ctx: TraceContext,
  typedJaxpr: TypedJaxpr,
): (...args: unknown[]) => unknown[] {
  return (...args) => evalJaxpr(ctx, typedJaxpr.jaxpr, typedJaxpr.literals, [], args);
}
