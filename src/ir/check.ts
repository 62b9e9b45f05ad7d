import { attempt, type CoreResult, MalformedProgramError } from "../core/errors";
import { unitVar } from "../core/unit";
import type { Atom, Jaxpr } from "./jaxpr";
import { Literal } from "./literal";
import { ppJaxpr } from "./pretty";

/**
 * Verify SSA and scoping: every read is preceded by a write in scope, nothing
 * is written twice, and each bound sub-program is itself well-formed.
 * Throws `MalformedProgramError` naming the variable and the graph.
 */
export function assertJaxpr(jaxpr: Jaxpr): void {
  const env = new Set<Atom>();

  const read = (v: Atom): void => {
    if (v instanceof Literal || env.has(v)) return;
    throw new MalformedProgramError(`Variable '${v}' not defined`, String(v), ppJaxpr(jaxpr));
  };

  const write = (v: Atom): void => {
    if (env.has(v)) {
      throw new MalformedProgramError(`Variable ${v} already bound`, String(v), ppJaxpr(jaxpr));
    }
    env.add(v);
  };

  write(unitVar);
  jaxpr.constvars.forEach(write);
  jaxpr.freevars.forEach(write);
  jaxpr.invars.forEach(write);
  for (const eqn of jaxpr.eqns) {
    eqn.invars.forEach(read);
    for (const { jaxpr: sub, constvars, freevars } of eqn.boundSubjaxprs) {
      freevars.forEach(read);
      constvars.forEach(read);
      assertJaxpr(sub);
    }
    eqn.outvars.forEach(write);
  }
  jaxpr.outvars.forEach(read);
}

export function checkJaxpr(jaxpr: Jaxpr): CoreResult<void> {
  return attempt(() => assertJaxpr(jaxpr));
}
