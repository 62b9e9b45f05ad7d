import type { Atom, Jaxpr, JaxprEqn, Params } from "./jaxpr";

function printVars(vs: readonly Atom[]): string {
  return vs.map(String).join(" ");
}

function formatParam(value: unknown): string {
  if (Array.isArray(value)) {
    return `(${value.map(formatParam).join(",")})`;
  }
  return String(value);
}

function formatParams(params: Params): string {
  const entries = Object.entries(params);
  if (entries.length === 0) return "";
  return `[${entries.map(([k, v]) => `${k}=${formatParam(v)}`).join(" ")}]`;
}

function indent(lines: string[], width: number): string[] {
  const pad = " ".repeat(width);
  return lines.map((line) => pad + line);
}

function ppEqn(eqn: JaxprEqn): string[] {
  const lhs = printVars(eqn.outvars);
  const rhs = `${eqn.primitive.name}${formatParams(eqn.params)}`;
  const ins = printVars(eqn.invars);
  const lines = [`${lhs} = ${rhs}${ins ? ` ${ins}` : ""}`];
  for (const { jaxpr, constvars, freevars } of eqn.boundSubjaxprs) {
    const sub = indent(ppJaxprLines(jaxpr), 2);
    sub[sub.length - 1] += ` [ ${printVars(constvars)} ; ${printVars(freevars)} ]`;
    lines.push(...sub);
  }
  return lines;
}

function ppJaxprLines(jaxpr: Jaxpr): string[] {
  const header =
    `{ lambda ${printVars(jaxpr.constvars)} ; ` +
    `${printVars(jaxpr.freevars)} ; ${printVars(jaxpr.invars)}.`;
  const body: string[] = [];
  jaxpr.eqns.forEach((eqn, i) => {
    const eqnLines = ppEqn(eqn);
    const prefix = i === 0 ? "let " : "    ";
    body.push(prefix + eqnLines[0], ...indent(eqnLines.slice(1), 4));
  });
  if (body.length === 0) body.push("let");
  body.push(`in [${jaxpr.outvars.map(String).join(", ")}] }`);
  return [header, ...indent(body, 2)];
}

/**
 * Diagnostic rendering of a graph. Not a stable or parsable format.
 */
export function ppJaxpr(jaxpr: Jaxpr): string {
  return ppJaxprLines(jaxpr).join("\n");
}
