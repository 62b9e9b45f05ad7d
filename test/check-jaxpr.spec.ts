import fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import {
  assertJaxpr,
  callP,
  checkJaxpr,
  definePrimitive,
  Jaxpr,
  Literal,
  MalformedProgramError,
  newJaxprEqn,
  ppJaxpr,
  unitVar,
  VarAllocator,
} from "../src";
import { addGraph, chainGraph, closureGraph } from "./helpers/graphs";
import { addP, mulP } from "./helpers/scalar";

function expectMalformed(jaxpr: Jaxpr): MalformedProgramError {
  const result = checkJaxpr(jaxpr);
  if (result.ok) {
    throw new Error("expected the graph to be rejected");
  }
  if (!(result.error instanceof MalformedProgramError)) {
    throw result.error;
  }
  return result.error;
}

describe("checkJaxpr", () => {
  it("accepts well-formed graphs", () => {
    expect(checkJaxpr(addGraph())).toEqual({ ok: true, value: undefined });
    expect(checkJaxpr(closureGraph()).ok).toBe(true);
  });

  it("accepts literals and the unit variable as operands", () => {
    const alloc = new VarAllocator();
    const [a, b] = alloc.newVars(2);
    const jaxpr = new Jaxpr([], [], [a], [b, unitVar], [newJaxprEqn(alloc, [a, new Literal(1)], [b], addP)]);
    expect(() => assertJaxpr(jaxpr)).not.toThrow();
  });

  it("rejects an output that nothing defines without running anything", () => {
    const spy = vi.fn(([x]: unknown[]) => x);
    const spiedP = definePrimitive("check_spied");
    spiedP.defImpl(spy);

    const alloc = new VarAllocator();
    const [a, b, c, d] = alloc.newVars(4);
    const jaxpr = new Jaxpr([], [], [a, b], [d], [newJaxprEqn(alloc, [a, b], [c], spiedP)]);
    const error = expectMalformed(jaxpr);

    expect(error.kind).toBe("malformed_program");
    expect(error.variable).toBe("d");
    expect(error.program).toBe(ppJaxpr(jaxpr));
    expect(error.message).toBe(`Variable 'd' not defined\njaxpr:\n${ppJaxpr(jaxpr)}\n`);
    expect(spy).not.toHaveBeenCalled();
  });

  it("rejects a variable written twice", () => {
    const alloc = new VarAllocator();
    const [a, b] = alloc.newVars(2);
    const jaxpr = new Jaxpr([], [], [a, b], [a], [newJaxprEqn(alloc, [a, b], [a], addP)]);
    const error = expectMalformed(jaxpr);
    expect(error.variable).toBe("a");
    expect(error.message.split("\n")[0]).toBe("Variable a already bound");
  });

  it("rejects a constant that shadows an input", () => {
    const alloc = new VarAllocator();
    const [a] = alloc.newVars(1);
    expect(() => assertJaxpr(new Jaxpr([a], [], [a], [a], []))).toThrow("Variable a already bound");
  });

  it("rejects a read before its definition", () => {
    const alloc = new VarAllocator();
    const [a, b, c, d] = alloc.newVars(4);
    const jaxpr = new Jaxpr(
      [],
      [],
      [a, b],
      [d],
      [newJaxprEqn(alloc, [c, a], [d], addP), newJaxprEqn(alloc, [a, b], [c], mulP)],
    );
    expect(expectMalformed(jaxpr).variable).toBe("c");
  });

  it("rejects a closure over a variable the caller never defines", () => {
    const subAlloc = new VarAllocator("_");
    const [f, x, y] = subAlloc.newVars(3);
    const sub = new Jaxpr([], [f], [x], [y], [newJaxprEqn(subAlloc, [f, x], [y], mulP)]);

    const alloc = new VarAllocator();
    const [a, stray, c] = alloc.newVars(3);
    const jaxpr = new Jaxpr(
      [],
      [],
      [a],
      [c],
      [newJaxprEqn(alloc, [a], [c], callP, [{ jaxpr: sub, constvars: [], freevars: [stray] }])],
    );
    const error = expectMalformed(jaxpr);
    expect(error.variable).toBe("b");
    expect(error.program).toBe(ppJaxpr(jaxpr));
  });

  it("checks sub-programs in their own scope", () => {
    const subAlloc = new VarAllocator("_");
    const [x, y, z] = subAlloc.newVars(3);
    const sub = new Jaxpr([], [], [x], [z], [newJaxprEqn(subAlloc, [x, y], [z], addP)]);

    const alloc = new VarAllocator();
    const [a, b] = alloc.newVars(2);
    const jaxpr = new Jaxpr(
      [],
      [],
      [a],
      [b],
      [newJaxprEqn(alloc, [a], [b], callP, [{ jaxpr: sub, constvars: [], freevars: [] }])],
    );
    const error = expectMalformed(jaxpr);
    expect(error.variable).toBe("b_");
    expect(error.program).toBe(ppJaxpr(sub));
  });

  it("does not let a sub-program see the caller's variables", () => {
    const alloc = new VarAllocator();
    const [a, b] = alloc.newVars(2);
    const sub = new Jaxpr([], [], [], [a], []);
    const jaxpr = new Jaxpr(
      [],
      [],
      [a],
      [b],
      [newJaxprEqn(alloc, [], [b], callP, [{ jaxpr: sub, constvars: [], freevars: [] }])],
    );
    expect(expectMalformed(jaxpr).program).toBe(ppJaxpr(sub));
  });

  it("accepts every straight-line graph built in order", () => {
    const step = fc.record(
      {
        op: fc.constantFrom<"add" | "mul">("add", "mul"),
        lhs: fc.nat({ max: 10 }),
        rhs: fc.nat({ max: 10 }),
        literal: fc.integer({ min: 0, max: 2 }),
      },
      { requiredKeys: ["op", "lhs", "rhs"] },
    );
    fc.assert(
      fc.property(fc.array(step, { maxLength: 10 }), (steps) => {
        expect(checkJaxpr(chainGraph(steps)).ok).toBe(true);
      }),
    );
  });
});
