import type { AbstractValue } from "../core/abstract-value";
import { MalformedProgramError } from "../core/errors";
import type { Primitive } from "../core/primitive";
import type { UnitVar } from "../core/unit";
import type { Literal } from "./literal";
import { ppJaxpr } from "./pretty";

export type Params = Readonly<Record<string, unknown>>;

function countToName(count: number): string {
  let name = "";
  let n = count;
  do {
    name = String.fromCharCode(97 + (n % 26)) + name;
    n = Math.floor(n / 26);
  } while (n > 0);
  return name;
}

/** A graph node reference. Written by exactly one binder. */
export class Var {
  constructor(
    readonly count: number,
    readonly suffix = "",
  ) {}

  toString(): string {
    return countToName(this.count) + this.suffix;
  }
}

/** Anything an environment can bind. */
export type Binder = Var | UnitVar;

export type Atom = Var | Literal | UnitVar;

/**
 * Hands out fresh variables and equation ids for one graph construction.
 * Ids are indices into the arena, never reused.
 */
export class VarAllocator {
  private nextVar = 0;
  private nextEqn = 0;

  constructor(private readonly suffix = "") {}

  newVar(): Var {
    return new Var(this.nextVar++, this.suffix);
  }

  newVars(n: number): Var[] {
    return Array.from({ length: n }, () => this.newVar());
  }

  newEqnId(): number {
    return this.nextEqn++;
  }
}

export type BoundSubjaxpr = {
  jaxpr: Jaxpr;
  constvars: Atom[];
  freevars: Atom[];
};

export type JaxprEqn = {
  eqnId: number;
  invars: Atom[];
  outvars: Binder[];
  primitive: Primitive;
  boundSubjaxprs: BoundSubjaxpr[];
  params: Params;
};

export function newJaxprEqn(
  alloc: VarAllocator,
  invars: Atom[],
  outvars: Binder[],
  primitive: Primitive,
  boundSubjaxprs: BoundSubjaxpr[] = [],
  params: Params = {},
): JaxprEqn {
  return {
    eqnId: alloc.newEqnId(),
    invars: invars.slice(),
    outvars: outvars.slice(),
    primitive,
    boundSubjaxprs: boundSubjaxprs.slice(),
    params,
  };
}

export class Jaxpr {
  readonly constvars: Binder[];
  readonly freevars: Binder[];
  readonly invars: Binder[];
  readonly outvars: Atom[];
  readonly eqns: JaxprEqn[];

  constructor(
    constvars: Binder[],
    freevars: Binder[],
    invars: Binder[],
    outvars: Atom[],
    eqns: JaxprEqn[],
  ) {
    this.constvars = constvars.slice();
    this.freevars = freevars.slice();
    this.invars = invars.slice();
    this.outvars = outvars.slice();
    this.eqns = eqns.slice();
  }

  toString(): string {
    return ppJaxpr(this);
  }
}

/** A closed graph with its constant values and input/output descriptions. */
export class TypedJaxpr {
  readonly literals: unknown[];
  readonly inAvals: AbstractValue[];
  readonly outAvals: AbstractValue[];

  constructor(
    readonly jaxpr: Jaxpr,
    literals: unknown[],
    inAvals: AbstractValue[],
    outAvals: AbstractValue[],
  ) {
    if (jaxpr.freevars.length > 0) {
      throw new MalformedProgramError(
        "TypedJaxpr requires a closed jaxpr",
        jaxpr.freevars.map(String).join(" "),
        ppJaxpr(jaxpr),
      );
    }
    if (literals.length !== jaxpr.constvars.length) {
      throw new MalformedProgramError(
        `TypedJaxpr expected ${jaxpr.constvars.length} literals, got ${literals.length}`,
        undefined,
        ppJaxpr(jaxpr),
      );
    }
    if (inAvals.length !== jaxpr.invars.length) {
      throw new MalformedProgramError(
        `TypedJaxpr expected ${jaxpr.invars.length} input avals, got ${inAvals.length}`,
        undefined,
        ppJaxpr(jaxpr),
      );
    }
    if (outAvals.length !== jaxpr.outvars.length) {
      throw new MalformedProgramError(
        `TypedJaxpr expected ${jaxpr.outvars.length} output avals, got ${outAvals.length}`,
        undefined,
        ppJaxpr(jaxpr),
      );
    }
    this.literals = literals.slice();
    this.inAvals = inAvals.slice();
    this.outAvals = outAvals.slice();
  }

  toTuple(): [Jaxpr, unknown[], AbstractValue[], AbstractValue[]] {
    return [this.jaxpr, this.literals, this.inAvals, this.outAvals];
  }

  toString(): string {
    return ppJaxpr(this.jaxpr);
  }
}
