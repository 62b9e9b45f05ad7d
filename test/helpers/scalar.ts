import {
  type AbstractValue,
  type ArithmeticAval,
  type ArithmeticRules,
  definePrimitive,
  type EqualityAval,
  type EqualityRules,
  type KernelProvider,
  type OrderedAval,
  type OrderingRules,
  registerKernelProvider,
  registerPrimitiveAbstraction,
  type TraceContext,
  Tracer,
  useKernelProvider,
} from "../../src";

/** Description of a JS number. Carries the value when it is known. */
export class ScalarAval implements ArithmeticAval, EqualityAval, OrderedAval {
  readonly kind = "scalar";

  constructor(readonly value?: number) {}

  get arithmetic(): ArithmeticRules {
    return scalarArithmetic;
  }

  get equality(): EqualityRules {
    return scalarEquality;
  }

  get ordering(): OrderingRules {
    return scalarOrdering;
  }

  join(other: AbstractValue): AbstractValue {
    if (other instanceof ScalarAval && other.value === this.value) {
      return this;
    }
    return shapedScalar;
  }

  toString(): string {
    return this.value === undefined ? "ScalarAval()" : `ScalarAval(value=${this.value})`;
  }
}

export const shapedScalar = new ScalarAval();

export const addP = definePrimitive("add");
export const subP = definePrimitive("sub");
export const mulP = definePrimitive("mul");
export const divP = definePrimitive("div");
export const powP = definePrimitive("pow");
export const negP = definePrimitive("neg");
export const absP = definePrimitive("abs");
export const eqP = definePrimitive("eq");
export const neP = definePrimitive("ne");
export const ltP = definePrimitive("lt");
export const leP = definePrimitive("le");
export const gtP = definePrimitive("gt");
export const geP = definePrimitive("ge");
export const sinP = definePrimitive("sin");
export const cosP = definePrimitive("cos");
/** Returns both the quotient and the remainder. */
export const divmodP = definePrimitive("divmod", { multipleResults: true });

function contextOf(x: unknown): TraceContext {
  if (!(x instanceof Tracer)) {
    throw new Error("arithmetic rules are only reached through tracers");
  }
  return x.trace.master.context;
}

const scalarArithmetic: ArithmeticRules = {
  add: (x, y) => addP.bind(contextOf(x), [x, y]),
  sub: (x, y) => subP.bind(contextOf(x), [x, y]),
  mul: (x, y) => mulP.bind(contextOf(x), [x, y]),
  div: (x, y) => divP.bind(contextOf(x), [x, y]),
  pow: (x, y) => powP.bind(contextOf(x), [x, y]),
  neg: (x) => negP.bind(contextOf(x), [x]),
  abs: (x) => absP.bind(contextOf(x), [x]),
};

const scalarEquality: EqualityRules = {
  eq: (x, y) => eqP.bind(contextOf(x), [x, y]),
  ne: (x, y) => neP.bind(contextOf(x), [x, y]),
};

const scalarOrdering: OrderingRules = {
  lt: (x, y) => ltP.bind(contextOf(x), [x, y]),
  le: (x, y) => leP.bind(contextOf(x), [x, y]),
  gt: (x, y) => gtP.bind(contextOf(x), [x, y]),
  ge: (x, y) => geP.bind(contextOf(x), [x, y]),
};

export function num(x: unknown): number {
  if (typeof x !== "number") {
    throw new Error(`expected a number, got ${String(x)}`);
  }
  return x;
}

const unaryAval = () => shapedScalar;
const binaryAval = () => shapedScalar;

export const scalarKernels: KernelProvider = {
  name: "scalar",
  kernels: {
    add: { impl: ([x, y]) => num(x) + num(y), abstractEval: binaryAval },
    sub: { impl: ([x, y]) => num(x) - num(y), abstractEval: binaryAval },
    mul: { impl: ([x, y]) => num(x) * num(y), abstractEval: binaryAval },
    div: { impl: ([x, y]) => num(x) / num(y), abstractEval: binaryAval },
    pow: { impl: ([x, y]) => num(x) ** num(y), abstractEval: binaryAval },
    neg: { impl: ([x]) => -num(x), abstractEval: unaryAval },
    abs: { impl: ([x]) => Math.abs(num(x)), abstractEval: unaryAval },
    eq: { impl: ([x, y]) => num(x) === num(y) },
    ne: { impl: ([x, y]) => num(x) !== num(y) },
    lt: { impl: ([x, y]) => num(x) < num(y) },
    le: { impl: ([x, y]) => num(x) <= num(y) },
    gt: { impl: ([x, y]) => num(x) > num(y) },
    ge: { impl: ([x, y]) => num(x) >= num(y) },
    sin: { impl: ([x]) => Math.sin(num(x)), abstractEval: unaryAval },
    cos: { impl: ([x]) => Math.cos(num(x)), abstractEval: unaryAval },
    divmod: {
      impl: ([x, y]) => [Math.floor(num(x) / num(y)), num(x) % num(y)],
      abstractEval: () => [shapedScalar, shapedScalar],
    },
  },
};

registerPrimitiveAbstraction("number", (x) => new ScalarAval(x));
registerKernelProvider(scalarKernels);
useKernelProvider(scalarKernels.name);
