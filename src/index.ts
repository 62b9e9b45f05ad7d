export {
  AbstractUnit,
  type AbstractValue,
  abstractUnit,
  type ArithmeticAval,
  type ArithmeticRules,
  Bot,
  bot,
  type Constructor,
  concreteAval,
  describeValue,
  type EqualityAval,
  type EqualityRules,
  hasArithmetic,
  hasEquality,
  hasOrdering,
  isValidValue,
  latticeJoin,
  type OrderedAval,
  type OrderingRules,
  registerAbstraction,
  registerPrimitiveAbstraction,
  unregisterAbstraction,
} from "./core/abstract-value";
export {
  attempt,
  type CoreError,
  type CoreErrorKind,
  type CoreResult,
  InvalidOperandError,
  isCoreError,
  LeakedTraceError,
  LiftingError,
  MalformedProgramError,
  type RuleName,
  UnimplementedRuleError,
} from "./core/errors";
export {
  type AbstractEvalRule,
  type BindRule,
  definePrimitive,
  getPrimitive,
  identityP,
  type ImplRule,
  listPrimitives,
  Primitive,
  type PrimitiveRules,
} from "./core/primitive";
export { Unit, unit, UnitVar, unitVar } from "./core/unit";
export {
  type FunTransform,
  Store,
  transformWithAux,
  type WrappedBody,
  WrappedFun,
  wrapInit,
} from "./core/wrapped-fun";
export {
  getActiveKernelProvider,
  getKernelProvider,
  registerKernelProvider,
  useKernelProvider,
  withKernelProvider,
} from "./backend/registry";
export type { Kernel, KernelProvider } from "./backend/types";
export { assertJaxpr, checkJaxpr } from "./ir/check";
export { evalJaxpr, jaxprAsFun } from "./ir/eval";
export {
  type Atom,
  type Binder,
  type BoundSubjaxpr,
  Jaxpr,
  type JaxprEqn,
  newJaxprEqn,
  type Params,
  TypedJaxpr,
  Var,
  VarAllocator,
} from "./ir/jaxpr";
export { isLiteralable, Literal, registerLiteralable } from "./ir/literal";
export { ppJaxpr } from "./ir/pretty";
export {
  applyTodos,
  call,
  callBind,
  callImpl,
  callP,
  defineCallPrimitive,
  processEnvTraces,
} from "./trace/call";
export {
  defaultTraceContextOptions,
  MasterTrace,
  type NewMasterOptions,
  Sublevel,
  TraceContext,
  type TraceContextOptions,
  TraceStack,
  type TraceType,
} from "./trace/context";
export { findLeakedTracers } from "./trace/leak-check";
export {
  type CallTodo,
  findTopTrace,
  fullLower,
  getAval,
  Trace,
  Tracer,
} from "./trace/trace";
