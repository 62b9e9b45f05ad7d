import { InvalidOperandError } from "../core/errors";
import { definePrimitive, type Primitive } from "../core/primitive";
import { transformWithAux, WrappedFun } from "../core/wrapped-fun";
import type { Params } from "../ir/jaxpr";
import type { TraceContext } from "./context";
import { type CallTodo, findTopTrace, fullLower, Tracer } from "./trace";

/** Apply todos innermost-last so outputs end up at the caller's level. */
export function applyTodos(todos: readonly CallTodo[], outs: unknown[]): unknown[] {
  let result = outs;
  for (let i = todos.length - 1; i >= 0; i -= 1) {
    result = todos[i](result).map(fullLower);
  }
  return result;
}

function topTracerAbove(outs: readonly unknown[], level: number): Tracer | undefined {
  let top: Tracer | undefined;
  for (const x of outs) {
    if (!(x instanceof Tracer) || x.trace.level <= level) continue;
    if (!top || x.trace.level > top.trace.level) top = x;
  }
  return top;
}

/**
 * Wrap a call body so that outputs owned by traces above `level` (activations
 * the body closed over rather than received as operands) are handed to each
 * such trace's `postProcessCall`, highest level first. The aux output is the
 * list of todos, innermost first.
 */
export function processEnvTraces(
  ctx: TraceContext,
  fun: WrappedFun,
  primitive: Primitive,
  level: number,
  params: Params,
): [WrappedFun, () => CallTodo[]] {
  return transformWithAux<CallTodo[]>(fun, (inner, emit) => (args, callParams) => {
    let outs = inner(args, callParams);
    const todos: CallTodo[] = [];
    for (;;) {
      const top = topTracerAbove(outs, level);
      if (!top) break;
      const { master } = top.trace;
      const trace = new master.traceType(master, ctx.curSublevel());
      const raised = outs.map((x) => trace.fullRaise(x));
      const [next, todo] = trace.postProcessCall(primitive, raised, params);
      outs = next;
      todos.push(todo);
    }
    emit(todos);
    return outs;
  });
}

function asOutputs(primitive: Primitive, outs: unknown): unknown[] {
  if (!Array.isArray(outs)) {
    throw new InvalidOperandError(`Call primitive '${primitive.name}' must return a list of outputs`);
  }
  return outs;
}

export function callBind(
  ctx: TraceContext,
  primitive: Primitive,
  fun: WrappedFun,
  args: unknown[],
  params: Params,
): unknown[] {
  const topTrace = findTopTrace(ctx, args);
  const level = topTrace ? topTrace.level : ctx.traceStack.nextLevel(true);
  const [wrapped, envTraceTodo] = processEnvTraces(ctx, fun, primitive, level, params);

  let outs: unknown[];
  if (!topTrace) {
    outs = ctx.withNewSublevel(() => asOutputs(primitive, primitive.impl([wrapped, ...args], params)));
  } else {
    const tracers = args.map((arg) => topTrace.fullRaise(arg));
    outs = topTrace.processCall(primitive, wrapped, tracers, params).map(fullLower);
  }
  return applyTodos(envTraceTodo(), outs);
}

export function callImpl(fun: WrappedFun, args: unknown[], params: Params): unknown[] {
  return fun.callWrapped(args, params);
}

/**
 * Define a primitive whose leading operand is a `WrappedFun`. Its bind is
 * `callBind` and its impl simply calls the function.
 */
export function defineCallPrimitive(name: string): Primitive {
  const primitive = definePrimitive(name, { multipleResults: true });
  const splitFun = (operands: unknown[]): [WrappedFun, unknown[]] => {
    const [fun, ...rest] = operands;
    if (!(fun instanceof WrappedFun)) {
      throw new InvalidOperandError(`'${name}' expects a wrapped function as its first operand`);
    }
    return [fun, rest];
  };
  primitive.defCustomBind((ctx, operands, params) => {
    const [fun, args] = splitFun(operands);
    return callBind(ctx, primitive, fun, args, params);
  });
  primitive.defImpl((operands, params) => {
    const [fun, args] = splitFun(operands);
    return callImpl(fun, args, params);
  });
  return primitive;
}

export const callP = defineCallPrimitive("call");

export function call(
  ctx: TraceContext,
  fun: WrappedFun,
  args: unknown[],
  params: Params = {},
): unknown[] {
  return callP.bindAll(ctx, [fun, ...args], params);
}
