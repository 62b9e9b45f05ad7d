import type { AbstractEvalRule, ImplRule } from "../core/primitive";

export type Kernel = {
  /** Concrete operands to concrete result(s). Pure. */
  impl: ImplRule;
  /** Abstract descriptions to abstract result(s). Pure. */
  abstractEval?: AbstractEvalRule;
};

/**
 * A table of evaluation rules keyed by primitive name. Providers know
 * nothing about tracing; the core only ever calls them with concrete values
 * or abstract descriptions.
 */
export interface KernelProvider {
  name: string;
  kernels: Readonly<Record<string, Kernel>>;
}
