import { UnimplementedRuleError } from "../core/errors";
import { getPrimitive, type Primitive, type PrimitiveRules } from "../core/primitive";
import type { KernelProvider } from "./types";

const providers = new Map<string, KernelProvider>();

let activeProvider: KernelProvider | undefined;

export function getKernelProvider(name: string): KernelProvider | undefined {
  return providers.get(name);
}

export function getActiveKernelProvider(): KernelProvider | undefined {
  return activeProvider;
}

function resolveTargets(provider: KernelProvider): Map<Primitive, PrimitiveRules> {
  const targets = new Map<Primitive, PrimitiveRules>();
  for (const [name, kernel] of Object.entries(provider.kernels)) {
    const primitive = getPrimitive(name);
    if (!primitive) {
      throw new UnimplementedRuleError(
        name,
        "impl",
        `Kernel provider '${provider.name}' defines '${name}', which is not a primitive`,
      );
    }
    targets.set(primitive, { impl: kernel.impl, abstractEval: kernel.abstractEval });
  }
  return targets;
}

export function registerKernelProvider(provider: KernelProvider): void {
  providers.set(provider.name, provider);
}

function lookup(name: string): KernelProvider {
  const provider = providers.get(name);
  if (!provider) {
    throw new Error(`Unknown kernel provider: ${name}`);
  }
  return provider;
}

/**
 * Rules to install when switching to `provider`: its own kernels, plus empty
 * rules for every primitive the active provider covered that it leaves out.
 */
function switchTargets(provider: KernelProvider): Map<Primitive, PrimitiveRules> {
  const targets = resolveTargets(provider);
  if (activeProvider && activeProvider !== provider) {
    for (const name of Object.keys(activeProvider.kernels)) {
      const primitive = getPrimitive(name);
      if (primitive && !targets.has(primitive)) {
        targets.set(primitive, {});
      }
    }
  }
  return targets;
}

/**
 * Install a registered provider's kernels into the primitives they name.
 * Primitives only the previous provider covered lose their rules. Every
 * name is resolved before any rule is replaced.
 */
export function useKernelProvider(name: string): KernelProvider {
  const provider = lookup(name);
  for (const [primitive, rules] of switchTargets(provider)) {
    primitive.setRules(rules);
  }
  activeProvider = provider;
  return provider;
}

/** Run `fn` with a registered provider's kernels installed, then restore the previous rules. */
export function withKernelProvider<T>(name: string, fn: (provider: KernelProvider) => T): T {
  const provider = lookup(name);
  const targets = switchTargets(provider);
  const previous = new Map<Primitive, PrimitiveRules>();
  for (const [primitive, rules] of targets) {
    previous.set(primitive, primitive.rules);
    primitive.setRules(rules);
  }
  const previousProvider = activeProvider;
  activeProvider = provider;
  try {
    return fn(provider);
  } finally {
    for (const [primitive, rules] of previous) {
      primitive.setRules(rules);
    }
    activeProvider = previousProvider;
  }
}
