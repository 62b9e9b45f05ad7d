export type CoreErrorKind =
  | "malformed_program"
  | "dispatch"
  | "lifting"
  | "unimplemented_rule"
  | "leak";

/**
 * Raised by the validator and the graph interpreter: use-before-def,
 * redefinition, unresolved closure reference, or a binding count mismatch.
 */
export class MalformedProgramError extends Error {
  name = "MalformedProgramError";
  readonly kind = "malformed_program";

  constructor(
    message: string,
    readonly variable: string | undefined,
    readonly program: string,
  ) {
    super(`${message}\njaxpr:\n${program}\n`);
  }
}

/**
 * A value that breaks the dispatch protocol: an operand that is neither a
 * tracer nor a registered concrete value, or a rule result of the wrong arity.
 */
export class InvalidOperandError extends Error {
  name = "InvalidOperandError";
  readonly kind = "dispatch";
}

export class LiftingError extends Error {
  name = "LiftingError";
  readonly kind = "lifting";

  constructor(
    message: string,
    readonly source: string,
    readonly target: string,
  ) {
    super(message);
  }
}

export type RuleName = "impl" | "abstract_eval" | "post_process_call";

export class UnimplementedRuleError extends Error {
  name = "UnimplementedRuleError";
  readonly kind = "unimplemented_rule";

  constructor(
    readonly primitive: string,
    readonly rule: RuleName,
    message?: string,
  ) {
    super(message ?? defaultRuleMessage(primitive, rule));
  }
}

function defaultRuleMessage(primitive: string, rule: RuleName): string {
  switch (rule) {
    case "impl":
      return `Evaluation rule for '${primitive}' not implemented`;
    case "abstract_eval":
      return `Abstract evaluation for '${primitive}' not implemented`;
    case "post_process_call":
      return `Call post-processing for '${primitive}' not implemented`;
  }
}

/** A popped activation or sublevel is still referenced. Debug only. */
export class LeakedTraceError extends Error {
  name = "LeakedTraceError";
  readonly kind = "leak";

  constructor(
    readonly leaked: string,
    readonly traceStack: string,
  ) {
    super(`Leaked trace ${leaked}\n${traceStack}`);
  }
}

export type CoreError =
  | MalformedProgramError
  | InvalidOperandError
  | LiftingError
  | UnimplementedRuleError
  | LeakedTraceError;

export type CoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CoreError };

export function isCoreError(err: unknown): err is CoreError {
  return (
    err instanceof MalformedProgramError ||
    err instanceof InvalidOperandError ||
    err instanceof LiftingError ||
    err instanceof UnimplementedRuleError ||
    err instanceof LeakedTraceError
  );
}

/**
 * Run `fn`, turning a thrown core error into a failed result. Anything
 * else that is thrown propagates.
 */
export function attempt<T>(fn: () => T): CoreResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isCoreError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
