import { LeakedTraceError } from "../core/errors";
import { findLeakedTracers } from "./leak-check";
import type { Trace } from "./trace";

/** Position of an independent trace of the same transformation within a level. */
export class Sublevel {
  constructor(readonly value: number) {}

  toString(): string {
    return String(this.value);
  }
}

export type TraceType = {
  new (master: MasterTrace, sublevel: Sublevel): Trace;
  readonly name: string;
};

/**
 * One activation of a transformation on a context's stack. Identity matters:
 * lifting compares masters by reference.
 */
export class MasterTrace {
  private _retired = false;

  constructor(
    readonly level: number,
    readonly traceType: TraceType,
    readonly context: TraceContext,
  ) {}

  /** True once the activation has been popped. */
  get retired(): boolean {
    return this._retired;
  }

  retire(): void {
    this._retired = true;
  }

  equals(other: MasterTrace): boolean {
    return this.level === other.level && this.traceType === other.traceType;
  }

  toString(): string {
    return `MasterTrace(${this.level},${this.traceType.name})`;
  }
}

/**
 * Active activations. `upward` grows above existing levels (0, 1, ...),
 * `downward` below them (-1, -2, ...).
 */
export class TraceStack {
  readonly upward: MasterTrace[] = [];
  readonly downward: MasterTrace[] = [];

  nextLevel(bottom: boolean): number {
    if (bottom) {
      return -(this.downward.length + 1);
    }
    return this.upward.length;
  }

  push(master: MasterTrace, bottom: boolean): void {
    if (bottom) {
      this.downward.push(master);
    } else {
      this.upward.push(master);
    }
  }

  pop(bottom: boolean): MasterTrace {
    const master = bottom ? this.downward.pop() : this.upward.pop();
    if (!master) {
      throw new Error(`No ${bottom ? "bottom" : "top"} trace to pop`);
    }
    return master;
  }

  toString(): string {
    const up = this.upward
      .slice()
      .reverse()
      .map((m) => `  ${m}\n`)
      .join("");
    const down = this.downward.map((m) => `  ${m}\n`).join("");
    return `Trace stack\n${up} ---\n${down}`;
  }
}

export interface TraceContextOptions {
  /** Verify that nothing returned from a scope still references its activation. */
  checkLeaks?: boolean;
  /** Skip the operand validity check in bind. */
  skipChecks?: boolean;
  /** Print stack pushes and pops. */
  debugStack?: boolean;
}

function envFlag(name: string): boolean {
  return typeof process !== "undefined" && process.env?.[name] === "1";
}

export function defaultTraceContextOptions(): Required<TraceContextOptions> {
  return {
    checkLeaks: envFlag("TRACECORE_CHECK_LEAKS"),
    skipChecks: envFlag("TRACECORE_SKIP_CHECKS"),
    debugStack: envFlag("TRACECORE_DEBUG_STACK"),
  };
}

export interface NewMasterOptions {
  /** Insert below every existing activation instead of above. */
  bottom?: boolean;
}

/**
 * Interpreter state for one thread of control. Every tracing call takes the
 * context explicitly; tracers carry it through their master and cannot be
 * combined under another context.
 */
export class TraceContext {
  readonly traceStack = new TraceStack();
  readonly options: Readonly<Required<TraceContextOptions>>;
  private readonly substack: Sublevel[] = [new Sublevel(0)];

  constructor(options: TraceContextOptions = {}) {
    this.options = { ...defaultTraceContextOptions(), ...options };
  }

  curSublevel(): Sublevel {
    return this.substack[this.substack.length - 1];
  }

  get sublevelDepth(): number {
    return this.substack.length;
  }

  withNewMaster<T>(
    traceType: TraceType,
    fn: (master: MasterTrace) => T,
    options: NewMasterOptions = {},
  ): T {
    const bottom = options.bottom ?? false;
    const level = this.traceStack.nextLevel(bottom);
    const master = new MasterTrace(level, traceType, this);
    this.traceStack.push(master, bottom);
    if (this.options.debugStack) console.log(`[trace-stack] push ${master}`);

    let result: T;
    try {
      result = fn(master);
    } finally {
      this.traceStack.pop(bottom);
      master.retire();
      if (this.options.debugStack) console.log(`[trace-stack] pop ${master}`);
    }

    if (this.options.checkLeaks) {
      const leaked = findLeakedTracers(result, (t) => t.trace.master === master);
      if (leaked.length > 0) {
        throw new LeakedTraceError(String(master), String(this.traceStack));
      }
    }
    return result;
  }

  withNewSublevel<T>(fn: () => T): T {
    const sublevel = new Sublevel(this.substack.length);
    this.substack.push(sublevel);

    let result: T;
    try {
      result = fn();
    } finally {
      this.substack.pop();
    }

    if (this.options.checkLeaks) {
      const leaked = findLeakedTracers(result, (t) => t.trace.sublevel === sublevel);
      if (leaked.length > 0) {
        throw new LeakedTraceError(`sublevel ${sublevel}`, String(this.traceStack));
      }
    }
    return result;
  }

  toString(): string {
    return String(this.traceStack);
  }
}
