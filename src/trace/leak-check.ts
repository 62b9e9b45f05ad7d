import { MasterTrace, TraceContext } from "./context";
import { Trace, Tracer } from "./trace";

function isBookkeeping(value: object): boolean {
  return value instanceof Trace || value instanceof MasterTrace || value instanceof TraceContext;
}

/**
 * Collect every tracer reachable from `root` that satisfies `owned`. Walks
 * arrays, maps, sets, and own enumerable properties (including those of
 * tracers, so wrapped tracers are found), but never descends into trace
 * bookkeeping objects.
 */
export function findLeakedTracers(
  root: unknown,
  owned: (tracer: Tracer) => boolean,
): Tracer[] {
  const leaked: Tracer[] = [];
  const seen = new Set<object>();
  const pending: unknown[] = [root];

  while (pending.length > 0) {
    const value = pending.pop();
    if (typeof value !== "object" || value === null) continue;
    if (seen.has(value) || isBookkeeping(value)) continue;
    seen.add(value);

    if (value instanceof Tracer) {
      if (owned(value)) leaked.push(value);
      for (const [key, field] of Object.entries(value)) {
        if (key !== "trace") pending.push(field);
      }
      continue;
    }
    if (value instanceof Map) {
      for (const [k, v] of value) pending.push(k, v);
      continue;
    }
    if (value instanceof Set || Array.isArray(value)) {
      for (const item of value) pending.push(item);
      continue;
    }
    pending.push(...Object.values(value));
  }
  return leaked;
}
