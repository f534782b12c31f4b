import { lookupPrim } from "@quilt/core";
import type { NativeFn } from "@quilt/core";

/** Expose a core primitive operator under a stdlib name. */
export function fromPrim(name: string, prim: string): NativeFn {
  const p = lookupPrim(prim);
  if (!p) {
    throw new Error(`Unknown primitive operator '%${prim}%'`);
  }
  return { name, arity: p.arity, execute: p.execute };
}
