/* =======================================================================================
 * BINDING MODEL
 * ---------------------------------------------------------------------------------------
 * Values are what a name was bound to. Only "is it a function, and with which
 * parameters" is inspected; every other expression is opaque.
 *
 * Vars are the bindings themselves:
 * - local:     owns a value stored in the same scope
 * - reference: aliases another (scope, var) pair; holds no value of its own
 * ======================================================================================= */

import type { NodeId, ScopeId, ValueId, VarId } from "./identity.js";

/** Editor position: 0-based line, 0-based UTF-16 character. */
export interface Position {
  readonly line: number;
  readonly character: number;
}

export interface Param {
  readonly name: string;
  /** Where the parameter is declared. */
  readonly position: Position;
}

export interface FunctionValue {
  readonly kind: "function";
  /** Name the function was declared or first bound under (advisory). */
  readonly name: string | null;
  /** Named parameters in declaration order. A trailing `...` is not included. */
  readonly params: readonly Param[];
  readonly node: NodeId;
}

export interface OpaqueValue {
  readonly kind: "opaque";
  readonly node: NodeId | null;
}

export type Value = FunctionValue | OpaqueValue;

export interface LocalVar {
  readonly kind: "local";
  readonly value: ValueId;
}

export interface ReferenceVar {
  readonly kind: "reference";
  readonly scope: ScopeId;
  readonly var: VarId;
}

export type Var = LocalVar | ReferenceVar;

/** Where a binding lives. */
export interface VarLocation {
  readonly scope: ScopeId;
  readonly var: VarId;
}

/** Where a value lives. */
export interface ValueLocation {
  readonly scope: ScopeId;
  readonly value: ValueId;
}

export interface Hint {
  readonly position: Position;
  readonly label: string;
  readonly kind: "parameter";
}

export function createHint(position: Position, label: string): Hint {
  const hint: Hint = { position: Object.freeze({ ...position }), label, kind: "parameter" };
  return Object.freeze(hint);
}

export function isFunctionValue(value: Value | undefined): value is FunctionValue {
  return value?.kind === "function";
}
