/* =======================================================================================
 * SCOPE TREE
 * ---------------------------------------------------------------------------------------
 * - One root ("global") scope; every other scope names its parent by ScopeId
 * - Each scope owns an append-only Value arena, Var arena and a name table
 * - The scope stack is the builder's traversal state (innermost last)
 * - Node index: block-owning NodeId → ScopeId opened for it
 *
 * Parents are always created before their children, so every parent chain ends
 * at the root.
 * ======================================================================================= */

import { asScopeId, asValueId, asVarId, type NodeId, type ScopeId, type ValueId, type VarId } from "../model/identity.js";
import { isFunctionValue, type FunctionValue, type Value, type ValueLocation, type Var, type VarLocation } from "../model/values.js";
import { debug } from "../shared/debug.js";
import { Arena } from "./arena.js";

export interface Scope {
  readonly id: ScopeId;
  readonly parent: ScopeId | null;
  /** Display name for diagnostics only. */
  readonly name: string | null;
  /** Block-owning node this scope was opened for (null for the root). */
  readonly owner: NodeId | null;
  readonly values: Arena<ValueId, Value>;
  readonly vars: Arena<VarId, Var>;
  /** Latest binding per name; older vars stay alive in `vars`. */
  readonly names: Map<string, VarId>;
}

export type ScopeInvariantCode =
  | "stack-underflow"
  | "unbalanced-stack"
  | "pending-names"
  | "unknown-scope"
  | "duplicate-owner";

/** A broken structural invariant: a defect in the pass, never expected input. */
export class ScopeInvariantError extends Error {
  constructor(
    readonly code: ScopeInvariantCode,
    message: string,
  ) {
    super(message);
    this.name = "ScopeInvariantError";
  }
}

export const ROOT_SCOPE_NAME = "global";

export class ScopeTree {
  readonly root: ScopeId;

  private readonly arena = new Arena<ScopeId, Scope>(asScopeId);
  private readonly stack: ScopeId[] = [];
  private readonly pendingNames: string[] = [];
  private readonly nodeIndex = new Map<NodeId, ScopeId>();
  private pushes = 0;
  private pops = 0;

  constructor() {
    this.root = this.createScope(null, ROOT_SCOPE_NAME, null);
    this.stack.push(this.root);
  }

  /* ---------------------------------------------------------------------------
   * Stack discipline
   * ------------------------------------------------------------------------- */

  get current(): ScopeId {
    const top = this.stack[this.stack.length - 1];
    if (top === undefined) {
      throw new ScopeInvariantError("stack-underflow", "scope stack is empty");
    }
    return top;
  }

  get stackDepth(): number {
    return this.stack.length;
  }

  /** Stack operations performed so far (opens and re-entries count as pushes). */
  get stackEvents(): { readonly pushes: number; readonly pops: number } {
    return { pushes: this.pushes, pops: this.pops };
  }

  /**
   * Open a scope for a block-owning node and make it current.
   * Consumes one pending display name, if any.
   */
  openScope(owner: NodeId, parent: ScopeId = this.current): ScopeId {
    if (this.nodeIndex.has(owner)) {
      throw new ScopeInvariantError("duplicate-owner", `node ${owner} already owns a scope`);
    }
    this.scope(parent);
    const name = this.pendingNames.pop() ?? null;
    const id = this.createScope(parent, name, owner);
    this.nodeIndex.set(owner, id);
    this.stack.push(id);
    this.pushes++;
    debug.scope("open", { id, parent, name, owner });
    return id;
  }

  /** Make an existing scope current until the matching `closeScope`. */
  pushScope(id: ScopeId): void {
    this.scope(id);
    this.stack.push(id);
    this.pushes++;
  }

  /** Pop the current scope. The root is never popped. */
  closeScope(): void {
    if (this.stack.length <= 1) {
      throw new ScopeInvariantError("stack-underflow", "attempted to close the root scope");
    }
    const id = this.stack.pop();
    this.pops++;
    debug.scope("close", { id });
  }

  /** Label the next opened scope. Advisory only. */
  nameNextScope(name: string): void {
    this.pendingNames.push(name);
  }

  get pendingNameCount(): number {
    return this.pendingNames.length;
  }

  /* ---------------------------------------------------------------------------
   * Allocation (always into the current scope)
   * ------------------------------------------------------------------------- */

  allocValue(value: Value): ValueId {
    return this.scope(this.current).values.insert(freezeValue(value));
  }

  allocVar(name: string, variable: Var): VarId {
    const scope = this.scope(this.current);
    const id = scope.vars.insert(Object.freeze(variable));
    scope.names.set(name, id);
    debug.scope("bind", { scope: scope.id, name, kind: variable.kind });
    return id;
  }

  allocLocal(name: string, value: Value): VarId {
    return this.allocVar(name, { kind: "local", value: this.allocValue(value) });
  }

  allocReference(name: string, scope: ScopeId, variable: VarId): VarId {
    return this.allocVar(name, { kind: "reference", scope, var: variable });
  }

  /* ---------------------------------------------------------------------------
   * Resolution
   * ------------------------------------------------------------------------- */

  /** Where `name` is bound, searching from the current scope out to the root. */
  findVarLocation(name: string): VarLocation | null {
    let id: ScopeId | null = this.current;
    while (id !== null) {
      const scope = this.scope(id);
      const found = scope.names.get(name);
      if (found !== undefined) return { scope: id, var: found };
      id = scope.parent;
    }
    return null;
  }

  /**
   * The binding `name` refers to from the current scope.
   *
   * A binding of the current scope is returned as stored. A binding found in an
   * ancestor comes back as a reference through the defining scope, so a later
   * re-binding there is what resolution sees.
   */
  findVar(name: string): Var | null {
    const location = this.findVarLocation(name);
    if (!location) return null;
    if (location.scope === this.current) {
      return this.scope(location.scope).vars.get(location.var) ?? null;
    }
    return { kind: "reference", scope: location.scope, var: location.var };
  }

  /**
   * Follow references until a local binding. Returns null for a dangling id or
   * when the chain comes back to a pair it already visited.
   */
  resolveReference(scope: ScopeId, variable: VarId): ValueLocation | null {
    const visited = new Set<string>();
    let scopeId = scope;
    let varId = variable;
    for (;;) {
      const key = `${scopeId}:${varId}`;
      if (visited.has(key)) {
        debug.scope("cycle", { scope, var: variable, length: visited.size });
        return null;
      }
      visited.add(key);
      const target = this.arena.get(scopeId)?.vars.get(varId);
      if (!target) return null;
      switch (target.kind) {
        case "local":
          return { scope: scopeId, value: target.value };
        case "reference":
          scopeId = target.scope;
          varId = target.var;
          break;
      }
    }
  }

  /** Resolve a var obtained from `findVar` to the value it ends at. */
  resolveVar(variable: Var): ValueLocation | null {
    switch (variable.kind) {
      case "local":
        return { scope: this.current, value: variable.value };
      case "reference":
        return this.resolveReference(variable.scope, variable.var);
    }
  }

  /** The function `name` currently refers to, if it refers to one. */
  resolveFunction(name: string): FunctionValue | null {
    const variable = this.findVar(name);
    if (!variable) return null;
    const location = this.resolveVar(variable);
    if (!location) return null;
    const value = this.value(location);
    return isFunctionValue(value) ? value : null;
  }

  /* ---------------------------------------------------------------------------
   * Accessors
   * ------------------------------------------------------------------------- */

  scope(id: ScopeId): Scope {
    const scope = this.arena.get(id);
    if (!scope) {
      throw new ScopeInvariantError("unknown-scope", `no scope with id ${id}`);
    }
    return scope;
  }

  value(location: ValueLocation): Value | undefined {
    return this.arena.get(location.scope)?.values.get(location.value);
  }

  scopeOfNode(node: NodeId): ScopeId | null {
    return this.nodeIndex.get(node) ?? null;
  }

  /** Indexed block-owning nodes with the scope opened for each. */
  indexedNodes(): IterableIterator<[NodeId, ScopeId]> {
    return this.nodeIndex.entries();
  }

  /** All scopes in creation order (root first). */
  scopes(): readonly Scope[] {
    return this.arena.values();
  }

  get scopeCount(): number {
    return this.arena.size;
  }

  /** Parent chain from `id` up to and including the root. */
  chain(id: ScopeId): ScopeId[] {
    const chain: ScopeId[] = [];
    let next: ScopeId | null = id;
    while (next !== null) {
      chain.push(next);
      next = this.scope(next).parent;
    }
    return chain;
  }

  private createScope(parent: ScopeId | null, name: string | null, owner: NodeId | null): ScopeId {
    return this.arena.insert({
      id: asScopeId(this.arena.size),
      parent,
      name,
      owner,
      values: new Arena<ValueId, Value>(asValueId),
      vars: new Arena<VarId, Var>(asVarId),
      names: new Map(),
    });
  }
}

/** Stored values are immutable, parameter lists included. */
function freezeValue(value: Value): Value {
  if (value.kind === "function") {
    for (const param of value.params) {
      Object.freeze(param.position);
      Object.freeze(param);
    }
    Object.freeze(value.params);
  }
  return Object.freeze(value);
}
