/* =======================================================================================
 * IDENTITY - branded integer ids for one analysis pass
 * ---------------------------------------------------------------------------------------
 * - NodeId: assigned to every syntax node while the parser creates it
 * - ScopeId: index into the pass's scope arena
 * - VarId / ValueId: indexes into one scope's own arenas (meaningful only with that scope)
 *
 * Ids are plain numbers at runtime. They are only meaningful together with the
 * SyntaxTree or ScopeTree that issued them; a new pass issues new ids.
 * ======================================================================================= */

type Brand<T, N extends string> = T & { readonly __brand: N };

export type NodeId = Brand<number, "NodeId">;
export type ScopeId = Brand<number, "ScopeId">;
export type VarId = Brand<number, "VarId">;
export type ValueId = Brand<number, "ValueId">;

export const asNodeId = (n: number): NodeId => n as NodeId;
export const asScopeId = (n: number): ScopeId => n as ScopeId;
export const asVarId = (n: number): VarId => n as VarId;
export const asValueId = (n: number): ValueId => n as ValueId;

/** Sequential id source; one per arena or per parse. */
export class IdAllocator<TId extends number> {
  private next = 0;

  constructor(private readonly brand: (n: number) => TId) {}

  allocate(): TId {
    return this.brand(this.next++);
  }

  /** Number of ids handed out so far. */
  get count(): number {
    return this.next;
  }
}
