/* =======================================================================================
 * ANALYSIS - entry points
 * ---------------------------------------------------------------------------------------
 * computeHints(tree)       parsed tree → hints (the core's single entry point)
 * analyzeText(text, opts)  parse + build + hints; parse failure comes back as a value
 * scopeAt(result, offset)  innermost scope whose owning block contains an offset
 * describeScopes(scopes)   plain summaries of every scope, for inspection
 *
 * Every call builds a fresh ScopeBuilder; nothing is shared between passes.
 * ======================================================================================= */

import type { NodeId, ScopeId } from "./model/identity.js";
import type { Hint } from "./model/values.js";
import { ScopeBuilder } from "./scope/builder.js";
import type { ScopeTree } from "./scope/scope-tree.js";
import { parseLua, rangeOf, type ParseFailure, type ParseOptions, type SyntaxTree } from "./syntax/parse.js";

export type AnalyzeOptions = ParseOptions;

export interface Analysis {
  readonly ok: true;
  readonly syntax: SyntaxTree;
  readonly scopes: ScopeTree;
  readonly hints: readonly Hint[];
}

export type AnalysisResult = Analysis | { readonly ok: false; readonly failure: ParseFailure };

export function computeHints(tree: SyntaxTree): readonly Hint[] {
  return new ScopeBuilder(tree).build().hints;
}

export function analyzeText(text: string, options: AnalyzeOptions = {}): AnalysisResult {
  const parsed = parseLua(text, options);
  if (!parsed.ok) return parsed;
  const { scopes, hints } = new ScopeBuilder(parsed.tree).build();
  return { ok: true, syntax: parsed.tree, scopes, hints };
}

/**
 * Innermost scope at a source offset, found through the node index: the
 * smallest owning block whose range contains the offset. Falls back to the
 * chunk's scope for offsets outside every block (e.g. trailing comments).
 */
export function scopeAt(analysis: Analysis, offset: number): ScopeId | null {
  let best: { scope: ScopeId; size: number } | null = null;
  for (const [nodeId, scope] of analysis.scopes.indexedNodes()) {
    const node = analysis.syntax.node(nodeId);
    const range = node ? rangeOf(node) : null;
    if (!range || offset < range[0] || offset > range[1]) continue;
    const size = range[1] - range[0];
    if (!best || size < best.size || (size === best.size && scope > best.scope)) {
      best = { scope, size };
    }
  }
  return best?.scope ?? analysis.scopes.scopeOfNode(analysis.syntax.idOf(analysis.syntax.chunk));
}

/** Names visible from `scope`, innermost binding first, each name once. */
export function visibleNames(scopes: ScopeTree, scope: ScopeId): string[] {
  const seen = new Set<string>();
  for (const id of scopes.chain(scope)) {
    for (const name of scopes.scope(id).names.keys()) seen.add(name);
  }
  return [...seen];
}

export interface ScopeSummary {
  readonly id: ScopeId;
  readonly parent: ScopeId | null;
  readonly name: string | null;
  readonly owner: NodeId | null;
  readonly names: readonly string[];
}

export function describeScopes(scopes: ScopeTree): ScopeSummary[] {
  return scopes.scopes().map((scope) => ({
    id: scope.id,
    parent: scope.parent,
    name: scope.name,
    owner: scope.owner,
    names: [...scope.names.keys()],
  }));
}
