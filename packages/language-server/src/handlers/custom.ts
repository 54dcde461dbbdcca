/**
 * Custom luahint request handlers: luahint/dumpScopes, luahint/scopeAt
 */
import type { Position } from "vscode-languageserver/node.js";
import { describeScopes, scopeAt, visibleNames, type ScopeSummary } from "@luahint/analyzer";
import type { ServerContext } from "../context.js";
import { describeParseFailure } from "../mapping/lsp-types.js";

type MaybeUriParam = { uri?: string } | string | null;

function uriFromParam(params: MaybeUriParam): string | undefined {
  if (typeof params === "string") return params;
  if (params && typeof params === "object" && typeof params.uri === "string") return params.uri;
  return undefined;
}

export interface DumpScopesResponse {
  uri: string;
  scopes: ScopeSummary[];
  hintCount: number;
}

export interface ScopeAtResponse {
  /** Display names from the innermost scope out to the root (`null` for unnamed). */
  chain: (string | null)[];
  /** Names visible at the position, innermost binding first. */
  visible: string[];
}

export function handleDumpScopes(ctx: ServerContext, params: MaybeUriParam): DumpScopesResponse | null {
  const uri = uriFromParam(params);
  ctx.logger.log(`RPC luahint/dumpScopes params=${JSON.stringify(params)}`);
  if (!uri) return null;
  const analysis = ctx.analyzeDocument(uri);
  if (!analysis) return null;
  if (!analysis.ok) {
    ctx.logger.log(`luahint/dumpScopes: ${uri} does not parse: ${describeParseFailure(analysis.failure)}`);
    return null;
  }
  return { uri, scopes: describeScopes(analysis.scopes), hintCount: analysis.hints.length };
}

export function handleScopeAt(
  ctx: ServerContext,
  params: { uri: string; position: Position } | null,
): ScopeAtResponse | null {
  if (!params?.uri || !params.position) return null;
  const doc = ctx.documents.get(params.uri);
  if (!doc) return null;
  const analysis = ctx.analyzeDocument(params.uri);
  if (!analysis || !analysis.ok) return null;
  const scope = scopeAt(analysis, doc.offsetAt(params.position));
  if (scope === null) return null;
  return {
    chain: analysis.scopes.chain(scope).map((id) => analysis.scopes.scope(id).name),
    visible: visibleNames(analysis.scopes, scope),
  };
}

/**
 * Registers all custom luahint request handlers on the connection.
 */
export function registerCustomHandlers(ctx: ServerContext): void {
  ctx.connection.onRequest("luahint/dumpScopes", (params: MaybeUriParam) => handleDumpScopes(ctx, params));
  ctx.connection.onRequest("luahint/scopeAt", (params: { uri: string; position: Position } | null) => handleScopeAt(ctx, params));
}
