/**
 * Parameter-name inlay hints for Lua calls.
 *
 * Every request reanalyzes the document's full current text. A document that
 * does not parse gets no hints until its text changes; unresolved calls simply
 * contribute nothing.
 */
import type { CancellationToken, InlayHint, InlayHintParams } from "vscode-languageserver/node.js";
import type { ServerContext } from "../context.js";
import { describeParseFailure, mapHintsInRange } from "../mapping/lsp-types.js";

export function handleInlayHints(
  ctx: ServerContext,
  params: InlayHintParams,
  token?: CancellationToken,
): InlayHint[] | null {
  const uri = params.textDocument.uri;
  try {
    if (!ctx.settings.enable) return null;
    if (token?.isCancellationRequested) return null;

    const analysis = ctx.analyzeDocument(uri);
    if (!analysis) return null;
    if (!analysis.ok) {
      ctx.logger.log(`[inlayHints] ${uri} does not parse: ${describeParseFailure(analysis.failure)}`);
      return null;
    }

    return mapHintsInRange(analysis.hints, params.range);
  } catch (e) {
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`[inlayHints] failed for ${uri}: ${message}`);
    return null;
  }
}

/**
 * Registers the inlay hint handler on the connection.
 */
export function registerInlayHintHandlers(ctx: ServerContext): void {
  ctx.connection.languages.inlayHint.on((params, token) => handleInlayHints(ctx, params, token));
}
