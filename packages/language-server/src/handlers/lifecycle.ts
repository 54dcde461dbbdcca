/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import { URI } from "vscode-uri";
import type { ServerContext } from "../context.js";
import {
  resolveServerVersion,
  resolveSettings,
  settingsFromConfiguration,
  type ServerSettings,
} from "../services/settings.js";

export const SERVER_NAME = "luahint";

function workspaceRootOf(params: InitializeParams): string | null {
  const first = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
  return first ? URI.parse(first).fsPath : null;
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = workspaceRootOf(params);
  ctx.settings = resolveSettings(params.initializationOptions);
  ctx.inlayHintRefreshSupport = params.capabilities.workspace?.inlayHint?.refreshSupport === true;
  ctx.logger.info(
    `initialize: root=${ctx.workspaceRoot ?? "<none>"} luaVersion=${ctx.settings.luaVersion} enable=${ctx.settings.enable}`,
  );
  return {
    serverInfo: {
      name: SERVER_NAME,
      version: resolveServerVersion(),
    },
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      inlayHintProvider: true,
      workspace: {
        workspaceFolders: {
          supported: true,
          changeNotifications: true,
        },
      },
    },
  };
}

function sameSettings(a: ServerSettings, b: ServerSettings): boolean {
  return a.enable === b.enable && a.luaVersion === b.luaVersion;
}

export async function handleDidChangeConfiguration(
  ctx: ServerContext,
  params: DidChangeConfigurationParams,
): Promise<void> {
  const next = settingsFromConfiguration(params.settings, ctx.settings);
  if (sameSettings(next, ctx.settings)) return;
  ctx.settings = next;
  ctx.logger.info(`settings changed: luaVersion=${next.luaVersion} enable=${next.enable}`);
  if (!ctx.inlayHintRefreshSupport) return;
  try {
    await ctx.connection.languages.inlayHint.refresh();
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    ctx.logger.warn(`inlay hint refresh failed: ${message}`);
  }
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  ctx.connection.onDidChangeConfiguration((params) => {
    void handleDidChangeConfiguration(ctx, params);
  });

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri} v${e.document.version}`);
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri} v${e.document.version}`);
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
  });
}
