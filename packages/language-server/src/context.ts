import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { analyzeText, type AnalysisResult } from "@luahint/analyzer";
import type { Logger } from "./services/types.js";
import { DEFAULT_SETTINGS, type ServerSettings } from "./services/settings.js";

/**
 * Shared server context passed to all handlers.
 * Holds the connection, the open documents and the current settings.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;

  // Mutable state
  workspaceRoot: string | null;
  settings: ServerSettings;
  /** Client accepts `workspace/inlayHint/refresh`. */
  inlayHintRefreshSupport: boolean;

  /**
   * Analyze the current text of an open document. Returns null when the
   * document is not open. Each call is a fresh, independent pass.
   */
  analyzeDocument(uri: string): AnalysisResult | null;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  settings?: ServerSettings;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;

  let workspaceRoot: string | null = null;
  let settings: ServerSettings = init.settings ?? { ...DEFAULT_SETTINGS };
  let inlayHintRefreshSupport = false;

  function analyzeDocument(uri: string): AnalysisResult | null {
    const doc = documents.get(uri);
    if (!doc) return null;
    // getText() is a full snapshot; edits arriving later do not affect this pass
    return analyzeText(doc.getText(), { luaVersion: settings.luaVersion });
  }

  return {
    connection,
    documents,
    logger,

    get workspaceRoot() { return workspaceRoot; },
    set workspaceRoot(v) { workspaceRoot = v; },

    get settings() { return settings; },
    set settings(v) { settings = v; },

    get inlayHintRefreshSupport() { return inlayHintRefreshSupport; },
    set inlayHintRefreshSupport(v) { inlayHintRefreshSupport = v; },

    analyzeDocument,
  };
}
