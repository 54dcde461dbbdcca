#!/usr/bin/env node
/**
 * luahint Language Server - Entry Point
 *
 * A thin entry point that creates the server context and wires together the
 * handlers:
 *
 * - context.ts             - ServerContext with shared state and document analysis
 * - handlers/lifecycle.ts  - initialize, configuration and document events
 * - handlers/inlay-hints.ts - parameter-name inlay hints
 * - handlers/custom.ts     - luahint/* inspection requests
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createServerContext } from "./context.js";
import type { Logger } from "./services/types.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";
import { registerInlayHintHandlers } from "./handlers/inlay-hints.js";
import { registerCustomHandlers } from "./handlers/custom.js";

// Transport (--stdio, --node-ipc, --socket=) is picked from the command line
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const logger: Logger = {
  log: (m: string) => connection.console.log(`[luahint] ${m}`),
  info: (m: string) => connection.console.info(`[luahint] ${m}`),
  warn: (m: string) => connection.console.warn(`[luahint] ${m}`),
  error: (m: string) => connection.console.error(`[luahint] ${m}`),
};

const ctx = createServerContext({
  connection,
  documents,
  logger,
});

registerLifecycleHandlers(ctx);
registerInlayHintHandlers(ctx);
registerCustomHandlers(ctx);

documents.listen(connection);
connection.listen();
