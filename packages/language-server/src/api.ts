// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./context.js";
export * from "./handlers/custom.js";
export * from "./handlers/inlay-hints.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/lsp-types.js";
export * from "./services/settings.js";
export type { Logger } from "./services/types.js";
