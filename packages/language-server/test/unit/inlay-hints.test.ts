import { describe, test, expect, vi } from "vitest";
import { InlayHintKind } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { handleInlayHints, registerInlayHintHandlers } from "@luahint/language-server/api";
import { createTestContext, inlayHintParams, lines, luaDocument } from "../helpers/test-factories.js";

const URI = "file:///workspace/main.lua";
const SOURCE = "local function f(a, b) end\nf(1, 2)";

describe("handleInlayHints", () => {
  test("returns parameter hints for resolved calls", () => {
    const { ctx } = createTestContext({ docs: [luaDocument(URI, SOURCE)] });

    expect(handleInlayHints(ctx, inlayHintParams(URI))).toEqual([
      { position: { line: 1, character: 2 }, label: "a:", kind: InlayHintKind.Parameter, paddingRight: true },
      { position: { line: 1, character: 5 }, label: "b:", kind: InlayHintKind.Parameter, paddingRight: true },
    ]);
  });

  test("returns only hints inside the requested range", () => {
    const { ctx } = createTestContext({ docs: [luaDocument(URI, SOURCE)] });
    expect(handleInlayHints(ctx, inlayHintParams(URI, lines(0, 0)))).toEqual([]);
  });

  test("reanalyzes the current text on every request", () => {
    const doc = luaDocument(URI, SOURCE);
    const { ctx } = createTestContext({ docs: [doc] });
    expect(handleInlayHints(ctx, inlayHintParams(URI))).toHaveLength(2);

    TextDocument.update(doc, [{ text: "local function f(x) end\nf(1)" }], doc.version + 1);
    expect(handleInlayHints(ctx, inlayHintParams(URI))?.map((h) => h.label)).toEqual(["x:"]);
  });

  test("returns null for a document that is not open", () => {
    const { ctx } = createTestContext();
    expect(handleInlayHints(ctx, inlayHintParams(URI))).toBeNull();
  });

  test("returns null when hints are disabled", () => {
    const { ctx, documents } = createTestContext({
      docs: [luaDocument(URI, SOURCE)],
      settings: { enable: false, luaVersion: "5.1" },
    });
    expect(handleInlayHints(ctx, inlayHintParams(URI))).toBeNull();
    expect(documents.get).not.toHaveBeenCalled();
  });

  test("returns null for a cancelled request", () => {
    const { ctx } = createTestContext({ docs: [luaDocument(URI, SOURCE)] });
    const token = { isCancellationRequested: true, onCancellationRequested: vi.fn() };
    expect(handleInlayHints(ctx, inlayHintParams(URI), token as never)).toBeNull();
  });

  test("returns null and logs when the document does not parse", () => {
    const { ctx, logger } = createTestContext({ docs: [luaDocument(URI, "local = 1")] });

    expect(handleInlayHints(ctx, inlayHintParams(URI))).toBeNull();
    expect(logger.log).toHaveBeenCalledWith(
      expect.stringContaining(`[inlayHints] ${URI} does not parse:`),
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  test("returns null and logs when analysis throws", () => {
    const logger = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const ctx = {
      logger,
      settings: { enable: true, luaVersion: "5.1" },
      analyzeDocument: vi.fn(() => {
        throw new Error("analysis exploded");
      }),
    };

    expect(handleInlayHints(ctx as never, inlayHintParams(URI))).toBeNull();
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining(`[inlayHints] failed for ${URI}: Error: analysis exploded`),
    );
  });
});

describe("registerInlayHintHandlers", () => {
  test("registers a handler that answers inlay hint requests", () => {
    const { ctx, connection } = createTestContext({ docs: [luaDocument(URI, SOURCE)] });

    registerInlayHintHandlers(ctx);

    expect(connection.languages.inlayHint.on).toHaveBeenCalledTimes(1);
    const handler = connection.languages.inlayHint.on.mock.calls[0]?.[0];
    expect(typeof handler).toBe("function");
    const token = { isCancellationRequested: false, onCancellationRequested: vi.fn() };
    expect(handler(inlayHintParams(URI), token)).toHaveLength(2);
  });
});
