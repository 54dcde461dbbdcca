import { describe, test, expect, vi } from "vitest";
import { TextDocumentSyncKind, type InitializeParams } from "vscode-languageserver/node.js";
import {
  handleDidChangeConfiguration,
  handleInitialize,
  registerLifecycleHandlers,
  SERVER_NAME,
} from "@luahint/language-server/api";
import { createTestContext, luaDocument } from "../helpers/test-factories.js";

function initializeParams(overrides: Partial<InitializeParams> = {}): InitializeParams {
  return {
    processId: null,
    rootUri: null,
    capabilities: {},
    ...overrides,
  };
}

describe("handleInitialize", () => {
  test("advertises incremental sync and inlay hints", () => {
    const { ctx } = createTestContext();
    const result = handleInitialize(ctx, initializeParams());

    expect(result.serverInfo?.name).toBe(SERVER_NAME);
    expect(result.capabilities.textDocumentSync).toBe(TextDocumentSyncKind.Incremental);
    expect(result.capabilities.inlayHintProvider).toBe(true);
    expect(result.capabilities.workspace?.workspaceFolders).toEqual({
      supported: true,
      changeNotifications: true,
    });
  });

  test("takes the workspace root from the first workspace folder", () => {
    const { ctx } = createTestContext();
    handleInitialize(ctx, initializeParams({
      rootUri: "file:///elsewhere",
      workspaceFolders: [{ uri: "file:///work/project", name: "project" }],
    }));
    expect(ctx.workspaceRoot).toBe("/work/project");
  });

  test("falls back to rootUri, then to no root", () => {
    const { ctx } = createTestContext();
    handleInitialize(ctx, initializeParams({ rootUri: "file:///work/other" }));
    expect(ctx.workspaceRoot).toBe("/work/other");

    handleInitialize(ctx, initializeParams());
    expect(ctx.workspaceRoot).toBeNull();
  });

  test("reads settings from initializationOptions", () => {
    const { ctx } = createTestContext();
    handleInitialize(ctx, initializeParams({
      initializationOptions: { enable: false, luaVersion: "5.3" },
    }));
    expect(ctx.settings).toEqual({ enable: false, luaVersion: "5.3" });
  });

  test("records whether the client accepts inlay hint refreshes", () => {
    const { ctx } = createTestContext();
    handleInitialize(ctx, initializeParams({
      capabilities: { workspace: { inlayHint: { refreshSupport: true } } },
    }));
    expect(ctx.inlayHintRefreshSupport).toBe(true);

    handleInitialize(ctx, initializeParams());
    expect(ctx.inlayHintRefreshSupport).toBe(false);
  });
});

describe("handleDidChangeConfiguration", () => {
  test("applies changed settings and asks the client to refresh hints", async () => {
    const { ctx, connection, logger } = createTestContext();
    ctx.inlayHintRefreshSupport = true;

    await handleDidChangeConfiguration(ctx, { settings: { luahint: { luaVersion: "5.2" } } });

    expect(ctx.settings).toEqual({ enable: true, luaVersion: "5.2" });
    expect(connection.languages.inlayHint.refresh).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("settings changed: luaVersion=5.2 enable=true");
  });

  test("does nothing when the settings are unchanged", async () => {
    const { ctx, connection } = createTestContext();
    ctx.inlayHintRefreshSupport = true;

    await handleDidChangeConfiguration(ctx, { settings: { luahint: { enable: true } } });
    await handleDidChangeConfiguration(ctx, { settings: null });

    expect(connection.languages.inlayHint.refresh).not.toHaveBeenCalled();
  });

  test("does not refresh a client without refresh support", async () => {
    const { ctx, connection } = createTestContext();

    await handleDidChangeConfiguration(ctx, { settings: { luahint: { enable: false } } });

    expect(ctx.settings.enable).toBe(false);
    expect(connection.languages.inlayHint.refresh).not.toHaveBeenCalled();
  });

  test("logs a failed refresh as a warning", async () => {
    const { ctx, connection, logger } = createTestContext();
    ctx.inlayHintRefreshSupport = true;
    connection.languages.inlayHint.refresh.mockRejectedValueOnce(new Error("client gone"));

    await handleDidChangeConfiguration(ctx, { settings: { luahint: { enable: false } } });

    expect(logger.warn).toHaveBeenCalledWith("inlay hint refresh failed: client gone");
  });
});

describe("registerLifecycleHandlers", () => {
  test("wires initialize, configuration and document events", () => {
    const { ctx, connection, documents } = createTestContext();

    registerLifecycleHandlers(ctx);

    expect(connection.onInitialize).toHaveBeenCalledTimes(1);
    expect(connection.onDidChangeConfiguration).toHaveBeenCalledTimes(1);
    expect(documents.onDidOpen).toHaveBeenCalledTimes(1);
    expect(documents.onDidChangeContent).toHaveBeenCalledTimes(1);
    expect(documents.onDidClose).toHaveBeenCalledTimes(1);
  });

  test("logs document events", () => {
    const { ctx, documents, logger } = createTestContext();
    registerLifecycleHandlers(ctx);

    const onOpen = documents.onDidOpen.mock.calls[0]?.[0];
    const onClose = documents.onDidClose.mock.calls[0]?.[0];
    const document = luaDocument("file:///workspace/a.lua", "", 3);
    onOpen({ document });
    onClose({ document });

    expect(logger.log).toHaveBeenCalledWith("didOpen file:///workspace/a.lua v3");
    expect(logger.log).toHaveBeenCalledWith("didClose file:///workspace/a.lua");
  });

  test("the registered initialize handler answers with capabilities", () => {
    const { ctx, connection } = createTestContext();
    registerLifecycleHandlers(ctx);

    const onInitialize = connection.onInitialize.mock.calls[0]?.[0];
    const result = onInitialize(initializeParams());
    expect(result.capabilities.inlayHintProvider).toBe(true);
  });

  test("the registered configuration handler applies settings", async () => {
    const { ctx, connection } = createTestContext();
    registerLifecycleHandlers(ctx);

    const onChange = connection.onDidChangeConfiguration.mock.calls[0]?.[0];
    onChange({ settings: { luahint: { luaVersion: "LuaJIT" } } });
    await vi.waitFor(() => expect(ctx.settings.luaVersion).toBe("LuaJIT"));
  });
});
