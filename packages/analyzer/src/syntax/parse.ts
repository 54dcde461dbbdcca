/* =======================================================================================
 * SYNTAX - luaparse adapter
 * ---------------------------------------------------------------------------------------
 * - Parses a full text snapshot into a luaparse Chunk (locations + ranges on)
 * - Assigns every node a NodeId in creation order while the parser runs
 * - Converts luaparse locations (1-based line, 0-based column) to editor positions
 * - Turns a thrown luaparse SyntaxError into a ParseFailure value
 *
 * The tree is never mutated after parsing.
 * ======================================================================================= */

import luaparse from "luaparse";
import type { Chunk, Node } from "luaparse";
import { IdAllocator, asNodeId, type NodeId } from "../model/identity.js";
import type { Position } from "../model/values.js";
import { debug } from "../shared/debug.js";

export type LuaVersion = "5.1" | "5.2" | "5.3" | "LuaJIT";

export const LUA_VERSIONS: readonly LuaVersion[] = ["5.1", "5.2", "5.3", "LuaJIT"];

export const DEFAULT_LUA_VERSION: LuaVersion = "5.1";

export function isLuaVersion(value: unknown): value is LuaVersion {
  return typeof value === "string" && LUA_VERSIONS.some((v) => v === value);
}

export interface ParseOptions {
  luaVersion?: LuaVersion;
}

export interface ParseFailure {
  readonly code: "parse-error";
  readonly message: string;
  /** Where the parser gave up, when it reported a location. */
  readonly position: Position | null;
}

export type ParseResult =
  | { readonly ok: true; readonly tree: SyntaxTree }
  | { readonly ok: false; readonly failure: ParseFailure };

/** Source offsets `[start, end)` of a node. */
export type NodeRange = readonly [number, number];

/**
 * A parsed document plus the NodeId table built while parsing.
 */
export class SyntaxTree {
  private starts: number[] | null = null;

  constructor(
    readonly text: string,
    readonly chunk: Chunk,
    private readonly ids: ReadonlyMap<Node, NodeId>,
    private readonly nodes: readonly Node[],
  ) {}

  /** Id of a node of this tree; throws for a node from elsewhere. */
  idOf(node: Node): NodeId {
    const id = this.ids.get(node);
    if (id === undefined) {
      throw new Error(`node ${node.type} does not belong to this syntax tree`);
    }
    return id;
  }

  node(id: NodeId): Node | undefined {
    return this.nodes[id];
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  /** Editor position of a source offset. Line breaks are counted as luaparse counts them. */
  positionAt(offset: number): Position {
    const starts = this.lineStarts();
    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((starts[mid] ?? 0) <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low, character: offset - (starts[low] ?? 0) };
  }

  private lineStarts(): number[] {
    if (this.starts) return this.starts;
    const starts = [0];
    const text = this.text;
    for (let index = 0; index < text.length; index++) {
      const ch = text.charCodeAt(index);
      if (ch !== 10 && ch !== 13) continue;
      // \r\n and \n\r are one break
      const next = text.charCodeAt(index + 1);
      if ((next === 10 || next === 13) && next !== ch) index++;
      starts.push(index + 1);
    }
    this.starts = starts;
    return starts;
  }
}

export function parseLua(text: string, options: ParseOptions = {}): ParseResult {
  const luaVersion = options.luaVersion ?? DEFAULT_LUA_VERSION;
  const allocator = new IdAllocator(asNodeId);
  const ids = new Map<Node, NodeId>();
  const nodes: Node[] = [];

  try {
    const chunk = luaparse.parse(text, {
      locations: true,
      ranges: true,
      comments: false,
      luaVersion,
      onCreateNode: (node) => {
        ids.set(node, allocator.allocate());
        nodes.push(node);
      },
    });
    debug.parse("complete", { luaVersion, nodes: allocator.count, length: text.length });
    return { ok: true, tree: new SyntaxTree(text, chunk, ids, nodes) };
  } catch (error) {
    const failure = toParseFailure(error);
    debug.parse("failed", { luaVersion, message: failure.message });
    return { ok: false, failure };
  }
}

/** Start of a node as an editor position. */
export function startOf(node: Node): Position | null {
  const loc = node.loc;
  if (!loc) return null;
  return { line: loc.start.line - 1, character: loc.start.column };
}

/** Whether the parser saw the expression wrapped in parentheses. */
export function isParenthesized(node: Node): boolean {
  return Reflect.get(node, "inParens") === true;
}

export function rangeOf(node: Node): NodeRange | null {
  const range = node.range;
  if (!range) return null;
  return [range[0], range[1]];
}

function toParseFailure(error: unknown): ParseFailure {
  // luaparse reports syntax errors as SyntaxError with `line` (1-based) and
  // `column` attached; anything else is a defect and keeps propagating.
  if (!(error instanceof SyntaxError)) throw error;
  const line = numericProperty(error, "line");
  const column = numericProperty(error, "column");
  return {
    code: "parse-error",
    message: error.message,
    position: line !== null && column !== null
      ? { line: Math.max(0, line - 1), character: Math.max(0, column) }
      : null,
  };
}

function numericProperty(source: object, key: string): number | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : null;
}
