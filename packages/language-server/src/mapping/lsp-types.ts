/**
 * Type mapping utilities: analyzer types → LSP types
 */
import { InlayHintKind, type InlayHint, type Position, type Range } from "vscode-languageserver/node.js";
import type { Hint, ParseFailure, Position as AnalyzerPosition } from "@luahint/analyzer";

export function toPosition(position: AnalyzerPosition): Position {
  return { line: position.line, character: position.character };
}

/** Rendered before the argument as `name: value`. */
export function mapHint(hint: Hint): InlayHint {
  return {
    position: toPosition(hint.position),
    label: `${hint.label}:`,
    kind: InlayHintKind.Parameter,
    paddingRight: true,
  };
}

/** Hints whose line lies within `range` (inclusive on both ends). */
export function mapHintsInRange(hints: readonly Hint[], range: Range): InlayHint[] {
  const mapped: InlayHint[] = [];
  for (const hint of hints) {
    const line = hint.position.line;
    if (line < range.start.line || line > range.end.line) continue;
    mapped.push(mapHint(hint));
  }
  return mapped;
}

export function describeParseFailure(failure: ParseFailure): string {
  if (!failure.position) return failure.message;
  return `${failure.message} (line ${failure.position.line + 1})`;
}
