/**
 * Parameter hints for one call site.
 *
 * Only a bare-name callee is resolved (`f(...)`, and `(f)(...)` since the parser
 * keeps no node for parentheses). Member, method, index and call callees give
 * no hints. Arguments and parameters are paired positionally; the unmatched
 * tail on either side is ignored.
 *
 * A hint sits where its argument starts in the source. For `f((1))` that is the
 * inner `(`: the parser reports the literal's own start, so the wrapping
 * parentheses are recovered from the text.
 */
import type { CallExpression, Expression } from "luaparse";
import { createHint, type FunctionValue, type Hint, type Position } from "../model/values.js";
import type { ScopeTree } from "../scope/scope-tree.js";
import { debug } from "../shared/debug.js";
import { isParenthesized, rangeOf, startOf, type SyntaxTree } from "../syntax/parse.js";

export function callHints(scopes: ScopeTree, syntax: SyntaxTree, call: CallExpression): Hint[] {
  const callee = resolveCallee(scopes, call.base);
  if (!callee) return [];

  const hints: Hint[] = [];
  const count = Math.min(call.arguments.length, callee.params.length);
  for (let index = 0; index < count; index++) {
    const argument = call.arguments[index];
    const param = callee.params[index];
    if (!argument || !param) continue;
    const position = argumentStart(syntax, argument, index === 0);
    if (!position) continue;
    hints.push(createHint(position, param.name));
  }
  debug.hints("call", { callee: callee.name, args: call.arguments.length, hints: hints.length });
  return hints;
}

export function resolveCallee(scopes: ScopeTree, callee: Expression): FunctionValue | null {
  if (callee.type !== "Identifier") {
    debug.hints("unsupported", { callee: callee.type });
    return null;
  }
  const fn = scopes.resolveFunction(callee.name);
  if (!fn) debug.hints("unresolved", { name: callee.name });
  return fn;
}

/**
 * Start of an argument including any parentheses around it. Walks back over
 * whitespace and `(` from the expression itself; for the first argument the
 * earliest `(` of that run is the call's own and is not part of the argument.
 */
function argumentStart(syntax: SyntaxTree, argument: Expression, first: boolean): Position | null {
  const range = rangeOf(argument);
  if (!isParenthesized(argument) || !range) return startOf(argument);

  const text = syntax.text;
  const parens: number[] = [];
  for (let offset = range[0] - 1; offset >= 0; offset--) {
    const ch = text[offset];
    if (ch === "(") parens.push(offset);
    else if (ch !== " " && ch !== "\t" && ch !== "\n" && ch !== "\r") break;
  }
  if (first) parens.pop();
  const open = parens[parens.length - 1];
  return open === undefined ? startOf(argument) : syntax.positionAt(open);
}
