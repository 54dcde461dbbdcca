/* =======================================================================================
 * SCOPE BUILDER
 * ---------------------------------------------------------------------------------------
 * One traversal of a luaparse chunk:
 * - opens/closes a scope per block, in lockstep with the source nesting
 * - records local, global and alias bindings into the scope tree
 * - generates parameter hints at each call, using the scope state at that point
 *
 * Single pass and declaration-order sensitive: a call only sees bindings made
 * before it in traversal order. Unrecognised shapes are skipped silently.
 * ======================================================================================= */

import type {
  AssignmentStatement,
  Chunk,
  Expression,
  FunctionDeclaration,
  Identifier,
  LocalStatement,
  Node,
  Statement,
} from "luaparse";
import type { FunctionValue, Hint, Param, Value, VarLocation } from "../model/values.js";
import { debug } from "../shared/debug.js";
import { startOf, type SyntaxTree } from "../syntax/parse.js";
import { callHints } from "../hints/generate.js";
import { ScopeInvariantError, ScopeTree } from "./scope-tree.js";

/** What a name gets bound to. */
type Binding =
  | { readonly kind: "value"; readonly value: Value }
  | { readonly kind: "alias"; readonly target: VarLocation };

export interface BuildResult {
  readonly scopes: ScopeTree;
  /** Hints in call-site traversal order. */
  readonly hints: readonly Hint[];
}

/**
 * Builds the scope tree and hint list for one syntax tree.
 * Construct one per analysis pass; `build` runs once.
 */
export class ScopeBuilder {
  private readonly scopes = new ScopeTree();
  private readonly hints: Hint[] = [];
  private result: BuildResult | null = null;

  constructor(private readonly syntax: SyntaxTree) {}

  build(): BuildResult {
    if (this.result) return this.result;

    this.visitChunk(this.syntax.chunk);

    if (this.scopes.stackDepth !== 1 || this.scopes.current !== this.scopes.root) {
      throw new ScopeInvariantError(
        "unbalanced-stack",
        `scope stack holds ${this.scopes.stackDepth} entries after traversal`,
      );
    }
    if (this.scopes.pendingNameCount !== 0) {
      throw new ScopeInvariantError(
        "pending-names",
        `${this.scopes.pendingNameCount} scope names were never consumed`,
      );
    }

    debug.scope("complete", { scopes: this.scopes.scopeCount, hints: this.hints.length });
    this.result = { scopes: this.scopes, hints: this.hints };
    return this.result;
  }

  /* ---------------------------------------------------------------------------
   * Blocks
   * ------------------------------------------------------------------------- */

  private visitChunk(chunk: Chunk): void {
    this.visitBlock(chunk, chunk.body);
  }

  /**
   * Open a scope for `owner`, bind `locals` (parameters, loop variables) in it
   * as opaque values, visit the statements, then close it. `tail` runs before
   * closing, for `repeat ... until cond` whose condition sees the body's locals.
   */
  private visitBlock(
    owner: Node,
    body: readonly Statement[],
    locals: readonly Identifier[] = [],
    tail?: () => void,
  ): void {
    this.scopes.openScope(this.syntax.idOf(owner));
    for (const local of locals) {
      this.scopes.allocLocal(local.name, this.opaque(local));
    }
    for (const statement of body) {
      this.visitStatement(statement);
    }
    tail?.();
    this.scopes.closeScope();
  }

  /* ---------------------------------------------------------------------------
   * Statements
   * ------------------------------------------------------------------------- */

  private visitStatement(statement: Statement): void {
    switch (statement.type) {
      case "LocalStatement":
        this.visitLocalStatement(statement);
        return;
      case "AssignmentStatement":
        this.visitAssignment(statement);
        return;
      case "FunctionDeclaration":
        this.visitFunctionDeclaration(statement);
        return;
      case "CallStatement":
        this.visitExpression(statement.expression);
        return;
      case "DoStatement":
        this.visitBlock(statement, statement.body);
        return;
      case "WhileStatement":
        this.visitExpression(statement.condition);
        this.visitBlock(statement, statement.body);
        return;
      case "RepeatStatement":
        this.visitBlock(statement, statement.body, [], () => this.visitExpression(statement.condition));
        return;
      case "IfStatement":
        for (const clause of statement.clauses) {
          if (clause.type !== "ElseClause") this.visitExpression(clause.condition);
          this.visitBlock(clause, clause.body);
        }
        return;
      case "ForNumericStatement":
        this.visitExpression(statement.start);
        this.visitExpression(statement.end);
        if (statement.step) this.visitExpression(statement.step);
        this.visitBlock(statement, statement.body, [statement.variable]);
        return;
      case "ForGenericStatement":
        for (const iterator of statement.iterators) this.visitExpression(iterator);
        this.visitBlock(statement, statement.body, statement.variables);
        return;
      case "ReturnStatement":
        for (const argument of statement.arguments) this.visitExpression(argument);
        return;
      default:
        // labels, goto, break: nothing to bind or resolve
        return;
    }
  }

  /** `local a, b = x, y`: initialisers first, then the names (not visible in their own init). */
  private visitLocalStatement(statement: LocalStatement): void {
    statement.init.forEach((expression, index) => {
      this.visitInitializer(expression, statement.variables[index]?.name ?? null);
    });

    const bindings = statement.variables.map((variable, index) => {
      const expression = statement.init[index];
      return expression ? this.bindingOf(expression, variable.name) : this.opaqueBinding(variable);
    });
    statement.variables.forEach((variable, index) => {
      const binding = bindings[index];
      if (binding) this.bind(variable.name, binding);
    });
  }

  /**
   * `a, b = x, y` always targets globals: the root is made current for the whole
   * statement, names are bound first, then the right-hand side is visited.
   */
  private visitAssignment(statement: AssignmentStatement): void {
    this.withRoot(() => {
      const bindings = statement.variables.map((target, index) => {
        const expression = statement.init[index];
        if (target.type !== "Identifier" || !expression) return null;
        return { name: target.name, binding: this.bindingOf(expression, target.name) };
      });
      for (const entry of bindings) {
        if (entry) this.bind(entry.name, entry.binding);
      }

      for (const target of statement.variables) {
        // `t.x = ...` / `t[k] = ...`: no binding, but calls inside still count
        if (target.type !== "Identifier") this.visitExpression(target);
      }
      statement.init.forEach((expression, index) => {
        const target = statement.variables[index];
        this.visitInitializer(expression, target?.type === "Identifier" ? target.name : null);
      });
    });
  }

  private visitFunctionDeclaration(declaration: FunctionDeclaration): void {
    const identifier = declaration.identifier;
    if (!identifier) {
      this.visitFunction(declaration, null);
      return;
    }

    if (declaration.isLocal && identifier.type === "Identifier") {
      // bound before the body so the function can call itself
      this.scopes.allocLocal(identifier.name, this.functionValue(declaration, identifier.name));
      this.visitFunction(declaration, identifier.name);
      return;
    }

    const name = qualifiedName(identifier);
    this.withRoot(() => {
      if (identifier.type === "Identifier") {
        this.scopes.allocLocal(identifier.name, this.functionValue(declaration, identifier.name));
      }
      this.visitFunction(declaration, name);
    });
  }

  /* ---------------------------------------------------------------------------
   * Expressions
   * ------------------------------------------------------------------------- */

  private visitInitializer(expression: Expression, name: string | null): void {
    if (expression.type === "FunctionDeclaration") {
      this.visitFunction(expression, name);
    } else {
      this.visitExpression(expression);
    }
  }

  private visitFunction(fn: FunctionDeclaration, name: string | null): void {
    if (name !== null) this.scopes.nameNextScope(name);
    this.visitBlock(fn, fn.body, namedParameters(fn));
  }

  private visitExpression(expression: Expression): void {
    switch (expression.type) {
      case "CallExpression":
        // outer call before the calls nested in its callee and arguments
        this.hints.push(...callHints(this.scopes, this.syntax, expression));
        this.visitExpression(expression.base);
        for (const argument of expression.arguments) this.visitExpression(argument);
        return;
      case "StringCallExpression":
        this.visitExpression(expression.base);
        return;
      case "TableCallExpression":
        this.visitExpression(expression.base);
        this.visitExpression(expression.arguments);
        return;
      case "FunctionDeclaration":
        this.visitFunction(expression, null);
        return;
      case "TableConstructorExpression":
        for (const field of expression.fields) {
          switch (field.type) {
            case "TableKey":
              this.visitExpression(field.key);
              this.visitExpression(field.value);
              break;
            case "TableKeyString":
              this.visitInitializer(field.value, field.key.name);
              break;
            case "TableValue":
              this.visitExpression(field.value);
              break;
          }
        }
        return;
      case "BinaryExpression":
      case "LogicalExpression":
        this.visitExpression(expression.left);
        this.visitExpression(expression.right);
        return;
      case "UnaryExpression":
        this.visitExpression(expression.argument);
        return;
      case "MemberExpression":
        this.visitExpression(expression.base);
        return;
      case "IndexExpression":
        this.visitExpression(expression.base);
        this.visitExpression(expression.index);
        return;
      default:
        // identifiers and literals
        return;
    }
  }

  /* ---------------------------------------------------------------------------
   * Bindings
   * ------------------------------------------------------------------------- */

  private bindingOf(expression: Expression, name: string): Binding {
    switch (expression.type) {
      case "FunctionDeclaration":
        return { kind: "value", value: this.functionValue(expression, name) };
      case "Identifier": {
        // parentheses leave no node behind, so `(f)` lands here too
        const target = this.scopes.findVarLocation(expression.name);
        return target ? { kind: "alias", target } : this.opaqueBinding(expression);
      }
      default:
        return this.opaqueBinding(expression);
    }
  }

  private bind(name: string, binding: Binding): void {
    switch (binding.kind) {
      case "value":
        this.scopes.allocLocal(name, binding.value);
        return;
      case "alias":
        this.scopes.allocReference(name, binding.target.scope, binding.target.var);
        return;
    }
  }

  private opaqueBinding(node: Node): Binding {
    return { kind: "value", value: this.opaque(node) };
  }

  private opaque(node: Node): Value {
    return { kind: "opaque", node: this.syntax.idOf(node) };
  }

  private functionValue(fn: FunctionDeclaration, name: string | null): FunctionValue {
    const params: Param[] = [];
    for (const parameter of namedParameters(fn)) {
      const position = startOf(parameter);
      if (position) params.push({ name: parameter.name, position });
    }
    return { kind: "function", name, params, node: this.syntax.idOf(fn) };
  }

  private withRoot(visit: () => void): void {
    this.scopes.pushScope(this.scopes.root);
    visit();
    this.scopes.closeScope();
  }
}

/** Parameters with a name; `...` is dropped. */
function namedParameters(fn: FunctionDeclaration): Identifier[] {
  const named: Identifier[] = [];
  for (const parameter of fn.parameters) {
    if (parameter.type === "Identifier") named.push(parameter);
  }
  return named;
}

/** `a`, `a.b.c` or `a.b:c`, for display. */
function qualifiedName(expression: Expression): string | null {
  switch (expression.type) {
    case "Identifier":
      return expression.name;
    case "MemberExpression": {
      const base = qualifiedName(expression.base);
      return base === null ? null : `${base}${expression.indexer}${expression.identifier.name}`;
    }
    default:
      return null;
  }
}
