/**
 * Flo Semantic Validator
 * Checks parsed programs for mistakes that would otherwise only fail at run time.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { patternNames } from "./patterns.js";

type BindingKind = "let" | "var" | "const" | "fn" | "param" | "for" | "rescue" | "pattern";

/**
 * A static scope. `if`, `while`, `match` and `attempt` bodies share their
 * enclosing scope, as they do at run time; function, `for`, `rescue` and
 * strand bodies get their own.
 */
class Scope {
  readonly names = new Map<string, BindingKind>();
  /** Function bodies, checked once the owning statement list is complete. */
  readonly pending: Array<() => void> = [];

  constructor(readonly parent: Scope | null) {}

  lookup(name: string): BindingKind | undefined {
    for (let s: Scope | null = this; s !== null; s = s.parent) {
      const kind = s.names.get(name);
      if (kind !== undefined) return kind;
    }
    return undefined;
  }
}

interface Ctx {
  diags: Diagnostic[];
  inFinally: boolean;
}

export function validate(program: AST.Module): Diagnostic[] {
  const diags: Diagnostic[] = [];
  checkScopeBody(program.statements, new Scope(null), { diags, inFinally: false }, []);
  return diags;
}

/** Check a statement list that owns `scope`, then the function bodies it deferred. */
function checkScopeBody(
  stmts: AST.Stmt[],
  scope: Scope,
  ctx: Ctx,
  initial: Array<[string, BindingKind]>
): void {
  for (const [name, kind] of initial) {
    scope.names.set(name, kind);
  }
  checkBlock(stmts, scope, ctx);
  while (scope.pending.length > 0) {
    const next = scope.pending.shift();
    if (next) next();
  }
}

function checkBlock(stmts: AST.Stmt[], scope: Scope, ctx: Ctx): void {
  const declared = new Set<string>();
  for (const stmt of stmts) {
    if (stmt.kind === "LetDecl" || stmt.kind === "VarDecl" || stmt.kind === "ConstDecl" || stmt.kind === "FnDecl") {
      if (declared.has(stmt.name)) {
        ctx.diags.push(
          makeDiag(
            "E_DUP_DECL",
            `'${stmt.name}' is already declared in this block.`,
            stmt.span,
            "Use a different name, or assign to a 'var' instead of redeclaring it."
          )
        );
      }
      declared.add(stmt.name);
    }
    checkStmt(stmt, scope, ctx);
  }
}

function checkStmt(stmt: AST.Stmt, scope: Scope, ctx: Ctx): void {
  switch (stmt.kind) {
    case "LetDecl":
    case "VarDecl":
    case "ConstDecl":
      checkExpr(stmt.value, scope, ctx);
      scope.names.set(stmt.name, stmt.kind === "LetDecl" ? "let" : stmt.kind === "VarDecl" ? "var" : "const");
      break;
    case "FnDecl":
      scope.names.set(stmt.name, "fn");
      deferFunction(stmt.name, stmt.params, stmt.body, scope, ctx);
      break;
    case "ReturnStmt":
      if (ctx.inFinally) {
        ctx.diags.push(
          makeDiag(
            "E_RETURN_IN_FINALLY",
            "'return' inside a 'finally' block is discarded.",
            stmt.span,
            "Return from the attempt body or the rescue block instead."
          )
        );
      }
      if (stmt.value) checkExpr(stmt.value, scope, ctx);
      break;
    case "ExprStmt":
      checkExpr(stmt.expr, scope, ctx);
      break;
    case "ImportDecl":
    case "CapabilityRequest":
      break;
  }
}

function deferFunction(
  name: string,
  params: AST.Param[],
  body: AST.Stmt[],
  scope: Scope,
  ctx: Ctx
): void {
  const seen = new Set<string>();
  for (const param of params) {
    if (seen.has(param.name)) {
      ctx.diags.push(
        makeDiag(
          "E_DUP_PARAM",
          `Duplicate parameter '${param.name}' in function '${name}'.`,
          param.span,
          "Use unique parameter names."
        )
      );
    }
    seen.add(param.name);
  }
  scope.pending.push(() => {
    checkScopeBody(
      body,
      new Scope(scope),
      { diags: ctx.diags, inFinally: false },
      params.map((p): [string, BindingKind] => [p.name, "param"])
    );
  });
}

function checkExprs(exprs: AST.Expr[], scope: Scope, ctx: Ctx): void {
  for (const e of exprs) checkExpr(e, scope, ctx);
}

function checkExpr(expr: AST.Expr, scope: Scope, ctx: Ctx): void {
  switch (expr.kind) {
    case "IntLiteral":
    case "FloatLiteral":
    case "StringLiteral":
    case "BoolLiteral":
    case "NilLiteral":
    case "VarRef":
    case "NoneExpr":
      return;

    case "Assignment": {
      checkExpr(expr.value, scope, ctx);
      const kind = scope.lookup(expr.name);
      if (kind !== undefined && kind !== "var") {
        ctx.diags.push(
          makeDiag(
            "E_IMMUTABLE_ASSIGN",
            `Cannot assign to '${expr.name}': it is bound by '${kind}' and is immutable.`,
            expr.span,
            `Declare it with 'var ${expr.name} := ...' if it needs to change.`
          )
        );
      }
      return;
    }

    case "BinaryExpr":
      checkExpr(expr.left, scope, ctx);
      checkExpr(expr.right, scope, ctx);
      return;
    case "UnaryExpr":
      checkExpr(expr.operand, scope, ctx);
      return;
    case "CallExpr":
      checkExpr(expr.callee, scope, ctx);
      checkExprs(expr.args, scope, ctx);
      return;
    case "IndexExpr":
      checkExpr(expr.target, scope, ctx);
      checkExpr(expr.index, scope, ctx);
      return;
    case "AttrExpr":
    case "OptionalChainExpr":
      checkExpr(expr.target, scope, ctx);
      return;
    case "ListExpr":
      checkExprs(expr.elements, scope, ctx);
      return;
    case "MapExpr":
      checkExprs(expr.entries.map((e) => e.value), scope, ctx);
      return;

    case "IfExpr":
      checkExpr(expr.cond, scope, ctx);
      checkBlock(expr.then, scope, ctx);
      for (const elif of expr.elifs) {
        checkExpr(elif.cond, scope, ctx);
        checkBlock(elif.body, scope, ctx);
      }
      if (expr.else) checkBlock(expr.else, scope, ctx);
      return;

    case "MatchExpr":
      checkExpr(expr.subject, scope, ctx);
      for (const arm of expr.arms) {
        const names = patternNames(arm.pattern);
        const seen = new Set<string>();
        for (const name of names) {
          if (seen.has(name)) {
            ctx.diags.push(
              makeDiag(
                "E_DUP_BINDING",
                `Pattern binds '${name}' more than once.`,
                arm.pattern.span,
                "Use '_' or a different name for the repeated position."
              )
            );
          }
          seen.add(name);
          scope.names.set(name, "pattern");
        }
        checkExpr(arm.body, scope, ctx);
      }
      return;

    case "ForExpr":
      checkExpr(expr.iterable, scope, ctx);
      checkScopeBody(expr.body, new Scope(scope), ctx, [[expr.binding, "for"]]);
      return;

    case "WhileExpr":
      checkExpr(expr.cond, scope, ctx);
      checkBlock(expr.body, scope, ctx);
      return;

    case "AttemptExpr":
      checkBlock(expr.body, scope, ctx);
      if (expr.rescue) {
        checkScopeBody(expr.rescue.body, new Scope(scope), ctx, [[expr.rescue.binding, "rescue"]]);
      }
      if (expr.finally) {
        checkBlock(expr.finally, scope, { diags: ctx.diags, inFinally: true });
      }
      return;

    case "FnExpr":
      deferFunction("lambda", expr.params, expr.body, scope, ctx);
      return;

    case "StrandExpr":
      checkScopeBody(expr.body, new Scope(scope), { diags: ctx.diags, inFinally: false }, []);
      return;

    case "AwaitExpr":
      checkExpr(expr.operand, scope, ctx);
      return;

    case "SomeExpr":
    case "OkExpr":
    case "ErrExpr":
      checkExpr(expr.value, scope, ctx);
      return;
  }
}
