/**
 * Flo Canonical Formatter
 * Serializes an AST back to canonical source text.
 */
import type * as AST from "./ast.js";
import { RESERVED_WORDS } from "./lexer.js";

const INDENT = "  ";

export function format(module: AST.Module): string {
  const lines = module.statements.map((s) => formatStmt(s, 0));
  return lines.join("\n") + "\n";
}

// Binding strength of each binary operator; assignment sits below all of them.
const PRECEDENCE: Record<AST.BinaryOp, number> = {
  "|>": 1,
  "<|": 1,
  "||": 2,
  "&&": 3,
  "==": 4,
  "!=": 4,
  "<": 5,
  ">": 5,
  "<=": 5,
  ">=": 5,
  "+": 6,
  "-": 6,
  "*": 7,
  "/": 7,
  "%": 7,
};

const UNARY_LEVEL = 8;
const POSTFIX_LEVEL = 9;

function level(e: AST.Expr): number {
  switch (e.kind) {
    case "Assignment":
      return 0;
    case "BinaryExpr":
      return PRECEDENCE[e.op];
    case "UnaryExpr":
    case "AwaitExpr":
      return UNARY_LEVEL;
    default:
      return POSTFIX_LEVEL;
  }
}

function wrap(e: AST.Expr, minLevel: number, depth: number): string {
  const text = formatExpr(e, depth);
  return level(e) < minLevel ? `(${text})` : text;
}

function formatStmt(s: AST.Stmt, depth: number): string {
  const prefix = INDENT.repeat(depth);
  switch (s.kind) {
    case "LetDecl":
      return `${prefix}let ${s.name}${formatAnnotation(s.type)} := ${formatExpr(s.value, depth)}`;
    case "VarDecl":
      return `${prefix}var ${s.name}${formatAnnotation(s.type)} := ${formatExpr(s.value, depth)}`;
    case "ConstDecl":
      return `${prefix}const ${s.name}${formatAnnotation(s.type)} !:= ${formatExpr(s.value, depth)}`;
    case "FnDecl":
      return `${prefix}fn ${s.name}${formatSignature(s.params, s.returnType)} do\n${formatBody(s.body, depth)}end`;
    case "ReturnStmt":
      return s.value ? `${prefix}return ${formatExpr(s.value, depth)}` : `${prefix}return`;
    case "ExprStmt":
      return `${prefix}${formatExpr(s.expr, depth)}`;
    case "ImportDecl": {
      const version = s.version !== undefined ? `@${s.version}` : "";
      const alias = s.alias !== undefined ? ` as ${s.alias}` : "";
      return `${prefix}bind ${s.name} ::: ${s.path}${version}${alias}`;
    }
    case "CapabilityRequest":
      return `${prefix}request cap ${s.capability} as ${s.typeName}`;
  }
}

/** Statements one level in, each on its own line, followed by the closing indent. */
function formatBody(stmts: AST.Stmt[], depth: number): string {
  const closing = INDENT.repeat(depth);
  if (stmts.length === 0) return closing;
  return stmts.map((s) => formatStmt(s, depth + 1) + "\n").join("") + closing;
}

function formatAnnotation(type: AST.TypeExpr | undefined): string {
  return type ? `: ${formatType(type)}` : "";
}

function formatSignature(params: AST.Param[], returnType: AST.TypeExpr | undefined): string {
  const list = params.map((p) => `${p.name}${formatAnnotation(p.type)}`).join(", ");
  const ret = returnType ? ` -> ${formatType(returnType)}` : "";
  return `(${list})${ret}`;
}

export function formatType(t: AST.TypeExpr): string {
  switch (t.kind) {
    case "SimpleType":
      return t.name;
    case "GenericType":
      return `${t.name}[${t.args.map(formatType).join(", ")}]`;
    case "FunctionType": {
      const ret = t.returns ? ` -> ${formatType(t.returns)}` : "";
      return `fn(${t.params.map(formatType).join(", ")})${ret}`;
    }
  }
}

export function formatExpr(e: AST.Expr, depth: number): string {
  switch (e.kind) {
    case "IntLiteral":
      return e.value.toString();
    case "FloatLiteral":
      return formatFloatLiteral(e.value);
    case "StringLiteral":
      return JSON.stringify(e.value);
    case "BoolLiteral":
      return e.value ? "true" : "false";
    case "NilLiteral":
      return "nil";
    case "VarRef":
      return e.name;
    case "NoneExpr":
      return "None";
    case "SomeExpr":
      return `Some(${formatExpr(e.value, depth)})`;
    case "OkExpr":
      return `Ok(${formatExpr(e.value, depth)})`;
    case "ErrExpr":
      return `Err(${formatExpr(e.value, depth)})`;

    case "Assignment":
      return `${e.name} = ${formatExpr(e.value, depth)}`;

    case "BinaryExpr": {
      const prec = PRECEDENCE[e.op];
      // Every level is left-associative, so an equal-level right operand keeps its parens.
      return `${wrap(e.left, prec, depth)} ${e.op} ${wrap(e.right, prec + 1, depth)}`;
    }
    case "UnaryExpr": {
      const operand = wrap(e.operand, UNARY_LEVEL, depth);
      // Keep `- -x` from reading as one token run.
      const gap = operand.startsWith(e.op) ? " " : "";
      return `${e.op}${gap}${operand}`;
    }
    case "AwaitExpr":
      return `await ${wrap(e.operand, UNARY_LEVEL, depth)}`;

    case "CallExpr":
      return `${wrap(e.callee, POSTFIX_LEVEL, depth)}(${e.args.map((a) => formatExpr(a, depth)).join(", ")})`;
    case "IndexExpr":
      return `${wrap(e.target, POSTFIX_LEVEL, depth)}[${formatExpr(e.index, depth)}]`;
    case "AttrExpr":
      return `${wrap(e.target, POSTFIX_LEVEL, depth)}.${e.name}`;
    case "OptionalChainExpr":
      return `${wrap(e.target, POSTFIX_LEVEL, depth)}?.${e.name}`;

    case "ListExpr":
      return formatList(e, depth);
    case "MapExpr":
      return formatMap(e, depth);

    case "IfExpr": {
      let out = `if ${formatExpr(e.cond, depth)} do\n${formatBody(e.then, depth)}`;
      for (const elif of e.elifs) {
        out += `elif ${formatExpr(elif.cond, depth)} do\n${formatBody(elif.body, depth)}`;
      }
      if (e.else) out += `else do\n${formatBody(e.else, depth)}`;
      return out + "end";
    }
    case "MatchExpr": {
      const inner = INDENT.repeat(depth + 1);
      const arms = e.arms.map((arm) => `${inner}${formatPattern(arm.pattern)} => ${formatExpr(arm.body, depth + 1)}\n`);
      return `match ${formatExpr(e.subject, depth)} do\n${arms.join("")}${INDENT.repeat(depth)}end`;
    }
    case "ForExpr":
      return `for ${e.binding} in ${formatExpr(e.iterable, depth)} do\n${formatBody(e.body, depth)}end`;
    case "WhileExpr":
      return `while ${formatExpr(e.cond, depth)} do\n${formatBody(e.body, depth)}end`;
    case "AttemptExpr": {
      let out = `attempt do\n${formatBody(e.body, depth)}`;
      if (e.rescue) out += `rescue ${e.rescue.binding} do\n${formatBody(e.rescue.body, depth)}`;
      if (e.finally) out += `finally do\n${formatBody(e.finally, depth)}`;
      return out + "end";
    }
    case "FnExpr":
      return `fn${formatSignature(e.params, e.returnType)} do\n${formatBody(e.body, depth)}end`;
    case "StrandExpr":
      return `strand do\n${formatBody(e.body, depth)}end`;
  }
}

export function formatPattern(p: AST.Pattern): string {
  switch (p.kind) {
    case "LiteralPattern":
      return formatExpr(p.literal, 0);
    case "VarPattern":
      return p.name;
    case "WildcardPattern":
      return "_";
    case "OptionPattern":
    case "ResultPattern":
      return p.inner ? `${p.variant}(${formatPattern(p.inner)})` : p.variant;
    case "ListPattern":
      return `[${p.elements.map(formatPattern).join(", ")}]`;
  }
}

function formatFloatLiteral(value: number): string {
  const raw = String(value);
  return /[.e]/.test(raw) ? raw : `${raw}.0`;
}

function formatKey(key: string): string {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(key) && !RESERVED_WORDS.has(key) ? key : JSON.stringify(key);
}

function formatList(list: AST.ListExpr, depth: number): string {
  if (list.elements.length === 0) return "[]";

  const inline = `[${list.elements.map((e) => formatExpr(e, depth + 1)).join(", ")}]`;
  if (inline.length <= 72 && !inline.includes("\n")) return inline;

  const inner = INDENT.repeat(depth + 1);
  const parts = list.elements.map((e) => `${inner}${formatExpr(e, depth + 1)}`);
  return `[\n${parts.join(",\n")}\n${INDENT.repeat(depth)}]`;
}

function formatMap(map: AST.MapExpr, depth: number): string {
  if (map.entries.length === 0) return "{}";

  const entry = (m: AST.MapEntry): string => `${formatKey(m.key)}: ${formatExpr(m.value, depth + 1)}`;
  const inline = `{ ${map.entries.map(entry).join(", ")} }`;
  if (inline.length <= 72 && !inline.includes("\n")) return inline;

  const inner = INDENT.repeat(depth + 1);
  const parts = map.entries.map((m) => `${inner}${entry(m)}`);
  return `{\n${parts.join(",\n")}\n${INDENT.repeat(depth)}}`;
}
