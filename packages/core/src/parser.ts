/**
 * Flo Language Parser using Chevrotain.
 * Produces a Flo AST from tokens.
 *
 * The grammar ignores newlines with one exception: a `(`, `[`, `+` or `-`
 * that starts a new line begins a new statement (or match arm) instead of
 * continuing the expression before it, and a `return` value must begin on
 * the `return` line.
 */
import { CstParser, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  AdditiveOp,
  AndAnd,
  Arrow,
  As,
  Attempt,
  Await,
  Bind,
  Cap,
  Colon,
  Comma,
  Const,
  Declare,
  DeclareConst,
  Do,
  Dot,
  Elif,
  Else,
  End,
  EqualityOp,
  Equals,
  Err,
  False,
  FatArrow,
  Finally,
  FloatLit,
  Fn,
  For,
  Ident,
  If,
  In,
  IntLit,
  LBrace,
  LBracket,
  Let,
  LParen,
  Match,
  Minus,
  ModulePath,
  MultiplicativeOp,
  Nil,
  None,
  Ok,
  OrOr,
  PipeOp,
  PrefixOp,
  QuestionDot,
  RBrace,
  RBracket,
  RelationalOp,
  Request,
  Rescue,
  Return,
  RParen,
  Some,
  Strand,
  StringLit,
  TripleColon,
  True,
  Var,
  While,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { FloLexer } from "./lexer.js";
import { makeDiag } from "./diagnostics.js";
import { fitsInt64 } from "./values.js";

class FloCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  /** True when the next token starts on the line the previous token ended on. */
  private sameLine(): boolean {
    return this.LA(1).startLine === this.LA(0).endLine;
  }

  private continuesPostfix(): boolean {
    const next = this.LA(1).tokenType;
    if (next === Dot || next === QuestionDot) return true;
    return (next === LParen || next === LBracket) && this.sameLine();
  }

  module = this.RULE("module", () => {
    this.MANY(() => {
      this.SUBRULE(this.stmt);
    });
  });

  block = this.RULE("block", () => {
    this.MANY(() => {
      this.SUBRULE(this.stmt);
    });
  });

  // --- Statements ---

  stmt = this.RULE("stmt", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.importDecl) },
      { ALT: () => this.SUBRULE(this.capabilityRequest) },
      { ALT: () => this.SUBRULE(this.letDecl) },
      { ALT: () => this.SUBRULE(this.varDecl) },
      { ALT: () => this.SUBRULE(this.constDecl) },
      { ALT: () => this.SUBRULE(this.fnDecl) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.exprStmt) },
    ]);
  });

  importDecl = this.RULE("importDecl", () => {
    this.CONSUME(Bind);
    this.CONSUME(Ident);
    this.CONSUME(TripleColon);
    this.CONSUME(ModulePath);
    this.OPTION(() => {
      this.CONSUME(As);
      this.CONSUME2(Ident);
    });
  });

  capabilityRequest = this.RULE("capabilityRequest", () => {
    this.CONSUME(Request);
    this.CONSUME(Cap);
    this.CONSUME(Ident);
    this.CONSUME(As);
    this.CONSUME2(Ident);
  });

  letDecl = this.RULE("letDecl", () => {
    this.CONSUME(Let);
    this.CONSUME(Ident);
    this.OPTION(() => this.SUBRULE(this.typeAnnotation));
    this.CONSUME(Declare);
    this.SUBRULE(this.expr);
  });

  varDecl = this.RULE("varDecl", () => {
    this.CONSUME(Var);
    this.CONSUME(Ident);
    this.OPTION(() => this.SUBRULE(this.typeAnnotation));
    this.CONSUME(Declare);
    this.SUBRULE(this.expr);
  });

  constDecl = this.RULE("constDecl", () => {
    this.CONSUME(Const);
    this.CONSUME(Ident);
    this.OPTION(() => this.SUBRULE(this.typeAnnotation));
    this.OR([
      { ALT: () => this.CONSUME(DeclareConst) },
      { ALT: () => this.CONSUME(Declare) },
    ]);
    this.SUBRULE(this.expr);
  });

  fnDecl = this.RULE("fnDecl", () => {
    this.CONSUME(Fn);
    this.CONSUME(Ident);
    this.SUBRULE(this.paramList);
    this.OPTION(() => {
      this.CONSUME(Arrow);
      this.SUBRULE(this.typeExpr);
    });
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(Return);
    this.OPTION({
      GATE: () => this.sameLine(),
      DEF: () => this.SUBRULE(this.expr),
    });
  });

  exprStmt = this.RULE("exprStmt", () => {
    this.SUBRULE(this.expr);
  });

  paramList = this.RULE("paramList", () => {
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.param);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.param);
      });
    });
    this.CONSUME(RParen);
  });

  param = this.RULE("param", () => {
    this.CONSUME(Ident);
    this.OPTION(() => this.SUBRULE(this.typeAnnotation));
  });

  // --- Types ---

  typeAnnotation = this.RULE("typeAnnotation", () => {
    this.CONSUME(Colon);
    this.SUBRULE(this.typeExpr);
  });

  typeExpr = this.RULE("typeExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Ident);
          this.OPTION(() => {
            this.CONSUME(LBracket);
            this.SUBRULE(this.typeExpr);
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE2(this.typeExpr);
            });
            this.CONSUME(RBracket);
          });
        },
      },
      { ALT: () => this.SUBRULE(this.functionType) },
    ]);
  });

  functionType = this.RULE("functionType", () => {
    this.CONSUME(Fn);
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.typeExpr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.typeExpr);
      });
    });
    this.CONSUME(RParen);
    this.OPTION2(() => {
      this.CONSUME(Arrow);
      this.SUBRULE3(this.typeExpr);
    });
  });

  // --- Expressions, lowest precedence first ---

  expr = this.RULE("expr", () => {
    this.SUBRULE(this.pipeline);
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expr);
    });
  });

  pipeline = this.RULE("pipeline", () => {
    this.SUBRULE(this.orExpr);
    this.MANY(() => {
      this.CONSUME(PipeOp);
      this.SUBRULE2(this.orExpr);
    });
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.CONSUME(OrOr);
      this.SUBRULE2(this.andExpr);
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.equality);
    this.MANY(() => {
      this.CONSUME(AndAnd);
      this.SUBRULE2(this.equality);
    });
  });

  equality = this.RULE("equality", () => {
    this.SUBRULE(this.relational);
    this.MANY(() => {
      this.CONSUME(EqualityOp);
      this.SUBRULE2(this.relational);
    });
  });

  relational = this.RULE("relational", () => {
    this.SUBRULE(this.additive);
    this.MANY(() => {
      this.CONSUME(RelationalOp);
      this.SUBRULE2(this.additive);
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.multiplicative);
    this.MANY({
      GATE: () => this.sameLine(),
      DEF: () => {
        this.CONSUME(AdditiveOp);
        this.SUBRULE2(this.multiplicative);
      },
    });
  });

  multiplicative = this.RULE("multiplicative", () => {
    this.SUBRULE(this.unary);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.unary);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(PrefixOp);
          this.SUBRULE(this.unary);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Await);
          this.SUBRULE2(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.postfix) },
    ]);
  });

  postfix = this.RULE("postfix", () => {
    this.SUBRULE(this.primary);
    this.MANY({
      GATE: () => this.continuesPostfix(),
      DEF: () => this.SUBRULE(this.postfixOp),
    });
  });

  postfixOp = this.RULE("postfixOp", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.OPTION(() => {
            this.SUBRULE(this.expr);
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE2(this.expr);
            });
          });
          this.CONSUME(RParen);
        },
      },
      {
        ALT: () => {
          this.CONSUME(LBracket);
          this.SUBRULE3(this.expr);
          this.CONSUME(RBracket);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Dot);
          this.CONSUME(Ident);
        },
      },
      {
        ALT: () => {
          this.CONSUME(QuestionDot);
          this.CONSUME2(Ident);
        },
      },
    ]);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.CONSUME(Ident) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expr);
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.SUBRULE(this.listExpr) },
      { ALT: () => this.SUBRULE(this.mapExpr) },
      { ALT: () => this.SUBRULE(this.ifExpr) },
      { ALT: () => this.SUBRULE(this.matchExpr) },
      { ALT: () => this.SUBRULE(this.forExpr) },
      { ALT: () => this.SUBRULE(this.whileExpr) },
      { ALT: () => this.SUBRULE(this.attemptExpr) },
      { ALT: () => this.SUBRULE(this.fnExpr) },
      { ALT: () => this.SUBRULE(this.strandExpr) },
      { ALT: () => this.SUBRULE(this.variantExpr) },
    ]);
  });

  literal = this.RULE("literal", () => {
    this.OR([
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(FloatLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Nil) },
    ]);
  });

  listExpr = this.RULE("listExpr", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expr);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma); // trailing comma
      });
    });
    this.CONSUME(RBracket);
  });

  mapExpr = this.RULE("mapExpr", () => {
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.mapEntry);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.mapEntry);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma); // trailing comma
      });
    });
    this.CONSUME(RBrace);
  });

  mapEntry = this.RULE("mapEntry", () => {
    this.OR([
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.CONSUME(StringLit) },
    ]);
    this.CONSUME(Colon);
    this.SUBRULE(this.expr);
  });

  ifExpr = this.RULE("ifExpr", () => {
    this.CONSUME(If);
    this.SUBRULE(this.expr);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.MANY(() => {
      this.SUBRULE(this.elifClause);
    });
    this.OPTION(() => {
      this.CONSUME(Else);
      this.OPTION2(() => this.CONSUME2(Do));
      this.SUBRULE2(this.block);
    });
    this.CONSUME(End);
  });

  elifClause = this.RULE("elifClause", () => {
    this.CONSUME(Elif);
    this.SUBRULE(this.expr);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
  });

  matchExpr = this.RULE("matchExpr", () => {
    this.CONSUME(Match);
    this.SUBRULE(this.expr);
    this.CONSUME(Do);
    this.MANY(() => {
      this.SUBRULE(this.matchArm);
    });
    this.CONSUME(End);
  });

  matchArm = this.RULE("matchArm", () => {
    this.SUBRULE(this.pattern);
    this.CONSUME(FatArrow);
    this.SUBRULE(this.expr);
  });

  pattern = this.RULE("pattern", () => {
    this.OR([
      {
        ALT: () => {
          this.OPTION(() => this.CONSUME(Minus));
          this.OR2([
            { ALT: () => this.CONSUME(IntLit) },
            { ALT: () => this.CONSUME(FloatLit) },
          ]);
        },
      },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Nil) },
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.CONSUME(None) },
      {
        ALT: () => {
          this.OR3([
            { ALT: () => this.CONSUME(Some) },
            { ALT: () => this.CONSUME(Ok) },
            { ALT: () => this.CONSUME(Err) },
          ]);
          this.OPTION2(() => {
            this.CONSUME(LParen);
            this.SUBRULE(this.pattern);
            this.CONSUME(RParen);
          });
        },
      },
      {
        ALT: () => {
          this.CONSUME(LBracket);
          this.OPTION3(() => {
            this.SUBRULE2(this.pattern);
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE3(this.pattern);
            });
          });
          this.CONSUME(RBracket);
        },
      },
    ]);
  });

  forExpr = this.RULE("forExpr", () => {
    this.CONSUME(For);
    this.CONSUME(Ident);
    this.CONSUME(In);
    this.SUBRULE(this.expr);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  whileExpr = this.RULE("whileExpr", () => {
    this.CONSUME(While);
    this.SUBRULE(this.expr);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  attemptExpr = this.RULE("attemptExpr", () => {
    this.CONSUME(Attempt);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.OPTION(() => {
      this.SUBRULE(this.rescueClause);
    });
    this.OPTION2(() => {
      this.SUBRULE(this.finallyClause);
    });
    this.CONSUME(End);
  });

  rescueClause = this.RULE("rescueClause", () => {
    this.CONSUME(Rescue);
    this.CONSUME(Ident);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
  });

  finallyClause = this.RULE("finallyClause", () => {
    this.CONSUME(Finally);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
  });

  fnExpr = this.RULE("fnExpr", () => {
    this.CONSUME(Fn);
    this.SUBRULE(this.paramList);
    this.OPTION(() => {
      this.CONSUME(Arrow);
      this.SUBRULE(this.typeExpr);
    });
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  strandExpr = this.RULE("strandExpr", () => {
    this.CONSUME(Strand);
    this.CONSUME(Do);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  variantExpr = this.RULE("variantExpr", () => {
    this.OR([
      { ALT: () => this.CONSUME(None) },
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Some) },
            { ALT: () => this.CONSUME(Ok) },
            { ALT: () => this.CONSUME(Err) },
          ]);
          this.CONSUME(LParen);
          this.SUBRULE(this.expr);
          this.CONSUME(RParen);
        },
      },
    ]);
  });
}

// Singleton parser instance
const cstParser = new FloCstParser();

// --- CST access helpers ---

class AstError extends Error {
  span?: Span;

  constructor(message: string, span?: Span) {
    super(message);
    this.name = "AstError";
    this.span = span;
  }
}

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function optNode(cst: CstNode, key: string): CstNode | undefined {
  return nodes(cst, key)[0];
}

function node(cst: CstNode, key: string, file: string): CstNode {
  const found = optNode(cst, key);
  if (!found) throw new AstError(`Expected '${key}' in '${cst.name}'.`, cstSpan(cst, file));
  return found;
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function optToken(cst: CstNode, key: string): IToken | undefined {
  return tokens(cst, key)[0];
}

function token(cst: CstNode, key: string, file: string): IToken {
  const found = optToken(cst, key);
  if (!found) throw new AstError(`Expected '${key}' in '${cst.name}'.`, cstSpan(cst, file));
  return found;
}

// --- Spans ---

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(a: Span, b: Span): Span {
  return { file: a.file, startLine: a.startLine, startCol: a.startCol, endLine: b.endLine, endCol: b.endCol };
}

function parseStringLiteral(t: IToken, file: string): string {
  const value: unknown = JSON.parse(t.image);
  if (typeof value !== "string") {
    throw new AstError(`Invalid string literal ${t.image}.`, tokenSpan(t, file));
  }
  return value;
}

// --- CST to AST visitor ---

function visitModule(cst: CstNode, file: string): AST.Module {
  return {
    kind: "Module",
    span: cstSpan(cst, file),
    statements: nodes(cst, "stmt").map((s) => visitStmt(s, file)),
  };
}

function visitBlock(cst: CstNode, file: string): AST.Stmt[] {
  return nodes(cst, "stmt").map((s) => visitStmt(s, file));
}

function visitStmt(cst: CstNode, file: string): AST.Stmt {
  const [child] = nodes(cst, Object.keys(cst.children)[0]);
  if (!child) throw new AstError("Unknown statement type", cstSpan(cst, file));
  switch (child.name) {
    case "importDecl":
      return visitImportDecl(child, file);
    case "capabilityRequest":
      return visitCapabilityRequest(child, file);
    case "letDecl":
    case "varDecl":
    case "constDecl":
      return visitDecl(child, file);
    case "fnDecl":
      return visitFnDecl(child, file);
    case "returnStmt": {
      const value = optNode(child, "expr");
      return {
        kind: "ReturnStmt",
        span: cstSpan(child, file),
        ...(value ? { value: visitExpr(value, file) } : {}),
      };
    }
    case "exprStmt":
      return { kind: "ExprStmt", span: cstSpan(child, file), expr: visitExpr(node(child, "expr", file), file) };
    default:
      throw new AstError("Unknown statement type", cstSpan(child, file));
  }
}

function visitImportDecl(cst: CstNode, file: string): AST.ImportDecl {
  const [nameToken, aliasToken] = tokens(cst, "Ident");
  const pathImage = token(cst, "ModulePath", file).image;
  const at = pathImage.indexOf("@");
  const decl: AST.ImportDecl = {
    kind: "ImportDecl",
    span: cstSpan(cst, file),
    name: nameToken.image,
    path: at >= 0 ? pathImage.slice(0, at) : pathImage,
  };
  if (at >= 0) decl.version = pathImage.slice(at + 1);
  if (aliasToken) decl.alias = aliasToken.image;
  return decl;
}

function visitCapabilityRequest(cst: CstNode, file: string): AST.CapabilityRequest {
  const [capToken, typeToken] = tokens(cst, "Ident");
  return {
    kind: "CapabilityRequest",
    span: cstSpan(cst, file),
    capability: capToken.image,
    typeName: typeToken.image,
  };
}

function visitDecl(cst: CstNode, file: string): AST.LetDecl | AST.VarDecl | AST.ConstDecl {
  const kind = cst.name === "letDecl" ? "LetDecl" : cst.name === "varDecl" ? "VarDecl" : "ConstDecl";
  const annotation = optNode(cst, "typeAnnotation");
  const decl: AST.LetDecl | AST.VarDecl | AST.ConstDecl = {
    kind,
    span: cstSpan(cst, file),
    name: token(cst, "Ident", file).image,
    value: visitExpr(node(cst, "expr", file), file),
  };
  if (annotation) decl.type = visitTypeExpr(node(annotation, "typeExpr", file), file);
  return decl;
}

function visitParams(cst: CstNode, file: string): AST.Param[] {
  return nodes(cst, "param").map((p) => {
    const annotation = optNode(p, "typeAnnotation");
    const param: AST.Param = {
      kind: "Param",
      span: cstSpan(p, file),
      name: token(p, "Ident", file).image,
    };
    if (annotation) param.type = visitTypeExpr(node(annotation, "typeExpr", file), file);
    return param;
  });
}

function visitFnDecl(cst: CstNode, file: string): AST.FnDecl {
  const returnType = optNode(cst, "typeExpr");
  const decl: AST.FnDecl = {
    kind: "FnDecl",
    span: cstSpan(cst, file),
    name: token(cst, "Ident", file).image,
    params: visitParams(node(cst, "paramList", file), file),
    body: visitBlock(node(cst, "block", file), file),
  };
  if (returnType) decl.returnType = visitTypeExpr(returnType, file);
  return decl;
}

function visitTypeExpr(cst: CstNode, file: string): AST.TypeExpr {
  const fnType = optNode(cst, "functionType");
  if (fnType) {
    const types = nodes(fnType, "typeExpr").map((t) => visitTypeExpr(t, file));
    const hasReturn = optToken(fnType, "Arrow") !== undefined;
    const returns = hasReturn ? types.pop() : undefined;
    return {
      kind: "FunctionType",
      span: cstSpan(fnType, file),
      params: types,
      ...(returns ? { returns } : {}),
    };
  }
  const name = token(cst, "Ident", file).image;
  const args = nodes(cst, "typeExpr");
  if (args.length > 0) {
    return {
      kind: "GenericType",
      span: cstSpan(cst, file),
      name,
      args: args.map((a) => visitTypeExpr(a, file)),
    };
  }
  return { kind: "SimpleType", span: cstSpan(cst, file), name };
}

// --- Expressions ---

function toBinaryOp(t: IToken, file: string): AST.BinaryOp {
  switch (t.image) {
    case "+": case "-": case "*": case "/": case "%":
    case "==": case "!=": case "<": case ">": case "<=": case ">=":
    case "&&": case "||": case "|>": case "<|":
      return t.image;
    default:
      throw new AstError(`Unknown operator '${t.image}'.`, tokenSpan(t, file));
  }
}

function toUnaryOp(t: IToken, file: string): AST.UnaryOp {
  switch (t.image) {
    case "-": case "!": case "+":
      return t.image;
    default:
      throw new AstError(`Unknown operator '${t.image}'.`, tokenSpan(t, file));
  }
}

/** Fold `operand (op operand)*` into a left-associative chain. */
function visitChain(
  cst: CstNode,
  operandKey: string,
  opKey: string,
  visitOperand: (node: CstNode, file: string) => AST.Expr,
  file: string
): AST.Expr {
  const operands = nodes(cst, operandKey);
  const ops = tokens(cst, opKey);
  let left = visitOperand(operands[0], file);
  for (let i = 0; i < ops.length; i++) {
    const right = visitOperand(operands[i + 1], file);
    left = {
      kind: "BinaryExpr",
      span: joinSpans(left.span, right.span),
      op: toBinaryOp(ops[i], file),
      left,
      right,
    };
  }
  return left;
}

function visitExpr(cst: CstNode, file: string): AST.Expr {
  const target = visitChain(node(cst, "pipeline", file), "orExpr", "PipeOp", visitOr, file);
  const valueNode = optNode(cst, "expr");
  if (!valueNode) return target;

  if (target.kind !== "VarRef") {
    throw new AstError("Invalid assignment target: only a name can be assigned.", target.span);
  }
  const value = visitExpr(valueNode, file);
  return { kind: "Assignment", span: joinSpans(target.span, value.span), name: target.name, value };
}

function visitOr(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "andExpr", "OrOr", visitAnd, file);
}

function visitAnd(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "equality", "AndAnd", visitEquality, file);
}

function visitEquality(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "relational", "EqualityOp", visitRelational, file);
}

function visitRelational(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "additive", "RelationalOp", visitAdditive, file);
}

function visitAdditive(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "multiplicative", "AdditiveOp", visitMultiplicative, file);
}

function visitMultiplicative(cst: CstNode, file: string): AST.Expr {
  return visitChain(cst, "unary", "MultiplicativeOp", visitUnary, file);
}

function visitUnary(cst: CstNode, file: string): AST.Expr {
  const postfix = optNode(cst, "postfix");
  if (postfix) return visitPostfix(postfix, file);

  const operand = visitUnary(node(cst, "unary", file), file);
  const awaitToken = optToken(cst, "Await");
  if (awaitToken) {
    return { kind: "AwaitExpr", span: joinSpans(tokenSpan(awaitToken, file), operand.span), operand };
  }
  const opToken = token(cst, "PrefixOp", file);
  return {
    kind: "UnaryExpr",
    span: joinSpans(tokenSpan(opToken, file), operand.span),
    op: toUnaryOp(opToken, file),
    operand,
  };
}

function visitPostfix(cst: CstNode, file: string): AST.Expr {
  let expr = visitPrimary(node(cst, "primary", file), file);
  for (const op of nodes(cst, "postfixOp")) {
    const span = joinSpans(expr.span, cstSpan(op, file));
    if (optToken(op, "LParen")) {
      expr = { kind: "CallExpr", span, callee: expr, args: nodes(op, "expr").map((a) => visitExpr(a, file)) };
    } else if (optToken(op, "LBracket")) {
      expr = { kind: "IndexExpr", span, target: expr, index: visitExpr(node(op, "expr", file), file) };
    } else if (optToken(op, "QuestionDot")) {
      expr = { kind: "OptionalChainExpr", span, target: expr, name: token(op, "Ident", file).image };
    } else {
      expr = { kind: "AttrExpr", span, target: expr, name: token(op, "Ident", file).image };
    }
  }
  return expr;
}

function visitPrimary(cst: CstNode, file: string): AST.Expr {
  const ident = optToken(cst, "Ident");
  if (ident) return { kind: "VarRef", span: tokenSpan(ident, file), name: ident.image };

  const inner = optNode(cst, "expr");
  if (inner) return visitExpr(inner, file);

  const [child] = nodes(cst, Object.keys(cst.children)[0]);
  if (!child) throw new AstError("Unknown expression type", cstSpan(cst, file));
  switch (child.name) {
    case "literal":
      return visitLiteral(child, file);
    case "listExpr":
      return {
        kind: "ListExpr",
        span: cstSpan(child, file),
        elements: nodes(child, "expr").map((e) => visitExpr(e, file)),
      };
    case "mapExpr":
      return {
        kind: "MapExpr",
        span: cstSpan(child, file),
        entries: nodes(child, "mapEntry").map((e) => visitMapEntry(e, file)),
      };
    case "ifExpr":
      return visitIfExpr(child, file);
    case "matchExpr":
      return {
        kind: "MatchExpr",
        span: cstSpan(child, file),
        subject: visitExpr(node(child, "expr", file), file),
        arms: nodes(child, "matchArm").map((a) => ({
          kind: "MatchArm",
          span: cstSpan(a, file),
          pattern: visitPattern(node(a, "pattern", file), file),
          body: visitExpr(node(a, "expr", file), file),
        })),
      };
    case "forExpr":
      return {
        kind: "ForExpr",
        span: cstSpan(child, file),
        binding: token(child, "Ident", file).image,
        iterable: visitExpr(node(child, "expr", file), file),
        body: visitBlock(node(child, "block", file), file),
      };
    case "whileExpr":
      return {
        kind: "WhileExpr",
        span: cstSpan(child, file),
        cond: visitExpr(node(child, "expr", file), file),
        body: visitBlock(node(child, "block", file), file),
      };
    case "attemptExpr":
      return visitAttemptExpr(child, file);
    case "fnExpr": {
      const returnType = optNode(child, "typeExpr");
      const fn: AST.FnExpr = {
        kind: "FnExpr",
        span: cstSpan(child, file),
        params: visitParams(node(child, "paramList", file), file),
        body: visitBlock(node(child, "block", file), file),
      };
      if (returnType) fn.returnType = visitTypeExpr(returnType, file);
      return fn;
    }
    case "strandExpr":
      return { kind: "StrandExpr", span: cstSpan(child, file), body: visitBlock(node(child, "block", file), file) };
    case "variantExpr":
      return visitVariantExpr(child, file);
    default:
      throw new AstError("Unknown expression type", cstSpan(child, file));
  }
}

function visitLiteral(cst: CstNode, file: string): AST.Literal {
  const intTok = optToken(cst, "IntLit");
  if (intTok) return intLiteral(intTok, false, file);
  const floatTok = optToken(cst, "FloatLit");
  if (floatTok) return { kind: "FloatLiteral", span: tokenSpan(floatTok, file), value: parseFloat(floatTok.image) };
  const strTok = optToken(cst, "StringLit");
  if (strTok) return { kind: "StringLiteral", span: tokenSpan(strTok, file), value: parseStringLiteral(strTok, file) };
  const trueTok = optToken(cst, "True");
  if (trueTok) return { kind: "BoolLiteral", span: tokenSpan(trueTok, file), value: true };
  const falseTok = optToken(cst, "False");
  if (falseTok) return { kind: "BoolLiteral", span: tokenSpan(falseTok, file), value: false };
  const nilTok = optToken(cst, "Nil");
  if (nilTok) return { kind: "NilLiteral", span: tokenSpan(nilTok, file) };
  throw new AstError("Unknown literal type", cstSpan(cst, file));
}

function intLiteral(t: IToken, negative: boolean, file: string): AST.IntLiteral {
  const value = negative ? -BigInt(t.image) : BigInt(t.image);
  if (!fitsInt64(value)) {
    throw new AstError(`Integer literal ${negative ? "-" : ""}${t.image} does not fit in 64 bits.`, tokenSpan(t, file));
  }
  return { kind: "IntLiteral", span: tokenSpan(t, file), value };
}

function visitMapEntry(cst: CstNode, file: string): AST.MapEntry {
  const ident = optToken(cst, "Ident");
  const key = ident ? ident.image : parseStringLiteral(token(cst, "StringLit", file), file);
  return { kind: "MapEntry", span: cstSpan(cst, file), key, value: visitExpr(node(cst, "expr", file), file) };
}

function visitIfExpr(cst: CstNode, file: string): AST.IfExpr {
  const [thenBlock, elseBlock] = nodes(cst, "block");
  const expr: AST.IfExpr = {
    kind: "IfExpr",
    span: cstSpan(cst, file),
    cond: visitExpr(node(cst, "expr", file), file),
    then: visitBlock(thenBlock, file),
    elifs: nodes(cst, "elifClause").map((e) => ({
      kind: "ElifClause",
      span: cstSpan(e, file),
      cond: visitExpr(node(e, "expr", file), file),
      body: visitBlock(node(e, "block", file), file),
    })),
  };
  if (elseBlock) expr.else = visitBlock(elseBlock, file);
  return expr;
}

function visitAttemptExpr(cst: CstNode, file: string): AST.AttemptExpr {
  const rescue = optNode(cst, "rescueClause");
  const fin = optNode(cst, "finallyClause");
  const expr: AST.AttemptExpr = {
    kind: "AttemptExpr",
    span: cstSpan(cst, file),
    body: visitBlock(node(cst, "block", file), file),
  };
  if (rescue) {
    expr.rescue = {
      kind: "RescueClause",
      span: cstSpan(rescue, file),
      binding: token(rescue, "Ident", file).image,
      body: visitBlock(node(rescue, "block", file), file),
    };
  }
  if (fin) expr.finally = visitBlock(node(fin, "block", file), file);
  return expr;
}

function visitVariantExpr(cst: CstNode, file: string): AST.Expr {
  const span = cstSpan(cst, file);
  if (optToken(cst, "None")) return { kind: "NoneExpr", span };
  const value = visitExpr(node(cst, "expr", file), file);
  if (optToken(cst, "Some")) return { kind: "SomeExpr", span, value };
  if (optToken(cst, "Ok")) return { kind: "OkExpr", span, value };
  return { kind: "ErrExpr", span, value };
}

function visitPattern(cst: CstNode, file: string): AST.Pattern {
  const span = cstSpan(cst, file);

  const intTok = optToken(cst, "IntLit");
  if (intTok) {
    return { kind: "LiteralPattern", span, literal: intLiteral(intTok, optToken(cst, "Minus") !== undefined, file) };
  }
  const floatTok = optToken(cst, "FloatLit");
  if (floatTok) {
    const sign = optToken(cst, "Minus") ? -1 : 1;
    return {
      kind: "LiteralPattern",
      span,
      literal: { kind: "FloatLiteral", span: tokenSpan(floatTok, file), value: sign * parseFloat(floatTok.image) },
    };
  }
  if (optToken(cst, "StringLit") || optToken(cst, "True") || optToken(cst, "False") || optToken(cst, "Nil")) {
    return { kind: "LiteralPattern", span, literal: visitLiteral(cst, file) };
  }

  const ident = optToken(cst, "Ident");
  if (ident) {
    return ident.image === "_" ? { kind: "WildcardPattern", span } : { kind: "VarPattern", span, name: ident.image };
  }

  if (optToken(cst, "None")) return { kind: "OptionPattern", span, variant: "None" };

  const innerNode = optNode(cst, "pattern");
  const inner = innerNode && !optToken(cst, "LBracket") ? visitPattern(innerNode, file) : undefined;
  const withInner = inner ? { inner } : {};
  if (optToken(cst, "Some")) return { kind: "OptionPattern", span, variant: "Some", ...withInner };
  if (optToken(cst, "Ok")) return { kind: "ResultPattern", span, variant: "Ok", ...withInner };
  if (optToken(cst, "Err")) return { kind: "ResultPattern", span, variant: "Err", ...withInner };

  return { kind: "ListPattern", span, elements: nodes(cst, "pattern").map((p) => visitPattern(p, file)) };
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Module;
  diagnostics: Diagnostic[];
}

export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const lexResult = FloLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + (err.length ?? 1),
        },
        "Check for invalid characters or unclosed strings."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.module();

  for (const err of cstParser.errors) {
    const t = err.token;
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        {
          file,
          startLine: Number.isNaN(t.startLine) ? 1 : t.startLine ?? 1,
          startCol: Number.isNaN(t.startColumn) ? 1 : t.startColumn ?? 1,
          endLine: Number.isNaN(t.endLine) ? 1 : t.endLine ?? 1,
          endCol: (Number.isNaN(t.endColumn) ? 1 : t.endColumn ?? 1) + 1,
        },
        "Check syntax near this location; blocks close with 'end'."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const program = visitModule(cst, file);
    return { program, diagnostics: [] };
  } catch (e) {
    if (e instanceof AstError) {
      diagnostics.push(makeDiag("E_AST", e.message, e.span));
      return { diagnostics };
    }
    throw e;
  }
}
