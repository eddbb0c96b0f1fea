/**
 * Flo Language Lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";
import type { IToken, TokenType } from "chevrotain";

// Identifiers are declared first so keywords can name them as their longer alternative.
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

const reserved = new Set<string>();

/** Words the lexer never reads as identifiers. */
export const RESERVED_WORDS: ReadonlySet<string> = reserved;

function keyword(name: string, word: string): TokenType {
  reserved.add(word);
  return createToken({ name, pattern: new RegExp(word), longer_alt: Ident });
}

// Declarations
export const Let = keyword("Let", "let");
export const Var = keyword("Var", "var");
export const Const = keyword("Const", "const");
export const Fn = keyword("Fn", "fn");
export const Return = keyword("Return", "return");

// Blocks and control flow
export const Do = keyword("Do", "do");
export const End = keyword("End", "end");
export const If = keyword("If", "if");
export const Elif = keyword("Elif", "elif");
export const Else = keyword("Else", "else");
export const For = keyword("For", "for");
export const In = keyword("In", "in");
export const While = keyword("While", "while");
export const Match = keyword("Match", "match");
export const Attempt = keyword("Attempt", "attempt");
export const Rescue = keyword("Rescue", "rescue");
export const Finally = keyword("Finally", "finally");

// Concurrency
export const Strand = keyword("Strand", "strand");
export const Await = keyword("Await", "await");

// Imports and capabilities
export const Bind = keyword("Bind", "bind");
export const As = keyword("As", "as");
export const Request = keyword("Request", "request");
export const Cap = keyword("Cap", "cap");

// Literal keywords
export const True = keyword("True", "true");
export const False = keyword("False", "false");
export const Nil = keyword("Nil", "nil");
export const Some = keyword("Some", "Some");
export const None = keyword("None", "None");
export const Ok = keyword("Ok", "Ok");
export const Err = keyword("Err", "Err");

export const KEYWORDS: readonly TokenType[] = [
  Let, Var, Const, Fn, Return,
  Do, End, If, Elif, Else, For, In, While, Match, Attempt, Rescue, Finally,
  Strand, Await,
  Bind, As, Request, Cap,
  True, False, Nil, Some, None, Ok, Err,
];

// Literals
export const FloatLit = createToken({
  name: "FloatLit",
  pattern: /(?:0|[1-9]\d*)(?:\.\d+(?:[eE][+-]?\d+)?|[eE][+-]?\d+)/,
});
export const IntLit = createToken({
  name: "IntLit",
  pattern: /(?:0|[1-9]\d*)(?![.\deE])/,
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\n\r]|\\["\\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/,
});

// Module path, only recognised right after `:::`
export const TripleColon = createToken({ name: "TripleColon", pattern: /:::/ });

const MODULE_PATH = /[A-Za-z_][\w-]*(?:\/[A-Za-z_][\w-]*)*(?:@[^\s]+)?/y;

function matchModulePath(text: string, offset: number, tokens: IToken[]): RegExpExecArray | null {
  const prev = tokens[tokens.length - 1];
  if (prev === undefined || prev.tokenType !== TripleColon) return null;
  MODULE_PATH.lastIndex = offset;
  return MODULE_PATH.exec(text);
}

export const ModulePath = createToken({
  name: "ModulePath",
  pattern: matchModulePath,
  line_breaks: false,
  start_chars_hint: [..."ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz_"],
});

// Operator categories keep each precedence level to a single CST key.
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });
export const RelationalOp = createToken({ name: "RelationalOp", pattern: Lexer.NA });
export const EqualityOp = createToken({ name: "EqualityOp", pattern: Lexer.NA });
export const PipeOp = createToken({ name: "PipeOp", pattern: Lexer.NA });
export const PrefixOp = createToken({ name: "PrefixOp", pattern: Lexer.NA });

// Multi-char operators
export const DeclareConst = createToken({ name: "DeclareConst", pattern: /!:=/ });
export const Declare = createToken({ name: "Declare", pattern: /:=/ });
export const FatArrow = createToken({ name: "FatArrow", pattern: /=>/ });
export const Arrow = createToken({ name: "Arrow", pattern: /->/ });
export const PipeForward = createToken({ name: "PipeForward", pattern: /\|>/, categories: [PipeOp] });
export const PipeBackward = createToken({ name: "PipeBackward", pattern: /<\|/, categories: [PipeOp] });
export const QuestionDot = createToken({ name: "QuestionDot", pattern: /\?\./ });
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/ });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/ });
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: [EqualityOp] });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: [EqualityOp] });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: [RelationalOp] });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: [RelationalOp] });

// Single-char operators
export const Gt = createToken({ name: "Gt", pattern: />/, categories: [RelationalOp] });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: [RelationalOp] });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Bang = createToken({ name: "Bang", pattern: /!/, categories: [PrefixOp] });
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [AdditiveOp, PrefixOp] });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [AdditiveOp, PrefixOp] });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: [MultiplicativeOp] });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: [MultiplicativeOp] });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: [MultiplicativeOp] });

// Punctuation
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  Comment,
  // Category tokens match nothing themselves but must be known to the lexer
  AdditiveOp,
  MultiplicativeOp,
  RelationalOp,
  EqualityOp,
  PipeOp,
  PrefixOp,
  // Multi-char operators first (order critical)
  TripleColon,  // ::: before := and :
  DeclareConst, // !:= before != and !
  Declare,      // := before :
  FatArrow,     // => before =
  Arrow,        // -> before Minus
  PipeForward,
  PipeBackward, // <| before <= and <
  QuestionDot,
  AndAnd,
  OrOr,
  EqEq,
  BangEq,
  GtEq,
  LtEq,
  // Module path before identifiers and keywords
  ModulePath,
  ...KEYWORDS,
  // Literals
  FloatLit,
  IntLit,
  StringLit,
  Ident,
  // Single-char operators & punctuation
  Gt,
  Lt,
  Equals,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Colon,
  Comma,
  Dot,
];

export const FloLexer = new Lexer(allTokens);
