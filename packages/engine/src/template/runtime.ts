import { callFunction } from "./functions.ts";
import { resolvePath } from "./fields.ts";
import { nil } from "./runtime-helpers.ts";
import type { RenderScope } from "./scope.ts";
import {
  AssignmentNode, BlockNode, IfNode, OutputNode, RangeNode, TemplateInvokeNode, TextNode, WithNode,
} from "./nodes.ts";
import type { Defines, TemplateNode } from "./nodes.ts";
import { Template } from "./template.ts";
import { BoolValue, NumberValue, SiteValue, StringValue } from "./values.ts";
import type { TemplateValue } from "./values.ts";

export class Segment {
  readonly isAction: boolean;
  readonly text: string;

  constructor(isAction: boolean, text: string) {
    this.isAction = isAction;
    this.text = text;
  }
}

export class Pipeline {
  readonly stages: readonly Command[];

  constructor(stages: readonly Command[]) {
    this.stages = stages;
  }

  eval(scope: RenderScope, overrides: Defines, defines: Defines): TemplateValue {
    let value: TemplateValue | undefined = undefined;
    for (const stage of this.stages) value = stage.eval(scope, overrides, defines, value);
    return value ?? nil;
  }
}

export const parseStringLiteral = (token: string): string | undefined => {
  const t = token.trim();
  if (
    t.length >= 2 &&
    ((t.startsWith("\"") && t.endsWith("\"")) || (t.startsWith("'") && t.endsWith("'")) || (t.startsWith("`") && t.endsWith("`")))
  ) {
    return t.substring(1, t.length - 1);
  }
  return undefined;
};

export const isNumberLiteral = (token: string): boolean => /^-?\d+(\.\d+)?$/.test(token);

const isLiteralOrPath = (t: string): boolean =>
  t === "." ||
  t === "$" ||
  t.startsWith(".") ||
  t.startsWith("$") ||
  t === "site" ||
  t.startsWith("site.") ||
  t === "true" ||
  t === "false" ||
  t === "nil" ||
  parseStringLiteral(t) !== undefined ||
  isNumberLiteral(t);

export const evalToken = (token: string, scope: RenderScope): TemplateValue => {
  const t = token.trim();
  if (t === ".") return scope.dot;
  if (t === "$") return scope.root;
  if (t.startsWith("$.")) return resolvePath(scope.root, t.substring(2).split("."));
  if (t.startsWith(".")) return resolvePath(scope.dot, t.substring(1).split("."));
  if (t.startsWith("$")) {
    const [name = "", ...rest] = t.substring(1).split(".");
    return resolvePath(scope.getVar(name) ?? nil, rest);
  }
  if (t === "site") return new SiteValue(scope.site);
  if (t.startsWith("site.")) return resolvePath(new SiteValue(scope.site), t.substring(5).split("."));
  const lit = parseStringLiteral(t);
  if (lit !== undefined) return new StringValue(lit);
  if (t === "true") return new BoolValue(true);
  if (t === "false") return new BoolValue(false);
  if (t === "nil") return nil;
  if (isNumberLiteral(t)) return new NumberValue(Number(t));
  return new StringValue(t);
};

export abstract class Expr {
  abstract eval(scope: RenderScope, overrides: Defines, defines: Defines): TemplateValue;
}

class TokenExpr extends Expr {
  readonly token: string;

  constructor(token: string) {
    super();
    this.token = token;
  }

  override eval(scope: RenderScope): TemplateValue {
    const t = this.token.trim();
    if (t === "" || isLiteralOrPath(t)) return evalToken(t, scope);
    return callFunction(t, [], scope);
  }
}

class PipelineExpr extends Expr {
  readonly pipeline: Pipeline;

  constructor(pipeline: Pipeline) {
    super();
    this.pipeline = pipeline;
  }

  override eval(scope: RenderScope, overrides: Defines, defines: Defines): TemplateValue {
    return this.pipeline.eval(scope, overrides, defines);
  }
}

/** Field access on a parenthesised result: `(index .X 0).Title`. */
class AccessExpr extends Expr {
  readonly base: Expr;
  readonly segments: readonly string[];

  constructor(base: Expr, segments: readonly string[]) {
    super();
    this.base = base;
    this.segments = segments;
  }

  override eval(scope: RenderScope, overrides: Defines, defines: Defines): TemplateValue {
    return resolvePath(this.base.eval(scope, overrides, defines), this.segments);
  }
}

export class Command {
  readonly head: Expr;
  readonly args: readonly Expr[];

  constructor(head: Expr, args: readonly Expr[]) {
    this.head = head;
    this.args = args;
  }

  eval(scope: RenderScope, overrides: Defines, defines: Defines, piped: TemplateValue | undefined): TemplateValue {
    if (this.args.length === 0 && piped === undefined) return this.head.eval(scope, overrides, defines);

    const head = this.head;
    if (head instanceof TokenExpr && !isLiteralOrPath(head.token)) {
      const evaluated = this.args.map((a) => a.eval(scope, overrides, defines));
      if (piped !== undefined) evaluated.push(piped);
      return callFunction(head.token, evaluated, scope);
    }

    const headValue = head.eval(scope, overrides, defines);
    return piped ?? headValue;
  }
}

class PipelineParser {
  readonly tokens: readonly string[];
  private idx: number;

  constructor(tokens: readonly string[]) {
    this.tokens = tokens;
    this.idx = 0;
  }

  parsePipeline(stopOnRightParen: boolean): Pipeline {
    const stages: Command[] = [];
    while (this.idx < this.tokens.length) {
      const t = this.tokens[this.idx];
      if (stopOnRightParen && t === ")") break;
      if (t === "|") {
        this.idx++;
        continue;
      }
      stages.push(this.parseCommand());
      if (this.tokens[this.idx] === "|") this.idx++;
    }
    return new Pipeline(stages);
  }

  private parseCommand(): Command {
    const head = this.parseExpr();
    const args: Expr[] = [];
    while (this.idx < this.tokens.length) {
      const t = this.tokens[this.idx];
      if (t === "|" || t === ")") break;
      args.push(this.parseExpr());
    }
    return new Command(head, args);
  }

  private parseExpr(): Expr {
    const t = this.tokens[this.idx];
    if (t === undefined) return new TokenExpr("");
    this.idx++;
    if (t !== "(") return new TokenExpr(t);

    const inner = this.parsePipeline(true);
    if (this.tokens[this.idx] === ")") this.idx++;
    let expr: Expr = new PipelineExpr(inner);
    for (let next = this.tokens[this.idx]; next !== undefined && next.startsWith(".") && next !== "."; next = this.tokens[this.idx]) {
      expr = new AccessExpr(expr, next.substring(1).split("."));
      this.idx++;
    }
    return expr;
  }
}

export const parsePipeline = (tokens: readonly string[]): Pipeline => new PipelineParser(tokens).parsePipeline(false);

const isSpace = (ch: string): boolean => ch === " " || ch === "\t" || ch === "\r" || ch === "\n";

/** Splits template text into literal text and `{{ }}` actions, applying `{{-` and `-}}` trimming. */
export const scanSegments = (template: string): Segment[] => {
  const segs: Segment[] = [];
  let i = 0;

  while (i < template.length) {
    const start = template.indexOf("{{", i);
    if (start < 0) {
      segs.push(new Segment(false, template.substring(i)));
      break;
    }
    if (start > i) segs.push(new Segment(false, template.substring(i, start)));

    const end = template.indexOf("}}", start + 2);
    if (end < 0) {
      segs.push(new Segment(false, template.substring(start)));
      break;
    }

    let action = template.substring(start + 2, end);
    let leftTrim = false;
    let rightTrim = false;
    if (action.startsWith("-") && (action.length === 1 || isSpace(action.charAt(1)))) {
      leftTrim = true;
      action = action.substring(1);
    }
    if (action.endsWith("-") && (action.length === 1 || isSpace(action.charAt(action.length - 2)))) {
      rightTrim = true;
      action = action.substring(0, action.length - 1);
    }

    const last = segs[segs.length - 1];
    if (leftTrim && last !== undefined && !last.isAction) {
      segs[segs.length - 1] = new Segment(false, last.text.trimEnd());
    }

    segs.push(new Segment(true, action.trim()));
    i = end + 2;

    if (rightTrim) {
      while (i < template.length && isSpace(template.charAt(i))) i++;
    }
  }

  return segs;
};

const wordBreak = new Set([" ", "\t", "\r", "\n", "|", "(", ")", ",", "="]);

export const tokenizeAction = (action: string): string[] => {
  const tokens: string[] = [];
  let i = 0;

  while (i < action.length) {
    const ch = action.charAt(i);
    if (isSpace(ch)) {
      i++;
      continue;
    }
    if (ch === "|" || ch === "(" || ch === ")" || ch === "," || ch === "=") {
      tokens.push(ch);
      i++;
      continue;
    }
    if (ch === ":" && action.charAt(i + 1) === "=") {
      tokens.push(":=");
      i += 2;
      continue;
    }
    if (ch === "\"" || ch === "'" || ch === "`") {
      const close = action.indexOf(ch, i + 1);
      const stop = close < 0 ? action.length : close;
      tokens.push(ch + action.substring(i + 1, stop) + ch);
      i = stop + 1;
      continue;
    }

    const tokenStart = i;
    while (i < action.length) {
      const c = action.charAt(i);
      if (wordBreak.has(c)) break;
      if (c === ":" && action.charAt(i + 1) === "=") break;
      i++;
    }
    tokens.push(action.substring(tokenStart, i));
  }

  return tokens;
};

class ParseNodesResult {
  readonly nodes: TemplateNode[];
  readonly endedWithElse: boolean;

  constructor(nodes: TemplateNode[], endedWithElse: boolean) {
    this.nodes = nodes;
    this.endedWithElse = endedWithElse;
  }
}

const isVariable = (token: string): boolean => token.startsWith("$") && token !== "$" && !token.startsWith("$.");

const isDeclareOp = (token: string | undefined): boolean => token === ":=" || token === "=";

class Parser {
  readonly segs: readonly Segment[];
  readonly defines: Map<string, readonly TemplateNode[]>;
  private idx: number;
  private lastElseTokens: string[] | undefined;

  constructor(segs: readonly Segment[]) {
    this.segs = segs;
    this.defines = new Map<string, readonly TemplateNode[]>();
    this.idx = 0;
    this.lastElseTokens = undefined;
  }

  private takeElseTokens(): string[] {
    const t = this.lastElseTokens ?? [];
    this.lastElseTokens = undefined;
    return t;
  }

  private parseElse(body: ParseNodesResult): TemplateNode[] {
    if (!body.endedWithElse) return [];
    this.takeElseTokens();
    return this.parseNodes(false).nodes;
  }

  private parseIfFrom(cond: Pipeline): IfNode {
    const thenBody = this.parseNodes(true);
    let elseNodes: TemplateNode[] = [];
    if (thenBody.endedWithElse) {
      const elseTokens = this.takeElseTokens();
      if (elseTokens[1] === "if") {
        elseNodes = [this.parseIfFrom(parsePipeline(elseTokens.slice(2)))];
      } else {
        elseNodes = this.parseNodes(false).nodes;
      }
    }
    return new IfNode(cond, thenBody.nodes, elseNodes);
  }

  private parseRange(tokens: readonly string[]): RangeNode {
    let keyVar: string | undefined = undefined;
    let valueVar: string | undefined = undefined;
    let exprTokens = tokens.slice(1);

    const [, first = "", second, third = "", fourth] = tokens;
    if (isVariable(first) && second === "," && isVariable(third) && isDeclareOp(fourth)) {
      keyVar = first.substring(1);
      valueVar = third.substring(1);
      exprTokens = tokens.slice(5);
    } else if (isVariable(first) && isDeclareOp(second)) {
      valueVar = first.substring(1);
      exprTokens = tokens.slice(3);
    }

    const expr = parsePipeline(exprTokens);
    const body = this.parseNodes(true);
    return new RangeNode(expr, keyVar, valueVar, body.nodes, this.parseElse(body));
  }

  parseNodes(stopOnElse: boolean): ParseNodesResult {
    const nodes: TemplateNode[] = [];

    while (this.idx < this.segs.length) {
      const seg = this.segs[this.idx];
      this.idx++;
      if (seg === undefined) break;

      if (!seg.isAction) {
        nodes.push(new TextNode(seg.text));
        continue;
      }
      if (seg.text.startsWith("/*") && seg.text.endsWith("*/")) continue;

      const tokens = tokenizeAction(seg.text);
      const [head, nameToken = ""] = tokens;
      if (head === undefined) continue;

      if (head === "end") return new ParseNodesResult(nodes, false);
      if (head === "else") {
        if (stopOnElse) {
          this.lastElseTokens = tokens;
          return new ParseNodesResult(nodes, true);
        }
        continue;
      }

      if (head === "define" && tokens.length >= 2) {
        const name = parseStringLiteral(nameToken) ?? nameToken;
        this.defines.set(name, this.parseNodes(false).nodes);
        continue;
      }

      if (head === "block" && tokens.length >= 2) {
        const name = parseStringLiteral(nameToken) ?? nameToken;
        const ctx = parsePipeline(tokens.length >= 3 ? tokens.slice(2) : ["."]);
        const body = this.parseNodes(false);
        this.defines.set(name, body.nodes);
        nodes.push(new BlockNode(name, ctx, body.nodes));
        continue;
      }

      if (head === "if") {
        nodes.push(this.parseIfFrom(parsePipeline(tokens.slice(1))));
        continue;
      }

      if (head === "with") {
        const expr = parsePipeline(tokens.slice(1));
        const body = this.parseNodes(true);
        nodes.push(new WithNode(expr, body.nodes, this.parseElse(body)));
        continue;
      }

      if (head === "range") {
        nodes.push(this.parseRange(tokens));
        continue;
      }

      if (head === "template" && tokens.length >= 2) {
        const name = parseStringLiteral(nameToken) ?? nameToken;
        nodes.push(new TemplateInvokeNode(name, parsePipeline(tokens.length >= 3 ? tokens.slice(2) : ["."])));
        continue;
      }

      if (tokens.length >= 3 && isVariable(head) && isDeclareOp(tokens[1])) {
        nodes.push(new AssignmentNode(head.substring(1), parsePipeline(tokens.slice(2)), tokens[1] === ":="));
        continue;
      }

      nodes.push(new OutputNode(parsePipeline(tokens), true));
    }

    return new ParseNodesResult(nodes, false);
  }
}

export const parseTemplate = (template: string): Template => {
  const parser = new Parser(scanSegments(template));
  const root = parser.parseNodes(false);
  return new Template(root.nodes, parser.defines);
};
