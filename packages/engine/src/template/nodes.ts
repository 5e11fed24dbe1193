import { TemplateResolutionError } from "../errors.ts";
import { isTruthy, stringify } from "./runtime-helpers.ts";
import type { Pipeline } from "./runtime.ts";
import type { RenderScope } from "./scope.ts";
import { ArrayValue, DictValue, NilValue, NumberValue, StringValue } from "./values.ts";
import type { TemplateValue } from "./values.ts";

export type Defines = ReadonlyMap<string, readonly TemplateNode[]>;

export abstract class TemplateNode {
  abstract render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void;
}

export const renderNodes = (
  nodes: readonly TemplateNode[],
  out: string[],
  scope: RenderScope,
  overrides: Defines,
  defines: Defines,
): void => {
  for (const node of nodes) node.render(out, scope, overrides, defines);
};

export class TextNode extends TemplateNode {
  readonly text: string;

  constructor(text: string) {
    super();
    this.text = text;
  }

  override render(out: string[]): void {
    out.push(this.text);
  }
}

export class OutputNode extends TemplateNode {
  readonly pipeline: Pipeline;
  readonly escape: boolean;

  constructor(pipeline: Pipeline, escape: boolean) {
    super();
    this.pipeline = pipeline;
    this.escape = escape;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const value = this.pipeline.eval(scope, overrides, defines);
    out.push(stringify(value, this.escape));
  }
}

export class AssignmentNode extends TemplateNode {
  readonly name: string;
  readonly pipeline: Pipeline;
  readonly declare: boolean;

  constructor(name: string, pipeline: Pipeline, declare: boolean) {
    super();
    this.name = name;
    this.pipeline = pipeline;
    this.declare = declare;
  }

  override render(_out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const value = this.pipeline.eval(scope, overrides, defines);
    if (this.declare) scope.declareVar(this.name, value);
    else scope.assignVar(this.name, value);
  }
}

export class TemplateInvokeNode extends TemplateNode {
  readonly name: string;
  readonly context: Pipeline;

  constructor(name: string, context: Pipeline) {
    super();
    this.name = name;
    this.context = context;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const nodes = overrides.get(this.name) ?? defines.get(this.name);
    if (nodes === undefined) throw new TemplateResolutionError(this.name, scope.env.description);
    const ctx = this.context.eval(scope, overrides, defines);
    const dot = ctx instanceof NilValue ? scope.dot : ctx;
    renderNodes(nodes, out, scope.child(dot), overrides, defines);
  }
}

export class IfNode extends TemplateNode {
  readonly condition: Pipeline;
  readonly thenNodes: readonly TemplateNode[];
  readonly elseNodes: readonly TemplateNode[];

  constructor(condition: Pipeline, thenNodes: readonly TemplateNode[], elseNodes: readonly TemplateNode[]) {
    super();
    this.condition = condition;
    this.thenNodes = thenNodes;
    this.elseNodes = elseNodes;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const value = this.condition.eval(scope, overrides, defines);
    renderNodes(isTruthy(value) ? this.thenNodes : this.elseNodes, out, scope, overrides, defines);
  }
}

export class RangeNode extends TemplateNode {
  readonly expr: Pipeline;
  readonly keyVar: string | undefined;
  readonly valueVar: string | undefined;
  readonly body: readonly TemplateNode[];
  readonly elseBody: readonly TemplateNode[];

  constructor(
    expr: Pipeline,
    keyVar: string | undefined,
    valueVar: string | undefined,
    body: readonly TemplateNode[],
    elseBody: readonly TemplateNode[],
  ) {
    super();
    this.expr = expr;
    this.keyVar = keyVar;
    this.valueVar = valueVar;
    this.body = body;
    this.elseBody = elseBody;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const value = this.expr.eval(scope, overrides, defines);

    const entries: [NumberValue | StringValue, TemplateValue][] = [];
    if (value instanceof ArrayValue) {
      value.value.forEach((item, i) => entries.push([new NumberValue(i), item]));
    } else if (value instanceof DictValue) {
      for (const [k, v] of value.value) entries.push([new StringValue(k), v]);
    }

    if (entries.length === 0) {
      renderNodes(this.elseBody, out, scope, overrides, defines);
      return;
    }

    for (const [key, item] of entries) {
      const itemScope = scope.child(item);
      if (this.valueVar !== undefined) itemScope.declareVar(this.valueVar, item);
      if (this.keyVar !== undefined) itemScope.declareVar(this.keyVar, key);
      renderNodes(this.body, out, itemScope, overrides, defines);
    }
  }
}

export class WithNode extends TemplateNode {
  readonly expr: Pipeline;
  readonly body: readonly TemplateNode[];
  readonly elseBody: readonly TemplateNode[];

  constructor(expr: Pipeline, body: readonly TemplateNode[], elseBody: readonly TemplateNode[]) {
    super();
    this.expr = expr;
    this.body = body;
    this.elseBody = elseBody;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const value = this.expr.eval(scope, overrides, defines);
    if (isTruthy(value)) {
      renderNodes(this.body, out, scope.child(value), overrides, defines);
      return;
    }
    renderNodes(this.elseBody, out, scope, overrides, defines);
  }
}

/** `{{ block "name" . }}`: renders the override for `name` when one is supplied, else its own body. */
export class BlockNode extends TemplateNode {
  readonly name: string;
  readonly context: Pipeline;
  readonly fallback: readonly TemplateNode[];

  constructor(name: string, context: Pipeline, fallback: readonly TemplateNode[]) {
    super();
    this.name = name;
    this.context = context;
    this.fallback = fallback;
  }

  override render(out: string[], scope: RenderScope, overrides: Defines, defines: Defines): void {
    const ctx = this.context.eval(scope, overrides, defines);
    const dot = ctx instanceof NilValue ? scope.dot : ctx;
    renderNodes(overrides.get(this.name) ?? this.fallback, out, scope.child(dot), overrides, defines);
  }
}
