export {
  TemplateValue, NilValue, StringValue, BoolValue, NumberValue, HtmlValue,
  ArrayValue, DictValue, SiteValue, DocumentValue, ListingValue,
} from "./values.ts";
export { RenderScope } from "./scope.ts";
export { TemplateEnvironment } from "./environment.ts";
export {
  TemplateNode, TextNode, OutputNode, AssignmentNode,
  TemplateInvokeNode, IfNode, RangeNode, WithNode, BlockNode,
} from "./nodes.ts";
export type { Defines } from "./nodes.ts";
export { Template } from "./template.ts";
export { nil, isTruthy, stringify, toPlainString, toNumber } from "./runtime-helpers.ts";
export { resolvePath } from "./fields.ts";
export { callFunction, formatPrintf } from "./functions.ts";
export { Pipeline, Expr, Command, parseTemplate, scanSegments, tokenizeAction, evalToken } from "./runtime.ts";
