import { TemplateExecutionError, TemplateResolutionError } from "../errors.ts";
import { HtmlString } from "../utils/html.ts";
import { slugify } from "../utils/text.ts";
import { isTruthy, nil, toNumber, toPlainString } from "./runtime-helpers.ts";
import type { RenderScope } from "./scope.ts";
import {
  ArrayValue, BoolValue, DictValue, DocumentValue, HtmlValue, ListingValue, NilValue, NumberValue, SiteValue, StringValue,
} from "./values.ts";
import type { TemplateValue } from "./values.ts";

type JsonValue = null | string | number | boolean | JsonValue[] | { [key: string]: JsonValue };

const isNumeric = (value: TemplateValue): boolean => value instanceof NumberValue;

const compare = (a: TemplateValue, b: TemplateValue): number => {
  if (isNumeric(a) || isNumeric(b)) return toNumber(a) - toNumber(b);
  const sa = toPlainString(a);
  const sb = toPlainString(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
};

const equals = (a: TemplateValue, b: TemplateValue): boolean => {
  if (a instanceof NilValue || b instanceof NilValue) return a instanceof NilValue && b instanceof NilValue;
  if (a instanceof BoolValue || b instanceof BoolValue) return isTruthy(a) === isTruthy(b) && a.kind === b.kind;
  return compare(a, b) === 0;
};

const toJson = (value: TemplateValue): JsonValue => {
  if (value instanceof NilValue) return null;
  if (value instanceof BoolValue) return value.value;
  if (value instanceof NumberValue) return value.value;
  if (value instanceof StringValue) return value.value;
  if (value instanceof HtmlValue) return value.value.value;
  if (value instanceof ArrayValue) return value.value.map(toJson);
  if (value instanceof DictValue) {
    const obj: { [key: string]: JsonValue } = {};
    for (const [k, v] of value.value) obj[k] = toJson(v);
    return obj;
  }
  if (value instanceof DocumentValue) {
    const doc = value.value;
    return { title: doc.metadata.title, url: doc.slug, summary: doc.metadata.summary, date: doc.metadata.date };
  }
  if (value instanceof ListingValue) return value.value.fileName;
  if (value instanceof SiteValue) return value.value.title;
  return null;
};

const lengthOf = (value: TemplateValue): number => {
  if (value instanceof ArrayValue) return value.value.length;
  if (value instanceof DictValue) return value.value.size;
  if (value instanceof ListingValue) return value.value.documents.length;
  return [...toPlainString(value)].length;
};

/** Go-style verbs: %s, %d, %v and %%. */
export const formatPrintf = (format: string, args: readonly TemplateValue[]): string => {
  let argIndex = 0;
  return format.replace(/%([sdv%])/g, (_match: string, verb: string): string => {
    if (verb === "%") return "%";
    const arg = args[argIndex++];
    if (arg === undefined) return `%!${verb}(MISSING)`;
    if (verb === "d") return Math.trunc(toNumber(arg)).toString();
    return toPlainString(arg);
  });
};

const truncate = (size: number, text: string): string => {
  const chars = [...text];
  if (chars.length <= size) return text;
  return chars.slice(0, size).join("").trimEnd() + "…";
};

const absURL = (scope: RenderScope, path: string): string => {
  if (/^[a-z][a-z0-9+.-]*:/i.test(path)) return path;
  const rel = path.startsWith("/") ? path.substring(1) : path;
  return `${scope.site.baseURL}/${rel}`;
};

const relURL = (path: string): string => (path.startsWith("/") || /^[a-z][a-z0-9+.-]*:/i.test(path) ? path : "/" + path);

const requireArgs = (name: string, args: readonly TemplateValue[], count: number): void => {
  if (args.length < count) {
    throw new TemplateExecutionError(`${name} expects ${count} argument(s), got ${args.length}`);
  }
};

const arg = (args: readonly TemplateValue[], index: number): TemplateValue => args[index] ?? nil;

export const callFunction = (nameRaw: string, args: readonly TemplateValue[], scope: RenderScope): TemplateValue => {
  const name = nameRaw.trim();
  switch (name.toLowerCase()) {
    case "eq": {
      requireArgs(name, args, 2);
      const first = arg(args, 0);
      return new BoolValue(args.slice(1).some((other) => equals(first, other)));
    }
    case "ne":
      requireArgs(name, args, 2);
      return new BoolValue(!equals(arg(args, 0), arg(args, 1)));
    case "lt":
      requireArgs(name, args, 2);
      return new BoolValue(compare(arg(args, 0), arg(args, 1)) < 0);
    case "le":
      requireArgs(name, args, 2);
      return new BoolValue(compare(arg(args, 0), arg(args, 1)) <= 0);
    case "gt":
      requireArgs(name, args, 2);
      return new BoolValue(compare(arg(args, 0), arg(args, 1)) > 0);
    case "ge":
      requireArgs(name, args, 2);
      return new BoolValue(compare(arg(args, 0), arg(args, 1)) >= 0);
    case "and": {
      for (const a of args) if (!isTruthy(a)) return a;
      return args.length > 0 ? arg(args, args.length - 1) : nil;
    }
    case "or": {
      for (const a of args) if (isTruthy(a)) return a;
      return args.length > 0 ? arg(args, args.length - 1) : nil;
    }
    case "not":
      requireArgs(name, args, 1);
      return new BoolValue(!isTruthy(arg(args, 0)));
    case "len":
      requireArgs(name, args, 1);
      return new NumberValue(lengthOf(arg(args, 0)));
    case "default": {
      requireArgs(name, args, 1);
      const given = arg(args, 1);
      return isTruthy(given) ? given : arg(args, 0);
    }
    case "safehtml":
      requireArgs(name, args, 1);
      return new HtmlValue(new HtmlString(toPlainString(arg(args, 0))));
    case "printf":
      requireArgs(name, args, 1);
      return new StringValue(formatPrintf(toPlainString(arg(args, 0)), args.slice(1)));
    case "add":
      requireArgs(name, args, 2);
      return new NumberValue(toNumber(arg(args, 0)) + toNumber(arg(args, 1)));
    case "sub":
      requireArgs(name, args, 2);
      return new NumberValue(toNumber(arg(args, 0)) - toNumber(arg(args, 1)));
    case "upper":
      requireArgs(name, args, 1);
      return new StringValue(toPlainString(arg(args, 0)).toUpperCase());
    case "lower":
      requireArgs(name, args, 1);
      return new StringValue(toPlainString(arg(args, 0)).toLowerCase());
    case "truncate":
      requireArgs(name, args, 2);
      return new StringValue(truncate(toNumber(arg(args, 0)), toPlainString(arg(args, 1))));
    case "urlize":
      requireArgs(name, args, 1);
      return new StringValue(slugify(toPlainString(arg(args, 0))));
    case "absurl":
      requireArgs(name, args, 1);
      return new StringValue(absURL(scope, toPlainString(arg(args, 0))));
    case "relurl":
      requireArgs(name, args, 1);
      return new StringValue(relURL(toPlainString(arg(args, 0))));
    case "jsonify":
      requireArgs(name, args, 1);
      return new StringValue(JSON.stringify(toJson(arg(args, 0))));
    case "partial": {
      requireArgs(name, args, 1);
      const partialName = toPlainString(arg(args, 0));
      const partial = scope.env.getPartial(partialName);
      if (partial === undefined) throw new TemplateResolutionError(`partials/${partialName}`, scope.env.description);
      const dot = args.length >= 2 ? arg(args, 1) : scope.dot;
      return new HtmlValue(new HtmlString(partial.render(dot, scope.site, scope.env)));
    }
    default:
      throw new TemplateExecutionError(`Unknown template function "${name}"`);
  }
};
