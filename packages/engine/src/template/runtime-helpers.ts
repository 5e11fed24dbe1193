import { escapeHtml } from "../utils/html.ts";
import {
  ArrayValue, BoolValue, DictValue, DocumentValue, HtmlValue, ListingValue, NilValue, NumberValue, StringValue,
} from "./values.ts";
import type { TemplateValue } from "./values.ts";

export const nil: TemplateValue = new NilValue();

export const isTruthy = (value: TemplateValue): boolean => {
  if (value instanceof NilValue) return false;
  if (value instanceof BoolValue) return value.value;
  if (value instanceof NumberValue) return value.value !== 0;
  if (value instanceof StringValue) return value.value !== "";
  if (value instanceof HtmlValue) return value.value.value !== "";
  if (value instanceof ArrayValue) return value.value.length > 0;
  if (value instanceof DictValue) return value.value.size > 0;
  return true;
};

export const toPlainString = (value: TemplateValue): string => {
  if (value instanceof StringValue) return value.value;
  if (value instanceof HtmlValue) return value.value.value;
  if (value instanceof BoolValue) return value.value ? "true" : "false";
  if (value instanceof NumberValue) return value.value.toString();
  if (value instanceof DocumentValue) return value.value.slug;
  if (value instanceof ListingValue) return value.value.fileName;
  return "";
};

export const stringify = (value: TemplateValue, escape: boolean): string => {
  if (value instanceof HtmlValue) return value.value.value;
  const s = toPlainString(value);
  return escape ? escapeHtml(s) : s;
};

export const toNumber = (value: TemplateValue): number => {
  if (value instanceof NumberValue) return value.value;
  if (value instanceof StringValue) {
    const parsed = Number(value.value.trim());
    return value.value.trim() !== "" && Number.isFinite(parsed) ? parsed : 0;
  }
  if (value instanceof BoolValue) return value.value ? 1 : 0;
  return 0;
};
