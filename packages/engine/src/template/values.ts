import type { Document, ListingPage, SiteConfig } from "../models/index.ts";
import { HtmlString } from "../utils/html.ts";

export abstract class TemplateValue {
  abstract readonly kind: string;
}

export class NilValue extends TemplateValue {
  override readonly kind = "nil";
}

export class StringValue extends TemplateValue {
  override readonly kind = "string";
  readonly value: string;

  constructor(value: string) {
    super();
    this.value = value;
  }
}

export class BoolValue extends TemplateValue {
  override readonly kind = "bool";
  readonly value: boolean;

  constructor(value: boolean) {
    super();
    this.value = value;
  }
}

export class NumberValue extends TemplateValue {
  override readonly kind = "number";
  readonly value: number;

  constructor(value: number) {
    super();
    this.value = value;
  }
}

/** Markup that is written out without escaping. */
export class HtmlValue extends TemplateValue {
  override readonly kind = "html";
  readonly value: HtmlString;

  constructor(value: HtmlString) {
    super();
    this.value = value;
  }
}

export class ArrayValue extends TemplateValue {
  override readonly kind = "array";
  readonly value: readonly TemplateValue[];

  constructor(value: readonly TemplateValue[]) {
    super();
    this.value = value;
  }
}

export class DictValue extends TemplateValue {
  override readonly kind = "dict";
  readonly value: ReadonlyMap<string, TemplateValue>;

  constructor(value: ReadonlyMap<string, TemplateValue>) {
    super();
    this.value = value;
  }

  /** Exact key first, then the first key that matches ignoring case. */
  get(key: string): TemplateValue | undefined {
    const exact = this.value.get(key);
    if (exact !== undefined) return exact;
    const lower = key.toLowerCase();
    for (const [k, v] of this.value) {
      if (k.toLowerCase() === lower) return v;
    }
    return undefined;
  }

  static fromStrings(entries: ReadonlyMap<string, string>): DictValue {
    const map = new Map<string, TemplateValue>();
    for (const [k, v] of entries) map.set(k, new StringValue(v));
    return new DictValue(map);
  }
}

export class SiteValue extends TemplateValue {
  override readonly kind = "site";
  readonly value: SiteConfig;

  constructor(value: SiteConfig) {
    super();
    this.value = value;
  }
}

export class DocumentValue extends TemplateValue {
  override readonly kind = "document";
  readonly value: Document;
  readonly site: SiteConfig;

  constructor(value: Document, site: SiteConfig) {
    super();
    this.value = value;
    this.site = site;
  }
}

export class ListingValue extends TemplateValue {
  override readonly kind = "listing";
  readonly value: ListingPage;
  readonly site: SiteConfig;

  constructor(value: ListingPage, site: SiteConfig) {
    super();
    this.value = value;
    this.site = site;
  }
}
