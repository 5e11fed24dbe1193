/** Metadata as declared in a document's leading block; recognised keys may be absent. */
export class DocumentMetadata {
  readonly title: string | undefined;
  readonly summary: string | undefined;
  readonly date: string | undefined;
  readonly image: string | undefined;
  /** Declared keys outside the recognised set, passed through untouched. */
  readonly extras: ReadonlyMap<string, string>;

  constructor(
    title: string | undefined,
    summary: string | undefined,
    date: string | undefined,
    image: string | undefined,
    extras: ReadonlyMap<string, string>,
  ) {
    this.title = title;
    this.summary = summary;
    this.date = date;
    this.image = image;
    this.extras = extras;
  }

  static empty(): DocumentMetadata {
    return new DocumentMetadata(undefined, undefined, undefined, undefined, new Map<string, string>());
  }
}

export class NormalizedMetadata {
  readonly title: string;
  readonly summary: string;
  readonly date: string;
  readonly image: string;
  readonly extras: ReadonlyMap<string, string>;

  constructor(title: string, summary: string, date: string, image: string, extras: ReadonlyMap<string, string>) {
    this.title = title;
    this.summary = summary;
    this.date = date;
    this.image = image;
    this.extras = extras;
  }
}

/** Output of the transformer for one document, before defaults are applied. */
export class TransformedDocument {
  readonly body: string;
  readonly metadata: DocumentMetadata;
  readonly wordCount: number;
  readonly readTime: number;

  constructor(body: string, metadata: DocumentMetadata, wordCount: number, readTime: number) {
    this.body = body;
    this.metadata = metadata;
    this.wordCount = wordCount;
    this.readTime = readTime;
  }
}

export class Document {
  readonly filename: string;
  readonly rawText: string;
  readonly body: string;
  readonly metadata: NormalizedMetadata;
  readonly slug: string;
  readonly fullUrl: string;
  readonly fullImageUrl: string;
  readonly readTime: number;

  constructor(
    filename: string,
    rawText: string,
    body: string,
    metadata: NormalizedMetadata,
    slug: string,
    fullUrl: string,
    fullImageUrl: string,
    readTime: number,
  ) {
    this.filename = filename;
    this.rawText = rawText;
    this.body = body;
    this.metadata = metadata;
    this.slug = slug;
    this.fullUrl = fullUrl;
    this.fullImageUrl = fullImageUrl;
    this.readTime = readTime;
    Object.freeze(this);
  }
}
