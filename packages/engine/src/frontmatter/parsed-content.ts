import { DocumentMetadata } from "../models/index.ts";

export class ParsedContent {
  readonly metadata: DocumentMetadata;
  readonly body: string;

  constructor(metadata: DocumentMetadata, body: string) {
    this.metadata = metadata;
    this.body = body;
  }
}
