import type { Document } from "./document.ts";

export class ListingPage {
  readonly documents: readonly Document[];
  readonly pageNumber: number;
  readonly totalPages: number;
  readonly fileName: string;
  /** Empty on the first page. */
  readonly prevUrl: string;
  /** Empty on the last page. */
  readonly nextUrl: string;

  constructor(
    documents: readonly Document[],
    pageNumber: number,
    totalPages: number,
    fileName: string,
    prevUrl: string,
    nextUrl: string,
  ) {
    this.documents = documents;
    this.pageNumber = pageNumber;
    this.totalPages = totalPages;
    this.fileName = fileName;
    this.prevUrl = prevUrl;
    this.nextUrl = nextUrl;
  }
}
