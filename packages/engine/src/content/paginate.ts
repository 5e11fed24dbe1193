import { ListingPage } from "../models/index.ts";
import type { Document } from "../models/index.ts";

export const canonicalListingName = "index.html";

export const listingFileName = (pageNumber: number): string =>
  pageNumber === 1 ? canonicalListingName : `page${pageNumber}.html`;

export const countPages = (total: number, capacity: number): number => Math.ceil(total / capacity);

export const paginate = (ordered: readonly Document[], capacity: number): ListingPage[] => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Page capacity must be a positive integer, got ${capacity}`);
  }

  const totalPages = countPages(ordered.length, capacity);
  const pages: ListingPage[] = [];
  for (let pageNumber = 1; pageNumber <= totalPages; pageNumber++) {
    const start = (pageNumber - 1) * capacity;
    const prevUrl = pageNumber > 1 ? listingFileName(pageNumber - 1) : "";
    const nextUrl = pageNumber < totalPages ? listingFileName(pageNumber + 1) : "";
    pages.push(
      new ListingPage(ordered.slice(start, start + capacity), pageNumber, totalPages, listingFileName(pageNumber), prevUrl, nextUrl),
    );
  }
  return pages;
};
