import type { Document } from "../models/index.ts";

const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Newest first by plain string comparison of `date`. Array#sort is stable,
 * so documents sharing a date keep their input order.
 */
export const orderByDateDescending = (documents: readonly Document[]): readonly Document[] => {
  const ordered = [...documents].sort((a, b) => compareCodeUnits(b.metadata.date, a.metadata.date));
  return Object.freeze(ordered);
};
