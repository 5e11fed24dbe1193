export const wordsPerMinute = 200;

export const countWords = (text: string): number => {
  const trimmed = text.trim();
  if (trimmed === "") return 0;
  return trimmed.split(/\s+/).length;
};

/** Rounds to the nearest integer; exact halves go to the even neighbour. */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

export const estimateReadTime = (wordCount: number): number => Math.max(1, roundHalfEven(wordCount / wordsPerMinute));
