export const truncate = (value: string | null | undefined, maxLength: number): string => {
  if (!value) return '';
  return value.length <= maxLength ? value : value.slice(0, Math.max(0, maxLength));
};

export const normalizeWhitespace = (text: string): string =>
  text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();

/** Lower-cased, whitespace-split query terms; duplicates are kept. */
export const queryTerms = (query: string): string[] =>
  query
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean);
