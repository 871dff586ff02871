export const collapseWhitespace = (value: string): string => {
  return value.replace(/\s+/g, ' ').trim();
};

/** Canonical form used for content hashing: NFC, single spaces, lowercase. */
export const normalizeForHash = (value: string): string => {
  return collapseWhitespace(value.normalize('NFC')).toLowerCase();
};

export const stripDiacritics = (value: string): string => {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
};

/** Lowercase without accents, for keyword matching. */
export const foldText = (value: string): string => {
  return stripDiacritics(value.toLowerCase());
};

export const tokenize = (value: string): string[] => {
  return foldText(value).match(/[a-z0-9]+/g) ?? [];
};

export const truncateText = (value: string, maxLength: number): string => {
  const normalized = collapseWhitespace(value);
  if (normalized.length <= maxLength) {
    return normalized;
  }

  return `${normalized.slice(0, maxLength - 1)}…`;
};

export const stableHash = (value: string): number => {
  let hash = 0;

  for (let index = 0; index < value.length; index += 1) {
    hash = (hash * 31 + value.charCodeAt(index)) >>> 0;
  }

  return hash;
};

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};
