const MULTIPLIERS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
  TB: 1024 * 1024 * 1024 * 1024,
};

/**
 * Parse a human byte size such as "64KB", "1.5MB" or "8192" (bytes).
 * @returns Size in bytes, or undefined if empty or invalid
 */
export const parseByteSize = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim().toUpperCase();
  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(KB|MB|GB|TB|B)?$/);
  if (!match) {
    return undefined;
  }

  const amount = Number.parseFloat(match[1] ?? '0');
  const multiplier = MULTIPLIERS[match[2] ?? 'B'] ?? 1;

  if (Number.isNaN(amount) || amount < 0) {
    return undefined;
  }

  return Math.floor(amount * multiplier);
};

/**
 * Chunk size for content hashing, from HASH_CHUNK_SIZE
 */
export const parseHashChunkSize = (): number | undefined => {
  const size = parseByteSize(process.env.HASH_CHUNK_SIZE);
  return size && size > 0 ? size : undefined;
};
