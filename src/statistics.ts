import type { DictionaryStatistics, ExpressionDictionary } from "./types.js";

/**
 * Count entries by surface word count, POS and type in a single pass.
 */
export function computeStatistics(
  dictionary: ExpressionDictionary
): DictionaryStatistics {
  const lengthDistribution: Record<number, number> = {};
  const posDistribution: Record<string, number> = {};
  const typeDistribution: Record<string, number> = {};

  for (const [surface, info] of dictionary) {
    const length = surface.split(/\s+/).filter((w) => w.length > 0).length;
    lengthDistribution[length] = (lengthDistribution[length] ?? 0) + 1;
    posDistribution[info.pos] = (posDistribution[info.pos] ?? 0) + 1;
    typeDistribution[info.type] = (typeDistribution[info.type] ?? 0) + 1;
  }

  return {
    total: dictionary.size,
    lengthDistribution,
    posDistribution,
    typeDistribution,
  };
}
