/**
 * Feature dictionary views
 */

import type { FeatureDictionary } from './types.js';

/**
 * Feature table names, in the dictionary's own iteration order
 */
export function featureGroupNames(featureDictionary: FeatureDictionary): string[] {
  return Object.keys(featureDictionary);
}

/**
 * All feature columns across tables: table order first, then column order
 * within each table.
 */
export function flattenFeatureNames(featureDictionary: FeatureDictionary): string[] {
  return Object.values(featureDictionary).flat();
}
