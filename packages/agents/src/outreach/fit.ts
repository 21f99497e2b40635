/**
 * Fit Helpers
 *
 * Derive the combined score, fit category and product focus from the two
 * product-line fit scores produced by company research.
 *
 * @module outreach/fit
 */

import type { FitCategory, ProductLine } from '@expo-outreach/lib';

/** Score a product line must reach to count as a fit */
export const DEFAULT_FIT_THRESHOLD = 50;

/** Weight of the weaker line in the combined score */
const SECONDARY_LINE_WEIGHT = 0.2;

/**
 * Combined score: the stronger line plus a fifth of the weaker one, floored.
 * combinedScore(80, 40) === 88
 */
export function combinedScore(gateFit: number, truckFit: number): number {
  const high = Math.max(gateFit, truckFit);
  const low = Math.min(gateFit, truckFit);
  return Math.floor(high + low * SECONDARY_LINE_WEIGHT);
}

export function fitCategory(
  gateFit: number,
  truckFit: number,
  threshold: number = DEFAULT_FIT_THRESHOLD,
): FitCategory {
  const gate = gateFit >= threshold;
  const truck = truckFit >= threshold;
  if (gate && truck) return 'both';
  if (gate) return 'gate';
  if (truck) return 'truck';
  return 'other';
}

/**
 * The line with the higher score, gate on a tie
 */
export function strongerLine(gateFit: number, truckFit: number): ProductLine {
  return truckFit > gateFit ? 'truck' : 'gate';
}

/**
 * The passing product line with the higher score, gate on a tie.
 * Undefined when neither line passes.
 */
export function productFocus(
  gateFit: number,
  truckFit: number,
  threshold: number = DEFAULT_FIT_THRESHOLD,
): ProductLine | undefined {
  switch (fitCategory(gateFit, truckFit, threshold)) {
    case 'gate':
      return 'gate';
    case 'truck':
      return 'truck';
    case 'both':
      return strongerLine(gateFit, truckFit);
    case 'other':
      return undefined;
  }
}
