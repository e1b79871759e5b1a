/**
 * Price and line comparison against competing books
 */

import { centsDiff, priceBetterForBettor } from './prob';
import type { LineQuotes } from './quotes';
import type { Side } from '../types/candidate';

export interface PriceGap {
  bestBook: string | null;
  bestPrice: number | null;
  bestGapCents: number;
  avgGapCents: number;
}

/**
 * Best competing price and the gaps to it and to the average competitor.
 * Competitors quoting the opposite sign of the reference price are ignored.
 */
export function priceGaps(
  entry: LineQuotes,
  side: Side,
  referenceBook: string,
  refPrice: number
): PriceGap {
  const refPositive = refPrice >= 0;
  let bestBook: string | null = null;
  let bestPrice: number | null = null;
  const others: number[] = [];

  for (const [book, sides] of entry.books) {
    if (book === referenceBook) continue;
    const price = sides[side];
    if (price === undefined) continue;
    if ((price >= 0) !== refPositive) continue;

    others.push(price);
    if (bestPrice === null || priceBetterForBettor(price, bestPrice)) {
      bestBook = book;
      bestPrice = price;
    }
  }

  const avgGapCents = others.length > 0
    ? centsDiff(refPrice, Math.round(others.reduce((a, b) => a + b, 0) / others.length))
    : 0;

  return {
    bestBook,
    bestPrice,
    bestGapCents: bestBook !== null ? centsDiff(refPrice, bestPrice) : 0,
    avgGapCents,
  };
}

function favoursHigherLine(side: Side): boolean {
  return side === 'Over' || side === 'Cover';
}

/**
 * How much better the reference line is than the average competing line,
 * in points; positive is better for the bettor
 */
export function lineAdvantage(refLine: number, otherLines: number[], side: Side): number {
  if (otherLines.length === 0) return 0;
  const meanOther = otherLines.reduce((a, b) => a + b, 0) / otherLines.length;
  return favoursHigherLine(side) ? meanOther - refLine : refLine - meanOther;
}

/** Competing books hanging a line that is worse for the bettor */
export function worseLineCount(refLine: number, otherLines: number[], side: Side): number {
  let worse = 0;
  for (const line of otherLines) {
    if (favoursHigherLine(side) && line > refLine + 1e-9) worse += 1;
    if (side === 'Under' && line < refLine - 1e-9) worse += 1;
  }
  return worse;
}
