// ═══════════════════════════════════════════════════════
// gap-analyzer.ts — Sale price vs previous lease deposit
// gap = sale − previous lease; a listing whose previous lease
// covers its sale price is a candidate under the default rule.
// ═══════════════════════════════════════════════════════
import type { Candidate, DetailRecord, DetailResult, ListingSummary } from '../types.ts';
import { parseAmount } from './currency.ts';

/** Decides whether a priced candidate is kept */
export type GapPredicate = (c: Pick<Candidate, 'saleWon'> & { previousLeaseWon: number | null }) => boolean;

/** Previous lease ≥ sale price; unknown amounts never qualify */
export const leaseCoversSale: GapPredicate = ({ saleWon, previousLeaseWon }) =>
  saleWon !== null && previousLeaseWon !== null && previousLeaseWon >= saleWon;

export interface GapPolicy {
  filterEnabled: boolean;
  predicate: GapPredicate;
}

export const DEFAULT_GAP_POLICY: GapPolicy = { filterEnabled: true, predicate: leaseCoversSale };

// Unparsable prices sort after every real one
const UNKNOWN_PRICE = 10 ** 12;

/** Sale price in won; the list price may be prefixed with its trade label */
export function salePriceOf(listing: ListingSummary): number | null {
  return parseAmount(listing.rawPriceText.replace(/^\s*매매\s*/, '').trim());
}

/** Cheapest first, so a capped backlog still covers the likeliest candidates. */
export function sortBySalePrice(listings: readonly ListingSummary[]): ListingSummary[] {
  return listings
    .map((listing) => ({ listing, price: salePriceOf(listing) ?? UNKNOWN_PRICE }))
    .sort((a, b) => a.price - b.price)
    .map(({ listing }) => listing);
}

export function computeGap(saleWon: number | null, previousLeaseWon: number | null): Pick<Candidate, 'gapAmountWon' | 'gapRatio'> {
  const gapAmountWon = saleWon !== null && previousLeaseWon !== null ? saleWon - previousLeaseWon : null;
  const gapRatio = gapAmountWon !== null && saleWon ? gapAmountWon / saleWon : null;
  return { gapAmountWon, gapRatio };
}

export function buildCandidate(listing: ListingSummary, detail: DetailRecord): Candidate {
  const saleWon = salePriceOf(listing);
  return { listing, detail, saleWon, ...computeGap(saleWon, detail.previousLeaseWon) };
}

/** Candidate for a listing and its detail, or null when skipped or filtered out. */
export function evaluate(listing: ListingSummary, detail: DetailResult, policy: GapPolicy = DEFAULT_GAP_POLICY): Candidate | null {
  if (detail.skip) return null;
  const candidate = buildCandidate(listing, detail);
  if (policy.filterEnabled && !policy.predicate({ saleWon: candidate.saleWon, previousLeaseWon: detail.previousLeaseWon })) {
    return null;
  }
  return candidate;
}

/** Ascending gap ratio; candidates without a ratio go last. */
export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => {
    if (a.gapRatio === null) return b.gapRatio === null ? 0 : 1;
    if (b.gapRatio === null) return -1;
    return a.gapRatio - b.gapRatio;
  });
}
