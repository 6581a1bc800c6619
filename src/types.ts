// ═══════════════════════════════════════════════════════
// gap-collector — Core Type Definitions
// Every data shape shared across the collector.
// ═══════════════════════════════════════════════════════
import type { FailureKind } from './shared/outcome.ts';

// ── Geography ──

export interface LatLon {
  lat: number;
  lon: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

/** Rectangular clamp applied to every navigation target */
export interface RegionBounds {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

/** Viewport state as encoded in the map URL's `ms` parameter */
export interface MapState {
  latitude: number;
  longitude: number;
  zoomLevel: number;
}

// ── Captured records ──

export type AssetType = 'APT' | 'VL';          // apartment | villa / row house
export type MarkerKind = 'complexes' | 'houses';

export interface Marker {
  id: string;
  displayName: string;
  reportedCount: number;  // best known listing count, never decreases
  kind: MarkerKind;
}

export interface StructuralAttributes {
  floorInfo: string;      // "12/25"
  grossArea: string;      // supply area ㎡
  netArea: string;        // exclusive area ㎡
  direction: string;
  featureText: string;
  registeredAt: string;   // "20240315"
}

export interface ListingSummary {
  id: string;
  name: string;
  tradeType: string;      // display label, "매매"
  tradeTypeCode: string;  // "A1"
  rawPriceText: string;   // "3억 8,000"
  parentMarkerId: string | null;
  attributes: StructuralAttributes;
}

/** One row of a complex's transaction history */
export interface LeaseHistoryRecord {
  dealDate: string | null;
  area: string | null;
  floor: string | null;
  dealPrice: string | null;
}

// ── Detail phase ──

export interface DetailRecord {
  skip: false;
  agencyName: string;
  agentName: string;
  phone1: string;
  phone2: string;
  leasePeriodYears: number | null;
  leaseMaxWon: number | null;
  leaseMinWon: number | null;
  previousLeaseWon: number | null;
}

/** Listing lacked the required previous-lease fact */
export interface SkippedDetail {
  skip: true;
  reason: Extract<FailureKind, 'missing_previous_lease'>;
}

export type DetailResult = DetailRecord | SkippedDetail;

export interface Candidate {
  listing: ListingSummary;
  detail: DetailRecord;
  saleWon: number | null;
  gapAmountWon: number | null;  // saleWon − previousLeaseWon, ≤ 0 under the default filter
  gapRatio: number | null;      // gapAmountWon / saleWon
}

// ── Export ──

/** Column keys of the exported table, in output order */
export const EXPORT_FIELDS = [
  'listingName',
  'listingId',
  'tradeTypeLabel',
  'saleWon',
  'floorInfo',
  'grossArea',
  'netArea',
  'direction',
  'featureText',
  'registeredAt',
  'agencyName',
  'agentName',
  'phone1',
  'phone2',
  'leasePeriodYears',
  'leaseMaxWon',
  'leaseMinWon',
  'previousLeaseWon',
  'gapAmountWon',
  'gapRatio',
] as const;

export type ExportField = typeof EXPORT_FIELDS[number];
export type ExportRow = Record<ExportField, string | number | null>;
export type OutputLocale = 'ko' | 'en';

// ── Configuration ──

export interface CollectorConfig {
  bounds: RegionBounds;
  zoomMin: number;
  zoomMax: number;
  assetTypes: AssetType[];
  gridRings: number;
  gridStepPx: number;
  sweepDwellMs: number;
  maxComplexes: number;
  maxListings: number;          // 0 = no cap
  minListingCount: number;
  prioritizeByCount: boolean;
  useMobileDetail: boolean;
  workerCount: number;
  requirePreviousLease: boolean;
  gapFilterEnabled: boolean;
  blockHeavyResources: boolean;
  responseTimeoutMs: number;
}

export interface CollectionTarget {
  lat: number;
  lon: number;
  zoom: number;
}
