// ═══════════════════════════════════════════════════════
// session.ts — All mutable state of one collection run
// Created per run and handed to the components that need it.
// Identity sets only grow; first sighting of an id wins.
// ═══════════════════════════════════════════════════════
import type { LeaseHistoryRecord, ListingSummary, Marker } from '../types.ts';
import { sessionSize } from '../shared/metrics.ts';

export interface SessionCounts {
  markers: number;
  listings: number;
  priceHistory: number;
}

export class CollectionSession {
  /** Set by the orchestrator once navigation has begun */
  captureActive = false;

  private readonly markers = new Map<string, Marker>();
  private readonly listings = new Map<string, ListingSummary>();
  private readonly priceHistory = new Map<string, LeaseHistoryRecord>();
  // counts reported for markers that have not been sighted yet
  private readonly countHints = new Map<string, number>();

  /**
   * Insert a marker on first sighting; on later sightings only raise its
   * count and fill a missing name. Returns true when the id was new.
   */
  upsertMarker(marker: Marker): boolean {
    const existing = this.markers.get(marker.id);
    if (existing) {
      if (!existing.displayName && marker.displayName) existing.displayName = marker.displayName;
      existing.reportedCount = Math.max(existing.reportedCount, marker.reportedCount);
      return false;
    }
    const hint = this.countHints.get(marker.id) ?? 0;
    this.markers.set(marker.id, { ...marker, reportedCount: Math.max(marker.reportedCount, hint) });
    this.countHints.delete(marker.id);
    sessionSize.set({ store: 'markers' }, this.markers.size);
    return true;
  }

  /** Raise a marker's count; remembered for later if the marker is unknown. */
  noteMarkerCount(id: string, count: number): void {
    const existing = this.markers.get(id);
    if (existing) {
      existing.reportedCount = Math.max(existing.reportedCount, count);
      return;
    }
    this.countHints.set(id, Math.max(this.countHints.get(id) ?? 0, count));
  }

  /** Returns true when the listing id was new. Later duplicates are dropped, not merged. */
  addListing(listing: ListingSummary): boolean {
    if (this.listings.has(listing.id)) return false;
    this.listings.set(listing.id, listing);
    sessionSize.set({ store: 'listings' }, this.listings.size);
    return true;
  }

  hasListing(id: string): boolean {
    return this.listings.has(id);
  }

  /** Returns true when the (date, area, floor, price) tuple was new. */
  addPriceRecord(record: LeaseHistoryRecord): boolean {
    const key = JSON.stringify([record.dealDate, record.area, record.floor, record.dealPrice]);
    if (this.priceHistory.has(key)) return false;
    this.priceHistory.set(key, record);
    sessionSize.set({ store: 'price_history' }, this.priceHistory.size);
    return true;
  }

  getMarker(id: string): Marker | undefined {
    return this.markers.get(id);
  }

  /** Markers in first-sighting order (copies) */
  markerList(): Marker[] {
    return [...this.markers.values()].map((m) => ({ ...m }));
  }

  /** Listings in first-sighting order */
  listingList(): ListingSummary[] {
    return [...this.listings.values()];
  }

  priceHistoryList(): LeaseHistoryRecord[] {
    return [...this.priceHistory.values()];
  }

  counts(): SessionCounts {
    return {
      markers: this.markers.size,
      listings: this.listings.size,
      priceHistory: this.priceHistory.size,
    };
  }
}
