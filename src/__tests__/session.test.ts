import { describe, it, expect } from 'vitest';
import { CollectionSession } from '../services/session.ts';
import type { ListingSummary } from '../types.ts';

function listing(id: string, name = `매물 ${id}`): ListingSummary {
  return {
    id,
    name,
    tradeType: '매매',
    tradeTypeCode: 'A1',
    rawPriceText: '3억',
    parentMarkerId: null,
    attributes: { floorInfo: '', grossArea: '', netArea: '', direction: '', featureText: '', registeredAt: '' },
  };
}

describe('CollectionSession', () => {
  it('starts with capture off', () => {
    expect(new CollectionSession().captureActive).toBe(false);
  });

  it('never lowers a marker count and fills a missing name', () => {
    const s = new CollectionSession();
    expect(s.upsertMarker({ id: 'm1', displayName: '', reportedCount: 5, kind: 'complexes' })).toBe(true);
    expect(s.upsertMarker({ id: 'm1', displayName: '푸른마을', reportedCount: 2, kind: 'complexes' })).toBe(false);
    expect(s.getMarker('m1')).toEqual({ id: 'm1', displayName: '푸른마을', reportedCount: 5, kind: 'complexes' });
  });

  it('applies a count reported before the marker was sighted', () => {
    const s = new CollectionSession();
    s.noteMarkerCount('m2', 9);
    s.noteMarkerCount('m2', 4);
    s.upsertMarker({ id: 'm2', displayName: '', reportedCount: 1, kind: 'houses' });
    expect(s.getMarker('m2')?.reportedCount).toBe(9);
  });

  it('keeps the first sighting of a listing', () => {
    const s = new CollectionSession();
    expect(s.addListing(listing('a1', 'first'))).toBe(true);
    expect(s.addListing(listing('a1', 'second'))).toBe(false);
    expect(s.listingList().map((l) => l.name)).toEqual(['first']);
    expect(s.counts()).toEqual({ markers: 0, listings: 1, priceHistory: 0 });
  });

  it('hands out marker copies', () => {
    const s = new CollectionSession();
    s.upsertMarker({ id: 'm1', displayName: 'x', reportedCount: 1, kind: 'complexes' });
    const [copy] = s.markerList();
    if (copy) copy.reportedCount = 100;
    expect(s.getMarker('m1')?.reportedCount).toBe(1);
  });
});
