// ═══════════════════════════════════════════════════════
// collector.ts — One collection run, start to ranked candidates
// Per asset type: open map → recenter → listing markers →
// sweep with capture on. Then complex pages, then details.
// A scenario or complex visit that throws is logged and skipped.
// ═══════════════════════════════════════════════════════
import type { BrowserHost, LocateOutcome, PageSurface } from '../browser/surface.ts';
import type { AssetType, Candidate, CollectionTarget, CollectorConfig, Marker, MarkerKind } from '../types.ts';
import { childLogger } from '../shared/logger.ts';
import { detailDuration, detailTotal, navigationTotal } from '../shared/metrics.ts';
import { errorMessage } from '../shared/outcome.ts';
import { DESKTOP_DETAIL, DetailExtractor, MOBILE_DETAIL } from './detail-extractor.ts';
import { evaluate, leaseCoversSale, rankCandidates, sortBySalePrice, type GapPolicy } from './gap-analyzer.ts';
import { sleep as defaultSleep, type RandomSource, type Sleep } from './helpers.ts';
import { ResponseIngestor } from './ingestor.ts';
import { NavigationController, type RecenterReport, type SweepReport } from './navigation.ts';
import { ResourcePool, runBounded } from './scheduler.ts';
import { CollectionSession, type SessionCounts } from './session.ts';

export const MAP_BASE = 'https://new.land.naver.com';

const KIND_BY_ASSET: Record<AssetType, MarkerKind> = { APT: 'complexes', VL: 'houses' };

/** UI labels, most specific first */
export const UI_LABELS = {
  listingMode: ['상세매물검색', '매물', '매물검색', '매물 보기'],
  listingMenu: ['단지'],
  listingMenuItem: ['매물'],
  saleTab: ['매매'],
} as const;

const log = childLogger({ module: 'collector' });

const MAP_CANVAS = 'canvas';
const COMPLEX_SETTLE_MS = 1000;
const SALE_TAB_SETTLE_MS = 600;
const MENU_SETTLE_MS = 300;
const CAPTURE_NUDGE_PX = 60;
const CAPTURE_SETTLE_MS = 800;

export interface ScenarioReport {
  assetType: AssetType;
  mapLoaded: boolean;
  recenter: RecenterReport;
  listingMode: LocateOutcome;
  sweep: SweepReport;
}

export interface RunReport {
  scenarios: ScenarioReport[];
  complexesVisited: number;
  counts: SessionCounts;
  details: { attempted: number; candidates: number; filtered: number; failed: number };
  candidates: Candidate[];   // ranked
}

export interface CollectorDeps {
  sleep?: Sleep;
  random?: RandomSource;
}

export function mapUrl(assetType: AssetType, target: CollectionTarget): string {
  const { lat, lon, zoom } = target;
  return `${MAP_BASE}/${KIND_BY_ASSET[assetType]}?ms=${lat},${lon},${zoom}&a=${assetType}&b=A1`;
}

export function complexUrl(marker: Marker): string {
  return `${MAP_BASE}/${marker.kind}/${encodeURIComponent(marker.id)}`;
}

/** First backend call that shows the map is live */
export function isMapDataResponse(url: string): boolean {
  return url.includes('single-markers')
    || url.includes('/api/articles/complex/')
    || url.includes('/api/articles/house/')
    || url.includes('/api/map/');
}

/**
 * Complexes worth opening: reported count at or above the threshold.
 * With none qualifying, the busiest of the first 2×max markers stand in.
 */
export function selectComplexes(
  markers: readonly Marker[],
  opts: Pick<CollectorConfig, 'minListingCount' | 'prioritizeByCount' | 'maxComplexes'>,
): Marker[] {
  const byCountDesc = (a: Marker, b: Marker) => b.reportedCount - a.reportedCount;
  let picked = markers.filter((m) => m.reportedCount >= opts.minListingCount);
  if (opts.prioritizeByCount) picked.sort(byCountDesc);
  if (picked.length === 0) picked = markers.slice(0, opts.maxComplexes * 2).sort(byCountDesc);
  return picked.slice(0, opts.maxComplexes);
}

export async function runCollection(
  host: BrowserHost,
  target: CollectionTarget,
  config: CollectorConfig,
  deps: CollectorDeps = {},
): Promise<RunReport> {
  const sleep = deps.sleep ?? defaultSleep;
  const session = new CollectionSession();
  const ingestor = new ResponseIngestor(session);
  const page = host.mapPage();
  const nav = new NavigationController(page, { bounds: config.bounds }, { sleep, random: deps.random });
  const unsubscribe = page.onResponse((exchange) => ingestor.enqueue(exchange));

  try {
    // ── Map scenarios ──
    const scenarios: ScenarioReport[] = [];
    for (const assetType of config.assetTypes) {
      log.info(`Scenario ${assetType}: ${target.lat}, ${target.lon} @${target.zoom}`);
      try {
        const report = await runScenario(page, nav, session, assetType, target, config, sleep);
        if (report) scenarios.push(report);
      } catch (err) {
        log.warn({ assetType, err: errorMessage(err) }, `Scenario ${assetType} abandoned`);
      }
      log.info(session.counts(), `Scenario ${assetType} done`);
    }

    // ── Complex pages ──
    await ingestor.drain();
    const complexes = selectComplexes(session.markerList(), config);
    log.info(`Visiting ${complexes.length} complexes`);
    for (const [i, marker] of complexes.entries()) {
      try {
        await visitComplex(page, marker, sleep);
      } catch (err) {
        log.warn({ markerId: marker.id, err: errorMessage(err) }, 'Complex visit failed');
      }
      if ((i + 1) % 50 === 0) log.info(`Complexes: ${i + 1}/${complexes.length}, listings ${session.counts().listings}`);
    }
    await ingestor.drain();

    // ── Details ──
    const backlog = sortBySalePrice(session.listingList());
    const extractor = new DetailExtractor(
      { template: config.useMobileDetail ? MOBILE_DETAIL : DESKTOP_DETAIL, requirePreviousLease: config.requirePreviousLease },
      { sleep },
    );
    const policy: GapPolicy = { filterEnabled: config.gapFilterEnabled, predicate: leaseCoversSale };
    const pool = new ResourcePool<PageSurface>(await host.openDetailPages(config.workerCount));
    log.info(`Detail phase: ${backlog.length} listings, ${pool.size} workers`);

    const report = await runBounded(backlog, pool, async (listing, detailPage) => {
      const endTimer = detailDuration.startTimer();
      try {
        const detail = await extractor.extract(detailPage, listing.id);
        if (detail.skip) {
          detailTotal.inc({ outcome: 'skipped' });
          return null;
        }
        const candidate = evaluate(listing, detail, policy);
        detailTotal.inc({ outcome: candidate ? 'candidate' : 'filtered' });
        return candidate;
      } finally {
        endTimer();
      }
    }, { maxItems: config.maxListings });
    if (report.failures.length > 0) detailTotal.inc({ outcome: 'failed' }, report.failures.length);

    const candidates = rankCandidates(report.results);
    const counts = session.counts();
    log.info({ ...counts, candidates: candidates.length, failed: report.failures.length }, 'Collection finished');

    return {
      scenarios,
      complexesVisited: complexes.length,
      counts,
      details: {
        attempted: report.attempted,
        candidates: candidates.length,
        filtered: report.filtered,
        failed: report.failures.length,
      },
      candidates,
    };
  } finally {
    session.captureActive = false;
    unsubscribe();
  }
}

/** One asset type: open the map, recenter, switch to listings, then sweep with capture on. */
async function runScenario(
  page: PageSurface,
  nav: NavigationController,
  session: CollectionSession,
  assetType: AssetType,
  target: CollectionTarget,
  config: CollectorConfig,
  sleep: Sleep,
): Promise<ScenarioReport | null> {
  const opened = await page.goto(mapUrl(assetType, target));
  if (opened.kind === 'error') {
    log.warn({ assetType, errorKind: opened.errorKind }, `Map page did not open: ${opened.message}`);
    return null;
  }
  const mapLoaded = await waitForMap(page, config.responseTimeoutMs);
  if (!mapLoaded) log.warn({ assetType }, 'Map not confirmed loaded; continuing');

  const recenter = await nav.recenter(target.lat, target.lon, target.zoom);
  const listingMode = await switchToListings(page, sleep);
  countLocate(listingMode, 'listing mode');
  await nav.wheelToZoom(Math.max(config.zoomMin, target.zoom));

  session.captureActive = true;
  await page.mouseMove(960, 540);
  await page.wheel(0, -CAPTURE_NUDGE_PX);
  await sleep(CAPTURE_SETTLE_MS);

  const sweep = await nav.gridSweep(
    target.lat, target.lon, target.zoom,
    config.gridRings, config.gridStepPx, config.sweepDwellMs,
  );
  return { assetType, mapLoaded, recenter, listingMode, sweep };
}

function countLocate(outcome: LocateOutcome, what: string): void {
  navigationTotal.inc({ operation: 'locate', outcome: outcome.found ? 'found' : 'not_found' });
  if (!outcome.found) log.debug({ errorKind: outcome.errorKind }, `No ${what} control on the page`);
}

/** Canvas, then a first data response; either may time out */
async function waitForMap(page: PageSurface, timeoutMs: number): Promise<boolean> {
  const canvas = await page.waitForSelector(MAP_CANVAS, timeoutMs);
  const data = await page.waitForResponse(isMapDataResponse, timeoutMs);
  return canvas && data;
}

/** Direct listing-mode button, else the 단지 → 매물 dropdown */
async function switchToListings(page: PageSurface, sleep: Sleep): Promise<LocateOutcome> {
  const direct = await page.clickByLabel(UI_LABELS.listingMode);
  if (direct.found) return direct;
  const menu = await page.clickByLabel(UI_LABELS.listingMenu);
  if (!menu.found) return menu;
  await sleep(MENU_SETTLE_MS);
  return page.clickByLabel(UI_LABELS.listingMenuItem);
}

/** Open the complex page and its sale tab so the listing list is fetched */
async function visitComplex(page: PageSurface, marker: Marker, sleep: Sleep): Promise<void> {
  const opened = await page.goto(complexUrl(marker));
  if (opened.kind === 'error') {
    log.debug({ markerId: marker.id, errorKind: opened.errorKind }, opened.message);
    return;
  }
  await sleep(COMPLEX_SETTLE_MS);
  countLocate(await page.clickByLabel(UI_LABELS.saleTab), 'sale tab');
  await sleep(SALE_TAB_SETTLE_MS);
}
