/**
 * services/navigation.ts — Human-paced map viewport control
 *
 * Moves the map the way a person does: zoom out for context, drag toward the
 * target in capped, smoothed strokes, zoom back in, then correct. Every loop
 * is bounded and best-effort; giving up leaves the viewport close enough for
 * capture and is reported, never thrown. Pointer input that throws ends the
 * loop it belongs to as `gave_up`.
 */
import type { MapSurface } from '../browser/surface.ts';
import type { LatLon, MapState, PixelPoint, RegionBounds } from '../types.ts';
import { childLogger } from '../shared/logger.ts';
import { navigationTotal } from '../shared/metrics.ts';
import { errorMessage, failure, ok, type Outcome } from '../shared/outcome.ts';
import { clampToRegion, pixelDistance, project, unproject } from './geo.ts';
import { randomInt, sleep as defaultSleep, type RandomSource, type Sleep } from './helpers.ts';

export interface NavigationOptions {
  bounds: RegionBounds;
  viewportCenter: PixelPoint;
  maxZoomIterations: number;
  maxDragIterations: number;
  maxStepPx: number;
  tolerancePx: number;
  dragWaypoints: number;
  zoomPulse: number;
  sweepPulse: number;
  zoomSettleMs: number;
  dragSettleMs: number;
  retryMs: number;
  coarseZoomRange: readonly [number, number];
}

export const DEFAULT_NAVIGATION: Omit<NavigationOptions, 'bounds'> = {
  viewportCenter: { x: 960, y: 540 },   // centre of a 1920×1080 viewport
  maxZoomIterations: 20,
  maxDragIterations: 18,
  maxStepPx: 800,
  tolerancePx: 3.5,
  dragWaypoints: 20,
  zoomPulse: 300,
  sweepPulse: 40,
  zoomSettleMs: 300,
  dragSettleMs: 350,
  retryMs: 300,
  coarseZoomRange: [9, 12],
};

export type Convergence = 'converged' | 'gave_up';

export interface RecenterReport {
  coarseZoom: number;
  zoomOut: Convergence;
  coarseDrag: Convergence;
  zoomIn: Convergence;
  fineDrag: Convergence;
}

export interface SweepReport {
  points: number;
  converged: number;
}

/** Read lat/lon/zoom from the `ms=lat,lon,zoom` query parameter. */
export function parseMapState(url: string): MapState | null {
  let ms: string | null;
  try {
    ms = new URL(url).searchParams.get('ms');
  } catch {
    return null;
  }
  if (!ms) return null;
  const parts = ms.split(',');
  if (parts.length !== 3) return null;
  const [latitude, longitude, zoomLevel] = parts.map(Number);
  if (latitude === undefined || longitude === undefined || zoomLevel === undefined) return null;
  if (![latitude, longitude, zoomLevel].every(Number.isFinite)) return null;
  return { latitude, longitude, zoomLevel };
}

/**
 * Sample points of a grid sweep: only the top and bottom rows of each ring.
 * rings=1 → 6 points, rings=2 → 6 + 10 = 16.
 */
export function sweepPoints(centerLat: number, centerLon: number, zoom: number, rings: number, stepPx: number): LatLon[] {
  const center = project(centerLat, centerLon, zoom);
  const points: LatLon[] = [];
  for (let r = 1; r <= rings; r++) {
    for (let dx = -r; dx <= r; dx++) {
      for (const dy of [-r, r]) {
        points.push(unproject(center.x + dx * stepPx, center.y + dy * stepPx, zoom));
      }
    }
  }
  return points;
}

export class NavigationController {
  private readonly opts: NavigationOptions;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private readonly log = childLogger({ module: 'navigation' });

  constructor(
    private readonly surface: MapSurface,
    options: Partial<NavigationOptions> & { bounds: RegionBounds },
    deps: { sleep?: Sleep; random?: RandomSource } = {},
  ) {
    this.opts = { ...DEFAULT_NAVIGATION, ...options };
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  readState(): Outcome<MapState> {
    const url = this.surface.url();
    const state = parseMapState(url);
    return state ? ok(state) : failure<MapState>('state_unreadable', `no map state in ${url}`);
  }

  /** Run one burst of pointer input; a throw becomes a pointer_failed outcome. */
  private async gesture(operation: string, input: () => Promise<void>): Promise<Outcome<void>> {
    try {
      await input();
      return ok(undefined);
    } catch (err) {
      this.log.warn({ operation, errorKind: 'pointer_failed', err: errorMessage(err) }, `${operation} input failed`);
      return failure('pointer_failed', errorMessage(err));
    }
  }

  /** Wheel one notch at a time until the integer zoom matches. */
  async wheelToZoom(targetZoom: number): Promise<Convergence> {
    const { viewportCenter: c, zoomPulse } = this.opts;
    for (let i = 0; i < this.opts.maxZoomIterations; i++) {
      const read = this.readState();
      if (read.kind !== 'ok') {
        await this.sleep(this.opts.retryMs);
        continue;
      }
      const zoom = Math.round(read.value.zoomLevel);
      if (zoom === targetZoom) {
        navigationTotal.inc({ operation: 'wheel', outcome: 'converged' });
        return 'converged';
      }
      const notch = await this.gesture('wheel', async () => {
        await this.surface.mouseMove(c.x, c.y);
        // negative deltaY zooms in
        await this.surface.wheel(0, targetZoom > zoom ? -zoomPulse : zoomPulse);
      });
      if (notch.kind === 'error') break;
      await this.sleep(this.opts.zoomSettleMs);
    }
    navigationTotal.inc({ operation: 'wheel', outcome: 'gave_up' });
    this.log.debug({ targetZoom, state: this.readState() }, 'wheelToZoom gave up');
    return 'gave_up';
  }

  /** Drag in capped, smoothed strokes until the target sits within tolerance of the centre. */
  async dragToTarget(lat: number, lon: number, tolerancePx = this.opts.tolerancePx): Promise<Convergence> {
    const target = clampToRegion(lat, lon, this.opts.bounds);
    const { viewportCenter: c } = this.opts;

    for (let i = 0; i < this.opts.maxDragIterations; i++) {
      const read = this.readState();
      if (read.kind !== 'ok') {
        await this.sleep(this.opts.retryMs);
        continue;
      }
      const state = read.value;
      const from = project(state.latitude, state.longitude, state.zoomLevel);
      const to = project(target.lat, target.lon, state.zoomLevel);
      const dist = pixelDistance(from, to);
      if (dist <= tolerancePx) {
        navigationTotal.inc({ operation: 'drag', outcome: 'converged' });
        return 'converged';
      }

      const step = Math.min(this.opts.maxStepPx, dist);
      const mx = (to.x - from.x) / dist * step;
      const my = (to.y - from.y) / dist * step;

      // Pulling the map content toward the upper-left moves the view toward the lower-right
      const stroke = await this.gesture('drag', async () => {
        await this.surface.mouseMove(c.x, c.y);
        await this.surface.mouseDown();
        await this.surface.mouseMove(c.x - mx, c.y - my, this.opts.dragWaypoints);
        await this.surface.mouseUp();
      });
      if (stroke.kind === 'error') break;
      await this.sleep(this.opts.dragSettleMs);
    }
    navigationTotal.inc({ operation: 'drag', outcome: 'gave_up' });
    this.log.debug({ target, state: this.readState() }, 'dragToTarget gave up');
    return 'gave_up';
  }

  /**
   * Zoom out to a random coarse level, drag close, zoom in, drag again.
   * The first drag is imprecise at coarse zoom; the second one corrects it.
   */
  async recenter(lat: number, lon: number, zoom: number): Promise<RecenterReport> {
    const [lo, hi] = this.opts.coarseZoomRange;
    const coarseZoom = randomInt(lo, hi, this.random);

    const zoomOut = await this.wheelToZoom(coarseZoom);
    const coarseDrag = await this.dragToTarget(lat, lon);
    const zoomIn = await this.wheelToZoom(zoom);
    const fineDrag = await this.dragToTarget(lat, lon);

    const report = { coarseZoom, zoomOut, coarseDrag, zoomIn, fineDrag };
    this.log.info(report, `Recentered on ${lat.toFixed(4)}, ${lon.toFixed(4)} @${zoom}`);
    return report;
  }

  /** Visit the edge rows of each ring around the centre, nudging the wheel and dwelling at each. */
  async gridSweep(
    centerLat: number,
    centerLon: number,
    zoom: number,
    rings: number,
    stepPx: number,
    dwellMs: number,
  ): Promise<SweepReport> {
    const points = sweepPoints(centerLat, centerLon, zoom, rings, stepPx);
    let converged = 0;
    for (const [i, p] of points.entries()) {
      this.log.debug(`Sweep ${i + 1}/${points.length}`);
      if (await this.dragToTarget(p.lat, p.lon) === 'converged') converged++;
      // small upward scroll forces a marker refresh
      await this.gesture('nudge', () => this.surface.wheel(0, -this.opts.sweepPulse));
      await this.sleep(dwellMs);
    }
    return { points: points.length, converged };
  }
}
