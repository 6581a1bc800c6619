// In-process stand-ins for the browser surfaces.
import { NOT_FOUND, type BrowserHost, type LocateOutcome, type NetworkExchange, type PageSurface, type ResponseListener } from '../browser/surface.ts';
import { ok, type Outcome } from '../shared/outcome.ts';
import { project, unproject } from '../services/geo.ts';
import { parseMapState } from '../services/navigation.ts';
import type { PixelPoint } from '../types.ts';

export const noSleep = (): Promise<void> => Promise.resolve();

export function jsonResponse(url: string, body: unknown): NetworkExchange {
  return { url, json: () => Promise.resolve(body) };
}

export function brokenResponse(url: string): NetworkExchange {
  return { url, json: () => Promise.reject(new SyntaxError('Unexpected token < in JSON')) };
}

export interface FakeMapOptions {
  labels?: string[];
  /** Responses fired when a URL is opened */
  onGoto?: (url: string) => NetworkExchange[];
  /** Responses fired by a small wheel nudge (|deltaY| < 100) */
  onNudge?: () => NetworkExchange[];
  /** Zoom ignores the wheel */
  stuckZoom?: boolean;
}

/**
 * A map that behaves like the real one: a wheel notch of |deltaY| ≥ 100
 * changes zoom by one (negative = in), a drag moves the centre pixel by
 * minus the pointer delta, and the URL carries `ms=lat,lon,zoom`.
 */
export class FakeMapPage implements PageSurface {
  lat = 0;
  lon = 0;
  zoom = 0;
  onMap = false;
  readonly visited: string[] = [];
  readonly clicked: string[] = [];
  wheelNotches = 0;
  drags = 0;

  private current = 'about:blank';
  private pointer: PixelPoint = { x: 0, y: 0 };
  private dragStart: PixelPoint | null = null;
  private readonly listeners = new Set<ResponseListener>();

  constructor(private readonly opts: FakeMapOptions = {}) {}

  async goto(url: string): Promise<Outcome<void>> {
    this.visited.push(url);
    this.current = url;
    const state = parseMapState(url);
    this.onMap = state !== null;
    if (state) {
      this.lat = state.latitude;
      this.lon = state.longitude;
      this.zoom = state.zoomLevel;
    }
    this.emit(this.opts.onGoto?.(url) ?? []);
    return ok(undefined);
  }

  url(): string {
    return this.onMap ? `https://new.land.naver.com/complexes?ms=${this.lat},${this.lon},${this.zoom}` : this.current;
  }

  async mouseMove(x: number, y: number): Promise<void> {
    this.pointer = { x, y };
  }

  async mouseDown(): Promise<void> {
    this.dragStart = this.pointer;
  }

  async mouseUp(): Promise<void> {
    if (!this.dragStart) return;
    const center = project(this.lat, this.lon, this.zoom);
    const moved = unproject(
      center.x - (this.pointer.x - this.dragStart.x),
      center.y - (this.pointer.y - this.dragStart.y),
      this.zoom,
    );
    this.lat = moved.lat;
    this.lon = moved.lon;
    this.dragStart = null;
    this.drags++;
  }

  async wheel(_dx: number, dy: number): Promise<void> {
    if (Math.abs(dy) >= 100) {
      this.wheelNotches++;
      if (!this.opts.stuckZoom) this.zoom += dy < 0 ? 1 : -1;
      return;
    }
    this.emit(this.opts.onNudge?.() ?? []);
  }

  async clickByLabel(labels: readonly string[]): Promise<LocateOutcome> {
    for (const label of labels) {
      if (this.opts.labels?.includes(label)) {
        this.clicked.push(label);
        return { found: true, label };
      }
    }
    return NOT_FOUND;
  }

  async bodyText(): Promise<string | null> {
    return '';
  }

  async waitForSelector(): Promise<boolean> {
    return true;
  }

  async waitForResponse(): Promise<boolean> {
    return true;
  }

  onResponse(listener: ResponseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  emit(exchanges: readonly NetworkExchange[]): void {
    for (const exchange of exchanges) {
      for (const listener of this.listeners) listener(exchange);
    }
  }
}

export interface FakeDetailOptions {
  /** Body text by landing URL */
  bodies: Record<string, string>;
  /** Requested URL → URL the page ends up on */
  redirects?: Record<string, string>;
  /** Labels present on every page */
  tabs?: string[];
  /** Body after the lease tab opened, by landing URL */
  leaseBodies?: Record<string, string>;
}

export class FakeDetailPage implements PageSurface {
  readonly visited: string[] = [];
  private current = 'about:blank';
  private leaseTabOpen = false;

  constructor(private readonly opts: FakeDetailOptions) {}

  async goto(url: string): Promise<Outcome<void>> {
    this.visited.push(url);
    this.current = this.opts.redirects?.[url] ?? url;
    this.leaseTabOpen = false;
    return ok(undefined);
  }

  url(): string {
    return this.current;
  }

  async mouseMove(): Promise<void> {}
  async mouseDown(): Promise<void> {}
  async mouseUp(): Promise<void> {}
  async wheel(): Promise<void> {}

  async clickByLabel(labels: readonly string[]): Promise<LocateOutcome> {
    const label = labels.find((l) => this.opts.tabs?.includes(l));
    if (label === undefined) return NOT_FOUND;
    if (label === '전세') this.leaseTabOpen = true;
    return { found: true, label };
  }

  async bodyText(): Promise<string | null> {
    if (this.leaseTabOpen) {
      const lease = this.opts.leaseBodies?.[this.current];
      if (lease !== undefined) return lease;
    }
    return this.opts.bodies[this.current] ?? '';
  }

  async waitForSelector(): Promise<boolean> {
    return true;
  }

  async waitForResponse(): Promise<boolean> {
    return true;
  }

  onResponse(): () => void {
    return () => {};
  }
}

export class FakeHost implements BrowserHost {
  closed = false;
  requestedDetailPages = 0;

  constructor(
    private readonly map: PageSurface,
    private readonly detailPage: (index: number) => PageSurface,
  ) {}

  mapPage(): PageSurface {
    return this.map;
  }

  async openDetailPages(count: number): Promise<PageSurface[]> {
    this.requestedDetailPages = count;
    return Array.from({ length: Math.max(1, count) }, (_, i) => this.detailPage(i));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
