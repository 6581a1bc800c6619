/**
 * browser/surface.ts — What the collector needs from a browser page
 *
 * The core only talks to these interfaces. browser/playwright.ts backs them
 * with Chromium; the test suite backs them with in-process fakes.
 */
import type { FailureKind, Outcome } from '../shared/outcome.ts';

/** One completed network exchange */
export interface NetworkExchange {
  url: string;
  /** Parses the body on demand; rejects when it is not JSON */
  json(): Promise<unknown>;
}

export type ResponseListener = (exchange: NetworkExchange) => void;

/** Which of the candidate labels was clicked */
export type LocateOutcome =
  | { found: true; label: string }
  | { found: false; errorKind: Extract<FailureKind, 'element_not_found'> };

export const NOT_FOUND: LocateOutcome = { found: false, errorKind: 'element_not_found' };

export interface PageSurface {
  goto(url: string): Promise<Outcome<void>>;
  url(): string;

  mouseMove(x: number, y: number, steps?: number): Promise<void>;
  mouseDown(): Promise<void>;
  mouseUp(): Promise<void>;
  wheel(deltaX: number, deltaY: number): Promise<void>;

  /** Click the first element whose visible text matches a label, trying labels in order */
  clickByLabel(labels: readonly string[]): Promise<LocateOutcome>;
  /** Visible text of the page body; null when it cannot be read */
  bodyText(): Promise<string | null>;

  /** Resolves false on timeout */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  /** Resolves false on timeout */
  waitForResponse(match: (url: string) => boolean, timeoutMs: number): Promise<boolean>;
  /** Subscribe to completed responses; returns the unsubscribe function */
  onResponse(listener: ResponseListener): () => void;
}

/** The subset the navigation controller drives */
export type MapSurface = Pick<PageSurface, 'url' | 'mouseMove' | 'mouseDown' | 'mouseUp' | 'wheel'>;

/** The subset a detail worker drives */
export type DetailSurface = Pick<PageSurface, 'goto' | 'url' | 'bodyText' | 'clickByLabel'>;

export interface BrowserHost {
  /** The single desktop page that carries the map */
  mapPage(): PageSurface;
  /** Isolated pages for detail workers, opened once and reused */
  openDetailPages(count: number): Promise<PageSurface[]>;
  close(): Promise<void>;
}
