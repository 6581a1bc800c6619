// ═══════════════════════════════════════════════════════
// target.ts — Where a run starts: --lat/--lon/--zoom,
// an interactive prompt for whatever is missing, then clamps.
// ═══════════════════════════════════════════════════════
import { parseArgs } from 'node:util';
import type { CollectionTarget, RegionBounds } from '../types.ts';
import { clampToRegion } from './geo.ts';
import { clamp } from './helpers.ts';

export const DEFAULT_TARGET: CollectionTarget = { lat: 37.5608, lon: 126.9888, zoom: 15 };

export type PartialTarget = Partial<CollectionTarget>;

export type Ask = (question: string) => Promise<string>;

function numberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(n)) throw new Error(`--${name} expects a number, got "${raw}"`);
  return n;
}

/** Read --lat/--lon/--zoom; throws on unknown flags or non-numeric values. */
export function parseTargetArgs(argv: readonly string[]): PartialTarget {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      lat: { type: 'string' },
      lon: { type: 'string' },
      zoom: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });
  return {
    lat: numberOption('lat', values.lat),
    lon: numberOption('lon', values.lon),
    zoom: numberOption('zoom', values.zoom),
  };
}

/** Ask for each missing value; blank or unparsable answers take the default. */
export async function promptMissing(partial: PartialTarget, ask: Ask, defaults = DEFAULT_TARGET): Promise<CollectionTarget> {
  const resolve = async (value: number | undefined, question: string, fallback: number): Promise<number> => {
    if (value !== undefined) return value;
    const answer = (await ask(`${question} [${fallback}]: `)).trim();
    const n = Number(answer);
    return answer !== '' && Number.isFinite(n) ? n : fallback;
  };
  return {
    lat: await resolve(partial.lat, 'Latitude', defaults.lat),
    lon: await resolve(partial.lon, 'Longitude', defaults.lon),
    zoom: await resolve(partial.zoom, 'Zoom', defaults.zoom),
  };
}

export function withDefaults(partial: PartialTarget, defaults = DEFAULT_TARGET): CollectionTarget {
  return {
    lat: partial.lat ?? defaults.lat,
    lon: partial.lon ?? defaults.lon,
    zoom: partial.zoom ?? defaults.zoom,
  };
}

/** Coordinates into the region, zoom to an integer inside the working band */
export function clampTarget(target: CollectionTarget, bounds: RegionBounds, zoomMin: number, zoomMax: number): CollectionTarget {
  const { lat, lon } = clampToRegion(target.lat, target.lon, bounds);
  return { lat, lon, zoom: clamp(Math.round(target.zoom), zoomMin, zoomMax) };
}
