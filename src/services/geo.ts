// ═══════════════════════════════════════════════════════
// geo.ts — Web-Mercator projection + region clamping
// Pixel plane is 256·2^zoom on each axis, origin top-left.
// ═══════════════════════════════════════════════════════
import type { LatLon, PixelPoint, RegionBounds } from '../types.ts';
import { clamp } from './helpers.ts';

const TILE_SIZE = 256;

const worldSize = (zoom: number): number => TILE_SIZE * 2 ** zoom;

/** lat/lon → pixel coordinates at zoom */
export function project(lat: number, lon: number, zoom: number): PixelPoint {
  const scale = worldSize(zoom);
  const x = (lon + 180) / 360 * scale;
  const siny = Math.sin(lat * Math.PI / 180);
  const y = (0.5 - Math.log((1 + siny) / (1 - siny)) / (4 * Math.PI)) * scale;
  return { x, y };
}

/** Pixel coordinates at zoom → lat/lon (inverse Gudermannian) */
export function unproject(x: number, y: number, zoom: number): LatLon {
  const scale = worldSize(zoom);
  const lon = x / scale * 360 - 180;
  const n = Math.PI - 2 * Math.PI * y / scale;
  const lat = Math.atan(Math.sinh(n)) * 180 / Math.PI;
  return { lat, lon };
}

/** Clamp each axis independently into bounds */
export function clampToRegion(lat: number, lon: number, bounds: RegionBounds): LatLon {
  return {
    lat: clamp(lat, bounds.latMin, bounds.latMax),
    lon: clamp(lon, bounds.lonMin, bounds.lonMax),
  };
}

/** Euclidean distance between two pixel points */
export function pixelDistance(a: PixelPoint, b: PixelPoint): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
