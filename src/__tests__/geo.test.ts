import { describe, it, expect } from 'vitest';
import { clampToRegion, pixelDistance, project, unproject } from '../services/geo.ts';

const KOREA = { latMin: 33.0, latMax: 39.5, lonMin: 124.0, lonMax: 132.1 };

describe('project / unproject', () => {
  it('maps the origin to the centre of the world plane', () => {
    expect(project(0, 0, 0)).toEqual({ x: 128, y: 128 });
    const p = project(0, 0, 3);
    expect(p.x).toBe(1024);
    expect(p.y).toBe(1024);
  });

  it('doubles pixel coordinates per zoom level', () => {
    const a = project(37.5608, 126.9888, 14);
    const b = project(37.5608, 126.9888, 15);
    expect(b.x).toBeCloseTo(a.x * 2, 6);
    expect(b.y).toBeCloseTo(a.y * 2, 6);
  });

  it('round-trips within 1e-6 degrees', () => {
    const samples: Array<[number, number]> = [
      [37.5608, 126.9888], [-33.86, 151.2], [0, 0], [84.9, -179.9], [-84.9, 179.9], [35.1, 129.04],
    ];
    for (const zoom of [0, 5, 12, 15, 20]) {
      for (const [lat, lon] of samples) {
        const { x, y } = project(lat, lon, zoom);
        const back = unproject(x, y, zoom);
        expect(Math.abs(back.lat - lat)).toBeLessThan(1e-6);
        expect(Math.abs(back.lon - lon)).toBeLessThan(1e-6);
      }
    }
  });

  it('puts north above south (smaller y)', () => {
    expect(project(38, 127, 10).y).toBeLessThan(project(37, 127, 10).y);
  });
});

describe('clampToRegion', () => {
  it('leaves points inside the region alone', () => {
    expect(clampToRegion(37.5, 127.0, KOREA)).toEqual({ lat: 37.5, lon: 127.0 });
  });

  it('clamps each axis independently', () => {
    expect(clampToRegion(45, 127, KOREA)).toEqual({ lat: 39.5, lon: 127 });
    expect(clampToRegion(36, 100, KOREA)).toEqual({ lat: 36, lon: 124.0 });
    expect(clampToRegion(10, 140, KOREA)).toEqual({ lat: 33.0, lon: 132.1 });
  });

  it('is idempotent', () => {
    const once = clampToRegion(50, 90, KOREA);
    expect(clampToRegion(once.lat, once.lon, KOREA)).toEqual(once);
  });
});

describe('pixelDistance', () => {
  it('is euclidean', () => {
    expect(pixelDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });
});
