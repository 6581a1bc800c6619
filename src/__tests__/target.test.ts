import { describe, it, expect, vi } from 'vitest';
import { clampTarget, DEFAULT_TARGET, parseTargetArgs, promptMissing, withDefaults } from '../services/target.ts';

const KOREA = { latMin: 33.0, latMax: 39.5, lonMin: 124.0, lonMax: 132.1 };

describe('parseTargetArgs', () => {
  it('reads numeric flags', () => {
    expect(parseTargetArgs(['--lat', '35.1', '--lon=129.04', '--zoom', '16']))
      .toEqual({ lat: 35.1, lon: 129.04, zoom: 16 });
  });

  it('leaves missing flags undefined', () => {
    expect(parseTargetArgs(['--zoom', '14'])).toEqual({ lat: undefined, lon: undefined, zoom: 14 });
  });

  it('rejects non-numeric values and unknown flags', () => {
    expect(() => parseTargetArgs(['--lat', 'north'])).toThrow('--lat expects a number, got "north"');
    expect(() => parseTargetArgs(['--radius', '3'])).toThrow();
  });
});

describe('promptMissing', () => {
  it('asks only for what is missing', async () => {
    const ask = vi.fn(async (_q: string) => '127.5');
    const target = await promptMissing({ lat: 36.0, zoom: 15 }, ask);

    expect(target).toEqual({ lat: 36.0, lon: 127.5, zoom: 15 });
    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask).toHaveBeenCalledWith('Longitude [126.9888]: ');
  });

  it('falls back to defaults on blank or garbage answers', async () => {
    const answers = ['', 'abc', ' 17 '];
    const target = await promptMissing({}, async () => answers.shift() ?? '');
    expect(target).toEqual({ lat: DEFAULT_TARGET.lat, lon: DEFAULT_TARGET.lon, zoom: 17 });
  });
});

describe('withDefaults / clampTarget', () => {
  it('fills gaps from the default target', () => {
    expect(withDefaults({ zoom: 16 })).toEqual({ lat: 37.5608, lon: 126.9888, zoom: 16 });
  });

  it('clamps coordinates to the region and zoom to the working band', () => {
    expect(clampTarget({ lat: 41, lon: 120, zoom: 19 }, KOREA, 15, 17)).toEqual({ lat: 39.5, lon: 124.0, zoom: 17 });
    expect(clampTarget({ lat: 37, lon: 127, zoom: 12.6 }, KOREA, 15, 17)).toEqual({ lat: 37, lon: 127, zoom: 15 });
    expect(clampTarget({ lat: 37, lon: 127, zoom: 15.6 }, KOREA, 15, 17)).toEqual({ lat: 37, lon: 127, zoom: 16 });
  });
});
