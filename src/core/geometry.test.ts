import { describe, it, expect } from 'vitest';
import {
  scalePoint,
  scalePointToRect,
  fitSquare,
  resolveSurfaceScale,
  projectPoint,
  type Point,
} from './geometry';

describe('geometry', () => {
  it('scalePoint multiplies both coordinates by the size', () => {
    expect(scalePoint({ x: 0.2, y: 0.8 }, 100)).toEqual({ x: 0.2 * 100, y: 0.8 * 100 });
    expect(scalePoint({ x: 1, y: 0 }, 300)).toEqual({ x: 300, y: 0 });
    expect(scalePoint({ x: 0.5, y: 0.5 }, 0)).toEqual({ x: 0, y: 0 });
  });

  it('scalePoint keeps normalized points inside [0, size]', () => {
    const samples: Point[] = [
      { x: 0, y: 0 },
      { x: 1, y: 1 },
      { x: 0.25, y: 0.75 },
      { x: 0.9, y: 0.1 },
    ];
    for (const size of [0, 1, 240, 333.5]) {
      for (const p of samples) {
        const q = scalePoint(p, size);
        expect(q.x).toBeGreaterThanOrEqual(0);
        expect(q.x).toBeLessThanOrEqual(size);
        expect(q.y).toBeGreaterThanOrEqual(0);
        expect(q.y).toBeLessThanOrEqual(size);
      }
    }
  });

  it('does not clamp out-of-range input', () => {
    expect(scalePoint({ x: 1.5, y: -0.5 }, 100)).toEqual({ x: 150, y: -50 });
  });

  it('scalePointToRect maps corners to the surface edges', () => {
    const surface = { width: 400, height: 250 };
    expect(scalePointToRect({ x: 1, y: 0 }, surface)).toEqual({ x: 400, y: 0 });
    expect(scalePointToRect({ x: 0, y: 1 }, surface)).toEqual({ x: 0, y: 250 });
  });

  it('fitSquare takes the smaller side and treats bad dimensions as 0', () => {
    expect(fitSquare({ width: 400, height: 250 })).toBe(250);
    expect(fitSquare({ width: 120, height: 300 })).toBe(120);
    expect(fitSquare({ width: -10, height: 300 })).toBe(0);
    expect(fitSquare({ width: Number.NaN, height: 300 })).toBe(0);
  });

  it('resolveSurfaceScale: square anchored at start', () => {
    expect(resolveSurfaceScale({ width: 400, height: 250 })).toEqual({
      scaleX: 250,
      scaleY: 250,
      offsetX: 0,
      offsetY: 0,
    });
  });

  it('resolveSurfaceScale: square centered in leftover space', () => {
    expect(resolveSurfaceScale({ width: 400, height: 250 }, 'square', 'center')).toEqual({
      scaleX: 250,
      scaleY: 250,
      offsetX: 75,
      offsetY: 0,
    });
  });

  it('resolveSurfaceScale: stretch scales axes independently', () => {
    const scale = resolveSurfaceScale({ width: 400, height: 250 }, 'stretch');
    expect(projectPoint({ x: 1, y: 0 }, scale)).toEqual({ x: 400, y: 0 });
    expect(projectPoint({ x: 0, y: 1 }, scale)).toEqual({ x: 0, y: 250 });
  });

  it('projectPoint adds offsets after scaling', () => {
    const scale = { scaleX: 200, scaleY: 200, offsetX: 50, offsetY: 10 };
    expect(projectPoint({ x: 0.5, y: 0.25 }, scale)).toEqual({ x: 150, y: 60 });
  });
});
