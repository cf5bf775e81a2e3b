export type Point = { x: number; y: number };
export type Size = { width: number; height: number };

/** 'square' draws into the largest square that fits; 'stretch' scales each axis to the surface. */
export type SurfaceFit = 'square' | 'stretch';
/** Where a square drawing region sits inside a non-square surface. */
export type SurfaceAlign = 'start' | 'center';

export type SurfaceScale = {
  scaleX: number;
  scaleY: number;
  offsetX: number;
  offsetY: number;
};

export function scalePoint(p: Point, size: number): Point {
  return { x: p.x * size, y: p.y * size };
}

export function scalePointToRect(p: Point, surface: Size): Point {
  return { x: p.x * surface.width, y: p.y * surface.height };
}

function nonNegative(v: number): number {
  if (!Number.isFinite(v) || v < 0) return 0;
  return v;
}

/** Negative or non-finite dimensions count as 0. */
export function normalizeSize(surface: Size): Size {
  return { width: nonNegative(surface.width), height: nonNegative(surface.height) };
}

/**
 * Side of the largest square that fits in the surface.
 * Negative or non-finite dimensions count as 0.
 */
export function fitSquare(surface: Size): number {
  return Math.min(nonNegative(surface.width), nonNegative(surface.height));
}

export function resolveSurfaceScale(
  surface: Size,
  fit: SurfaceFit = 'square',
  align: SurfaceAlign = 'start',
): SurfaceScale {
  const { width, height } = normalizeSize(surface);
  if (fit === 'stretch') {
    return { scaleX: width, scaleY: height, offsetX: 0, offsetY: 0 };
  }
  const side = Math.min(width, height);
  if (align === 'center') {
    return { scaleX: side, scaleY: side, offsetX: (width - side) / 2, offsetY: (height - side) / 2 };
  }
  return { scaleX: side, scaleY: side, offsetX: 0, offsetY: 0 };
}

/** Map a normalized point into surface coordinates. Out-of-range input is not clamped. */
export function projectPoint(p: Point, scale: SurfaceScale): Point {
  return {
    x: p.x * scale.scaleX + scale.offsetX,
    y: p.y * scale.scaleY + scale.offsetY,
  };
}
