/**
 * Integer lattice geometry used by candidates and seeding
 */

export interface Point {
  x: number;
  y: number;
}

// ============================================================================
// Point Operations
// ============================================================================

export function add(p1: Point, p2: Point): Point {
  return { x: p1.x + p2.x, y: p1.y + p2.y };
}

export function subtract(p1: Point, p2: Point): Point {
  return { x: p1.x - p2.x, y: p1.y - p2.y };
}

/**
 * Calculate cross product magnitude (z-component of 3D cross product)
 */
export function cross(p1: Point, p2: Point): number {
  return p1.x * p2.y - p1.y * p2.x;
}

/**
 * Cross product of (b - a) and (c - a); positive when a, b, c turn counter-clockwise
 * in a y-up frame
 */
export function orientation(a: Point, b: Point, c: Point): number {
  return cross(subtract(b, a), subtract(c, a));
}

export function pointsEqual(p1: Point, p2: Point): boolean {
  return p1.x === p2.x && p1.y === p2.y;
}

export function isLatticePoint(p: Point): boolean {
  return Number.isInteger(p.x) && Number.isInteger(p.y);
}

export function clampPoint(p: Point, width: number, height: number): Point {
  return {
    x: Math.min(width - 1, Math.max(0, p.x)),
    y: Math.min(height - 1, Math.max(0, p.y)),
  };
}

export function inDomain(p: Point, width: number, height: number): boolean {
  return p.x >= 0 && p.x < width && p.y >= 0 && p.y < height;
}

// ============================================================================
// Polygon Operations
// ============================================================================

/**
 * True when the points span no area: every point coincides with the first
 * or lies on one line through it.
 */
export function isDegenerate(points: readonly Point[]): boolean {
  if (points.length < 3) return true;

  const origin = points[0];
  const anchor = points.find((p) => !pointsEqual(p, origin));
  if (!anchor) return true;

  return points.every((p) => orientation(origin, anchor, p) === 0);
}

/**
 * Convex hull (Andrew's monotone chain). Collinear boundary points are
 * dropped; use latticePointsOnHull to recover them.
 */
export function convexHull(points: readonly Point[]): Point[] {
  const unique = new Map<string, Point>();
  for (const p of points) unique.set(`${p.x},${p.y}`, p);

  const sorted = Array.from(unique.values()).sort((a, b) => a.x - b.x || a.y - b.y);
  if (sorted.length < 3) return sorted;

  const lower: Point[] = [];
  for (const p of sorted) {
    while (
      lower.length >= 2 &&
      orientation(lower[lower.length - 2], lower[lower.length - 1], p) <= 0
    ) {
      lower.pop();
    }
    lower.push(p);
  }

  const upper: Point[] = [];
  for (let i = sorted.length - 1; i >= 0; i--) {
    const p = sorted[i];
    while (
      upper.length >= 2 &&
      orientation(upper[upper.length - 2], upper[upper.length - 1], p) <= 0
    ) {
      upper.pop();
    }
    upper.push(p);
  }

  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

function gcd(a: number, b: number): number {
  a = Math.abs(a);
  b = Math.abs(b);
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Lattice points on the segment from a to b, a included, b excluded
 */
export function latticePointsOnSegment(a: Point, b: Point): Point[] {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const steps = gcd(dx, dy);
  if (steps === 0) return [a];

  const points: Point[] = [];
  for (let i = 0; i < steps; i++) {
    points.push({ x: a.x + (dx / steps) * i, y: a.y + (dy / steps) * i });
  }
  return points;
}

/**
 * Every lattice point on the boundary of the convex hull of the given
 * lattice points, walking the hull in order.
 */
export function latticePointsOnHull(points: readonly Point[]): Point[] {
  const hull = convexHull(points);
  if (hull.length <= 1) return hull;
  if (hull.length === 2) {
    return [...latticePointsOnSegment(hull[0], hull[1]), hull[1]];
  }

  const boundary: Point[] = [];
  for (let i = 0; i < hull.length; i++) {
    boundary.push(...latticePointsOnSegment(hull[i], hull[(i + 1) % hull.length]));
  }
  return boundary;
}
