/**
 * GeoVerifier
 *
 * Decides whether a GPS fix lies within an approved site polygon.
 *
 * RULES:
 * - Fix accuracy worse than the ceiling (default 50 m) → INDETERMINATE, never INSIDE/OUTSIDE
 * - Points on an edge or vertex are INSIDE (closed polygon)
 * - Points outside the ring but within the site's radius tolerance of it are INSIDE
 * - Overlapping sites are tried smallest-area first; first INSIDE wins
 *
 * Stateless and reentrant. Coordinates are treated as planar (lon = x, lat = y)
 * for containment; distances and areas use an equirectangular projection.
 */

import type { GeoPoint, GeoResult, Site } from '../../types/index.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_ACCURACY_CEILING_METERS = 50;

const EARTH_RADIUS_METERS = 6_371_008.8;
const DEG_TO_RAD = Math.PI / 180;
/** ~0.1 mm at the equator */
const BOUNDARY_EPSILON_DEGREES = 1e-9;

export interface GeoVerifierOptions {
  accuracyCeilingMeters?: number;
}

export interface SiteMatch {
  result: GeoResult;
  site?: Site;
}

// ============================================================================
// VERIFIER
// ============================================================================

export class GeoVerifier {
  private readonly accuracyCeilingMeters: number;

  constructor(options: GeoVerifierOptions = {}) {
    this.accuracyCeilingMeters = options.accuracyCeilingMeters ?? DEFAULT_ACCURACY_CEILING_METERS;
  }

  verify(point: GeoPoint, accuracyMeters: number, site: Site, ceilingOverride?: number): GeoResult {
    if (!this.isAccurateEnough(accuracyMeters, ceilingOverride)) {
      return 'INDETERMINATE';
    }
    return containsWithTolerance(site, point) ? 'INSIDE' : 'OUTSIDE';
  }

  /**
   * Check a fix against several sites in priority order (smallest area first).
   */
  verifyAgainstSites(
    point: GeoPoint,
    accuracyMeters: number,
    sites: readonly Site[],
    ceilingOverride?: number
  ): SiteMatch {
    if (!this.isAccurateEnough(accuracyMeters, ceilingOverride)) {
      return { result: 'INDETERMINATE' };
    }

    for (const site of prioritizeSites(sites)) {
      if (containsWithTolerance(site, point)) {
        return { result: 'INSIDE', site };
      }
    }
    return { result: 'OUTSIDE' };
  }

  private isAccurateEnough(accuracyMeters: number, ceilingOverride?: number): boolean {
    const ceiling = ceilingOverride ?? this.accuracyCeilingMeters;
    return Number.isFinite(accuracyMeters) && accuracyMeters >= 0 && accuracyMeters <= ceiling;
  }
}

// ============================================================================
// GEOMETRY
// ============================================================================

export function prioritizeSites(sites: readonly Site[]): Site[] {
  return [...sites].sort((a, b) => {
    const byArea = polygonAreaSquareMeters(a.polygon) - polygonAreaSquareMeters(b.polygon);
    if (byArea !== 0) return byArea;
    if (a.id !== b.id) return a.id < b.id ? -1 : 1;
    return a.version - b.version;
  });
}

function containsWithTolerance(site: Site, point: GeoPoint): boolean {
  const { polygon } = site;
  if (polygon.length < 3) return false;
  if (isOnBoundary(polygon, point) || isInsidePolygon(polygon, point)) return true;
  return site.radiusToleranceMeters > 0 && distanceToBoundaryMeters(polygon, point) <= site.radiusToleranceMeters;
}

/**
 * Even-odd ray casting. Boundary points are not guaranteed either way here;
 * callers check `isOnBoundary` first.
 */
export function isInsidePolygon(polygon: readonly GeoPoint[], point: GeoPoint): boolean {
  const x = point.lon;
  const y = point.lat;
  let inside = false;

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].lon;
    const yi = polygon[i].lat;
    const xj = polygon[j].lon;
    const yj = polygon[j].lat;

    const crosses = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) inside = !inside;
  }

  return inside;
}

export function isOnBoundary(polygon: readonly GeoPoint[], point: GeoPoint): boolean {
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    if (isOnSegment(polygon[j], polygon[i], point)) return true;
  }
  return false;
}

function isOnSegment(a: GeoPoint, b: GeoPoint, p: GeoPoint): boolean {
  const dx = b.lon - a.lon;
  const dy = b.lat - a.lat;
  const length = Math.hypot(dx, dy);

  if (length === 0) {
    return Math.hypot(p.lon - a.lon, p.lat - a.lat) <= BOUNDARY_EPSILON_DEGREES;
  }

  const cross = dx * (p.lat - a.lat) - dy * (p.lon - a.lon);
  if (Math.abs(cross) / length > BOUNDARY_EPSILON_DEGREES) return false;

  const withinX = p.lon >= Math.min(a.lon, b.lon) - BOUNDARY_EPSILON_DEGREES
    && p.lon <= Math.max(a.lon, b.lon) + BOUNDARY_EPSILON_DEGREES;
  const withinY = p.lat >= Math.min(a.lat, b.lat) - BOUNDARY_EPSILON_DEGREES
    && p.lat <= Math.max(a.lat, b.lat) + BOUNDARY_EPSILON_DEGREES;
  return withinX && withinY;
}

/**
 * Shortest distance from a point to the polygon ring, in meters.
 */
export function distanceToBoundaryMeters(polygon: readonly GeoPoint[], point: GeoPoint): number {
  const cosLat = Math.cos(point.lat * DEG_TO_RAD);
  const project = (v: GeoPoint) => ({
    x: (v.lon - point.lon) * DEG_TO_RAD * EARTH_RADIUS_METERS * cosLat,
    y: (v.lat - point.lat) * DEG_TO_RAD * EARTH_RADIUS_METERS,
  });

  let best = Infinity;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = project(polygon[j]);
    const b = project(polygon[i]);
    best = Math.min(best, distanceOriginToSegment(a, b));
  }
  return best;
}

function distanceOriginToSegment(a: { x: number; y: number }, b: { x: number; y: number }): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) return Math.hypot(a.x, a.y);

  const t = Math.max(0, Math.min(1, -(a.x * dx + a.y * dy) / lengthSquared));
  return Math.hypot(a.x + t * dx, a.y + t * dy);
}

/**
 * Shoelace area in square meters.
 */
export function polygonAreaSquareMeters(polygon: readonly GeoPoint[]): number {
  if (polygon.length < 3) return 0;

  const meanLat = polygon.reduce((sum, v) => sum + v.lat, 0) / polygon.length;
  const cosLat = Math.cos(meanLat * DEG_TO_RAD);
  const scale = DEG_TO_RAD * EARTH_RADIUS_METERS;

  let twiceArea = 0;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].lon * scale * cosLat;
    const yi = polygon[i].lat * scale;
    const xj = polygon[j].lon * scale * cosLat;
    const yj = polygon[j].lat * scale;
    twiceArea += xj * yi - xi * yj;
  }
  return Math.abs(twiceArea) / 2;
}
