/**
 * GeoJSON shapes understood by GEO_WITHIN, and the containment test the
 * residual predicate applies to them.
 *
 * Regions are either a GeoJSON `Polygon` (outer ring first, holes after)
 * or the store's `AeroCircle`: `{ type: 'AeroCircle', coordinates: [[lng, lat], radiusMeters] }`.
 *
 * @module query/geo
 */

import { z } from 'zod';

const Position = z.tuple([z.number(), z.number()]);

export const GeoPointSchema = z.object({
  type: z.literal('Point'),
  coordinates: Position,
});

export const GeoPolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(Position).min(4)).min(1),
});

export const GeoCircleSchema = z.object({
  type: z.literal('AeroCircle'),
  coordinates: z.tuple([Position, z.number().nonnegative()]),
});

export const GeoRegionSchema = z.discriminatedUnion('type', [GeoPolygonSchema, GeoCircleSchema]);

export type GeoPoint = z.infer<typeof GeoPointSchema>;
export type GeoRegion = z.infer<typeof GeoRegionSchema>;

const EARTH_RADIUS_METERS = 6371008.8;

function fromJson(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

/**
 * Accepts a GeoJSON object or its JSON text, as the store keeps GeoJSON
 * bins as strings.
 */
export function toGeoPoint(value: unknown): GeoPoint | undefined {
  const parsed = GeoPointSchema.safeParse(fromJson(value));
  return parsed.success ? parsed.data : undefined;
}

export function toGeoRegion(value: unknown): GeoRegion | undefined {
  const parsed = GeoRegionSchema.safeParse(fromJson(value));
  return parsed.success ? parsed.data : undefined;
}

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in meters between two [lng, lat] positions */
export function haversineMeters(a: readonly [number, number], b: readonly [number, number]): number {
  const dLat = toRadians(b[1] - a[1]);
  const dLng = toRadians(b[0] - a[0]);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRadians(a[1])) * Math.cos(toRadians(b[1])) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

function inRing(point: readonly [number, number], ring: readonly (readonly [number, number])[]): boolean {
  const [x, y] = point;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

/**
 * Planar point-in-polygon test (even-odd rule) over lng/lat, or a
 * great-circle distance check for circles.
 */
export function isWithin(point: GeoPoint, region: GeoRegion): boolean {
  switch (region.type) {
    case 'Polygon': {
      const [outer, ...holes] = region.coordinates;
      return inRing(point.coordinates, outer) && !holes.some((hole) => inRing(point.coordinates, hole));
    }
    case 'AeroCircle': {
      const [center, radius] = region.coordinates;
      return haversineMeters(point.coordinates, center) <= radius;
    }
  }
}
