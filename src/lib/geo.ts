import { InvalidStateError } from './errors';
import type { Coordinate } from './types';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export const toCoordinate = ([lng, lat]: readonly [number, number]): Coordinate => ({ lng, lat });

export function centroid(points: readonly Coordinate[]): Coordinate {
  if (points.length === 0) throw new InvalidStateError('centroid of an empty point set');
  let sumLng = 0;
  let sumLat = 0;
  for (const point of points) {
    sumLng += point.lng;
    sumLat += point.lat;
  }
  return { lng: sumLng / points.length, lat: sumLat / points.length };
}

/** Angular distance along the sphere (haversine), in degrees. */
export function greatCircleDistanceDeg(a: Coordinate, b: Coordinate): number {
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLng = (b.lng - a.lng) * DEG_TO_RAD;
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;
  return 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h)) * RAD_TO_DEG;
}

export const pathLengthDeg = (path: readonly Coordinate[]) =>
  path.reduce((sum, point, index) => (index === 0 ? sum : sum + greatCircleDistanceDeg(path[index - 1], point)), 0);
