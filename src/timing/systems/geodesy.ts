import { EARTH_RADIUS_METERS } from "../constants";
import type { GeoPoint } from "../types/fix";

function toRad(deg: number) {
  return (deg * Math.PI) / 180;
}

export function parseDecimal(text: string) {
  const value = Number.parseFloat(text);
  return Number.isNaN(value) ? 0 : value;
}

/**
 * Converts a receiver coordinate (`DDMM.MMMM` or `DDDMM.MMMM`) to decimal degrees.
 * Everything left of the last two integer digits is whole degrees.
 */
export function nmeaToDegrees(text: string) {
  if (text.length === 0) return 0;
  const value = parseDecimal(text);
  const degrees = Math.trunc(value / 100);
  const minutes = value - degrees * 100;
  return degrees + minutes / 60;
}

/**
 * Haversine distance between two lat/lng points in meters.
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number) {
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function distanceBetween(from: GeoPoint, to: GeoPoint) {
  return haversineDistance(from.latitude, from.longitude, to.latitude, to.longitude);
}
