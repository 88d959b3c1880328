import { StandardizedLocation } from '../types/Location';

/**
 * Distances and grouping over standardized locations
 */

const EARTH_RADIUS_METERS = 6371000;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in meters
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(a)));
}

/**
 * True for locations whose stored coordinates were unusable and were replaced by 0,0
 */
export function hasInvalidCoordinates(location: StandardizedLocation): boolean {
  return location.metadata.invalidCoordinates !== undefined;
}

export interface LocationCluster {
  center: { latitude: number; longitude: number };
  /** Farthest member from the center, in meters */
  radius: number;
  count: number;
  startTime: string | null;
  endTime: string | null;
  locations: StandardizedLocation[];
}

function summarize(members: StandardizedLocation[]): LocationCluster {
  const latitude = members.reduce((sum, location) => sum + location.latitude, 0) / members.length;
  const longitude = members.reduce((sum, location) => sum + location.longitude, 0) / members.length;
  const radius = Math.max(
    ...members.map(location => haversineDistance(latitude, longitude, location.latitude, location.longitude))
  );
  // RFC 3339 UTC strings order lexically
  const times = members.map(location => location.timestampUTC).sort();

  return {
    center: { latitude, longitude },
    radius,
    count: members.length,
    startTime: times[0] ?? null,
    endTime: times[times.length - 1] ?? null,
    locations: members,
  };
}

/**
 * Group locations in one pass: each location not yet placed starts a cluster
 * and takes every unplaced location within thresholdMeters of it.
 */
export function clusterLocations(locations: StandardizedLocation[], thresholdMeters = 100): LocationCluster[] {
  const placed = new Array<boolean>(locations.length).fill(false);
  const clusters: LocationCluster[] = [];

  locations.forEach((seed, i) => {
    if (placed[i]) return;
    placed[i] = true;
    const members = [seed];

    locations.forEach((other, j) => {
      if (placed[j]) return;
      if (haversineDistance(seed.latitude, seed.longitude, other.latitude, other.longitude) <= thresholdMeters) {
        members.push(other);
        placed[j] = true;
      }
    });

    clusters.push(summarize(members));
  });

  return clusters;
}
