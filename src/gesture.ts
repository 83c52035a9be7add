import type { GestureFeatures, GestureType, TouchSample } from './types';
import { distance, distanceToLine, mean, stddev } from './utils';

/** Max start→end displacement (px) for a gesture to count as a tap. */
export const TAP_MOVEMENT_THRESHOLD = 30;
/** Max duration (ms) for a gesture to count as a tap. */
export const TAP_DURATION_THRESHOLD_MS = 500;
/** Successive segment headings differing by more than this count as a direction change. */
const DIRECTION_CHANGE_RAD = Math.PI / 4;

export const GESTURE_CSV_HEADER = [
  'timestamp',
  'gesture_type',
  'duration_ms',
  'total_distance',
  'avg_velocity',
  'peak_velocity',
  'avg_pressure',
  'peak_pressure',
  'path_deviation',
  'direction_changes',
  'jitter',
].join(',');

/** Tap when the net displacement and the duration are both within the tap bounds. */
export function classifyGesture(path: readonly TouchSample[]): GestureType {
  const start = path[0];
  const end = path[path.length - 1];
  const movement = distance(start.x, start.y, end.x, end.y);
  const duration = end.timestamp - start.timestamp;
  return movement <= TAP_MOVEMENT_THRESHOLD && duration <= TAP_DURATION_THRESHOLD_MS
    ? 'TAP'
    : 'SWIPE';
}

/** Perpendicular distances of the interior points from the start→end chord. */
function chordDeviations(path: readonly TouchSample[]): number[] {
  const start = path[0];
  const end = path[path.length - 1];
  const deviations: number[] = [];
  for (let i = 1; i < path.length - 1; i++) {
    const p = path[i];
    deviations.push(distanceToLine(start.x, start.y, end.x, end.y, p.x, p.y));
  }
  return deviations;
}

function countDirectionChanges(path: readonly TouchSample[]): number {
  let changes = 0;
  for (let i = 2; i < path.length; i++) {
    const p1 = path[i - 2];
    const p2 = path[i - 1];
    const p3 = path[i];
    const a1 = Math.atan2(p2.y - p1.y, p2.x - p1.x);
    const a2 = Math.atan2(p3.y - p2.y, p3.x - p2.x);
    // Raw heading difference, not wrapped to [0, π].
    if (Math.abs(a2 - a1) > DIRECTION_CHANGE_RAD) changes++;
  }
  return changes;
}

/**
 * Reduce a completed pointer path (at least two samples) to its feature vector.
 * Distances are in input units, velocities in units per ms.
 */
export function extractFeatures(path: readonly TouchSample[]): GestureFeatures {
  const start = path[0];
  const end = path[path.length - 1];
  const durationMs = end.timestamp - start.timestamp;

  let totalDistance = 0;
  let peakVelocity = 0;
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const curr = path[i];
    const segment = distance(prev.x, prev.y, curr.x, curr.y);
    totalDistance += segment;
    const dt = curr.timestamp - prev.timestamp;
    if (dt > 0) peakVelocity = Math.max(peakVelocity, segment / dt);
  }

  const pressures = path.map((p) => p.pressure);
  let peakPressure = 0;
  for (const p of pressures) peakPressure = Math.max(peakPressure, p);

  const deviations = path.length >= 3 ? chordDeviations(path) : [];

  return {
    timestamp: end.timestamp,
    gestureType: classifyGesture(path),
    durationMs,
    totalDistance,
    avgVelocity: durationMs > 0 ? totalDistance / durationMs : 0,
    peakVelocity,
    avgPressure: mean(pressures),
    peakPressure,
    pathDeviation: mean(deviations),
    directionChanges: path.length >= 3 ? countDirectionChanges(path) : 0,
    jitter: stddev(deviations),
  };
}

/** One CSV row in GESTURE_CSV_HEADER column order. */
export function toCsvRow(features: GestureFeatures): string {
  return [
    features.timestamp,
    features.gestureType,
    features.durationMs,
    features.totalDistance,
    features.avgVelocity,
    features.peakVelocity,
    features.avgPressure,
    features.peakPressure,
    features.pathDeviation,
    features.directionChanges,
    features.jitter,
  ].join(',');
}

export interface GestureSegmenter {
  down(sample: TouchSample): void;
  move(sample: TouchSample): void;
  /** Close the pointer's path. Returns its features, or null when there was no usable path. */
  up(sample: TouchSample): GestureFeatures | null;
  /** Number of pointers currently down. */
  readonly activeCount: number;
  clear(): void;
}

/**
 * Groups raw pointer samples into gestures, one open path per pointer id.
 * A path is dropped as soon as its features are extracted.
 */
export function createGestureSegmenter(): GestureSegmenter {
  const active = new Map<number, TouchSample[]>();

  return {
    down(sample: TouchSample) {
      active.set(sample.pointerId, [sample]);
    },

    move(sample: TouchSample) {
      active.get(sample.pointerId)?.push(sample);
    },

    up(sample: TouchSample): GestureFeatures | null {
      const path = active.get(sample.pointerId);
      if (!path) return null;
      active.delete(sample.pointerId);
      path.push(sample);
      if (path.length < 2) return null;
      return extractFeatures(path);
    },

    get activeCount() {
      return active.size;
    },

    clear() {
      active.clear();
    },
  };
}
