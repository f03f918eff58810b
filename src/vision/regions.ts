import type { FractionalBox, RegionName, RegionSpec } from './types.js';

export const MIN_EDGE = 256;
export const MAX_EDGE = 1024;

/**
 * Fixed region catalogue; the order is the order replies are voted in
 */
export const REGION_CATALOGUE: readonly RegionSpec[] = [
  {
    name: 'full',
    box: { left: 0, top: 0, right: 1, bottom: 1 },
    focus: 'Look at the whole photograph and find the vertical pole that carries the signs.',
  },
  {
    name: 'upper-junction',
    box: { left: 0.35, top: 0.15, right: 0.65, bottom: 0.45 },
    focus: 'This crop shows where the upper signs are mounted on the pole.',
  },
  {
    name: 'main-junction',
    box: { left: 0.3, top: 0.25, right: 0.7, bottom: 0.55 },
    focus: 'This crop shows the main sign mounting. Check whether one or two poles carry the signs.',
  },
  {
    name: 'lower-junction',
    box: { left: 0.35, top: 0.35, right: 0.65, bottom: 0.65 },
    focus: 'This crop shows the lower sign mounting and the pole below it.',
  },
  {
    name: 'center-shaft',
    box: { left: 0.4, top: 0.3, right: 0.6, bottom: 0.8 },
    focus: 'This crop shows the pole shaft. Judge its surface: smooth metal or rough concrete.',
  },
  {
    name: 'upper-section',
    box: { left: 0.35, top: 0, right: 0.65, bottom: 0.4 },
    focus: 'This crop shows the top of the pole. Look for lamps or signal heads.',
  },
  {
    name: 'base-section',
    box: { left: 0.4, top: 0.6, right: 0.6, bottom: 1.0 },
    focus: 'This crop shows the base of the pole. Ignore the pavement around it.',
  },
];

export function getRegion(name: RegionName): RegionSpec {
  const region = REGION_CATALOGUE.find(r => r.name === name);
  if (!region) {
    throw new Error(`Unknown region: ${name}`);
  }
  return region;
}

/**
 * Pixel rectangle of a fractional box, clipped to the image and at least 1×1
 */
export function regionRectangle(
  box: FractionalBox,
  width: number,
  height: number
): { left: number; top: number; width: number; height: number } {
  const left = Math.min(Math.max(0, Math.floor(box.left * width)), width - 1);
  const top = Math.min(Math.max(0, Math.floor(box.top * height)), height - 1);
  const right = Math.min(width, Math.max(left + 1, Math.round(box.right * width)));
  const bottom = Math.min(height, Math.max(top + 1, Math.round(box.bottom * height)));
  return { left, top, width: right - left, height: bottom - top };
}

/**
 * Scale dimensions so the longest edge falls within [minEdge, maxEdge],
 * keeping the aspect ratio
 */
export function fitLongestEdge(
  width: number,
  height: number,
  minEdge: number = MIN_EDGE,
  maxEdge: number = MAX_EDGE
): { width: number; height: number } {
  const longest = Math.max(width, height);
  let scale = 1;
  if (longest > maxEdge) {
    scale = maxEdge / longest;
  } else if (longest < minEdge) {
    scale = minEdge / longest;
  }
  if (scale === 1) {
    return { width, height };
  }
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}
