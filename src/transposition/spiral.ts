/**
 * Spiral route ciphers.
 *
 * The plaintext is written into a rectangle row by row and read back along a
 * spiral path (or the reverse for decoding).
 */

import type { Location, Rectangle, SpiralOptions } from '../types/index.js';
import { InvalidArgumentError } from '../utils/errors.js';
import {
  assertDimensions,
  emptyRectangle,
  formRectangleHorizontally,
  unravelRectangleHorizontally,
} from './rectangle.js';

// ── Options ─────────────────────────────────────────────────────────────────

export interface RouteOptions extends SpiralOptions {
  /** Fills the cells left over when the text is shorter than the grid. Default: 'X' */
  padding?: string;
}

const DEFAULT_OPTIONS: Required<RouteOptions> = {
  clockwise: true,
  inward: true,
  padding: 'X',
};

/** Fill every option left out or set to `undefined` from the defaults. */
function resolveOptions(options?: RouteOptions): Required<RouteOptions> {
  return {
    clockwise: options?.clockwise ?? DEFAULT_OPTIONS.clockwise,
    inward: options?.inward ?? DEFAULT_OPTIONS.inward,
    padding: options?.padding ?? DEFAULT_OPTIONS.padding,
  };
}

// ── Route generation ────────────────────────────────────────────────────────

/**
 * The cells of one ring, clockwise from its top-left corner. Degenerate
 * rings (a single row or column) visit each cell once.
 */
function ringCells(left: number, top: number, right: number, bottom: number): Location[] {
  const cells: Location[] = [];
  for (let x = left; x <= right; x++) cells.push([x, top]);
  for (let y = top + 1; y <= bottom; y++) cells.push([right, y]);
  if (bottom > top) {
    for (let x = right - 1; x >= left; x--) cells.push([x, bottom]);
  }
  if (right > left) {
    for (let y = bottom - 1; y > top; y--) cells.push([left, y]);
  }
  return cells;
}

/**
 * Visiting order of every cell of a `width` × `height` rectangle along a
 * spiral.
 *
 * Inward spirals start in the top-left corner. A counter-clockwise ring
 * starts on the same cell as a clockwise one and walks the rest of the ring
 * in reverse. Outward spirals are inward spirals read backwards.
 */
export function getSpiral(
  width: number,
  height: number,
  options?: SpiralOptions,
): Location[] {
  assertDimensions(width, height);
  const opts = resolveOptions(options);

  const locations: Location[] = [];
  let left = 0;
  let top = 0;
  let right = width - 1;
  let bottom = height - 1;

  while (left <= right && top <= bottom) {
    let ring = ringCells(left, top, right, bottom);
    if (!opts.clockwise && ring.length > 1) {
      ring = [ring[0], ...ring.slice(1).reverse()];
    }
    locations.push(...ring);
    left++;
    top++;
    right--;
    bottom--;
  }

  if (!opts.inward) locations.reverse();
  return locations;
}

// ── Reading and writing along a route ───────────────────────────────────────

/** Write `text` along `locations`, returning a new rectangle. */
export function writeToLocations(
  rectangle: Rectangle,
  text: string,
  locations: Location[],
): Rectangle {
  const written = rectangle.map((row) => [...row]);
  locations.forEach(([x, y], index) => {
    written[y][x] = text.charAt(index);
  });
  return written;
}

export function readFromLocations(rectangle: Rectangle, locations: Location[]): string {
  return locations.map(([x, y]) => rectangle[y][x]).join('');
}

/** Write `text` into an empty rectangle along a spiral. */
export function formRectangleSpiral(
  text: string,
  width: number,
  height: number,
  options?: SpiralOptions,
): Rectangle {
  return writeToLocations(
    emptyRectangle(width, height),
    text,
    getSpiral(width, height, options),
  );
}

// ── Route cipher ────────────────────────────────────────────────────────────

function padToGrid(text: string, width: number, height: number, padding: string): string {
  assertDimensions(width, height);
  const cells = width * height;
  if (text.length > cells) {
    throw new InvalidArgumentError(
      `Text length (${text.length}) exceeds the ${width}x${height} grid (${cells} cells)`,
      { textLength: text.length, width, height },
    );
  }
  if (padding.length !== 1) {
    throw new InvalidArgumentError(`Padding must be a single character, got "${padding}"`);
  }
  return text.padEnd(cells, padding);
}

/** Write row by row, read along the spiral. */
export function spiralEncode(
  text: string,
  width: number,
  height: number,
  options?: RouteOptions,
): string {
  const opts = resolveOptions(options);
  const padded = padToGrid(text, width, height, opts.padding);
  const rectangle = formRectangleHorizontally(padded, width, height);
  return readFromLocations(rectangle, getSpiral(width, height, opts));
}

/** Write along the spiral, read row by row. The result keeps its padding. */
export function spiralDecode(
  cryptText: string,
  width: number,
  height: number,
  options?: RouteOptions,
): string {
  const opts = resolveOptions(options);
  const padded = padToGrid(cryptText, width, height, opts.padding);
  return unravelRectangleHorizontally(formRectangleSpiral(padded, width, height, opts));
}
