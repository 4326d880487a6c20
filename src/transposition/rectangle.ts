/**
 * Rectangle transposition primitives.
 *
 * A rectangle is indexed `rectangle[y][x]`. Cells past the end of the text
 * hold `''` so every row is exactly `width` long.
 */

import type { Rectangle } from '../types/index.js';
import { InvalidArgumentError } from '../utils/errors.js';

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidArgumentError(
      `Rectangle dimensions must be positive integers, got ${width}x${height}`,
      { width, height },
    );
  }
}

/** An empty `width` × `height` rectangle. */
export function emptyRectangle(width: number, height: number): Rectangle {
  assertDimensions(width, height);
  return Array.from({ length: height }, () => Array<string>(width).fill(''));
}

/** Fill row by row. Text beyond `width * height` is dropped. */
export function formRectangleHorizontally(
  text: string,
  width: number,
  height: number,
): Rectangle {
  const rectangle = emptyRectangle(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      rectangle[y][x] = text.charAt(y * width + x);
    }
  }
  return rectangle;
}

/** Fill column by column. Text beyond `width * height` is dropped. */
export function formRectangleVertically(
  text: string,
  width: number,
  height: number,
): Rectangle {
  const rectangle = emptyRectangle(width, height);
  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      rectangle[y][x] = text.charAt(x * height + y);
    }
  }
  return rectangle;
}

export function unravelRectangleHorizontally(rectangle: Rectangle): string {
  return rectangle.map((row) => row.join('')).join('');
}

export function unravelRectangleVertically(rectangle: Rectangle): string {
  if (rectangle.length === 0) return '';
  let text = '';
  const width = rectangle[0].length;
  for (let x = 0; x < width; x++) {
    for (const row of rectangle) {
      text += row[x] ?? '';
    }
  }
  return text;
}

function assertIndex(index: number, size: number, what: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new InvalidArgumentError(`${what} index ${index} is out of range 0..${size - 1}`, {
      index,
      size,
    });
  }
}

/** Swap two rows, returning a new rectangle. */
export function swapRows(rectangle: Rectangle, rowA: number, rowB: number): Rectangle {
  assertIndex(rowA, rectangle.length, 'Row');
  assertIndex(rowB, rectangle.length, 'Row');
  const swapped = rectangle.map((row) => [...row]);
  [swapped[rowA], swapped[rowB]] = [swapped[rowB], swapped[rowA]];
  return swapped;
}

/** Swap two columns, returning a new rectangle. */
export function swapColumns(
  rectangle: Rectangle,
  columnA: number,
  columnB: number,
): Rectangle {
  const width = rectangle[0]?.length ?? 0;
  assertIndex(columnA, width, 'Column');
  assertIndex(columnB, width, 'Column');
  return rectangle.map((row) => {
    const copy = [...row];
    [copy[columnA], copy[columnB]] = [copy[columnB], copy[columnA]];
    return copy;
  });
}
