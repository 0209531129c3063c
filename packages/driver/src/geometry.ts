/**
 * Quad and box-model arithmetic.
 *
 * A quad is eight numbers, four x/y points clockwise from the top left, as
 * `DOM.getContentQuads` and `DOM.getBoxModel` report them. A shape is a list
 * of quads; a non-rectangular element is described by several of them.
 */

import type { Protocol } from 'devtools-protocol';

export type Quad = Protocol.DOM.Quad;

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

function points(quad: Quad): Point[] {
  if (quad.length !== 8) {
    throw new Error(`a quad has 8 coordinates, got ${quad.length}`);
  }
  return [0, 2, 4, 6].map((i) => ({ x: quad[i], y: quad[i + 1] }));
}

/**
 * Center of a quad, the average of its corners.
 */
export function quadCenter(quad: Quad): Point {
  const corners = points(quad);
  return {
    x: corners.reduce((sum, p) => sum + p.x, 0) / corners.length,
    y: corners.reduce((sum, p) => sum + p.y, 0) / corners.length,
  };
}

/**
 * Axis-aligned bounds of a quad.
 */
export function quadBounds(quad: Quad): Rect {
  const corners = points(quad);
  const xs = corners.map((p) => p.x);
  const ys = corners.map((p) => p.y);
  const x = Math.min(...xs);
  const y = Math.min(...ys);
  return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
}

export function shapesEqual(a: Quad[], b: Quad[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((quad, i) => quad.length === b[i].length && quad.every((n, j) => n === b[i][j]));
}
