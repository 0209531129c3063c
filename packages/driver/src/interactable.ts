/**
 * Hit-test verification: an element is interactable when the topmost
 * element at its center point is the element itself or one of its
 * descendants.
 */

import { z } from 'zod';
import type { ElementHandle } from './element.js';
import { NotInteractableError } from './errors.js';
import { evalOptions } from './eval.js';
import type { Quad } from './geometry.js';
import { quadCenter } from './geometry.js';

const ScrollOffset = z.object({ x: z.number(), y: z.number() });

/**
 * Verify `element` can receive pointer input at the center of its shape and
 * return the shape. Multi-quad shapes are judged by their first quad.
 */
export async function interactable(element: ElementHandle): Promise<Quad[]> {
  const shape = await element.shape();
  if (shape.length === 0) {
    throw new NotInteractableError('element has no visible shape', element);
  }

  const center = quadCenter(shape[0]);

  const page = element.scopedPage();
  const scrolled = await page
    .root()
    .evaluate(evalOptions('function () { return { x: this.scrollX, y: this.scrollY }; }'));
  const scroll = ScrollOffset.parse(scrolled.value);

  const hit = await page.elementFromPoint(
    Math.trunc(center.x) + Math.trunc(scroll.x),
    Math.trunc(center.y) + Math.trunc(scroll.y)
  );

  if (!(await element.containsElement(hit))) {
    throw new NotInteractableError('another element covers current one', hit);
  }

  return shape;
}
