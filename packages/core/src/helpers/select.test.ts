import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { select } from './select.js';

describe('select', () => {
  let container: HTMLDivElement;
  let element: HTMLSelectElement;

  beforeEach(() => {
    container = document.createElement('div');
    document.body.appendChild(container);

    element = document.createElement('select');
    for (const [value, label] of [
      ['a', 'Apple'],
      ['b', 'Banana'],
      ['c', 'Cherry'],
    ]) {
      const option = document.createElement('option');
      option.value = value;
      option.textContent = label;
      element.appendChild(option);
    }
    container.appendChild(element);
  });

  afterEach(() => {
    container.remove();
  });

  it('should select an option by its text', () => {
    expect(select.call(element, ['Banana'])).toBe(1);
    expect(element.value).toBe('b');
  });

  it('should select an option by css selector', () => {
    expect(select.call(element, ['[value="c"]'])).toBe(1);
    expect(element.value).toBe('c');
  });

  it('should count selectors that found nothing as unmatched', () => {
    expect(select.call(element, ['Durian'])).toBe(0);
  });

  it('should fire a change event', () => {
    let changes = 0;
    element.addEventListener('change', () => changes++);

    select.call(element, ['Apple']);

    expect(changes).toBe(1);
  });

  it('should refuse non-select elements', () => {
    const div = document.createElement('div');

    expect(() => select.call(div, ['x'])).toThrow('cannot select options of <div>');
  });
});
