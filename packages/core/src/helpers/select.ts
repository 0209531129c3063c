/**
 * Select the `<option>`s of a `<select>` that match each selector.
 *
 * A selector matches an option when the option's text contains it, or when
 * it is a CSS selector the option matches. Returns how many selectors found
 * an option.
 */
export function select(this: Element, selectors: string[]): number {
  if (!(this instanceof HTMLSelectElement)) {
    throw new Error(`cannot select options of <${this.localName}>`);
  }

  let matched = 0;
  for (const selector of selectors) {
    const option = Array.from(this.options).find((candidate) => {
      if ((candidate.textContent ?? '').includes(selector)) return true;
      try {
        return candidate.matches(selector);
      } catch {
        // plain text that is not a valid selector
        return false;
      }
    });

    if (option) {
      option.selected = true;
      matched++;
    }
  }

  this.dispatchEvent(new Event('input', { bubbles: true }));
  this.dispatchEvent(new Event('change', { bubbles: true }));
  return matched;
}
