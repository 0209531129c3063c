/**
 * Text reading and text selection helpers.
 */

/**
 * The text a user sees for the element: form control values for inputs,
 * the selected option labels for selects, rendered text otherwise.
 */
export function text(this: Element): string {
  if (this instanceof HTMLInputElement || this instanceof HTMLTextAreaElement) {
    return this.value;
  }
  if (this instanceof HTMLSelectElement) {
    return Array.from(this.selectedOptions, (option) => option.text).join();
  }
  if (this instanceof HTMLElement) {
    return this.innerText;
  }
  return this.textContent ?? '';
}

/**
 * Fire the events a framework listens for after the value of a control was
 * changed by inserted text.
 */
export function inputEvent(this: Element): void {
  this.dispatchEvent(new Event('input', { bubbles: true }));
  this.dispatchEvent(new Event('change', { bubbles: true }));
}

/**
 * Select the first match of `pattern` inside an input or textarea.
 * Returns false when the element holds no match.
 */
export function selectText(this: Element, pattern: string): boolean {
  if (!(this instanceof HTMLInputElement || this instanceof HTMLTextAreaElement)) {
    throw new Error(`cannot select text inside <${this.localName}>`);
  }

  const match = new RegExp(pattern).exec(this.value);
  if (!match) return false;

  this.setSelectionRange(match.index, match.index + match[0].length);
  return true;
}

export function selectAllText(this: Element): void {
  if (this instanceof HTMLInputElement || this instanceof HTMLTextAreaElement) {
    this.select();
    return;
  }

  const selection = this.ownerDocument.getSelection();
  if (!selection) return;
  const range = this.ownerDocument.createRange();
  range.selectNodeContents(this);
  selection.removeAllRanges();
  selection.addRange(range);
}
