/**
 * Helpers for elements that load an external resource.
 */

/**
 * Resolve the URL the element loaded its content from. Images are waited
 * on until they finish loading.
 */
export function resource(this: Element): Promise<string> {
  return new Promise((resolve, reject) => {
    if (!(this instanceof HTMLImageElement)) {
      if (this instanceof HTMLMediaElement) {
        resolve(this.currentSrc || this.src);
      } else {
        resolve(this.getAttribute('src') ?? '');
      }
      return;
    }

    const image = this;
    if (image.complete) {
      resolve(image.currentSrc || image.src);
      return;
    }
    image.addEventListener('load', () => resolve(image.currentSrc || image.src), { once: true });
    image.addEventListener('error', () => reject(new Error(`failed to load ${image.src}`)), {
      once: true,
    });
  });
}

/**
 * Resolve once an image has loaded. Other elements resolve immediately.
 */
export function waitLoad(this: Element): Promise<boolean> {
  return new Promise((resolve, reject) => {
    if (!(this instanceof HTMLImageElement) || this.complete) {
      resolve(true);
      return;
    }

    const image = this;
    image.addEventListener('load', () => resolve(true), { once: true });
    image.addEventListener('error', () => reject(new Error(`failed to load ${image.src}`)), {
      once: true,
    });
  });
}
