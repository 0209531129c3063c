/**
 * Decode `data:` URIs such as the ones `HTMLCanvasElement.toDataURL` returns.
 */

export interface DataUri {
  mimeType: string;
  data: Buffer;
}

const DATA_URI = /^data:([^,;]*)((?:;[^,;]*)*),(.*)$/s;

export function parseDataUri(uri: string): DataUri {
  const match = DATA_URI.exec(uri);
  if (!match) {
    throw new Error(`not a data URI: ${uri.slice(0, 32)}`);
  }

  const [, mimeType, parameters, payload] = match;
  const base64 = parameters.split(';').includes('base64');

  return {
    mimeType: mimeType || 'text/plain',
    data: base64 ? Buffer.from(payload, 'base64') : Buffer.from(decodeURIComponent(payload)),
  };
}
