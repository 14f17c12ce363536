/**
 * Turns a raw response body into text. The charset comes from the
 * Content-Type header, then from the XML prolog, then defaults to UTF-8.
 * The CBR feed is served as windows-1251.
 */
export function decodeBody(bytes: Uint8Array, contentType?: string): string {
  const charset = charsetFromContentType(contentType) ?? charsetFromProlog(bytes) ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    // unknown label
    return new TextDecoder('utf-8').decode(bytes);
  }
}

function charsetFromContentType(contentType?: string): string | undefined {
  if (!contentType) return undefined;
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match?.[1].toLowerCase();
}

function charsetFromProlog(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 200));
  const match = /<\?xml[^>]*encoding\s*=\s*["']([^"']+)["']/i.exec(head);
  return match?.[1].toLowerCase();
}
