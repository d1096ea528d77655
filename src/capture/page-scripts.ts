/**
 * Functions serialized into the page by page.evaluate
 * They run in the browser: no imports, no closures over module state.
 */

/** Fetch the page's own URL with its cookies; byte array or null */
export async function fetchCurrentDocument(): Promise<number[] | null> {
  try {
    const response = await fetch(window.location.href, { credentials: 'include' });
    if (!response.ok) {
      return null;
    }
    return Array.from(new Uint8Array(await response.arrayBuffer()));
  } catch {
    return null;
  }
}

/** Inject an <a download> at url and click it */
export function clickAnchorDownload(url: string): void {
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = '';
  anchor.style.display = 'none';
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
}

/**
 * Fetch url with credentials, wrap it in an object URL and click a download
 * anchor for it. Returns the object URL so the caller can revoke it.
 */
export async function clickBlobDownload(url: string): Promise<string> {
  const response = await fetch(url, { credentials: 'include' });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  const objectUrl = URL.createObjectURL(await response.blob());
  const anchor = document.createElement('a');
  anchor.href = objectUrl;
  anchor.download = 'document.pdf';
  anchor.style.display = 'none';
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  return objectUrl;
}

export function revokeObjectUrl(objectUrl: string): void {
  URL.revokeObjectURL(objectUrl);
}
