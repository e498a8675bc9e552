/** Read on every request so a token rotated after page load is still picked up. */
export function readCsrfToken(doc: Document): string {
  const meta = doc.querySelector('meta[name="csrf-token"]');
  return meta?.getAttribute("content") ?? "";
}
