// src/anchor-registry.ts — Heading text → collision-free anchor ids
// Slugs follow the heading-anchor convention of common markdown viewers; links inside the
// generated document depend on every step below, in this order.

const NON_SLUG_CHARS = /[^\p{L}\p{N}_\- ]+/gu;

/**
 * Normalize heading text into a URL-safe slug.
 *
 * @example slugify("src/My_File.py") // "src-my-filepy"
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replaceAll("/", " ")
    .replace(NON_SLUG_CHARS, "")
    .replaceAll("_", " ")
    .replace(/\s+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Hands out unique anchors for one document. The first registration of a slug gets the
 * bare slug; the Nth repeat gets `slug-N`. Suffixed anchors are reserved too, so a later
 * heading whose own slug is `slug-1` moves on to the next free suffix.
 */
export class AnchorRegistry {
  private readonly counts = new Map<string, number>();

  register(headingText: string): string {
    const base = slugify(headingText);
    let anchor = base;
    while (this.counts.has(anchor)) {
      const next = (this.counts.get(base) ?? 0) + 1;
      this.counts.set(base, next);
      anchor = `${base}-${next}`;
    }
    this.counts.set(anchor, 0);
    return anchor;
  }
}
