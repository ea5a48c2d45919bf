/**
 * Style Link Attacher
 *
 * Derives the `style` link of an item from its current asset keys. Replace
 * semantics: any earlier style link is dropped, so re-running with the same
 * URL gives the same links.
 */

import { MEDIA_TYPES, STYLE_REL } from '../core/constants.js';
import type { CatalogItem, StacLink } from '../core/types.js';

type StyleTarget = Pick<CatalogItem, 'assets' | 'links'>;

/**
 * New `links` for `item` with a style link pointing at `styleUrl`
 *
 * - Unset or empty `styleUrl`: the existing links, untouched (same array).
 * - Otherwise: non-style links in their original order, then one style
 *   link whose `asset:keys` are all current asset keys in map order.
 */
export function attachStyleLink(
  item: StyleTarget,
  styleUrl: string | null | undefined
): readonly StacLink[] {
  if (!styleUrl) {
    return item.links;
  }

  const kept = item.links.filter(link => link.rel !== STYLE_REL);
  const style: StacLink = {
    rel: STYLE_REL,
    href: styleUrl,
    type: MEDIA_TYPES.vectorStyles,
    'asset:keys': Object.keys(item.assets),
  };

  return [...kept, style];
}

/**
 * Item-returning form of {@link attachStyleLink}
 */
export function withStyleLink<T extends StyleTarget>(
  item: T,
  styleUrl: string | null | undefined
): T {
  const links = attachStyleLink(item, styleUrl);
  return links === item.links ? item : { ...item, links };
}
