/**
 * Discovery Module
 *
 * Parses the three-level navigation menu (main category -> sub-category ->
 * leaf link) into an ordered CategoryTree. Parsing is pure and lenient: a
 * node with a missing marker or an unresolvable href is skipped and the rest
 * of the menu is still returned.
 *
 * Usage:
 * ```typescript
 * const tree = await discoverCategories(fetcher, config.baseURL, config.markers.navigation);
 * const leaves = flattenCategories(tree);
 * ```
 */

import type { DocumentFetcher, ParsedDocument } from '../fetcher/index.js';
import { resolveUrl, trimString } from '../normalizer/index.js';
import { defaultLogger } from '../observability/index.js';
import type {
  CategoryTree,
  LeafCategory,
  LeafLink,
  Logger,
  NavigationMarkers,
} from '../types/index.js';

/**
 * Counts of each tree level
 */
export interface CategoryCounts {
  main: number;
  sub: number;
  leaf: number;
}

/**
 * Parse the navigation menu into a category tree
 *
 * @param document - Parsed root page
 * @param baseURL - Base URL leaf hrefs are resolved against
 * @param markers - Navigation markers
 * @param logger - Optional logger for skipped nodes
 */
export function parseCategories(
  document: ParsedDocument,
  baseURL: string,
  markers: NavigationMarkers,
  logger: Logger = defaultLogger
): CategoryTree {
  const tree: CategoryTree = new Map();

  for (const mainItem of document.findAll(markers.mainItem)) {
    const mainName = trimString(mainItem.find(markers.mainLink)?.text());
    if (!mainName) {
      logger.debug('Skipping main category without a name');
      continue;
    }

    let subCategories = tree.get(mainName);
    if (!subCategories) {
      subCategories = new Map();
      tree.set(mainName, subCategories);
    }

    for (const subItem of mainItem.findAll(markers.subItem)) {
      const subName = trimString(subItem.find(markers.subTitle)?.text());
      if (!subName) {
        logger.debug('Skipping sub-category without a title', { mainCategory: mainName });
        continue;
      }

      let leaves = subCategories.get(subName);
      if (!leaves) {
        leaves = [];
        subCategories.set(subName, leaves);
      }

      for (const link of subItem.findAll(markers.leafLink)) {
        const leafName = trimString(link.text());
        const leafUrl = resolveUrl(link.attr('href'), baseURL);

        if (!leafName || !leafUrl) {
          logger.debug('Skipping malformed leaf link', {
            mainCategory: mainName,
            subCategory: subName,
            name: leafName,
          });
          continue;
        }

        // (main, sub, nested) must stay unique; first occurrence wins
        if (leaves.some((existing) => existing.name === leafName)) {
          continue;
        }

        leaves.push({ name: leafName, url: leafUrl });
      }
    }
  }

  return tree;
}

/**
 * Flatten the tree into leaf categories, in navigation order
 */
export function flattenCategories(tree: CategoryTree): LeafCategory[] {
  const leaves: LeafCategory[] = [];
  for (const [mainCategory, subCategories] of tree) {
    for (const [subCategory, links] of subCategories) {
      for (const link of links) {
        leaves.push({
          mainCategory,
          subCategory,
          nestedCategory: link.name,
          sourceURL: link.url,
        });
      }
    }
  }
  return leaves;
}

/**
 * Count the nodes of each level
 */
export function countCategories(tree: CategoryTree): CategoryCounts {
  let sub = 0;
  let leaf = 0;
  for (const subCategories of tree.values()) {
    sub += subCategories.size;
    for (const links of subCategories.values()) {
      leaf += links.length;
    }
  }
  return { main: tree.size, sub, leaf };
}

/**
 * Build a tree from a plain object, e.g. a saved or hand-written tree
 */
export function categoryTreeFromObject(
  source: Record<string, Record<string, Array<LeafLink | [string, string]>>>
): CategoryTree {
  const tree: CategoryTree = new Map();
  for (const [mainCategory, subCategories] of Object.entries(source)) {
    const subs = new Map<string, LeafLink[]>();
    for (const [subCategory, links] of Object.entries(subCategories)) {
      subs.set(
        subCategory,
        links.map((link) => (Array.isArray(link) ? { name: link[0], url: link[1] } : link))
      );
    }
    tree.set(mainCategory, subs);
  }
  return tree;
}

/**
 * Fetch the root page and parse its navigation menu
 *
 * @throws RetrievalError when the root page cannot be fetched
 */
export async function discoverCategories(
  fetcher: DocumentFetcher,
  baseURL: string,
  markers: NavigationMarkers,
  logger: Logger = defaultLogger
): Promise<CategoryTree> {
  logger.info('Discovering categories', { baseURL });

  const document = await fetcher.fetchDocument(baseURL);
  const tree = parseCategories(document, baseURL, markers, logger);

  logger.info('Category discovery completed', { ...countCategories(tree) });

  return tree;
}
