/**
 * Renderers Module
 *
 * Plain-text views for the operator console. Rendering is pure: every
 * function returns a string and leaves printing to the caller.
 *
 * - Category tree: shown before the confirmation prompt
 * - Run summary: shown when the crawl finishes
 */

import type { CategoryCrawlResult, CategoryTree, CrawlSummary } from '../types/index.js';
import { countCategories } from '../discovery/index.js';

/**
 * Render the discovered tree as an indented list:
 *
 * ```
 * Categories:
 * - Women:
 *   - Clothing:
 *     - Dresses (https://shop.example/women/dresses)
 * ```
 */
export function renderCategoryTree(tree: CategoryTree): string {
  const lines: string[] = ['Categories:'];

  for (const [mainCategory, subCategories] of tree) {
    lines.push(`- ${mainCategory}:`);
    for (const [subCategory, links] of subCategories) {
      lines.push(`  - ${subCategory}:`);
      for (const link of links) {
        lines.push(`    - ${link.name} (${link.url})`);
      }
    }
  }

  const counts = countCategories(tree);
  lines.push('');
  lines.push(
    `${counts.main} main categories, ${counts.sub} sub-categories, ${counts.leaf} leaf categories`
  );

  return lines.join('\n');
}

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

function renderCategoryLine(result: CategoryCrawlResult): string {
  const { mainCategory, subCategory, nestedCategory } = result.category;
  const path = `${mainCategory} > ${subCategory} > ${nestedCategory}`;
  const counts =
    `${result.extracted}/${result.enumerated} extracted, ` +
    `${result.inserted} new, ${result.failed} failed`;
  const suffix = result.error ? ` [error: ${result.error}]` : '';
  return `- ${path}: ${counts} (${formatDuration(result.durationMs)})${suffix}`;
}

/**
 * Render per-category counts and totals of a finished run
 */
export function renderRunSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    'Crawl summary',
    `Started:   ${summary.startedAt}`,
    `Completed: ${summary.completedAt}`,
    '',
  ];

  for (const result of summary.categories) {
    lines.push(renderCategoryLine(result));
  }

  if (summary.categories.length > 0) {
    lines.push('');
  }

  const { enumerated, extracted, inserted, failed } = summary.totals;
  lines.push(
    `Total: ${extracted}/${enumerated} extracted, ${inserted} new, ${failed} failed ` +
      `across ${summary.categories.length} categories`
  );

  return lines.join('\n');
}
