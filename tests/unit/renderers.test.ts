/**
 * Unit tests for the Renderers Module
 */

import { describe, test, expect } from '@jest/globals';
import { categoryTreeFromObject } from '../../src/discovery/index.js';
import { renderCategoryTree, renderRunSummary } from '../../src/renderers/index.js';
import type { CrawlSummary } from '../../src/types/index.js';

describe('Renderers Module', () => {
  describe('renderCategoryTree()', () => {
    test('should render an indented listing with counts', () => {
      const tree = categoryTreeFromObject({
        Men: { Shirts: [['Casual', 'https://x/casual'], ['Formal', 'https://x/formal']] },
        Women: { Shoes: [['Boots', 'https://x/boots']] },
      });

      expect(renderCategoryTree(tree).split('\n')).toEqual([
        'Categories:',
        '- Men:',
        '  - Shirts:',
        '    - Casual (https://x/casual)',
        '    - Formal (https://x/formal)',
        '- Women:',
        '  - Shoes:',
        '    - Boots (https://x/boots)',
        '',
        '2 main categories, 2 sub-categories, 3 leaf categories',
      ]);
    });

    test('should render an empty tree', () => {
      expect(renderCategoryTree(new Map())).toBe(
        'Categories:\n\n0 main categories, 0 sub-categories, 0 leaf categories'
      );
    });
  });

  describe('renderRunSummary()', () => {
    test('should render per-category lines and totals', () => {
      const summary: CrawlSummary = {
        startedAt: '2024-01-15T10:30:00.000Z',
        completedAt: '2024-01-15T10:42:00.000Z',
        categories: [
          {
            category: {
              mainCategory: 'Men',
              subCategory: 'Shirts',
              nestedCategory: 'Casual',
              sourceURL: 'https://x/casual',
            },
            enumerated: 3,
            extracted: 2,
            inserted: 2,
            failed: 1,
            durationMs: 1500,
          },
          {
            category: {
              mainCategory: 'Men',
              subCategory: 'Shirts',
              nestedCategory: 'Formal',
              sourceURL: 'https://x/formal',
            },
            enumerated: 0,
            extracted: 0,
            inserted: 0,
            failed: 0,
            durationMs: 250,
            error: 'Navigation to https://x/formal failed',
          },
        ],
        totals: { enumerated: 3, extracted: 2, inserted: 2, failed: 1 },
      };

      expect(renderRunSummary(summary).split('\n')).toEqual([
        'Crawl summary',
        'Started:   2024-01-15T10:30:00.000Z',
        'Completed: 2024-01-15T10:42:00.000Z',
        '',
        '- Men > Shirts > Casual: 2/3 extracted, 2 new, 1 failed (1.5s)',
        '- Men > Shirts > Formal: 0/0 extracted, 0 new, 0 failed (250ms) [error: Navigation to https://x/formal failed]',
        '',
        'Total: 2/3 extracted, 2 new, 1 failed across 2 categories',
      ]);
    });
  });
});
