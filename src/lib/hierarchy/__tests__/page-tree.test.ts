/**
 * Page Tree Tests
 */

import { PageTree } from '../page-tree';
import { createPageRecord } from '../../crawling/page-record';
import { DiscoverySource, PageRecord, PageType } from '../../crawling/crawling.types';

const SITE = 'Agency';
const BASE = 'https://www.agency.df.gov.br';

const record = (path: string, hierarchy: string[] = [SITE, 'Page']): PageRecord =>
  createPageRecord(`${BASE}${path}`, hierarchy, { source: DiscoverySource.MENU });

describe('PageTree', () => {
  let tree: PageTree;

  beforeEach(() => {
    tree = new PageTree(SITE);
  });

  describe('addMenuPage', () => {
    it('should create missing intermediate nodes', () => {
      const apply = record('/services/apply', [SITE, 'Services', 'Apply']);
      const node = tree.addMenuPage([SITE, 'Services', 'Apply'], apply.url, apply);

      expect(node.path()).toEqual([SITE, 'Services', 'Apply']);
      const services = tree.getRoot().children.get('Services');
      expect(services?.url).toBeUndefined();
      expect(services?.children.get('Apply')).toBe(node);
    });

    it('should reuse nodes that already exist', () => {
      const services = record('/services', [SITE, 'Services']);
      const apply = record('/services/apply', [SITE, 'Services', 'Apply']);
      tree.addMenuPage([SITE, 'Services', 'Apply'], apply.url, apply);
      const node = tree.addMenuPage([SITE, 'Services'], services.url, services);

      expect(node.url).toBe(services.url);
      expect(tree.getRoot().children.size).toBe(1);
      expect(tree.size()).toBe(2);
    });
  });

  describe('addContentPage', () => {
    it('should place the page under the deepest existing ancestor', () => {
      const services = record('/services', [SITE, 'Services']);
      tree.addMenuPage([SITE, 'Services'], services.url, services);

      const leaf = record('/services/forms/leaf');
      const node = tree.addContentPage(leaf.url, leaf, [SITE, 'Services', 'Forms', 'Leaf']);

      expect(node.path()).toEqual([SITE, 'Services', 'Leaf']);
      expect(tree.getRoot().children.has('Forms')).toBe(false);
    });

    it('should number titles that collide under the same parent', () => {
      const first = record('/about-1');
      const second = record('/about-2');
      const third = record('/about-3');

      tree.addContentPage(first.url, first, [SITE, 'About']);
      const secondNode = tree.addContentPage(second.url, second, [SITE, 'About']);
      const thirdNode = tree.addContentPage(third.url, third, [SITE, 'About']);

      expect(secondNode.title).toBe('About (1)');
      expect(thirdNode.title).toBe('About (2)');
      expect(Array.from(tree.getRoot().children.keys())).toEqual(['About', 'About (1)', 'About (2)']);
    });

    it('should fall back to the record hierarchy without a breadcrumb', () => {
      const page = record('/contact', [SITE, 'Contact']);
      const node = tree.addContentPage(page.url, page);

      expect(node.path()).toEqual([SITE, 'Contact']);
    });

    it('should number pages in attachment order', () => {
      const home = createPageRecord(BASE, [SITE], {
        source: DiscoverySource.HOMEPAGE,
        pageType: PageType.HOME,
      });
      const page = record('/contact', [SITE, 'Contact']);

      expect(tree.attachRoot(home.url, home).sequenceNumber).toBe(1);
      expect(tree.addContentPage(page.url, page).sequenceNumber).toBe(2);
      expect(tree.getNode(home.url)).toBe(tree.getRoot());
    });
  });

  describe('updateHierarchies', () => {
    it('should rewrite hierarchies from tree positions and reclassify', () => {
      const services = record('/services', [SITE, 'Services']);
      tree.addMenuPage([SITE, 'Services'], services.url, services);

      const leaf = record('/leaf', [SITE, 'Leaf']);
      expect(leaf.pageType).toBe(PageType.DEFINED_PAGE);
      tree.addContentPage(leaf.url, leaf, [SITE, 'Services', 'Leaf']);

      tree.updateHierarchies();

      expect(leaf.hierarchy).toEqual([SITE, 'Services', 'Leaf']);
      expect(leaf.pageType).toBe(PageType.WIDGET_PAGE);
      expect(leaf.isVisible).toBe(false);
      expect(services.hierarchy).toEqual([SITE, 'Services']);
    });

    it('should be idempotent', () => {
      const a = record('/a', [SITE, 'A']);
      const b = record('/a/b', [SITE, 'A', 'B']);
      tree.addMenuPage([SITE, 'A'], a.url, a);
      tree.addContentPage(b.url, b, [SITE, 'A', 'B']);

      tree.updateHierarchies();
      const first = [a, b].map((r) => ({ hierarchy: [...r.hierarchy], pageType: r.pageType }));
      tree.updateHierarchies();
      const second = [a, b].map((r) => ({ hierarchy: [...r.hierarchy], pageType: r.pageType }));

      expect(second).toEqual(first);
    });
  });

  it('should start over on reset', () => {
    const page = record('/contact', [SITE, 'Contact']);
    tree.addContentPage(page.url, page);

    tree.reset('Renamed');

    expect(tree.rootLabel).toBe('Renamed');
    expect(tree.size()).toBe(0);
    expect(tree.getNode(page.url)).toBeUndefined();
  });
});
