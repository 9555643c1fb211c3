/**
 * Page Tree
 * Ownership tree of discovered pages keyed by title path
 */

import { PageRecord } from '../crawling/crawling.types';
import { classifyByDepth } from '../crawling/page-record';

export class PageNode {
  readonly children: Map<string, PageNode> = new Map();
  url?: string;
  record?: PageRecord;
  sequenceNumber: number = 0;

  constructor(
    public readonly title: string,
    public readonly parent: PageNode | null = null
  ) {}

  /**
   * Titles from the root down to this node
   */
  path(): string[] {
    const titles: string[] = [];
    let current: PageNode | null = this;
    while (current) {
      titles.unshift(current.title);
      current = current.parent;
    }
    return titles;
  }
}

export class PageTree {
  private root: PageNode;
  private urlToNode: Map<string, PageNode> = new Map();
  private nextSequence: number = 1;

  constructor(rootLabel: string) {
    this.root = new PageNode(rootLabel);
  }

  get rootLabel(): string {
    return this.root.title;
  }

  getRoot(): PageNode {
    return this.root;
  }

  /**
   * Start over with a new root label
   */
  reset(rootLabel: string): void {
    this.root = new PageNode(rootLabel);
    this.urlToNode.clear();
    this.nextSequence = 1;
  }

  /**
   * Attach the homepage to the root node
   */
  attachRoot(url: string, record: PageRecord): PageNode {
    return this.attach(this.root, url, record);
  }

  /**
   * Walk (creating as needed) along hierarchy[1:] and attach the page to the last node
   */
  addMenuPage(hierarchy: string[], url: string, record: PageRecord): PageNode {
    let current = this.root;

    for (const title of hierarchy.slice(1)) {
      let child = current.children.get(title);
      if (!child) {
        child = new PageNode(title, current);
        current.children.set(title, child);
      }
      current = child;
    }

    return this.attach(current, url, record);
  }

  /**
   * Place a page under the deepest existing ancestor named by breadcrumb[1:-1].
   * Missing intermediate titles are not created.
   */
  addContentPage(url: string, record: PageRecord, breadcrumb?: string[]): PageNode {
    const trail = breadcrumb && breadcrumb.length > 0 ? breadcrumb : record.hierarchy;

    let parent = this.root;
    if (trail.length > 1) {
      for (const crumb of trail.slice(1, -1)) {
        const child = parent.children.get(crumb);
        if (child) {
          parent = child;
        }
      }
    }

    const baseTitle = trail[trail.length - 1];
    let title = baseTitle;
    let counter = 1;
    while (parent.children.has(title)) {
      title = `${baseTitle} (${counter})`;
      counter++;
    }

    const node = new PageNode(title, parent);
    parent.children.set(title, node);
    return this.attach(node, url, record);
  }

  getNode(url: string): PageNode | undefined {
    return this.urlToNode.get(url);
  }

  /**
   * Rewrite every attached record's hierarchy from its position in the tree
   */
  updateHierarchies(): void {
    for (const node of this.urlToNode.values()) {
      if (node.record) {
        node.record.hierarchy = node.path();
        classifyByDepth(node.record);
      }
    }
  }

  size(): number {
    return this.urlToNode.size;
  }

  private attach(node: PageNode, url: string, record: PageRecord): PageNode {
    node.url = url;
    node.record = record;
    node.sequenceNumber = this.nextSequence++;
    this.urlToNode.set(url, node);
    return node;
  }
}
