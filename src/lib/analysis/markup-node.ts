/**
 * Markup Node
 * Parser-independent view of an element, used by the DOM-walking heuristics
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';

export interface MarkupNode {
  readonly tagName: string;
  readonly classNames: readonly string[];
  text(): string;
  attribute(name: string): string | undefined;
  parent(): MarkupNode | null;
  children(): MarkupNode[];
  isSameNode(other: MarkupNode): boolean;
}

/**
 * Collapse whitespace and trim
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function hasAnyClass(node: MarkupNode, classNames: readonly string[]): boolean {
  return node.classNames.some((name) => classNames.includes(name));
}

/**
 * Elements matching a selector built at run time, in document order
 */
export function selectElements($: CheerioAPI, selector: string): Element[] {
  return $(selector).toArray().filter(isTag);
}

/**
 * First element matching the selector, or null
 */
export function firstElement($: CheerioAPI, selector: string): Cheerio<Element> | null {
  const [element] = selectElements($, selector);
  return element ? $(element) : null;
}

/**
 * Element sibling right before the node, if any
 */
export function previousElementSibling(node: MarkupNode): MarkupNode | null {
  const parent = node.parent();
  if (!parent) return null;

  const siblings = parent.children();
  const index = siblings.findIndex((sibling) => sibling.isSameNode(node));
  return index > 0 ? siblings[index - 1] : null;
}

/**
 * cheerio/domhandler adapter
 */
export class DomMarkupNode implements MarkupNode {
  constructor(
    private readonly $: CheerioAPI,
    readonly element: Element
  ) {}

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  get classNames(): readonly string[] {
    return (this.element.attribs.class ?? '').split(/\s+/).filter((name) => name.length > 0);
  }

  text(): string {
    return cleanText(this.$(this.element).text());
  }

  attribute(name: string): string | undefined {
    return this.element.attribs[name];
  }

  parent(): MarkupNode | null {
    const parent = this.element.parent;
    return parent && isTag(parent) ? new DomMarkupNode(this.$, parent) : null;
  }

  children(): MarkupNode[] {
    return this.element.children.filter(isTag).map((child) => new DomMarkupNode(this.$, child));
  }

  isSameNode(other: MarkupNode): boolean {
    return other instanceof DomMarkupNode && other.element === this.element;
  }
}
