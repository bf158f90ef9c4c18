import { parse, HTMLElement, TextNode, type Node } from "node-html-parser";
import { REMOVED_TAGS } from "../constants.js";

/**
 * Parses markup into a tree. `pre` is parsed normally so links inside it are found.
 */
export function parseMarkup(html: string): HTMLElement {
  const root = parse(html, {
    blockTextElements: { script: true, noscript: true, style: true },
  });
  for (const element of root.querySelectorAll(REMOVED_TAGS.join(", "))) {
    element.remove();
  }
  return root;
}

export function tagNameOf(element: HTMLElement): string {
  return (element.rawTagName ?? "").toLowerCase();
}

/**
 * Text of every descendant text node, each trimmed, empty ones dropped, joined without separator.
 */
export function flattenText(node: Node): string {
  if (node instanceof TextNode) {
    return node.text.trim();
  }
  if (node instanceof HTMLElement) {
    return node.childNodes
      .map((child) => flattenText(child))
      .filter((text) => text.length > 0)
      .join("");
  }
  return "";
}

/** Every non-empty `href` under `element`, duplicates kept. */
export function collectLinks(element: HTMLElement): string[] {
  const links: string[] = [];
  for (const anchor of element.querySelectorAll("a")) {
    const href = anchor.getAttribute("href");
    if (href) {
      links.push(href);
    }
  }
  return links;
}

export function nextElementSibling(element: HTMLElement): HTMLElement | null {
  const siblings = element.parentNode?.childNodes ?? [];
  for (let index = siblings.indexOf(element) + 1; index > 0 && index < siblings.length; index++) {
    const sibling = siblings[index];
    if (sibling instanceof HTMLElement) {
      return sibling;
    }
  }
  return null;
}

export function previousElementSibling(element: HTMLElement): HTMLElement | null {
  const siblings = element.parentNode?.childNodes ?? [];
  for (let index = siblings.indexOf(element) - 1; index >= 0; index--) {
    const sibling = siblings[index];
    if (sibling instanceof HTMLElement) {
      return sibling;
    }
  }
  return null;
}

/** Text nodes under `root` in document order. */
export function textNodesOf(root: HTMLElement): TextNode[] {
  const nodes: TextNode[] = [];
  const visit = (node: Node): void => {
    if (node instanceof TextNode) {
      nodes.push(node);
    } else if (node instanceof HTMLElement) {
      node.childNodes.forEach(visit);
    }
  };
  visit(root);
  return nodes;
}

/**
 * First element matched by the ordered selectors, falling back to `body` and then the root.
 */
export function selectContentRoot(root: HTMLElement, selectors: ReadonlyArray<string>): HTMLElement {
  for (const selector of selectors) {
    const match = root.querySelector(selector);
    if (match) {
      return match;
    }
  }
  return root.querySelector("body") ?? root;
}
