// Markup adapter: builds an element tree from HTML text via html5parser

import { parseHtml, type INode, type ITag } from './deps.ts';
import { ElementArena } from './element.ts';
import { getLogger } from './logging.ts';
import type { ElementHandle } from './types.ts';

const logger = getLogger('Markup');

export interface MarkupOptions {
  /**
   * Treat the input as a fragment: a single top-level element becomes the
   * root, several are wrapped in a `div`. Otherwise the input is a document
   * and is wrapped in html/body unless it already has an `html` element.
   */
  fragment?: boolean;
}

export interface MarkupResult {
  tree: ElementArena;
  /** Text of each `<style>` element, in document order */
  stylesheets: string[];
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00A0',
};

/**
 * Decode named (basic set) and numeric character references
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match, ref: string) => {
    if (ref.startsWith('#x') || ref.startsWith('#X')) {
      const code = parseInt(ref.slice(2), 16);
      return Number.isFinite(code) && code <= 0x10FFFF ? String.fromCodePoint(code) : match;
    }
    if (ref.startsWith('#')) {
      const code = parseInt(ref.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10FFFF ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

function isTag(node: INode): node is ITag {
  return 'name' in node;
}

/** Comments, doctype and processing instructions */
function isDirective(tag: ITag): boolean {
  return tag.name.startsWith('!') || tag.name.startsWith('?');
}

function isSignificant(node: INode): boolean {
  if (isTag(node)) return !isDirective(node);
  return node.value.trim() !== '';
}

function tagAttributes(tag: ITag): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const attribute of tag.attributes) {
    const name = attribute.name.value.toLowerCase();
    if (name in attributes) continue;
    attributes[name] = decodeEntities(attribute.value?.value ?? '');
  }
  return attributes;
}

function rawText(nodes: readonly INode[]): string {
  return nodes.map(node => (isTag(node) ? rawText(node.body ?? []) : node.value)).join('');
}

class TreeBuilder {
  readonly arena = new ElementArena();
  readonly stylesheets: string[] = [];

  element(tag: string, attributes: Record<string, string> = {}): ElementHandle {
    return this.arena.createElement(tag, { attributes });
  }

  append(parent: ElementHandle, nodes: readonly INode[]): void {
    for (const node of nodes) {
      const child = this.convert(node);
      if (child !== undefined) {
        this.arena.appendChild(parent, child);
      }
    }
  }

  convert(node: INode): ElementHandle | undefined {
    if (!isSignificant(node)) return undefined;

    if (!isTag(node)) {
      return this.arena.createText(decodeEntities(node.value));
    }

    const name = node.name.toLowerCase();
    const handle = this.element(name, tagAttributes(node));

    if (name === 'style' || name === 'script') {
      const text = rawText(node.body ?? []);
      if (name === 'style') this.stylesheets.push(text);
      if (text.trim() !== '') {
        this.arena.appendChild(handle, this.arena.createText(text));
      }
      return handle;
    }

    this.append(handle, node.body ?? []);
    return handle;
  }
}

/**
 * Parse HTML text into an element tree. Comments, doctype and
 * whitespace-only text are dropped; entities in text and attribute values
 * are decoded.
 */
export function parseMarkup(html: string, options: MarkupOptions = {}): MarkupResult {
  const builder = new TreeBuilder();
  const topLevel = parseHtml(html).filter(isSignificant);
  const elements = topLevel.filter(isTag);

  let root: ElementHandle;
  if (options.fragment) {
    const only = topLevel.length === 1 ? elements[0] : undefined;
    const converted = only ? builder.convert(only) : undefined;
    if (converted !== undefined) {
      root = converted;
    } else {
      root = builder.element('div');
      builder.append(root, topLevel);
    }
  } else {
    const htmlTag = elements.find(tag => tag.name.toLowerCase() === 'html');
    if (htmlTag) {
      const converted = builder.convert(htmlTag);
      root = converted ?? builder.element('html');
    } else {
      root = builder.element('html');
      const body = builder.element('body');
      builder.arena.appendChild(root, body);
      builder.append(body, topLevel);
    }
  }

  builder.arena.setRoot(root);
  logger.debug('Parsed markup', { nodes: builder.arena.size, stylesheets: builder.stylesheets.length });
  return { tree: builder.arena, stylesheets: builder.stylesheets };
}
