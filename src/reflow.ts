// Reflow: cascade and layout of a whole document in one synchronous call

import { resolveStyles } from './cascade.ts';
import { StyleboxConfig } from './config/mod.ts';
import { Document } from './document.ts';
import { DiagnosticSink, ERROR_MESSAGES, ReflowError, type Diagnostic } from './errors.ts';
import { LayoutEngine } from './layout.ts';
import { LayoutTree } from './layout-tree.ts';
import { getLogger } from './logging.ts';
import type { ComputedStyle } from './properties.ts';
import { Stylesheet, parseStylesheetLenient, type StyleRule } from './stylesheet.ts';
import { TextMeasurer } from './text-measure.ts';
import type { ElementHandle, ElementState, ElementTree, Size } from './types.ts';

const logger = getLogger('Reflow');

export type StylesheetInput = string | Stylesheet | readonly StyleRule[];

export interface ReflowOptions {
  /** Defaults to the configured viewport */
  viewport?: Size;
  /** Layout passes; defaults to `layout.passes` */
  passes?: number;
  /** Interaction state; defaults to the document's */
  state?: ElementState;
  /** Apply the user-agent defaults (default true) */
  userAgentStyles?: boolean;
  textMeasurer?: TextMeasurer;
  rootFontSize?: number;
}

export interface ReflowResult {
  tree: LayoutTree;
  diagnostics: readonly Diagnostic[];
  styles: ReadonlyMap<ElementHandle, ComputedStyle>;
}

/**
 * Runs cascade and layout for one document and keeps the last published
 * tree. A failed run leaves the previous tree in place.
 */
export class Reflow {
  private _document: Document;
  private _current?: LayoutTree;
  private _running = false;
  private _count = 0;

  constructor(document: Document | ElementTree) {
    this._document = document instanceof Document ? document : new Document(document);
  }

  get document(): Document {
    return this._document;
  }

  /** Last successfully published tree */
  get current(): LayoutTree | undefined {
    return this._current;
  }

  get isRunning(): boolean {
    return this._running;
  }

  /** Completed runs */
  get count(): number {
    return this._count;
  }

  run(stylesheet: StylesheetInput, options: ReflowOptions = {}): ReflowResult {
    if (this._running) {
      throw new ReflowError(ERROR_MESSAGES.reentrantReflow());
    }

    this._running = true;
    try {
      const result = this._reflow(stylesheet, options);
      this._current = result.tree;
      this._count++;
      return result;
    } catch (error) {
      logger.error('Reflow failed; keeping previous layout', error instanceof Error ? error : undefined);
      throw error;
    } finally {
      this._running = false;
    }
  }

  private _reflow(stylesheet: StylesheetInput, options: ReflowOptions): ReflowResult {
    const startTime = performance.now();
    const config = StyleboxConfig.get();
    const sink = new DiagnosticSink();
    const tree = this._document.tree;

    const rules = this._collectRules(stylesheet, sink);
    const styles = resolveStyles(tree, rules, {
      userAgent: options.userAgentStyles ?? true,
      rootFontSize: options.rootFontSize ?? config.rootFontSize,
      state: options.state ?? this._document.state,
      diagnostics: sink,
    });

    const viewport = options.viewport ?? { width: config.viewportWidth, height: config.viewportHeight };
    const engine = new LayoutEngine(tree, styles, {
      passes: options.passes ?? config.layoutPasses,
      textMeasurer: options.textMeasurer ?? TextMeasurer.fromConfig(config),
    });
    const layout = engine.run(viewport);
    const layoutTree = new LayoutTree(tree, styles, layout.boxes, layout.textLines);

    const diagnostics = [
      ...this._document.diagnostics.items,
      ...(stylesheet instanceof Stylesheet ? stylesheet.diagnostics.items : []),
      ...sink.items,
    ];

    logger.debug('Reflow complete', {
      elements: layoutTree.size,
      rules: rules.length,
      passes: layout.passes,
      diagnostics: diagnostics.length,
      ms: Math.round((performance.now() - startTime) * 100) / 100,
    });

    return { tree: layoutTree, diagnostics, styles };
  }

  private _collectRules(stylesheet: StylesheetInput, sink: DiagnosticSink): readonly StyleRule[] {
    if (typeof stylesheet === 'string') {
      return parseStylesheetLenient(stylesheet, { diagnostics: sink });
    }
    if (stylesheet instanceof Stylesheet) {
      return stylesheet.rules;
    }
    return stylesheet;
  }
}

/**
 * One-shot reflow of a document against a viewport
 */
export function reflow(
  document: Document | ElementTree,
  stylesheet: StylesheetInput,
  viewport?: Size,
  options: ReflowOptions = {}
): ReflowResult {
  return new Reflow(document).run(stylesheet, viewport ? { ...options, viewport } : options);
}
