// Layout engine: block flow, inline flow, single-line flex
// Widths resolve top-down, heights bottom-up, in one recursive walk per pass.

import { traverseElements } from './element.ts';
import { getLogger } from './logging.ts';
import { INITIAL_VALUES, type ComputedStyle, type Display } from './properties.ts';
import { SizingModel, boxDimensions, globalSizingModel, type Box, type BoxEdges } from './sizing.ts';
import { TextMeasurer, collapseWhitespace } from './text-measure.ts';
import { isTextNode, type Element, type ElementHandle, type ElementTree, type Size } from './types.ts';
import { isPercentage, resolveLength, type LengthPercentage, type LengthPercentageAuto, type MaxSize } from './values.ts';

const logger = getLogger('LayoutEngine');

const SLOW_LAYOUT_MS = 20;

const FALLBACK_STYLE: ComputedStyle = Object.freeze({ ...INITIAL_VALUES, extensions: Object.freeze({}) });

export interface LayoutOptions {
  /**
   * Number of passes. Extra passes re-resolve percentage heights whose
   * containing block had an auto height, against that block's height from
   * the previous pass.
   */
  passes?: number;
  textMeasurer?: TextMeasurer;
  sizingModel?: SizingModel;
}

export interface LayoutResult {
  boxes: Map<ElementHandle, Box>;
  /** Wrapped lines of each text node */
  textLines: Map<ElementHandle, string[]>;
  /** Passes actually run */
  passes: number;
}

/** Sizes imposed by a parent layout mode (flex), in content-box px */
interface SizeOverride {
  contentWidth?: number;
  contentHeight?: number;
}

type WidthMode = 'fill' | 'shrink';

interface IntrinsicWidths {
  min: number;
  max: number;
}

interface LineItem {
  handle: ElementHandle;
  width: number;
  height: number;
}

interface LineBox {
  y: number;
  width: number;
  height: number;
  items: LineItem[];
}

/** A flex item with its resolved sizes */
interface FlexItem {
  element: Element;
  style: ComputedStyle;
  edges: BoxEdges;
  flexGrow: number;
  flexShrink: number;
  baseSize: number;
  finalMain: number;
  crossSize: number;
  explicitCross: boolean;
  alignSelf: 'stretch' | 'flex-start' | 'flex-end' | 'center';
  mainChrome: number;
  mainMargin: number;
  crossChrome: number;
  crossMargin: number;
  minMain: number;
  maxMain: number;
  minCross: number;
  maxCross: number;
}

export function isInlineLevel(display: Display): boolean {
  return display === 'inline' || display === 'inline-block' || display === 'inline-flex';
}

export function isFlexContainer(display: Display): boolean {
  return display === 'flex' || display === 'inline-flex';
}

/** min beats max */
function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class LayoutEngine {
  private _tree: ElementTree;
  private _styles: ReadonlyMap<ElementHandle, ComputedStyle>;
  private _sizingModel: SizingModel;
  private _textMeasurer: TextMeasurer;
  private _passes: number;

  // Per-pass state
  private _boxes = new Map<ElementHandle, Box>();
  private _textLines = new Map<ElementHandle, string[]>();
  private _previousBoxes?: ReadonlyMap<ElementHandle, Box>;
  private _percentAgainstAuto = 0;
  private _intrinsicCache = new Map<ElementHandle, IntrinsicWidths>();
  private _heightCache = new Map<ElementHandle, { width: number; cbHeight: number | undefined; height: number }>();

  constructor(
    tree: ElementTree,
    styles: ReadonlyMap<ElementHandle, ComputedStyle>,
    options: LayoutOptions = {}
  ) {
    this._tree = tree;
    this._styles = styles;
    this._sizingModel = options.sizingModel ?? globalSizingModel;
    this._textMeasurer = options.textMeasurer ?? new TextMeasurer();
    this._passes = Math.max(1, Math.floor(options.passes ?? 1));
  }

  get boxes(): ReadonlyMap<ElementHandle, Box> {
    return this._boxes;
  }

  get textLines(): ReadonlyMap<ElementHandle, string[]> {
    return this._textLines;
  }

  /**
   * Lay out `element` and its descendants with the top-left of its margin
   * box at the origin. Boxes land in {@link boxes}.
   */
  layout(element: Element, containingBlockWidth: number, containingBlockHeight: number): Box {
    return this._layoutElement(element, 0, 0, Math.max(0, containingBlockWidth), Math.max(0, containingBlockHeight), 'fill');
  }

  /**
   * Lay out the whole tree against a viewport, running up to the configured
   * number of passes.
   */
  run(viewport: Size): LayoutResult {
    const startTime = performance.now();
    const root = this._tree.get(this._tree.root);
    let pass = 0;

    this._previousBoxes = undefined;
    while (pass < this._passes) {
      pass++;
      this._resetPass();
      this.layout(root, viewport.width, viewport.height);

      if (this._percentAgainstAuto === 0) break;
      if (this._previousBoxes && this._sameGeometry(this._previousBoxes, this._boxes)) break;
      if (pass < this._passes) {
        logger.debug(`Layout pass ${pass} left ${this._percentAgainstAuto} percentage heights against auto`);
      }
      this._previousBoxes = this._boxes;
    }

    const totalTime = performance.now() - startTime;
    if (totalTime > SLOW_LAYOUT_MS) {
      logger.warn(`Slow layout detected: ${totalTime.toFixed(2)}ms`, { elements: this._boxes.size, passes: pass });
    } else if (logger.isTraceEnabled()) {
      logger.trace(`Layout completed in ${totalTime.toFixed(2)}ms`, { elements: this._boxes.size, passes: pass });
    }

    return { boxes: this._boxes, textLines: this._textLines, passes: pass };
  }

  private _resetPass(): void {
    this._boxes = new Map();
    this._textLines = new Map();
    this._percentAgainstAuto = 0;
    this._intrinsicCache.clear();
    this._heightCache.clear();
  }

  private _sameGeometry(a: ReadonlyMap<ElementHandle, Box>, b: ReadonlyMap<ElementHandle, Box>): boolean {
    if (a.size !== b.size) return false;
    for (const [handle, box] of b) {
      const other = a.get(handle);
      if (!other) return false;
      const m1 = box.margin;
      const m2 = other.margin;
      if (m1.x !== m2.x || m1.y !== m2.y || m1.width !== m2.width || m1.height !== m2.height) return false;
    }
    return true;
  }

  private _style(element: Element): ComputedStyle {
    return this._styles.get(element.handle) ?? FALLBACK_STYLE;
  }

  // Size resolution

  private _specifiedWidth(style: ComputedStyle, edges: BoxEdges, cbWidth: number): number | undefined {
    if (style.width === 'auto') return undefined;
    return this._sizingModel.contentWidthFromSpecified(resolveLength(style.width, cbWidth), style, edges);
  }

  /**
   * Base a percentage height resolves against. An auto containing block
   * counts as 0 unless an earlier pass measured it.
   */
  private _percentBase(element: Element, cbHeight: number | undefined): number {
    if (cbHeight !== undefined) return cbHeight;
    this._percentAgainstAuto++;
    const previous = element.parent !== undefined ? this._previousBoxes?.get(element.parent) : undefined;
    return previous ? previous.content.height : 0;
  }

  private _specifiedHeight(
    element: Element,
    style: ComputedStyle,
    edges: BoxEdges,
    cbHeight: number | undefined
  ): number | undefined {
    const height = style.height;
    if (height === 'auto') return undefined;
    const px = typeof height === 'number' ? height : resolveLength(height, this._percentBase(element, cbHeight));
    return this._sizingModel.contentHeightFromSpecified(px, style, edges);
  }

  private _minSize(value: LengthPercentage, base: number | undefined): number {
    if (isPercentage(value) && base === undefined) return 0;
    return Math.max(0, resolveLength(value, base ?? 0));
  }

  private _maxSize(value: MaxSize, base: number | undefined): number {
    if (value === 'none' || (isPercentage(value) && base === undefined)) return Infinity;
    return Math.max(0, resolveLength(value, base ?? 0));
  }

  /** Clamp a content width by min-/max-width, read the way box-sizing says */
  private _clampWidth(contentWidth: number, style: ComputedStyle, edges: BoxEdges, cbWidth: number): number {
    const chrome = style.boxSizing === 'border-box' ? this._sizingModel.horizontalChrome(edges) : 0;
    const min = this._minSize(style.minWidth, cbWidth) - chrome;
    const max = this._maxSize(style.maxWidth, cbWidth) - chrome;
    return Math.max(0, clamp(contentWidth, min, max));
  }

  private _clampHeight(contentHeight: number, style: ComputedStyle, edges: BoxEdges, cbHeight: number | undefined): number {
    const chrome = style.boxSizing === 'border-box' ? this._sizingModel.verticalChrome(edges) : 0;
    const min = this._minSize(style.minHeight, cbHeight) - chrome;
    const max = this._maxSize(style.maxHeight, cbHeight) - chrome;
    return Math.max(0, clamp(contentHeight, min, max));
  }

  // Element layout

  private _layoutElement(
    element: Element,
    x: number,
    y: number,
    cbWidth: number,
    cbHeight: number | undefined,
    mode: WidthMode,
    override: SizeOverride = {}
  ): Box {
    const style = this._style(element);

    if (style.display === 'none') {
      return this._hide(element, x, y);
    }
    if (isTextNode(element)) {
      return this._layoutText(element, style, x, y, override.contentWidth ?? cbWidth, override);
    }

    const sizing = this._sizingModel;
    const resolved = sizing.resolveEdges(style, cbWidth);
    let edges = resolved.edges;
    const autoMargins = resolved.autoMargins;
    const chromeH = sizing.horizontalChrome(edges);

    // Width, top-down
    let contentWidth: number;
    if (override.contentWidth !== undefined) {
      contentWidth = Math.max(0, override.contentWidth);
    } else {
      const available = cbWidth - edges.margin.horizontal - chromeH;
      const specified = this._specifiedWidth(style, edges, cbWidth);
      const width = specified ?? (mode === 'fill' ? available : this._shrinkToFit(element, available));
      contentWidth = this._clampWidth(width, style, edges, cbWidth);

      if (mode === 'fill' && (autoMargins.left || autoMargins.right)) {
        const margin = edges.margin;
        const used = contentWidth + chromeH +
          (autoMargins.left ? 0 : margin.left) + (autoMargins.right ? 0 : margin.right);
        const free = Math.max(0, cbWidth - used);
        const left = autoMargins.left ? (autoMargins.right ? free / 2 : free) : margin.left;
        const right = autoMargins.right ? (autoMargins.left ? free / 2 : free) : margin.right;
        edges = { ...edges, margin: boxDimensions(margin.top, right, margin.bottom, left) };
      }
    }

    // Height known up front only when specified or imposed
    let definiteHeight = override.contentHeight ?? this._specifiedHeight(element, style, edges, cbHeight);
    if (definiteHeight !== undefined && override.contentHeight === undefined) {
      definiteHeight = this._clampHeight(definiteHeight, style, edges, cbHeight);
    }

    const contentX = x + edges.margin.left + edges.border.left + edges.padding.left;
    const contentY = y + edges.margin.top + edges.border.top + edges.padding.top;

    const autoHeight = isFlexContainer(style.display)
      ? this._layoutFlex(element, style, contentX, contentY, contentWidth, definiteHeight)
      : this._layoutFlow(element, style, contentX, contentY, contentWidth, definiteHeight);

    // Height, bottom-up
    const contentHeight = definiteHeight ?? this._clampHeight(autoHeight, style, edges, cbHeight);

    const box = sizing.buildBox(x, y, contentWidth, contentHeight, edges);
    this._boxes.set(element.handle, box);

    if (style.position === 'relative') {
      this._applyRelativeOffset(element, style, cbWidth, cbHeight);
    }

    return box;
  }

  /**
   * Shift an element and its subtree by its top/left (or bottom/right)
   * offsets. Flow positions of siblings are unaffected.
   */
  private _applyRelativeOffset(element: Element, style: ComputedStyle, cbWidth: number, cbHeight: number | undefined): void {
    const offset = (value: LengthPercentageAuto, base: number): number | undefined =>
      value === 'auto' ? undefined : resolveLength(value, base);

    const dx = offset(style.left, cbWidth) ?? -(offset(style.right, cbWidth) ?? 0);
    const dy = offset(style.top, cbHeight ?? 0) ?? -(offset(style.bottom, cbHeight ?? 0) ?? 0);
    this._translateSubtree(element, dx, dy);
  }

  private _translateSubtree(element: Element, dx: number, dy: number): void {
    if (dx === 0 && dy === 0) return;
    traverseElements(this._tree, (node) => {
      const box = this._boxes.get(node.handle);
      if (box) {
        this._boxes.set(node.handle, this._sizingModel.translateBox(box, dx, dy));
      }
    }, element.handle);
  }

  /** Zero-size boxes at (x, y) for an element and everything under it */
  private _hide(element: Element, x: number, y: number): Box {
    const empty = this._sizingModel.emptyBox(x, y);
    traverseElements(this._tree, (node) => {
      this._boxes.set(node.handle, empty);
      if (isTextNode(node)) this._textLines.set(node.handle, []);
    }, element.handle);
    return empty;
  }

  private _layoutText(
    element: Element,
    style: ComputedStyle,
    x: number,
    y: number,
    maxWidth: number,
    override: SizeOverride = {}
  ): Box {
    const text = collapseWhitespace(element.text ?? '');
    const measurement = this._textMeasurer.measure(text, style, Math.max(0, maxWidth));
    const width = override.contentWidth ?? measurement.width;
    const height = override.contentHeight ?? measurement.height;
    const { edges } = this._sizingModel.resolveEdges(style, 0);
    const box = this._sizingModel.buildBox(x, y, width, height, edges);
    this._boxes.set(element.handle, box);
    this._textLines.set(element.handle, measurement.lines);
    return box;
  }

  // Intrinsic sizes

  /** shrink-to-fit: min(max(min-content, available), max-content) */
  private _shrinkToFit(element: Element, available: number): number {
    const { min, max } = this._intrinsicWidths(element);
    return Math.min(Math.max(min, available), max);
  }

  /** Min- and max-content widths of an element's content box */
  private _intrinsicWidths(element: Element): IntrinsicWidths {
    const cached = this._intrinsicCache.get(element.handle);
    if (cached) return cached;

    const style = this._style(element);
    let result: IntrinsicWidths;

    if (style.display === 'none') {
      result = { min: 0, max: 0 };
    } else if (isTextNode(element)) {
      const text = element.text ?? '';
      result = {
        min: this._textMeasurer.minContentWidth(text, style),
        max: this._textMeasurer.maxContentWidth(text, style),
      };
    } else {
      const children = this._tree.childrenOf(element).filter((child) => this._style(child).display !== 'none');
      const contributions = children.map((child) => this._outerIntrinsicWidths(child));

      if (isFlexContainer(style.display) && !style.flexDirection.startsWith('column')) {
        const gaps = style.columnGap * Math.max(0, children.length - 1);
        result = {
          min: contributions.reduce((sum, c) => sum + c.min, 0) + gaps,
          max: contributions.reduce((sum, c) => sum + c.max, 0) + gaps,
        };
      } else if (isFlexContainer(style.display)) {
        result = {
          min: contributions.reduce((widest, c) => Math.max(widest, c.min), 0),
          max: contributions.reduce((widest, c) => Math.max(widest, c.max), 0),
        };
      } else {
        // Inline runs sit side by side; block children stack
        let max = 0;
        let run = 0;
        children.forEach((child, i) => {
          if (isTextNode(child) || isInlineLevel(this._style(child).display)) {
            run += contributions[i].max;
          } else {
            max = Math.max(max, run, contributions[i].max);
            run = 0;
          }
        });
        max = Math.max(max, run);
        const min = contributions.reduce((widest, c) => Math.max(widest, c.min), 0);
        result = { min, max };
      }
    }

    this._intrinsicCache.set(element.handle, result);
    return result;
  }

  /** Margin-box contribution of a child to its parent's intrinsic widths */
  private _outerIntrinsicWidths(element: Element): IntrinsicWidths {
    const style = this._style(element);
    const { edges } = this._sizingModel.resolveEdges(style, 0);
    const outer = this._sizingModel.horizontalChrome(edges) + edges.margin.horizontal;

    let inner: IntrinsicWidths;
    if (typeof style.width === 'number') {
      const width = this._sizingModel.contentWidthFromSpecified(style.width, style, edges);
      inner = { min: width, max: width };
    } else {
      inner = this._intrinsicWidths(element);
    }

    const clampInner = (value: number) => this._clampWidth(value, style, edges, 0);
    return { min: clampInner(inner.min) + outer, max: clampInner(inner.max) + outer };
  }

  /** Auto content height of an element laid out at a given content width */
  private _measureHeight(element: Element, contentWidth: number, cbWidth: number, cbHeight: number | undefined): number {
    const cached = this._heightCache.get(element.handle);
    if (cached && cached.width === contentWidth && cached.cbHeight === cbHeight) {
      return cached.height;
    }
    const box = this._layoutElement(element, 0, 0, cbWidth, cbHeight, 'shrink', { contentWidth });
    this._heightCache.set(element.handle, { width: contentWidth, cbHeight, height: box.content.height });
    return box.content.height;
  }

  // Block and inline flow

  /**
   * Stack block-level children; run inline-level children into lines.
   * Returns the content height used.
   */
  private _layoutFlow(
    element: Element,
    style: ComputedStyle,
    contentX: number,
    contentY: number,
    contentWidth: number,
    contentHeight: number | undefined
  ): number {
    let cursorY = contentY;
    let lines: LineBox[] = [];

    const currentLine = (): LineBox => {
      const last = lines[lines.length - 1];
      if (last) return last;
      const line: LineBox = { y: cursorY, width: 0, height: 0, items: [] };
      lines.push(line);
      return line;
    };
    const breakLine = (line: LineBox): LineBox => {
      const next: LineBox = { y: line.y + line.height, width: 0, height: 0, items: [] };
      lines.push(next);
      return next;
    };
    const closeRun = () => {
      if (lines.length === 0) return;
      this._alignLines(lines, style, contentWidth);
      const last = lines[lines.length - 1];
      cursorY = last.y + last.height;
      lines = [];
    };

    for (const child of this._tree.childrenOf(element)) {
      const childStyle = this._style(child);

      if (childStyle.display === 'none') {
        this._hide(child, contentX, contentY);
        continue;
      }

      if (isTextNode(child)) {
        const text = collapseWhitespace(child.text ?? '');
        if (text === '') {
          this._layoutText(child, childStyle, contentX, cursorY, contentWidth);
          continue;
        }
        let line = currentLine();
        const natural = this._textMeasurer.measureWidth(text, childStyle);
        if (line.items.length > 0 && line.width + natural > contentWidth) {
          line = breakLine(line);
        }
        const box = this._layoutText(child, childStyle, contentX + line.width, line.y, contentWidth - line.width);
        this._addToLine(line, child.handle, box);
        continue;
      }

      if (isInlineLevel(childStyle.display)) {
        let line = currentLine();
        const box = this._layoutElement(child, contentX + line.width, line.y, contentWidth, contentHeight, 'shrink');
        if (line.items.length > 0 && line.width + box.margin.width > contentWidth) {
          line = breakLine(line);
          this._translateSubtree(child, contentX - box.margin.x, line.y - box.margin.y);
        }
        this._addToLine(line, child.handle, box);
        continue;
      }

      closeRun();
      const box = this._layoutElement(child, contentX, cursorY, contentWidth, contentHeight, 'fill');
      cursorY += box.margin.height;
    }

    closeRun();
    return cursorY - contentY;
  }

  private _addToLine(line: LineBox, handle: ElementHandle, box: Box): void {
    line.items.push({ handle, width: box.margin.width, height: box.margin.height });
    line.width += box.margin.width;
    line.height = Math.max(line.height, box.margin.height);
  }

  /** Apply text-align to each finished line */
  private _alignLines(lines: LineBox[], style: ComputedStyle, contentWidth: number): void {
    const factor = style.textAlign === 'center' ? 0.5 : style.textAlign === 'right' ? 1 : 0;
    if (factor === 0) return;
    for (const line of lines) {
      const offset = (contentWidth - line.width) * factor;
      if (offset <= 0) continue;
      for (const item of line.items) {
        this._translateSubtree(this._tree.get(item.handle), offset, 0);
      }
    }
  }

  // Flex

  private _layoutFlex(
    element: Element,
    style: ComputedStyle,
    contentX: number,
    contentY: number,
    contentWidth: number,
    contentHeight: number | undefined
  ): number {
    const traceEnabled = logger.isTraceEnabled();
    const flexStartTime = traceEnabled ? performance.now() : 0;

    const isRow = style.flexDirection === 'row' || style.flexDirection === 'row-reverse';
    const reverse = style.flexDirection.endsWith('-reverse');
    const gap = isRow ? style.columnGap : style.rowGap;
    const mainAvailable = isRow ? contentWidth : contentHeight;
    const crossAvailable = isRow ? contentHeight : contentWidth;

    const items: FlexItem[] = [];
    for (const child of this._tree.childrenOf(element)) {
      const childStyle = this._style(child);
      if (childStyle.display === 'none') {
        this._hide(child, contentX, contentY);
        continue;
      }
      items.push(this._createFlexItem(child, childStyle, style, isRow, contentWidth, contentHeight));
    }

    if (items.length === 0) return 0;

    // Resolve flexible lengths
    const totalGaps = gap * (items.length - 1);
    const totalOuter = items.reduce((sum, item) => sum + item.finalMain + item.mainChrome + item.mainMargin, 0);
    const freeSpace = mainAvailable === undefined ? 0 : mainAvailable - totalOuter - totalGaps;
    if (freeSpace !== 0) {
      this._resolveFlexibleLengths(items, freeSpace);
    }

    // Cross sizes
    if (isRow) {
      for (const item of items) {
        if (item.explicitCross) continue;
        if (item.alignSelf === 'stretch' && crossAvailable !== undefined) {
          item.crossSize = crossAvailable - item.crossChrome - item.crossMargin;
        } else {
          item.crossSize = this._measureHeight(item.element, item.finalMain, contentWidth, contentHeight);
        }
        item.crossSize = clamp(item.crossSize, item.minCross, item.maxCross);
      }
    }

    const lineCross = crossAvailable ??
      items.reduce((tallest, item) => Math.max(tallest, item.crossSize + item.crossChrome + item.crossMargin), 0);

    for (const item of items) {
      if (item.alignSelf === 'stretch' && !item.explicitCross) {
        item.crossSize = clamp(lineCross - item.crossChrome - item.crossMargin, item.minCross, item.maxCross);
      }
      item.crossSize = Math.max(0, item.crossSize);
    }

    // Position
    const used = items.reduce((sum, item) => sum + item.finalMain + item.mainChrome + item.mainMargin, 0) + totalGaps;
    const mainSize = mainAvailable ?? used;
    const remaining = mainSize - used;
    let position = 0;
    let between = 0;

    switch (style.justifyContent) {
      case 'flex-end':
        position = remaining;
        break;
      case 'center':
        position = remaining / 2;
        break;
      case 'space-between':
        between = items.length > 1 && remaining > 0 ? remaining / (items.length - 1) : 0;
        break;
      case 'space-around':
        between = remaining > 0 ? remaining / items.length : 0;
        position = between / 2;
        break;
      case 'space-evenly':
        between = remaining > 0 ? remaining / (items.length + 1) : 0;
        position = between;
        break;
      case 'flex-start':
      default:
        position = 0;
    }

    for (const item of items) {
      const outerMain = item.finalMain + item.mainChrome + item.mainMargin;
      const outerCross = item.crossSize + item.crossChrome + item.crossMargin;
      const mainOffset = reverse ? mainSize - position - outerMain : position;

      let crossOffset = 0;
      if (item.alignSelf === 'flex-end') crossOffset = lineCross - outerCross;
      else if (item.alignSelf === 'center') crossOffset = (lineCross - outerCross) / 2;

      const x = contentX + (isRow ? mainOffset : crossOffset);
      const y = contentY + (isRow ? crossOffset : mainOffset);
      const override: SizeOverride = isRow
        ? { contentWidth: item.finalMain, contentHeight: item.crossSize }
        : { contentWidth: item.crossSize, contentHeight: item.finalMain };

      this._layoutElement(item.element, x, y, contentWidth, contentHeight, 'shrink', override);
      position += outerMain + gap + between;
    }

    if (traceEnabled) {
      logger.trace(`Flexbox layout completed in ${(performance.now() - flexStartTime).toFixed(2)}ms`, {
        items: items.length,
        mainSize,
        lineCross,
      });
    }

    return isRow ? lineCross : used;
  }

  /**
   * Distribute free space by flex-grow (or take overflow away by
   * flex-shrink), freezing items that hit their min/max and handing what
   * they could not take to the rest, until no item is newly frozen.
   */
  private _resolveFlexibleLengths(items: FlexItem[], freeSpace: number): void {
    const growing = freeSpace > 0;
    const factor = (item: FlexItem) => (growing ? item.flexGrow : item.flexShrink);
    const hypothetical = items.map(item => item.finalMain);
    const frozen = items.map(item => factor(item) === 0);

    for (;;) {
      let remaining = freeSpace;
      let totalFactor = 0;
      items.forEach((item, i) => {
        if (frozen[i]) remaining -= item.finalMain - hypothetical[i];
        else totalFactor += factor(item);
      });
      if (totalFactor === 0) return;

      let newlyFrozen = 0;
      items.forEach((item, i) => {
        if (frozen[i]) return;
        const target = hypothetical[i] + (factor(item) / totalFactor) * remaining;
        item.finalMain = clamp(target, item.minMain, item.maxMain);
        if (item.finalMain !== target) {
          frozen[i] = true;
          newlyFrozen++;
        }
      });
      if (newlyFrozen === 0) return;
    }
  }

  private _createFlexItem(
    child: Element,
    childStyle: ComputedStyle,
    containerStyle: ComputedStyle,
    isRow: boolean,
    contentWidth: number,
    contentHeight: number | undefined
  ): FlexItem {
    const sizing = this._sizingModel;
    const { edges } = sizing.resolveEdges(childStyle, contentWidth);
    const mainAvailable = isRow ? contentWidth : contentHeight;
    const crossAvailable = isRow ? contentHeight : contentWidth;

    const mainChrome = isRow ? sizing.horizontalChrome(edges) : sizing.verticalChrome(edges);
    const crossChrome = isRow ? sizing.verticalChrome(edges) : sizing.horizontalChrome(edges);
    const mainMargin = isRow ? edges.margin.horizontal : edges.margin.vertical;
    const crossMargin = isRow ? edges.margin.vertical : edges.margin.horizontal;

    const toContentMain = (px: number) => isRow
      ? sizing.contentWidthFromSpecified(px, childStyle, edges)
      : sizing.contentHeightFromSpecified(px, childStyle, edges);
    const toContentCross = (px: number) => isRow
      ? sizing.contentHeightFromSpecified(px, childStyle, edges)
      : sizing.contentWidthFromSpecified(px, childStyle, edges);

    const mainProperty = isRow ? childStyle.width : childStyle.height;
    const crossProperty = isRow ? childStyle.height : childStyle.width;
    const definite = (value: LengthPercentageAuto, base: number | undefined): number | undefined => {
      if (value === 'auto') return undefined;
      if (typeof value === 'number') return value;
      return resolveLength(value, this._percentBase(child, base));
    };

    const alignSelf = childStyle.alignSelf === 'auto' ? containerStyle.alignItems : childStyle.alignSelf;
    const textChild = isTextNode(child);

    // Cross size: known now for columns, after main sizing for rows
    const explicitCrossPx = textChild ? undefined : definite(crossProperty, crossAvailable);
    const explicitCross = explicitCrossPx !== undefined;
    const minCrossBase = isRow ? contentHeight : contentWidth;
    const crossChromeForMinMax = childStyle.boxSizing === 'border-box' ? crossChrome : 0;
    const minCross = this._minSize(isRow ? childStyle.minHeight : childStyle.minWidth, minCrossBase) - crossChromeForMinMax;
    const maxCross = this._maxSize(isRow ? childStyle.maxHeight : childStyle.maxWidth, minCrossBase) - crossChromeForMinMax;

    let crossSize = explicitCrossPx !== undefined ? toContentCross(explicitCrossPx) : 0;
    if (!isRow && !explicitCross) {
      const available = contentWidth - crossChrome - crossMargin;
      crossSize = alignSelf === 'stretch' ? available : this._shrinkToFit(child, available);
    }
    if (!isRow) {
      crossSize = clamp(crossSize, minCross, maxCross);
    }

    // Base size: flex-basis, else the main size property, else content
    let baseSize: number;
    const basis = textChild ? 'auto' : childStyle.flexBasis;
    const basisPx = basis === 'auto' ? undefined
      : typeof basis === 'number' ? basis
      : mainAvailable !== undefined ? resolveLength(basis, mainAvailable) : undefined;
    const mainPx = textChild ? undefined : definite(mainProperty, mainAvailable);

    if (basisPx !== undefined) {
      baseSize = toContentMain(basisPx);
    } else if (mainPx !== undefined) {
      baseSize = toContentMain(mainPx);
    } else if (isRow) {
      baseSize = this._intrinsicWidths(child).max;
    } else {
      baseSize = this._measureHeight(child, crossSize, contentWidth, contentHeight);
    }

    const mainChromeForMinMax = childStyle.boxSizing === 'border-box' ? mainChrome : 0;
    const minMain = this._minSize(isRow ? childStyle.minWidth : childStyle.minHeight, mainAvailable) - mainChromeForMinMax;
    const maxMain = this._maxSize(isRow ? childStyle.maxWidth : childStyle.maxHeight, mainAvailable) - mainChromeForMinMax;

    return {
      element: child,
      style: childStyle,
      edges,
      flexGrow: childStyle.flexGrow,
      flexShrink: childStyle.flexShrink,
      baseSize,
      finalMain: clamp(baseSize, minMain, maxMain),
      crossSize,
      explicitCross,
      alignSelf,
      mainChrome,
      mainMargin,
      crossChrome,
      crossMargin,
      minMain: Math.max(0, minMain),
      maxMain,
      minCross: Math.max(0, minCross),
      maxCross,
    };
  }
}

/**
 * Lay out a styled tree against a viewport
 */
export function layoutTree(
  tree: ElementTree,
  styles: ReadonlyMap<ElementHandle, ComputedStyle>,
  viewport: Size,
  options: LayoutOptions = {}
): LayoutResult {
  return new LayoutEngine(tree, styles, options).run(viewport);
}
