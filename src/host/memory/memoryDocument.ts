import { v4 as uuidv4 } from "uuid";
import type { FontSpec, LayerSeed, PageSeed, PageType } from "../../types/contracts.js";
import { StateError } from "../../utils/errors.js";
import type {
  HostDocument,
  HostElement,
  HostLayer,
  HostPage,
  NewStroke,
  PdfPageInfo,
  StrokeElement,
  TextElement
} from "../types.js";

export const DEFAULT_FONT: FontSpec = { name: "Sans", size: 12 };

export class MemoryTextElement implements TextElement {
  readonly kind = "text";
  readonly id: string;
  readonly text: string;
  private x: number;
  private y: number;
  private font: FontSpec;

  constructor(text: string, x: number, y: number, font: FontSpec = DEFAULT_FONT) {
    this.id = uuidv4();
    this.text = text;
    this.x = x;
    this.y = y;
    this.font = { ...font };
  }

  getX(): number {
    return this.x;
  }

  getY(): number {
    return this.y;
  }

  getFont(): FontSpec {
    return { ...this.font };
  }

  /** Text is never rotated; only the position and the font size scale. */
  scale(x0: number, y0: number, fx: number, fy: number, _rotation: number, restoreLineWidth: boolean): void {
    this.x = x0 + (this.x - x0) * fx;
    this.y = y0 + (this.y - y0) * fy;
    if (!restoreLineWidth) {
      this.font = { ...this.font, size: this.font.size * Math.sqrt(Math.abs(fx * fy)) };
    }
  }
}

export class MemoryLayer implements HostLayer {
  name?: string;
  private visible: boolean;
  private readonly elements: HostElement[] = [];

  constructor(name?: string, visible = true) {
    this.name = name;
    this.visible = visible;
  }

  static fromSeed(seed: LayerSeed): MemoryLayer {
    const layer = new MemoryLayer(seed.name, seed.visible);
    for (const text of seed.texts) {
      layer.addElement(new MemoryTextElement(text.text, text.x, text.y, text.font));
    }
    return layer;
  }

  getName(): string | undefined {
    return this.name;
  }

  isVisible(): boolean {
    return this.visible;
  }

  setVisible(visible: boolean): void {
    this.visible = visible;
  }

  isAnnotated(): boolean {
    return this.elements.length > 0;
  }

  getElements(): readonly HostElement[] {
    return this.elements;
  }

  addElement(element: HostElement): void {
    this.elements.push(element);
  }

  addStroke(stroke: NewStroke): StrokeElement {
    const element: StrokeElement = { kind: "stroke", id: uuidv4(), ...stroke, points: [...stroke.points] };
    this.elements.push(element);
    return element;
  }

  copy(): MemoryLayer {
    const layer = new MemoryLayer(this.name, this.visible);
    for (const element of this.elements) {
      if (element.kind === "text") {
        layer.addElement(new MemoryTextElement(element.text, element.getX(), element.getY(), element.getFont()));
      } else {
        layer.addElement({ ...element, id: uuidv4() });
      }
    }
    return layer;
  }

  /** Moves every element of `other` on top of this layer's elements. */
  absorb(other: MemoryLayer): void {
    this.elements.push(...other.elements);
    other.elements.length = 0;
  }
}

export type PageListener = (page: MemoryPage) => void;

export class MemoryPage implements HostPage {
  private width: number;
  private height: number;
  private background: PageType;
  private pdfPageNr: number;
  private backgroundName: string;
  private backgroundVisible = true;
  private readonly layers: MemoryLayer[];
  private selectedLayerId: number;
  private readonly listeners = new Set<PageListener>();

  constructor(width: number, height: number, background: PageType, layers: MemoryLayer[] = [new MemoryLayer()]) {
    this.width = width;
    this.height = height;
    this.background = { ...background };
    this.pdfPageNr = -1;
    this.backgroundName = "";
    this.layers = layers;
    this.selectedLayerId = layers.length;
  }

  static fromSeed(seed: PageSeed): MemoryPage {
    const page = new MemoryPage(
      seed.width,
      seed.height,
      { format: seed.format, config: seed.config },
      seed.layers.map((layer) => MemoryLayer.fromSeed(layer))
    );
    page.backgroundName = seed.backgroundName;
    if (seed.pdfPage !== undefined) {
      page.pdfPageNr = seed.pdfPage;
      page.background = { format: "pdf", config: "" };
    }
    if (seed.selectedLayer !== undefined) {
      page.selectLayer(Math.min(seed.selectedLayer, page.layers.length));
    }
    return page;
  }

  /** Blank page of the same size and background, without its content. */
  cloneBlank(): MemoryPage {
    const page = new MemoryPage(this.width, this.height, this.background);
    page.pdfPageNr = this.pdfPageNr;
    return page;
  }

  duplicate(): MemoryPage {
    const page = new MemoryPage(
      this.width,
      this.height,
      this.background,
      this.layers.map((layer) => layer.copy())
    );
    page.pdfPageNr = this.pdfPageNr;
    page.backgroundName = this.backgroundName;
    page.backgroundVisible = this.backgroundVisible;
    page.selectedLayerId = this.selectedLayerId;
    return page;
  }

  getWidth(): number {
    return this.width;
  }

  getHeight(): number {
    return this.height;
  }

  setSize(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  isAnnotated(): boolean {
    return this.layers.some((layer) => layer.isAnnotated());
  }

  getBackgroundType(): PageType {
    return { ...this.background };
  }

  setBackgroundType(pageType: PageType): void {
    this.background = { ...pageType };
    if (pageType.format !== "pdf") {
      this.pdfPageNr = -1;
    }
  }

  getPdfPageNr(): number {
    return this.background.format === "pdf" ? this.pdfPageNr : -1;
  }

  setBackgroundPdfPageNr(pageNr: number): void {
    this.pdfPageNr = pageNr;
    this.background = { format: "pdf", config: "" };
  }

  getBackgroundName(): string {
    return this.backgroundName;
  }

  setBackgroundName(name: string): void {
    this.backgroundName = name;
  }

  getLayers(): readonly MemoryLayer[] {
    return this.layers;
  }

  getLayerCount(): number {
    return this.layers.length;
  }

  /** Content layer with the given 1-based id; undefined for the background. */
  getLayer(layerId: number): MemoryLayer | undefined {
    return layerId >= 1 ? this.layers[layerId - 1] : undefined;
  }

  isLayerVisible(layerId: number): boolean {
    if (layerId === 0) {
      return this.backgroundVisible;
    }
    return this.getLayer(layerId)?.isVisible() ?? false;
  }

  setLayerVisible(layerId: number, visible: boolean): void {
    if (layerId === 0) {
      this.backgroundVisible = visible;
      return;
    }
    this.getLayer(layerId)?.setVisible(visible);
  }

  getSelectedLayerId(): number {
    return this.selectedLayerId;
  }

  selectLayer(layerId: number): void {
    this.selectedLayerId = Math.min(Math.max(layerId, 0), this.layers.length);
  }

  getSelectedLayer(): MemoryLayer {
    if (this.layers.length === 0) {
      this.layers.push(new MemoryLayer());
      this.selectedLayerId = 1;
    }
    // with the background selected, drawing goes to the lowest layer
    const index = Math.max(this.selectedLayerId, 1) - 1;
    return this.layers[index];
  }

  insertLayer(position: number, layer: MemoryLayer): void {
    this.layers.splice(position, 0, layer);
  }

  removeLayer(layerId: number): MemoryLayer | undefined {
    if (layerId < 1 || layerId > this.layers.length) {
      return undefined;
    }
    return this.layers.splice(layerId - 1, 1)[0];
  }

  swapLayers(first: number, second: number): void {
    const a = this.getLayer(first);
    const b = this.getLayer(second);
    if (a && b) {
      this.layers[first - 1] = b;
      this.layers[second - 1] = a;
    }
  }

  onChange(listener: PageListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  firePageChanged(): void {
    for (const listener of this.listeners) {
      listener(this);
    }
  }
}

export interface PdfBackground {
  filepath: string;
  pages: PdfPageInfo[];
}

export class MemoryDocument implements HostDocument {
  private readonly pages: MemoryPage[];
  private readonly pdf?: PdfBackground;
  private lockDepth = 0;

  constructor(pages: MemoryPage[], pdf?: PdfBackground) {
    this.pages = pages;
    this.pdf = pdf;
  }

  get isLocked(): boolean {
    return this.lockDepth > 0;
  }

  lock(): void {
    this.lockDepth += 1;
  }

  unlock(): void {
    if (this.lockDepth === 0) {
      throw new StateError("Document is not locked");
    }
    this.lockDepth -= 1;
  }

  getPageCount(): number {
    return this.pages.length;
  }

  getPage(index: number): MemoryPage | undefined {
    return index >= 0 ? this.pages[index] : undefined;
  }

  indexOf(page: HostPage): number {
    return this.pages.findIndex((candidate) => candidate === page);
  }

  setPageSize(page: HostPage, width: number, height: number): void {
    if (!this.isLocked) {
      throw new StateError("Page size changes need the document lock");
    }
    page.setSize(width, height);
  }

  insertPage(index: number, page: MemoryPage): void {
    this.pages.splice(index, 0, page);
  }

  removePage(index: number): MemoryPage | undefined {
    return this.pages.splice(index, 1)[0];
  }

  swapPages(first: number, second: number): void {
    const a = this.pages[first];
    const b = this.pages[second];
    if (a && b) {
      this.pages[first] = b;
      this.pages[second] = a;
    }
  }

  getPdfPageCount(): number {
    return this.pdf?.pages.length ?? 0;
  }

  getPdfPage(index: number): PdfPageInfo | undefined {
    return index >= 0 ? this.pdf?.pages[index] : undefined;
  }

  getPdfFilepath(): string {
    return this.pdf?.filepath ?? "";
  }
}
