import type {
  DrawingType,
  EraserType,
  FontSpec,
  LineStyle,
  PageType,
  Point,
  SidebarAction,
  StrokeToolType,
  ToolCapability,
  ToolSize,
  ToolType
} from "../types/contracts.js";

/*
 * Narrow views of the editor the bridge talks to. The editor owns all of this
 * state; the bridge only calls these operations on the script's behalf.
 */

export interface StrokeElement {
  readonly kind: "stroke";
  readonly id: string;
  readonly toolType: StrokeToolType;
  readonly points: readonly Point[];
  readonly width: number;
  readonly color: number;
  /** Fill opacity 0..255, or NO_FILL. */
  readonly fill: number;
  readonly lineStyle: LineStyle;
}

export interface TextElement {
  readonly kind: "text";
  readonly id: string;
  readonly text: string;
  getX(): number;
  getY(): number;
  getFont(): FontSpec;
  /** Scales about (x0, y0); with `restoreLineWidth` false the font size scales too. */
  scale(x0: number, y0: number, fx: number, fy: number, rotation: number, restoreLineWidth: boolean): void;
}

export interface ImageElement {
  readonly kind: "image";
  readonly id: string;
}

export type HostElement = StrokeElement | TextElement | ImageElement;

/** A stroke about to be handed to a layer. */
export type NewStroke = Omit<StrokeElement, "kind" | "id">;

export interface HostLayer {
  /** Undefined while the layer carries its default name. */
  getName(): string | undefined;
  isVisible(): boolean;
  isAnnotated(): boolean;
  getElements(): readonly HostElement[];
  addStroke(stroke: NewStroke): StrokeElement;
}

export interface HostPage {
  getWidth(): number;
  getHeight(): number;
  setSize(width: number, height: number): void;
  isAnnotated(): boolean;
  getBackgroundType(): PageType;
  /** Zero-based pdf page, or -1 when the background is not a pdf page. */
  getPdfPageNr(): number;
  setBackgroundPdfPageNr(pageNr: number): void;
  getBackgroundName(): string;
  setBackgroundName(name: string): void;
  /** Content layers, excluding the background layer. */
  getLayers(): readonly HostLayer[];
  getLayerCount(): number;
  /** 0 is the background, 1..n the content layers. */
  isLayerVisible(layerId: number): boolean;
  getSelectedLayerId(): number;
  /** The selected content layer; created on demand when the page has none. */
  getSelectedLayer(): HostLayer;
  firePageChanged(): void;
}

export interface PdfPageInfo {
  width: number;
  height: number;
}

export interface HostDocument {
  lock(): void;
  unlock(): void;
  getPageCount(): number;
  getPage(index: number): HostPage | undefined;
  indexOf(page: HostPage): number;
  setPageSize(page: HostPage, width: number, height: number): void;
  getPdfPageCount(): number;
  getPdfPage(index: number): PdfPageInfo | undefined;
  /** Empty when the document has no pdf background. */
  getPdfFilepath(): string;
}

export interface HostTool {
  readonly type: ToolType;
  hasCapability(capability: ToolCapability): boolean;
  getColor(): number;
  setColor(color: number): void;
  getSize(): ToolSize;
  getThickness(size: ToolSize): number;
  isFillEnabled(): boolean;
  getFillOpacity(): number;
  getDrawingType(): DrawingType;
  getLineStyle(): LineStyle;
}

export interface ToolHandler {
  /** Undefined while no tool is selected. */
  getActiveToolType(): ToolType | undefined;
  getTool(type: ToolType): HostTool;
  getEraserType(): EraserType;
}

export interface LayerController {
  actionPerformed(action: string): void;
  switchToLayer(layerId: number, updateVisibility: boolean): void;
  setLayerVisible(layerId: number, visible: boolean): void;
  setCurrentLayerName(name: string): void;
  getCurrentPageId(): number;
}

export interface SidebarToolbar {
  runAction(action: SidebarAction): void;
}

export interface ScrollHandler {
  scrollToPage(pageIndex: number): void;
}

export interface WindowLayout {
  scrollRelative(dx: number, dy: number): void;
  scrollAbs(x: number, y: number): void;
}

export interface PageBackgroundController {
  changeCurrentPageBackground(pageType: PageType): void;
}

export interface HostSettings {
  getDisplayDpi(): number;
  getFont(): FontSpec;
}

/**
 * Modal dialogs. Each call blocks the caller until the user answers;
 * `undefined` means the dialog was dismissed.
 */
export interface DialogProvider {
  showPluginMessage(pluginName: string, message: string, buttons: ReadonlyMap<number, string>): number;
  chooseSaveFile(suggestion: string): string | undefined;
  chooseOpenFile(filters: readonly string[]): string | undefined;
}

export interface HostControl {
  getDocument(): HostDocument;
  getCurrentPage(): HostPage | undefined;
  getCurrentPageNo(): number;
  getToolHandler(): ToolHandler;
  getLayerController(): LayerController;
  getSidebarToolbar(): SidebarToolbar;
  getScrollHandler(): ScrollHandler;
  getLayout(): WindowLayout;
  getPageBackgroundController(): PageBackgroundController;
  getSettings(): HostSettings;
  getDialogs(): DialogProvider;
  /** Runs a UI action as if triggered from the menu, persisting toggles. */
  actionPerformed(action: string, group: string, enabled: boolean): void;
  /** Notifies action listeners only; nothing is stored in the settings. */
  fireActionSelected(group: string, action: string): void;
  firePageSelected(pageIndex: number): void;
  firePageSizeChanged(pageIndex: number): void;
  toolColorChanged(): void;
  changeColorOfSelection(): void;
  clearSelectionEndText(): void;
}
