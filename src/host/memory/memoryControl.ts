import { TOOL_TYPES, type FontSpec, type PageType, type SidebarAction, type ToolType } from "../../types/contracts.js";
import { DomainError, StateError } from "../../utils/errors.js";
import type {
  HostControl,
  HostSettings,
  LayerController,
  PageBackgroundController,
  ScrollHandler,
  SidebarToolbar,
  WindowLayout
} from "../types.js";
import { MemoryLayer, type MemoryDocument, type MemoryPage } from "./memoryDocument.js";
import type { ScriptedDialogs } from "./memoryDialogs.js";
import type { MemoryToolHandler } from "./memoryTools.js";

/** Everything the editor would have reacted to, in order. */
export type HostEvent =
  | { type: "actionPerformed"; action: string; group: string; enabled: boolean }
  | { type: "actionSelected"; group: string; action: string }
  | { type: "layerAction"; action: string; page: number }
  | { type: "sidebarAction"; action: SidebarAction; page: number }
  | { type: "pageSelected"; page: number }
  | { type: "pageSizeChanged"; page: number }
  | { type: "pageChanged"; page: number }
  | { type: "backgroundChanged"; page: number; pageType: PageType }
  | { type: "scrolledToPage"; page: number }
  | { type: "scrolled"; x: number; y: number }
  | { type: "toolColorChanged"; tool: ToolType | undefined; color: number | undefined }
  | { type: "selectionRecolored"; color: number | undefined }
  | { type: "textEditingEnded" };

export class MemorySettings implements HostSettings {
  private readonly displayDpi: number;
  private readonly font: FontSpec;

  constructor(displayDpi: number, font: FontSpec) {
    this.displayDpi = displayDpi;
    this.font = { ...font };
  }

  getDisplayDpi(): number {
    return this.displayDpi;
  }

  getFont(): FontSpec {
    return { ...this.font };
  }
}

export interface MemoryControlOptions {
  document: MemoryDocument;
  currentPage: number;
  toolHandler: MemoryToolHandler;
  dialogs: ScriptedDialogs;
  settings: MemorySettings;
}

function toolForAction(action: string): ToolType | undefined {
  const name = action.replace(/^ACTION_TOOL_/, "").toLowerCase();
  return action.startsWith("ACTION_TOOL_") ? TOOL_TYPES.find((type) => type === name) : undefined;
}

/**
 * Headless editor. Keeps the document, the tools and the view position, and
 * records every notification in `events`.
 */
export class MemoryControl implements HostControl {
  readonly document: MemoryDocument;
  readonly toolHandler: MemoryToolHandler;
  readonly dialogs: ScriptedDialogs;
  readonly settings: MemorySettings;
  private currentPageIndex: number;
  private scroll = { x: 0, y: 0 };
  private readonly toggles = new Map<string, boolean>();
  private readonly log: HostEvent[] = [];
  private readonly detachers = new Map<MemoryPage, () => void>();

  constructor(options: MemoryControlOptions) {
    this.document = options.document;
    this.toolHandler = options.toolHandler;
    this.dialogs = options.dialogs;
    this.settings = options.settings;
    this.currentPageIndex = Math.min(Math.max(options.currentPage, 0), Math.max(this.document.getPageCount() - 1, 0));
    this.watchPages();
  }

  get events(): readonly HostEvent[] {
    return this.log;
  }

  /** Hands over the recorded events and empties the log. */
  drainEvents(): HostEvent[] {
    return this.log.splice(0);
  }

  get scrollPosition(): { x: number; y: number } {
    return { ...this.scroll };
  }

  isToggled(action: string): boolean | undefined {
    return this.toggles.get(action);
  }

  private record(event: HostEvent): void {
    this.log.push(event);
  }

  private watchPages(): void {
    for (let index = 0; index < this.document.getPageCount(); index += 1) {
      const page = this.document.getPage(index);
      if (page && !this.detachers.has(page)) {
        this.detachers.set(
          page,
          page.onChange((changed) => this.record({ type: "pageChanged", page: this.document.indexOf(changed) }))
        );
      }
    }
  }

  private selectPage(index: number): void {
    this.currentPageIndex = Math.min(Math.max(index, 0), Math.max(this.document.getPageCount() - 1, 0));
  }

  getDocument(): MemoryDocument {
    return this.document;
  }

  getCurrentPage(): MemoryPage | undefined {
    return this.document.getPage(this.currentPageIndex);
  }

  getCurrentPageNo(): number {
    return this.currentPageIndex;
  }

  getToolHandler(): MemoryToolHandler {
    return this.toolHandler;
  }

  getDialogs(): ScriptedDialogs {
    return this.dialogs;
  }

  getSettings(): MemorySettings {
    return this.settings;
  }

  getLayerController(): LayerController {
    return {
      actionPerformed: (action) => this.layerAction(action),
      switchToLayer: (layerId, updateVisibility) => this.switchToLayer(layerId, updateVisibility),
      setLayerVisible: (layerId, visible) => {
        this.getCurrentPage()?.setLayerVisible(layerId, visible);
      },
      setCurrentLayerName: (name) => this.setCurrentLayerName(name),
      getCurrentPageId: () => this.currentPageIndex
    };
  }

  getSidebarToolbar(): SidebarToolbar {
    return { runAction: (action) => this.sidebarAction(action) };
  }

  getScrollHandler(): ScrollHandler {
    return {
      scrollToPage: (pageIndex) => {
        this.selectPage(pageIndex);
        this.record({ type: "scrolledToPage", page: pageIndex });
      }
    };
  }

  getLayout(): WindowLayout {
    return {
      scrollRelative: (dx, dy) => {
        this.scroll = { x: this.scroll.x + dx, y: this.scroll.y + dy };
        this.record({ type: "scrolled", ...this.scroll });
      },
      scrollAbs: (x, y) => {
        this.scroll = { x, y };
        this.record({ type: "scrolled", x, y });
      }
    };
  }

  getPageBackgroundController(): PageBackgroundController {
    return {
      changeCurrentPageBackground: (pageType) => {
        const page = this.getCurrentPage();
        if (!page) {
          throw new StateError("No page!");
        }
        if (pageType.format === "pdf") {
          if (this.document.getPdfPageCount() === 0) {
            throw new StateError("Document has no pdf background");
          }
          page.setBackgroundPdfPageNr(Math.max(page.getPdfPageNr(), 0));
        } else {
          page.setBackgroundType(pageType);
        }
        this.record({ type: "backgroundChanged", page: this.currentPageIndex, pageType: page.getBackgroundType() });
      }
    };
  }

  actionPerformed(action: string, group: string, enabled: boolean): void {
    this.toggles.set(action, enabled);
    const tool = toolForAction(action);
    if (tool && enabled) {
      this.toolHandler.selectTool(tool);
    }
    this.record({ type: "actionPerformed", action, group, enabled });
  }

  fireActionSelected(group: string, action: string): void {
    this.record({ type: "actionSelected", group, action });
  }

  firePageSelected(pageIndex: number): void {
    this.selectPage(pageIndex);
    this.record({ type: "pageSelected", page: pageIndex });
  }

  firePageSizeChanged(pageIndex: number): void {
    this.record({ type: "pageSizeChanged", page: pageIndex });
  }

  toolColorChanged(): void {
    const tool = this.toolHandler.getActiveToolType();
    this.record({
      type: "toolColorChanged",
      tool,
      color: tool === undefined ? undefined : this.toolHandler.getTool(tool).getColor()
    });
  }

  changeColorOfSelection(): void {
    const tool = this.toolHandler.getActiveToolType();
    this.record({
      type: "selectionRecolored",
      color: tool === undefined ? undefined : this.toolHandler.getTool(tool).getColor()
    });
  }

  clearSelectionEndText(): void {
    this.record({ type: "textEditingEnded" });
  }

  private requirePage(): MemoryPage {
    const page = this.getCurrentPage();
    if (!page) {
      throw new StateError("No page!");
    }
    return page;
  }

  private setCurrentLayerName(name: string): void {
    const page = this.requirePage();
    const selected = page.getSelectedLayerId();
    if (selected === 0) {
      page.setBackgroundName(name);
      return;
    }
    const layer = page.getLayer(selected);
    if (layer) {
      layer.name = name;
    }
  }

  private switchToLayer(layerId: number, updateVisibility: boolean): void {
    const page = this.requirePage();
    page.selectLayer(layerId);
    if (updateVisibility) {
      for (let id = 1; id <= page.getLayerCount(); id += 1) {
        page.setLayerVisible(id, id <= layerId);
      }
      page.setLayerVisible(0, true);
    }
  }

  private layerAction(action: string): void {
    const page = this.requirePage();
    const selected = page.getSelectedLayerId();
    const count = page.getLayerCount();

    switch (action) {
      case "ACTION_NEW_LAYER":
        page.insertLayer(selected, new MemoryLayer());
        page.selectLayer(selected + 1);
        break;
      case "ACTION_DELETE_LAYER":
        if (selected > 0) {
          page.removeLayer(selected);
          page.selectLayer(selected - 1);
        }
        break;
      case "ACTION_MERGE_LAYER_DOWN": {
        const below = page.getLayer(selected - 1);
        const current = page.getLayer(selected);
        if (below && current) {
          below.absorb(current);
          page.removeLayer(selected);
          page.selectLayer(selected - 1);
        }
        break;
      }
      case "ACTION_MOVE_LAYER_UP":
        if (selected > 0 && selected < count) {
          page.swapLayers(selected, selected + 1);
          page.selectLayer(selected + 1);
        }
        break;
      case "ACTION_MOVE_LAYER_DOWN":
        if (selected > 1) {
          page.swapLayers(selected, selected - 1);
          page.selectLayer(selected - 1);
        }
        break;
      case "ACTION_GOTO_NEXT_LAYER":
        page.selectLayer(selected + 1);
        break;
      case "ACTION_GOTO_PREVIOUS_LAYER":
        page.selectLayer(selected - 1);
        break;
      case "ACTION_GOTO_TOP_LAYER":
        page.selectLayer(count);
        break;
      case "ACTION_RENAME_LAYER":
        // renaming needs a name from the user; scripts use setCurrentLayerName
        break;
      default:
        throw new DomainError(`${action} is not a layer action`, { action });
    }

    this.record({ type: "layerAction", action, page: this.currentPageIndex });
  }

  private sidebarAction(action: SidebarAction): void {
    const index = this.currentPageIndex;
    const page = this.requirePage();

    switch (action) {
      case "COPY":
        this.document.insertPage(index + 1, page.duplicate());
        this.selectPage(index + 1);
        break;
      case "DELETE":
        if (this.document.getPageCount() > 1) {
          this.document.removePage(index);
          this.detachers.get(page)?.();
          this.detachers.delete(page);
          this.selectPage(index);
        }
        break;
      case "MOVE_UP":
        if (index > 0) {
          this.document.swapPages(index, index - 1);
          this.selectPage(index - 1);
        }
        break;
      case "MOVE_DOWN":
        if (index < this.document.getPageCount() - 1) {
          this.document.swapPages(index, index + 1);
          this.selectPage(index + 1);
        }
        break;
      case "NEW_BEFORE":
        this.document.insertPage(index, page.cloneBlank());
        break;
      case "NEW_AFTER":
        this.document.insertPage(index + 1, page.cloneBlank());
        this.selectPage(index + 1);
        break;
    }

    this.watchPages();
    this.record({ type: "sidebarAction", action, page: index });
  }
}
