import { describe, expect, it } from "vitest";
import { MemoryDocument, MemoryPage, createMemoryHost } from "../../src/host/memory/index.js";
import { StateError } from "../../src/utils/errors.js";

function layerNames(page: MemoryPage | undefined): Array<string | undefined> {
  return page ? page.getLayers().map((layer) => layer.getName()) : [];
}

describe("memory host seeding", () => {
  it("builds pages from a seed", () => {
    const control = createMemoryHost({
      pages: [{ width: 10, height: 20, layers: [{ name: "A" }, { name: "B" }], selectedLayer: 7 }, {}],
      currentPage: 5
    });

    const first = control.getDocument().getPage(0);
    expect(control.getDocument().getPageCount()).toBe(2);
    expect(control.getCurrentPageNo()).toBe(1);
    expect(layerNames(first)).toEqual(["A", "B"]);
    expect(first?.getSelectedLayerId()).toBe(2);
  });

  it("rejects seeds without pages", () => {
    expect(() => createMemoryHost({ pages: [] })).toThrow();
  });
});

describe("memory document", () => {
  it("only resizes pages under the lock", () => {
    const page = new MemoryPage(10, 10, { format: "plain", config: "" });
    const document = new MemoryDocument([page]);

    expect(() => document.setPageSize(page, 20, 20)).toThrow(StateError);
    expect(() => document.unlock()).toThrow("Document is not locked");

    document.lock();
    document.setPageSize(page, 20, 30);
    document.unlock();
    expect([page.getWidth(), page.getHeight()]).toEqual([20, 30]);
  });

  it("drops the pdf page number with a non-pdf background", () => {
    const page = new MemoryPage(10, 10, { format: "plain", config: "" });
    page.setBackgroundPdfPageNr(3);
    expect(page.getPdfPageNr()).toBe(3);

    page.setBackgroundType({ format: "ruled", config: "" });
    expect(page.getPdfPageNr()).toBe(-1);
  });
});

describe("memory layer actions", () => {
  it("reorders, merges and deletes layers", () => {
    const control = createMemoryHost({ pages: [{ layers: [{ name: "A" }, { name: "B" }, { name: "C" }], selectedLayer: 2 }] });
    const layers = control.getLayerController();
    const page = control.getCurrentPage();

    layers.actionPerformed("ACTION_MOVE_LAYER_UP");
    expect(layerNames(page)).toEqual(["A", "C", "B"]);
    expect(page?.getSelectedLayerId()).toBe(3);

    layers.actionPerformed("ACTION_MOVE_LAYER_DOWN");
    layers.actionPerformed("ACTION_MOVE_LAYER_DOWN");
    expect(layerNames(page)).toEqual(["B", "A", "C"]);
    expect(page?.getSelectedLayerId()).toBe(1);

    layers.actionPerformed("ACTION_GOTO_TOP_LAYER");
    layers.actionPerformed("ACTION_MERGE_LAYER_DOWN");
    expect(layerNames(page)).toEqual(["B", "A"]);
    expect(page?.getSelectedLayerId()).toBe(2);

    layers.actionPerformed("ACTION_DELETE_LAYER");
    expect(layerNames(page)).toEqual(["B"]);
    expect(page?.getSelectedLayerId()).toBe(1);

    expect(control.events.map((event) => event.type)).toEqual([
      "layerAction",
      "layerAction",
      "layerAction",
      "layerAction",
      "layerAction",
      "layerAction"
    ]);
  });
});

describe("memory sidebar actions", () => {
  it("moves and deletes pages around the current one", () => {
    const control = createMemoryHost({ pages: [{ width: 1 }, { width: 2 }, { width: 3 }], currentPage: 1 });
    const sidebar = control.getSidebarToolbar();
    const widths = () => {
      const result: number[] = [];
      for (let index = 0; index < control.getDocument().getPageCount(); index += 1) {
        result.push(control.getDocument().getPage(index)?.getWidth() ?? 0);
      }
      return result;
    };

    sidebar.runAction("MOVE_UP");
    expect(widths()).toEqual([2, 1, 3]);
    expect(control.getCurrentPageNo()).toBe(0);

    sidebar.runAction("MOVE_DOWN");
    expect(widths()).toEqual([1, 2, 3]);
    expect(control.getCurrentPageNo()).toBe(1);

    sidebar.runAction("NEW_BEFORE");
    expect(widths()).toEqual([1, 2, 2, 3]);
    expect(control.getCurrentPageNo()).toBe(1);

    sidebar.runAction("DELETE");
    expect(widths()).toEqual([1, 2, 3]);
  });

  it("keeps the last page", () => {
    const control = createMemoryHost();
    control.getSidebarToolbar().runAction("DELETE");

    expect(control.getDocument().getPageCount()).toBe(1);
  });

  it("watches pages added later for changes", () => {
    const control = createMemoryHost();
    control.getSidebarToolbar().runAction("NEW_AFTER");
    control.getCurrentPage()?.firePageChanged();

    expect(control.events.at(-1)).toEqual({ type: "pageChanged", page: 1 });
  });
});
