import { PAGE_TYPE_FORMATS, type PageTypeFormat } from "../../types/contracts.js";
import type { HostControl, HostPage } from "../../host/types.js";
import { DomainError, StateError, ValidationError } from "../../utils/errors.js";
import { optionalArg, requireArg } from "../coercion.js";
import { encodeSequence } from "../tableMarshaler.js";
import { defineEntryPoints, requireCurrentPage } from "../entryPoint.js";

export interface LayerView {
  name: string;
  isVisible: boolean;
  /** Absent on the background layer. */
  isAnnotated?: boolean;
}

export interface PageView {
  pageWidth: number;
  pageHeight: number;
  isAnnotated: boolean;
  pageTypeFormat: PageTypeFormat;
  /** 1-based pdf page, 0 without pdf background. */
  pdfBackgroundPageNo: number;
  /** Index 0 is the background layer. */
  layers: LayerView[];
  currentLayer: number;
}

export interface DocumentStructureView {
  pages: PageView[];
  /** 1-based, so the current page is `pages[currentPage - 1]`. */
  currentPage: number;
  pdfBackgroundFilename: string;
}

function isPageTypeFormat(value: string): value is PageTypeFormat {
  return PAGE_TYPE_FORMATS.some((format) => format === value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Page index of `page`, or undefined when the document does not hold it. */
function pageIndexOf(control: HostControl, page: HostPage): number | undefined {
  const document = control.getDocument();
  const index = document.indexOf(page);
  return index >= 0 && index < document.getPageCount() ? index : undefined;
}

/**
 * Page size changes run under the document lock, and listeners hear about
 * them only once the lock is released.
 */
function applyPageSize(control: HostControl, page: HostPage, width: number, height: number): void {
  const document = control.getDocument();
  document.lock();
  try {
    document.setPageSize(page, width, height);
  } finally {
    document.unlock();
  }

  const index = pageIndexOf(control, page);
  if (index !== undefined) {
    control.firePageSizeChanged(index);
  }
}

export function buildDocumentStructure(control: HostControl): DocumentStructureView {
  const document = control.getDocument();
  const pages: HostPage[] = [];
  for (let index = 0; index < document.getPageCount(); index += 1) {
    const page = document.getPage(index);
    if (page) {
      pages.push(page);
    }
  }

  return {
    pages: encodeSequence(pages, (page) => ({
      pageWidth: page.getWidth(),
      pageHeight: page.getHeight(),
      isAnnotated: page.isAnnotated(),
      pageTypeFormat: page.getBackgroundType().format,
      pdfBackgroundPageNo: page.getPdfPageNr() + 1,
      layers: [
        { isVisible: page.isLayerVisible(0), name: page.getBackgroundName() },
        ...encodeSequence(page.getLayers(), (layer, index) => ({
          name: layer.getName() ?? `Layer ${index + 1}`,
          isVisible: layer.isVisible(),
          isAnnotated: layer.isAnnotated()
        }))
      ],
      currentLayer: page.getSelectedLayerId()
    })),
    currentPage: control.getLayerController().getCurrentPageId() + 1,
    pdfBackgroundFilename: document.getPdfFilepath()
  };
}

export const documentEntryPoints = defineEntryPoints("document", {
  getDocumentStructure: {
    usage: "const structure = app.getDocumentStructure()",
    body: (context) => buildDocumentStructure(context.control)
  },

  scrollToPage: {
    usage: "app.scrollToPage(1, true); // next page\napp.scrollToPage(10); // page 10",
    body: (context, args) => {
      const value = requireArg(args, 0, "integer", "page");
      const relative = optionalArg(args, 1, "boolean", "relative", false, context.warnSink);
      const control = context.control;
      const target = relative ? control.getCurrentPageNo() + value : value - 1;
      const last = control.getDocument().getPageCount() - 1;
      control.getScrollHandler().scrollToPage(clamp(target, 0, Math.max(last, 0)));
      return undefined;
    }
  },

  scrollToPos: {
    usage: "app.scrollToPos(20, 10); // relative\napp.scrollToPos(200, 50, false); // absolute",
    body: (context, args) => {
      const dx = requireArg(args, 0, "number", "dx");
      const dy = requireArg(args, 1, "number", "dy");
      const relative = optionalArg(args, 2, "boolean", "relative", true, context.warnSink);
      const layout = context.control.getLayout();
      if (relative) {
        layout.scrollRelative(dx, dy);
      } else {
        layout.scrollAbs(dx, dy);
      }
      return undefined;
    }
  },

  setCurrentPage: {
    usage: "app.setCurrentPage(1)",
    body: (context, args) => {
      const pageId = requireArg(args, 0, "integer", "pageId");
      const control = context.control;
      const last = Math.max(control.getDocument().getPageCount(), 1);
      control.firePageSelected(clamp(pageId, 1, last) - 1);
      return undefined;
    }
  },

  setPageSize: {
    usage: "app.setPageSize(595.275591, 841.889764); app.setPageSize(0, 14.17 * 6, true)",
    body: (context, args) => {
      const page = requireCurrentPage(context);
      let width = requireArg(args, 0, "number", "width");
      let height = requireArg(args, 1, "number", "height");
      const relative = optionalArg(args, 2, "boolean", "relative", false, context.warnSink);

      if (relative) {
        width += page.getWidth();
        height += page.getHeight();
      }

      if (width > 0 && height > 0) {
        applyPageSize(context.control, page, width, height);
      } else {
        context.logger.debug(`Ignoring page size ${width}x${height}`);
      }
      return undefined;
    }
  },

  setCurrentLayer: {
    usage: "app.setCurrentLayer(2, true)",
    body: (context, args) => {
      const page = requireCurrentPage(context);
      const layerId = requireArg(args, 0, "integer", "layerId");
      const layerCount = page.getLayerCount();
      if (layerId < 0 || layerId > layerCount) {
        throw new ValidationError(`No layer with layer ID ${layerId}`, { layerId, layerCount });
      }

      const update = optionalArg(args, 1, "boolean", "update", false, context.warnSink);
      context.control.getLayerController().switchToLayer(layerId, update);
      return undefined;
    }
  },

  setLayerVisibility: {
    usage: "app.setLayerVisibility(true)",
    body: (context, args) => {
      const visible = optionalArg(args, 0, "boolean", "visible", true, context.warnSink);
      const page = requireCurrentPage(context);
      context.control.getLayerController().setLayerVisible(page.getSelectedLayerId(), visible);
      return undefined;
    }
  },

  setCurrentLayerName: {
    usage: 'app.setCurrentLayerName("Custom name 1")',
    body: (context, args) => {
      const name = args[0];
      if (typeof name === "string") {
        context.control.getLayerController().setCurrentLayerName(name);
      }
      return undefined;
    }
  },

  setBackgroundName: {
    usage: 'app.setBackgroundName("Custom name 1")',
    body: (context, args) => {
      const page = requireCurrentPage(context);
      const name = args[0];
      if (typeof name === "string") {
        page.setBackgroundName(name);
      }
      return undefined;
    }
  },

  changeCurrentPageBackground: {
    usage: 'app.changeCurrentPageBackground("graph")',
    body: (context, args) => {
      const format = requireArg(args, 0, "string", "format");
      const config = optionalArg(args, 1, "string", "config", "", context.warnSink);
      if (!isPageTypeFormat(format)) {
        throw new DomainError(`Unknown page background format: ${format}`, { format });
      }
      requireCurrentPage(context);
      context.control.getPageBackgroundController().changeCurrentPageBackground({ format, config });
      return undefined;
    }
  },

  changeBackgroundPdfPageNr: {
    usage: "app.changeBackgroundPdfPageNr(1, true); // next pdf page\napp.changeBackgroundPdfPageNr(7, false)",
    body: (context, args) => {
      const pageNr = requireArg(args, 0, "integer", "pageNr");
      const relative = optionalArg(args, 1, "boolean", "relative", true, context.warnSink);
      const control = context.control;
      const document = control.getDocument();
      const page = requireCurrentPage(context);

      let selected = pageNr - 1;
      if (relative) {
        if (page.getBackgroundType().format !== "pdf") {
          throw new StateError("Current page has no pdf background, cannot use relative mode!");
        }
        selected = page.getPdfPageNr() + pageNr;
      }

      const pdfPage = selected >= 0 && selected < document.getPdfPageCount() ? document.getPdfPage(selected) : undefined;
      if (!pdfPage) {
        throw new DomainError(`Pdf page number ${selected + 1} does not exist!`, {
          pdfPageCount: document.getPdfPageCount()
        });
      }

      page.setBackgroundPdfPageNr(selected);
      applyPageSize(control, page, pdfPage.width, pdfPage.height);
      return undefined;
    }
  },

  scaleTextElements: {
    usage: "app.scaleTextElements(2.3)",
    body: (context, args) => {
      const factor = requireArg(args, 0, "number", "factor");
      const page = requireCurrentPage(context);
      context.control.clearSelectionEndText();

      for (const element of page.getSelectedLayer().getElements()) {
        if (element.kind === "text") {
          element.scale(element.getX(), element.getY(), factor, factor, 0, false);
        }
      }
      return undefined;
    }
  },

  getDisplayDpi: {
    usage: "const dpi = app.getDisplayDpi()",
    body: (context) => context.control.getSettings().getDisplayDpi()
  },

  refreshPage: {
    usage: "app.refreshPage()",
    body: (context) => {
      const page = context.control.getCurrentPage();
      if (page) {
        page.firePageChanged();
      } else {
        context.logger.warn("Called refreshPage, but no page is selected.");
      }
      return undefined;
    }
  }
});
