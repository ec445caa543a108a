import {
  documentSeedSchema,
  type DialogResponses,
  type DocumentSeedInput,
  type FontSpec,
  type ToolType
} from "../../types/contracts.js";
import { MemoryControl, MemorySettings } from "./memoryControl.js";
import { ScriptedDialogs } from "./memoryDialogs.js";
import { DEFAULT_FONT, MemoryDocument, MemoryPage } from "./memoryDocument.js";
import { MemoryToolHandler } from "./memoryTools.js";

export { MemoryControl, MemorySettings, type HostEvent } from "./memoryControl.js";
export { ScriptedDialogs, type DialogRecord } from "./memoryDialogs.js";
export { MemoryDocument, MemoryLayer, MemoryPage, MemoryTextElement } from "./memoryDocument.js";
export { MemoryTool, MemoryToolHandler, type ToolSettings } from "./memoryTools.js";

export interface MemoryHostOptions {
  displayDpi?: number;
  font?: FontSpec;
  /** `null` starts without a selected tool. */
  activeTool?: ToolType | null;
  dialogResponses?: DialogResponses;
}

export function createMemoryHost(seed: DocumentSeedInput = {}, options: MemoryHostOptions = {}): MemoryControl {
  const parsed = documentSeedSchema.parse(seed);
  const document = new MemoryDocument(
    parsed.pages.map((page) => MemoryPage.fromSeed(page)),
    parsed.pdf
  );

  return new MemoryControl({
    document,
    currentPage: parsed.currentPage,
    toolHandler: new MemoryToolHandler(options.activeTool),
    dialogs: new ScriptedDialogs(options.dialogResponses),
    settings: new MemorySettings(options.displayDpi ?? 72, options.font ?? DEFAULT_FONT)
  });
}
