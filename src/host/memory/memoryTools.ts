import {
  TOOL_TYPES,
  type DrawingType,
  type EraserType,
  type LineStyle,
  type ToolCapability,
  type ToolSize,
  type ToolType
} from "../../types/contracts.js";
import type { HostTool, ToolHandler } from "../types.js";

/** Stroke widths in pt per size step. */
const PEN_THICKNESS: Record<ToolSize, number> = {
  very_fine: 0.42,
  fine: 0.85,
  medium: 1.41,
  thick: 2.26,
  very_thick: 5.67
};

const MARKER_THICKNESS: Record<ToolSize, number> = {
  very_fine: 2.83,
  fine: 2.83,
  medium: 8.5,
  thick: 19.84,
  very_thick: 19.84
};

const NO_THICKNESS: Record<ToolSize, number> = {
  very_fine: 0,
  fine: 0,
  medium: 0,
  thick: 0,
  very_thick: 0
};

export interface ToolSettings {
  color: number;
  size: ToolSize;
  fill: boolean;
  fillOpacity: number;
  drawingType: DrawingType;
  lineStyle: LineStyle;
}

interface ToolProfile {
  capabilities: readonly ToolCapability[];
  thickness: Record<ToolSize, number>;
  defaults?: Partial<ToolSettings>;
}

const SHAPE_TOOL: ToolProfile = { capabilities: ["color", "size", "lineStyle"], thickness: PEN_THICKNESS };
const PLAIN_TOOL: ToolProfile = { capabilities: [], thickness: NO_THICKNESS };

const TOOL_PROFILES: Record<ToolType, ToolProfile> = {
  pen: {
    capabilities: ["color", "size", "fill", "lineStyle", "drawingType"],
    thickness: PEN_THICKNESS,
    defaults: { color: 0x3333cc, fillOpacity: 128 }
  },
  highlighter: {
    capabilities: ["color", "size", "fill", "drawingType"],
    thickness: MARKER_THICKNESS,
    defaults: { color: 0xffff00, fillOpacity: 128 }
  },
  eraser: { capabilities: ["size"], thickness: MARKER_THICKNESS },
  text: { capabilities: ["color"], thickness: NO_THICKNESS },
  image: PLAIN_TOOL,
  select_rect: PLAIN_TOOL,
  select_region: PLAIN_TOOL,
  select_object: PLAIN_TOOL,
  play_object: PLAIN_TOOL,
  vertical_space: PLAIN_TOOL,
  hand: PLAIN_TOOL,
  draw_rect: { ...SHAPE_TOOL, defaults: { drawingType: "rectangle" } },
  draw_ellipse: { ...SHAPE_TOOL, defaults: { drawingType: "ellipse" } },
  draw_arrow: { ...SHAPE_TOOL, defaults: { drawingType: "arrow" } },
  draw_coordinate_system: { ...SHAPE_TOOL, defaults: { drawingType: "coordinateSystem" } }
};

const DEFAULT_SETTINGS: ToolSettings = {
  color: 0x000000,
  size: "medium",
  fill: false,
  fillOpacity: 255,
  drawingType: "default",
  lineStyle: "plain"
};

export class MemoryTool implements HostTool {
  readonly type: ToolType;
  private readonly capabilities: ReadonlySet<ToolCapability>;
  private readonly thickness: Record<ToolSize, number>;
  private settings: ToolSettings;

  constructor(type: ToolType, overrides: Partial<ToolSettings> = {}) {
    const profile = TOOL_PROFILES[type];
    this.type = type;
    this.capabilities = new Set(profile.capabilities);
    this.thickness = profile.thickness;
    this.settings = { ...DEFAULT_SETTINGS, ...profile.defaults, ...overrides };
  }

  hasCapability(capability: ToolCapability): boolean {
    return this.capabilities.has(capability);
  }

  getColor(): number {
    return this.settings.color;
  }

  setColor(color: number): void {
    this.settings = { ...this.settings, color };
  }

  getSize(): ToolSize {
    return this.settings.size;
  }

  getThickness(size: ToolSize): number {
    return this.thickness[size];
  }

  isFillEnabled(): boolean {
    return this.settings.fill;
  }

  getFillOpacity(): number {
    return this.settings.fillOpacity;
  }

  getDrawingType(): DrawingType {
    return this.settings.drawingType;
  }

  getLineStyle(): LineStyle {
    return this.settings.lineStyle;
  }

  configure(settings: Partial<ToolSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }
}

export class MemoryToolHandler implements ToolHandler {
  private readonly tools: Map<ToolType, MemoryTool>;
  private activeTool?: ToolType;
  private eraserType: EraserType = "default";

  /** `null` starts without a selected tool. */
  constructor(activeTool: ToolType | null = "pen") {
    this.tools = new Map(TOOL_TYPES.map((type): [ToolType, MemoryTool] => [type, new MemoryTool(type)]));
    this.activeTool = activeTool ?? undefined;
  }

  getActiveToolType(): ToolType | undefined {
    return this.activeTool;
  }

  selectTool(type: ToolType | undefined): void {
    this.activeTool = type;
  }

  getTool(type: ToolType): MemoryTool {
    const tool = this.tools.get(type);
    if (tool) {
      return tool;
    }
    const created = new MemoryTool(type);
    this.tools.set(type, created);
    return created;
  }

  getEraserType(): EraserType {
    return this.eraserType;
  }

  setEraserType(type: EraserType): void {
    this.eraserType = type;
  }
}
