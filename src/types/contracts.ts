import { z } from "zod";

export const TOOL_TYPES = [
  "pen",
  "eraser",
  "highlighter",
  "text",
  "image",
  "select_rect",
  "select_region",
  "select_object",
  "play_object",
  "vertical_space",
  "hand",
  "draw_rect",
  "draw_ellipse",
  "draw_arrow",
  "draw_coordinate_system"
] as const;
export type ToolType = (typeof TOOL_TYPES)[number];

export const TOOL_SIZES = ["very_fine", "fine", "medium", "thick", "very_thick"] as const;
export type ToolSize = (typeof TOOL_SIZES)[number];

export const DRAWING_TYPES = [
  "default",
  "ruler",
  "rectangle",
  "ellipse",
  "arrow",
  "doubleArrow",
  "coordinateSystem",
  "strokeRecognizer",
  "spline"
] as const;
export type DrawingType = (typeof DRAWING_TYPES)[number];

export const LINE_STYLES = ["plain", "dash", "dashdot", "dot"] as const;
export type LineStyle = (typeof LINE_STYLES)[number];

export const ERASER_TYPES = ["default", "whiteout", "deleteStroke"] as const;
export type EraserType = (typeof ERASER_TYPES)[number];

export const PAGE_TYPE_FORMATS = [
  "plain",
  "ruled",
  "lined",
  "staves",
  "graph",
  "dotted",
  "isodotted",
  "isograph",
  "pdf",
  "image",
  "copy"
] as const;
export type PageTypeFormat = (typeof PAGE_TYPE_FORMATS)[number];

export const SIDEBAR_ACTIONS = ["COPY", "DELETE", "MOVE_UP", "MOVE_DOWN", "NEW_BEFORE", "NEW_AFTER"] as const;
export type SidebarAction = (typeof SIDEBAR_ACTIONS)[number];

export const STROKE_TOOL_TYPES = ["pen", "highlighter"] as const;
export type StrokeToolType = (typeof STROKE_TOOL_TYPES)[number];

export const TOOL_INFO_MODES = ["active", "pen", "highlighter", "eraser", "text"] as const;
export type ToolInfoMode = (typeof TOOL_INFO_MODES)[number];

export const TOOL_CAPABILITIES = ["color", "size", "fill", "lineStyle", "drawingType"] as const;
export type ToolCapability = (typeof TOOL_CAPABILITIES)[number];

/** Pressure value of a point sampled without pressure information. */
export const NO_PRESSURE = -1;
/** Fill value of a stroke that is not filled. */
export const NO_FILL = -1;
export const MAX_RGB_COLOR = 0xffffff;

export interface Point {
  x: number;
  y: number;
  pressure: number;
}

export interface PageType {
  format: PageTypeFormat;
  config: string;
}

export interface FontSpec {
  name: string;
  size: number;
}

// Interpreter slot kinds. Conversions follow what the script engine itself
// accepts: numeric strings read as numbers, numbers read as strings.
const numericString = /^\s*([-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?|0[xX][0-9a-fA-F]+)\s*$/;

export const scriptNumberSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(numericString)
    .transform((value) => Number(value.trim()))
]);
export const scriptIntegerSchema = scriptNumberSchema.pipe(z.number().int());
export const scriptStringSchema = z.union([z.string(), z.number().finite().transform((value) => String(value))]);
export const scriptBooleanSchema = z.boolean();

export const registerUiTableSchema = {
  menu: scriptStringSchema,
  callback: scriptStringSchema,
  accelerator: scriptStringSchema
};

export const uiActionTableSchema = {
  action: scriptStringSchema,
  group: scriptStringSchema,
  enabled: scriptBooleanSchema
};

export const changeToolColorTableSchema = {
  color: z.number().int(),
  tool: scriptStringSchema,
  selection: scriptBooleanSchema
};

export const strokeAttributesTableSchema = {
  tool: scriptStringSchema,
  width: scriptNumberSchema,
  color: z.number().int(),
  fill: z.number().int(),
  lineStyle: z.string()
};

export const pluginManifestSchema = z.object({
  name: z.string().min(1).max(128).optional(),
  description: z.string().max(1024).default(""),
  author: z.string().max(256).default(""),
  version: z.string().max(64).default("0.0.0"),
  mainfile: z
    .string()
    .min(1)
    .regex(/^[^/\\]+\.(m?js|cjs)$/, "mainfile must be a script file inside the plugin folder")
    .default("main.js"),
  enabled: z.boolean().default(true)
});
export type PluginManifest = z.infer<typeof pluginManifestSchema>;

export const textSeedSchema = z.object({
  text: z.string(),
  x: z.number(),
  y: z.number(),
  font: z
    .object({
      name: z.string().min(1),
      size: z.number().positive()
    })
    .optional()
});

export const layerSeedSchema = z.object({
  name: z.string().max(256).optional(),
  visible: z.boolean().default(true),
  texts: z.array(textSeedSchema).default([])
});
export type LayerSeed = z.infer<typeof layerSeedSchema>;

export const pageSeedSchema = z.object({
  width: z.number().positive().default(595.275591),
  height: z.number().positive().default(841.889764),
  format: z.enum(PAGE_TYPE_FORMATS).default("plain"),
  config: z.string().default(""),
  pdfPage: z.number().int().nonnegative().optional(),
  backgroundName: z.string().default(""),
  layers: z.array(layerSeedSchema).default([{}]),
  selectedLayer: z.number().int().nonnegative().optional()
});
export type PageSeed = z.infer<typeof pageSeedSchema>;

export const pdfSeedSchema = z.object({
  filepath: z.string().min(1),
  pages: z
    .array(
      z.object({
        width: z.number().positive(),
        height: z.number().positive()
      })
    )
    .min(1)
});

export const documentSeedSchema = z.object({
  pages: z.array(pageSeedSchema).min(1).default([{}]),
  pdf: pdfSeedSchema.optional(),
  currentPage: z.number().int().nonnegative().default(0)
});
export type DocumentSeed = z.infer<typeof documentSeedSchema>;
export type DocumentSeedInput = z.input<typeof documentSeedSchema>;

export const dialogResponsesSchema = z.object({
  messageButtons: z.array(z.number().int()).default([]),
  saveAs: z.array(z.string().nullable()).default([]),
  openFile: z.array(z.string().nullable()).default([])
});
export type DialogResponses = z.infer<typeof dialogResponsesSchema>;
export type DialogResponsesInput = z.input<typeof dialogResponsesSchema>;
