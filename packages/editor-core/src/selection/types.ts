/**
 * Selection snapshot types mirrored from the document engine. Snapshots are immutable; stores
 * replace them wholesale so observers never see a half-updated selection.
 */

export const STYLE_CONTEXTS = ["P", "H1", "H2", "H3", "H4", "H5", "H6", "PRE", "Undefined"] as const;
export type StyleContext = (typeof STYLE_CONTEXTS)[number];

export const LIST_CONTEXTS = ["UL", "OL", "Undefined"] as const;
export type ListContext = (typeof LIST_CONTEXTS)[number];

export const TABLE_BORDERS = ["outer", "header", "cell", "none"] as const;
export type TableBorder = (typeof TABLE_BORDERS)[number];

export const DEFAULT_TABLE_BORDER: TableBorder = "cell";

export type FormatFlag = "bold" | "italic" | "underline" | "strike" | "sub" | "sup" | "code";

export const FORMAT_FLAGS: readonly FormatFlag[] = [
  "bold",
  "italic",
  "underline",
  "strike",
  "sub",
  "sup",
  "code"
];

export interface SelectionRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface SelectionSnapshot {
  readonly valid: boolean;

  readonly selection: string | null;
  readonly selrect: SelectionRect | null;

  readonly href: string | null;
  readonly link: string | null;

  readonly src: string | null;
  readonly alt: string | null;
  readonly width: number | null;
  readonly height: number | null;
  readonly scale: number | null;

  readonly table: boolean;
  readonly thead: boolean;
  readonly tbody: boolean;
  readonly header: boolean;
  readonly colspan: boolean;
  readonly border: TableBorder;
  readonly rows: number;
  readonly cols: number;
  readonly row: number;
  readonly col: number;

  readonly style: StyleContext;
  readonly list: ListContext;
  readonly li: boolean;
  readonly quote: boolean;

  readonly bold: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly strike: boolean;
  readonly sub: boolean;
  readonly sup: boolean;
  readonly code: boolean;
}

export const isStyleContext = (value: unknown): value is StyleContext =>
  STYLE_CONTEXTS.some((context) => context === value);

export const isListContext = (value: unknown): value is ListContext =>
  LIST_CONTEXTS.some((context) => context === value);

export const isTableBorder = (value: unknown): value is TableBorder =>
  TABLE_BORDERS.some((border) => border === value);
