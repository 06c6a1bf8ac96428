/** Primitive cell value types. Integers and floats are both `number`. */
export type CellValue = string | number | Date | null;

/** Horizontal text alignment options */
export const ALIGNMENTS = ['left', 'center', 'right'] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

export const VERTICAL_ALIGNMENTS = ['top', 'middle', 'bottom'] as const;
export type VerticalAlignment = (typeof VERTICAL_ALIGNMENTS)[number];

/** Border style for a single edge */
export interface BorderEdge {
  style: 'thin' | 'medium' | 'thick' | 'dashed';
  color?: string;
}

/** Full border configuration */
export interface BorderConfig {
  top?: BorderEdge;
  right?: BorderEdge;
  bottom?: BorderEdge;
  left?: BorderEdge;
}

/** Cell formatting */
export interface CellFormat {
  bold?: boolean;
  fontSize?: number;
  fontColor?: string;
  bgColor?: string;
  numberFormat?: string;
  alignment?: Alignment;
  verticalAlignment?: VerticalAlignment;
  border?: BorderConfig;
}

/** Range reference (0-based, inclusive) */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** Merge range */
export interface MergeRange extends CellRange {}
