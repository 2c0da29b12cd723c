/**
 * Layout-aware text reconstruction for pdfjs-dist text content.
 *
 * pdfjs hands back positioned text fragments rather than lines. Statement
 * rows are rebuilt by grouping fragments on their baseline and joining them
 * left to right, with a tab where the horizontal gap looks like a column
 * boundary so that description and amount columns never run together.
 */

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  /** The text content */
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  /** Width of the text item */
  width: number;
  /** Height of the text item (approximated from font size) */
  height: number;
}

/**
 * Shape of a pdfjs text content item. Marked-content entries lack `str`
 * and are skipped.
 */
interface PdfjsTextItemLike {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  if (typeof item !== 'object' || item === null) return false;
  if (!('str' in item) || typeof item.str !== 'string') return false;
  return 'transform' in item && Array.isArray(item.transform);
}

/**
 * Convert raw pdfjs `getTextContent().items` into positioned text items,
 * dropping marked content and whitespace-only fragments.
 */
export function toTextItems(contentItems: readonly unknown[]): TextItem[] {
  const items: TextItem[] = [];

  for (const item of contentItems) {
    if (!isTextItem(item)) continue;

    const str = item.str.trim();
    if (str.length === 0) continue;

    // transform is [scaleX, skewX, skewY, scaleY, translateX, translateY]
    const transform = item.transform;
    const x = Number(transform[4]) || 0;
    const y = Number(transform[5]) || 0;

    const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
    const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

    items.push({ str, x, y, width, height });
  }

  return items;
}

/**
 * Build lines from text items using gap detection.
 *
 * @param items - Text items of a single page
 * @returns Reconstructed lines, top to bottom
 */
export function buildLinesFromItems(items: readonly TextItem[]): string[] {
  const Y_TOL = 2.0;        // items within this Y distance share a row
  const SPACE_GAP = 2.5;    // small gap -> space
  const COLUMN_GAP = 18;    // large gap -> tab

  if (items.length === 0) return [];

  // Top to bottom, then left to right
  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: Array<{ y: number; items: TextItem[] }> = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    if (lastRow !== undefined && Math.abs(item.y - lastRow.y) <= Y_TOL) {
      lastRow.items.push(item);
    } else {
      rows.push({ y: item.y, items: [item] });
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.items.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row.items) {
      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > COLUMN_GAP) {
          out += '\t';
        } else if (gap > SPACE_GAP) {
          out += ' ';
        }
      }

      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}
