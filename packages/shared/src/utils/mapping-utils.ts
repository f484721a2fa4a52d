import type { CellMapping, LayoutOutput } from '../types/layout-types';
import type { WireCellMapping, WireLayout, WireSheet } from '../schemas/layout-schema';

/** Canonical cell → producer wire shape */
export function toWireCell(cell: CellMapping): WireCellMapping {
  const { style } = cell;
  return {
    cell_coordinate: cell.coordinate,
    cell_value: cell.value,
    font_size: style.fontSize,
    font_color: style.fontColor,
    background_color: style.backgroundColor,
    is_bold: style.bold,
    is_italic: style.italic,
    horizontal_alignment: style.horizontalAlignment,
    vertical_alignment: style.verticalAlignment,
    border_top: style.borderTop,
    border_bottom: style.borderBottom,
    border_left: style.borderLeft,
    border_right: style.borderRight,
    border_color: style.borderColor,
  };
}

/** Producer wire shape → canonical cell */
export function fromWireCell(wire: WireCellMapping): CellMapping {
  return {
    coordinate: wire.cell_coordinate,
    value: wire.cell_value,
    style: {
      fontSize: wire.font_size,
      fontColor: wire.font_color.toUpperCase(),
      backgroundColor: wire.background_color === null ? null : wire.background_color.toUpperCase(),
      bold: wire.is_bold,
      italic: wire.is_italic,
      horizontalAlignment: wire.horizontal_alignment,
      verticalAlignment: wire.vertical_alignment,
      borderTop: wire.border_top,
      borderBottom: wire.border_bottom,
      borderLeft: wire.border_left,
      borderRight: wire.border_right,
      borderColor: wire.border_color.toUpperCase(),
    },
  };
}

/** Sheets as an ordered list; a JSON object keyed by name would move names like "2024" first */
export function toWirePlan(layout: LayoutOutput): WireSheet[] {
  return layout.map((sheet) => ({ sheet_name: sheet.name, cells: sheet.cells.map(toWireCell) }));
}

/** `sheetOrder` comes from the source text; object key order cannot be trusted for it */
export function fromWireLayout(
  wire: WireLayout,
  sheetOrder: readonly string[] = Object.keys(wire),
): LayoutOutput {
  return sheetOrder.flatMap((name) => {
    const cells = wire[name];
    return cells ? [{ name, cells: cells.map(fromWireCell) }] : [];
  });
}
