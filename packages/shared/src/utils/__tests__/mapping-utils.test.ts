import { describe, it, expect } from 'vitest';
import { toWireCell, toWirePlan, fromWireLayout, fromWireCell } from '../mapping-utils';
import type { LayoutOutput } from '../../types/layout-types';

const layout: LayoutOutput = [
  {
    name: 'Invoice',
    cells: [
      {
        coordinate: 'B3',
        value: 250,
        style: {
          fontSize: 10,
          fontColor: '000000',
          backgroundColor: null,
          bold: false,
          italic: false,
          horizontalAlignment: 'right',
          verticalAlignment: 'center',
          borderTop: 'thin',
          borderBottom: 'thin',
          borderLeft: 'thin',
          borderRight: 'thin',
          borderColor: 'D3D3D3',
        },
      },
    ],
  },
];

describe('toWirePlan', () => {
  it('lists sheets by name and spells out every style attribute', () => {
    const plan = toWirePlan(layout);
    expect(plan.map((s) => s.sheet_name)).toEqual(['Invoice']);
    expect(plan[0]?.cells[0]).toEqual({
      cell_coordinate: 'B3',
      cell_value: 250,
      font_size: 10,
      font_color: '000000',
      background_color: null,
      is_bold: false,
      is_italic: false,
      horizontal_alignment: 'right',
      vertical_alignment: 'center',
      border_top: 'thin',
      border_bottom: 'thin',
      border_left: 'thin',
      border_right: 'thin',
      border_color: 'D3D3D3',
    });
  });

  it('keeps sheet order for integer-like names', () => {
    const sheets: LayoutOutput = [
      { name: 'Invoice', cells: [] },
      { name: '2024', cells: [] },
    ];
    expect(toWirePlan(sheets).map((s) => s.sheet_name)).toEqual(['Invoice', '2024']);
  });
});

describe('fromWireLayout', () => {
  const cells = layout[0]?.cells.map(toWireCell) ?? [];

  it('follows the given sheet order', () => {
    const wire = { Invoice: cells, '2024': cells };
    expect(Object.keys(wire)).toEqual(['2024', 'Invoice']);
    expect(fromWireLayout(wire, ['Invoice', '2024']).map((s) => s.name)).toEqual(['Invoice', '2024']);
  });

  it('falls back to key order and converts cells back', () => {
    expect(fromWireLayout({ Invoice: cells })).toEqual(layout);
  });
});

describe('fromWireCell', () => {
  it('upper-cases hex colors', () => {
    const cell = fromWireCell({
      cell_coordinate: 'A1',
      cell_value: 'x',
      font_size: 10,
      font_color: 'abcdef',
      background_color: 'f0efe8',
      is_bold: true,
      is_italic: false,
      horizontal_alignment: 'left',
      vertical_alignment: 'center',
      border_top: 'thin',
      border_bottom: 'thin',
      border_left: 'thin',
      border_right: 'thin',
      border_color: 'd3d3d3',
    });
    expect(cell.style.fontColor).toBe('ABCDEF');
    expect(cell.style.backgroundColor).toBe('F0EFE8');
    expect(cell.style.borderColor).toBe('D3D3D3');
  });
});
