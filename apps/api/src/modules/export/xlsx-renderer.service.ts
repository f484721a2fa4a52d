import { Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import { rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import type { BorderStyle, CellStyle, LayoutOutput, SheetLayout } from '@sheetplan/shared';
import {
  BadCoordinateError,
  EmptyLayoutError,
  InvalidCoordinateError,
  RENDER_LIMITS,
  decodeCoordinate,
} from '@sheetplan/shared';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const VERTICAL_ALIGNMENT: Record<CellStyle['verticalAlignment'], ExcelJS.Alignment['vertical']> = {
  top: 'top',
  center: 'middle',
  bottom: 'bottom',
};

@Injectable()
export class XlsxRendererService {
  private readonly logger = new Logger(XlsxRendererService.name);

  /** Render a layout mapping to an XLSX buffer (no disk writes) */
  async renderToBuffer(layout: LayoutOutput): Promise<Buffer> {
    const workbook = this.buildWorkbook(layout);
    const buffer = await workbook.xlsx.writeBuffer();
    this.logger.log(`XLSX rendered to buffer (${layout.length} sheets)`);
    return Buffer.from(buffer);
  }

  /**
   * Render fully in memory, write next to the destination, then rename over it.
   * A failure at any step leaves no partial file behind.
   */
  async renderToFile(layout: LayoutOutput, outputPath: string): Promise<void> {
    const buffer = await this.renderToBuffer(layout);
    const tempPath = path.join(
      path.dirname(outputPath),
      `.${path.basename(outputPath)}.${process.pid}.tmp`,
    );
    try {
      await writeFile(tempPath, buffer);
      await rename(tempPath, outputPath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
    this.logger.log(`XLSX written to ${outputPath} (${buffer.length} bytes)`);
  }

  private buildWorkbook(layout: LayoutOutput): ExcelJS.Workbook {
    if (layout.length === 0) {
      throw new EmptyLayoutError();
    }

    const workbook = new ExcelJS.Workbook();
    for (const sheet of layout) {
      this.writeSheet(workbook.addWorksheet(sheet.name), sheet);
    }
    return workbook;
  }

  private writeSheet(ws: ExcelJS.Worksheet, sheet: SheetLayout): void {
    const widths = new Map<number, number>();

    for (const mapping of sheet.cells) {
      const { row, col } = this.placeCell(sheet.name, mapping.coordinate);
      const wsCell = ws.getCell(row, col);
      wsCell.value = mapping.value;
      this.applyStyle(wsCell, mapping.style);

      const length = String(mapping.value).length + RENDER_LIMITS.COLUMN_WIDTH_PADDING;
      widths.set(col, Math.max(widths.get(col) ?? 0, length));
    }

    // Set column widths
    for (const [col, length] of widths) {
      ws.getColumn(col).width = Math.min(
        RENDER_LIMITS.MAX_COLUMN_WIDTH,
        Math.max(RENDER_LIMITS.MIN_COLUMN_WIDTH, length),
      );
    }
  }

  private placeCell(sheetName: string, coordinate: string): { row: number; col: number } {
    try {
      return decodeCoordinate(coordinate);
    } catch (err) {
      if (err instanceof InvalidCoordinateError) {
        throw new BadCoordinateError(sheetName, coordinate);
      }
      throw err;
    }
  }

  private applyStyle(wsCell: ExcelJS.Cell, style: CellStyle): void {
    wsCell.font = {
      size: style.fontSize,
      color: { argb: `FF${style.fontColor}` },
      bold: style.bold,
      italic: style.italic,
    };
    if (style.backgroundColor) {
      wsCell.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: `FF${style.backgroundColor}` },
        bgColor: { argb: `FF${style.backgroundColor}` },
      };
    }
    wsCell.alignment = {
      horizontal: style.horizontalAlignment,
      vertical: VERTICAL_ALIGNMENT[style.verticalAlignment],
      wrapText: true,
    };

    const color = { argb: `FF${style.borderColor}` };
    const side = (border: BorderStyle): Partial<ExcelJS.Border> | undefined =>
      border === 'none' ? undefined : { style: border, color };
    wsCell.border = {
      top: side(style.borderTop),
      bottom: side(style.borderBottom),
      left: side(style.borderLeft),
      right: side(style.borderRight),
    };
  }
}
