import { Injectable } from '@nestjs/common';
import type { CellRole, CellStyle, DataType } from '@sheetplan/shared';
import { STYLE_TABLE } from './style-table';

@Injectable()
export class StyleResolverService {
  /** Style of a cell with the given role holding a value of the given type */
  resolve(role: CellRole, dataType: DataType): Readonly<CellStyle> {
    return STYLE_TABLE[role][dataType];
  }
}
