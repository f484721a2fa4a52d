import { Injectable, Logger } from '@nestjs/common';
import type {
  CellMapping,
  LayoutOutput,
  LayoutPlan,
  SheetLayout,
  SheetNameConflictPolicy,
  SourceDocument,
} from '@sheetplan/shared';
import {
  AmbiguousSheetNameError,
  EmptyDocumentError,
  SHEET_LIMITS,
  encodeCoordinate,
} from '@sheetplan/shared';
import { FieldNormalizerService } from './field-normalizer.service';
import { LayoutPlannerService } from './layout-planner.service';
import { StyleResolverService } from './style-resolver.service';

export interface AssembleOptions {
  /** Defaults to 'suffix' */
  sheetNameConflict?: SheetNameConflictPolicy;
}

@Injectable()
export class MappingAssemblerService {
  private readonly logger = new Logger(MappingAssemblerService.name);

  constructor(
    private readonly normalizer: FieldNormalizerService,
    private readonly planner: LayoutPlannerService,
    private readonly styleResolver: StyleResolverService,
  ) {}

  /** Normalize, plan and style every document; one sheet per document in input order */
  assemble(documents: SourceDocument[], options: AssembleOptions = {}): LayoutOutput {
    const policy = options.sheetNameConflict ?? 'suffix';
    // lower-cased sheet name → file that claimed it
    const claimed = new Map<string, string>();

    return documents.map((document): SheetLayout => {
      const normalized = this.normalizer.normalize(document);
      if (normalized.sections.length === 0) {
        throw new EmptyDocumentError(document.fileName);
      }
      if (normalized.mergedSections.length > 0) {
        this.logger.warn(
          `"${document.fileName}": section(s) ${normalized.mergedSections.map((s) => `"${s}"`).join(', ')} ` +
          'appear more than once and were merged into their first occurrence',
        );
      }

      const plan = this.planner.plan(normalized);
      const name = this.claimSheetName(plan.sheetName, document.fileName, claimed, policy);
      const cells = this.toCells(plan);
      this.logger.debug(`Sheet "${name}": ${plan.rows.length} rows, ${cells.length} cells`);
      return { name, cells };
    });
  }

  private toCells(plan: LayoutPlan): CellMapping[] {
    return plan.rows.flatMap((row) =>
      row.cells.map((planned) => ({
        coordinate: encodeCoordinate(row.row, planned.column),
        value: planned.value,
        style: this.styleResolver.resolve(planned.role, planned.dataType),
      })),
    );
  }

  /** Sheet names compare case-insensitively, as spreadsheet applications do */
  private claimSheetName(
    base: string,
    fileName: string,
    claimed: Map<string, string>,
    policy: SheetNameConflictPolicy,
  ): string {
    const owner = claimed.get(base.toLowerCase());
    if (owner === undefined) {
      claimed.set(base.toLowerCase(), fileName);
      return base;
    }
    if (policy === 'error') {
      throw new AmbiguousSheetNameError(base, owner, fileName);
    }

    for (let n = 2; ; n++) {
      const suffix = ` ${n}`;
      const candidate = `${base.slice(0, SHEET_LIMITS.MAX_SHEET_NAME_LENGTH - suffix.length).trimEnd()}${suffix}`;
      if (!claimed.has(candidate.toLowerCase())) {
        claimed.set(candidate.toLowerCase(), fileName);
        this.logger.warn(`"${fileName}" maps to sheet "${base}" already used by "${owner}"; renamed to "${candidate}"`);
        return candidate;
      }
    }
  }
}
