import { Injectable, Logger } from '@nestjs/common';
import type { LayoutOutput } from '@sheetplan/shared';
import {
  INGEST_LIMITS,
  InvalidLayoutMappingError,
  MalformedJsonError,
  NoJsonObjectFoundError,
  fromWireLayout,
  nodeToValue,
  parseJsonTree,
  propertyNames,
  wireLayoutSchema,
} from '@sheetplan/shared';
import { LayoutValidatorService } from './layout-validator.service';

const FENCE_OPEN = /^```[A-Za-z0-9_+-]*[^\S\n]*\n?/;
const FENCE_CLOSE = /\n?```\s*$/;

/**
 * Turns free-form producer output into a validated layout mapping.
 * Tolerates a surrounding code fence and prose outside the outermost braces.
 */
@Injectable()
export class MappingIngestorService {
  private readonly logger = new Logger(MappingIngestorService.name);

  constructor(private readonly validator: LayoutValidatorService) {}

  ingest(raw: string): LayoutOutput {
    const json = this.extractJsonObject(raw);
    const { value, sheetOrder } = this.parseJson(json);

    const result = wireLayoutSchema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue ? issue.path.join('.') : '';
      throw new InvalidLayoutMappingError(
        'cell-shape',
        `${path || '(root)'}: ${issue?.message ?? 'unexpected structure'}`,
        { path },
      );
    }

    const layout = fromWireLayout(result.data, sheetOrder);
    this.validator.validate(layout);
    this.logger.log(
      `Ingested layout mapping: ${layout.length} sheet(s), ` +
      `${layout.reduce((n, s) => n + s.cells.length, 0)} cell(s)`,
    );
    return layout;
  }

  /** Strip one wrapping code fence, then cut from the first '{' to the last '}' */
  extractJsonObject(raw: string): string {
    let text = raw.trim();
    if (text.startsWith('```')) {
      text = text.replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '').trim();
    }

    const first = text.indexOf('{');
    const last = text.lastIndexOf('}');
    if (first === -1 || last === -1 || last < first) {
      throw new NoJsonObjectFoundError('no enclosing braces', this.fragment(text));
    }

    const candidate = text.slice(first, last + 1);
    if (!this.hasBalancedBraces(candidate)) {
      throw new NoJsonObjectFoundError('unbalanced braces', this.fragment(candidate));
    }
    return candidate;
  }

  /** Sheet order is read off the text; a parsed object would move names like "2024" first */
  private parseJson(json: string): { value: unknown; sheetOrder: string[] } {
    const tree = parseJsonTree(json);
    if (!tree.ok) {
      throw new MalformedJsonError(`${tree.reason} at offset ${tree.offset}`, this.fragment(json));
    }

    const sheetOrder = propertyNames(tree.root);
    const seen = new Set<string>();
    for (const name of sheetOrder) {
      if (seen.has(name)) {
        throw new InvalidLayoutMappingError('unique-sheet-names', `Sheet "${name}" appears more than once`, {
          sheet: name,
        });
      }
      seen.add(name);
    }
    return { value: nodeToValue(tree.root), sheetOrder };
  }

  /** Brace depth outside string literals never drops below zero and ends at zero */
  private hasBalancedBraces(text: string): boolean {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (const ch of text) {
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth += 1;
      else if (ch === '}') {
        depth -= 1;
        if (depth < 0) return false;
      }
    }
    return depth === 0;
  }

  private fragment(text: string): string {
    return text.length > INGEST_LIMITS.FRAGMENT_LENGTH
      ? `${text.slice(0, INGEST_LIMITS.FRAGMENT_LENGTH)}...`
      : text;
  }
}
