import type { SheetNameConflictPolicy } from '@sheetplan/shared';
import { SHEET_NAME_CONFLICT_POLICIES } from '@sheetplan/shared';

export const PRODUCERS = ['engine', 'ai'] as const;
export type Producer = (typeof PRODUCERS)[number];

export interface CliArgs {
  inputPath: string;
  outputPath: string;
  producer: Producer;
  sheetNameConflict: SheetNameConflictPolicy;
}

export const USAGE =
  'Usage: sheetplan <input.json> <output.xlsx> [--producer=engine|ai] [--on-conflict=suffix|error]';

function isProducer(value: string): value is Producer {
  return PRODUCERS.some((p) => p === value);
}

function isConflictPolicy(value: string): value is SheetNameConflictPolicy {
  return SHEET_NAME_CONFLICT_POLICIES.some((p) => p === value);
}

/** Parse argv (without the node and script entries) */
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let producer: Producer = 'engine';
  let sheetNameConflict: SheetNameConflictPolicy = 'suffix';
  let conflictGiven = false;

  for (const arg of argv) {
    if (arg.startsWith('--producer=')) {
      const value = arg.slice('--producer='.length);
      if (!isProducer(value)) throw new Error(`Unknown producer "${value}". ${USAGE}`);
      producer = value;
    } else if (arg.startsWith('--on-conflict=')) {
      const value = arg.slice('--on-conflict='.length);
      if (!isConflictPolicy(value)) throw new Error(`Unknown conflict policy "${value}". ${USAGE}`);
      sheetNameConflict = value;
      conflictGiven = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}". ${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  const [inputPath, outputPath, ...extra] = positional;
  if (!inputPath || !outputPath || extra.length > 0) {
    throw new Error(USAGE);
  }
  if (producer === 'ai' && conflictGiven) {
    throw new Error('--on-conflict only applies to --producer=engine');
  }
  return { inputPath, outputPath, producer, sheetNameConflict };
}
