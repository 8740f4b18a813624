import { parseArgs } from 'node:util';
import { loadConfig } from './lib/config';
import type { FusionConfig, FusionConfigInput } from './lib/config';
import { FusionError } from './lib/errors';
import { mergeSheets } from './lib/merge/mergeEngine';
import { formatWarnings, summarizeMerge } from './lib/merge/report';
import { composeFusionSheet } from './lib/output/composeFusionSheet';
import { ExcelWorkbook, outputPathFor } from './lib/workbook/excelWorkbook';

const USAGE = `Usage: score-fusion <workbook.xlsx> [options]

The first sheet holds the roster (names in column A, or A and B).
Every other sheet holds names followed by scores. No header rows.

Options:
  --max-edit-distance <n>  largest spelling difference accepted for a fuzzy match
  --no-partial-match       never match on a single shared name
  --sheet-name <name>      name of the generated sheet (default: Fusion)
  -h, --help               show this help`;

export interface CliOptions {
  inputPath: string;
  overrides: FusionConfigInput;
}

export class UsageError extends Error {}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'max-edit-distance': { type: 'string' },
        'no-partial-match': { type: 'boolean' },
        'sheet-name': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions | null {
  const parsed = parseRawArgs(argv);
  const { values, positionals } = parsed;
  if (values.help) return null;
  if (positionals.length !== 1) {
    throw new UsageError('Expected exactly one workbook path');
  }

  const overrides: FusionConfigInput = {};
  const maxEdit = values['max-edit-distance'];
  if (maxEdit !== undefined) {
    const n = Number(maxEdit);
    if (maxEdit.trim() === '' || !Number.isInteger(n)) {
      throw new UsageError(`--max-edit-distance expects an integer, got '${maxEdit}'`);
    }
    overrides.maxEditDistance = n;
  }
  if (values['no-partial-match']) overrides.partialTokenMatch = false;
  if (values['sheet-name'] !== undefined) overrides.outputSheetName = values['sheet-name'];

  return { inputPath: positionals[0], overrides };
}

export async function runFusion(inputPath: string, config: FusionConfig): Promise<string> {
  const workbook = await ExcelWorkbook.open(inputPath);
  const sheets = workbook.sheets();

  for (const sheet of sheets) {
    console.log(`[Fusion] Reading '${sheet.name}' sheet...`);
  }

  const result = mergeSheets(sheets, config);
  console.log(`[Fusion] Roster '${result.rosterSheetName}': ${result.students.length} students (${result.rosterLayout.nameWidth} name column(s))`);
  for (const block of result.blocks) {
    console.log(`[Fusion] '${block.sheetName}': ${block.rowCount} lines, ${block.scoreColumns} column(s) of scores`);
  }

  const output = composeFusionSheet(result, config);
  workbook.appendSheet(output, config.highlightColor);
  const outputPath = outputPathFor(inputPath);
  await workbook.save(outputPath);

  const summary = summarizeMerge(result);
  console.log(
    `[Fusion] Merged ${summary.highConfidence + summary.lowConfidence} rows (${summary.lowConfidence} to review), ${summary.unmatched} not merged`,
  );
  for (const line of formatWarnings(result.warnings, result.students)) {
    console.warn(`[Fusion] ${line}`);
  }
  console.log(`[Fusion] Written ${outputPath}`);
  return outputPath;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`[Fusion] ${err.message}\n\n${USAGE}`);
    return 2;
  }
  if (!options) {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(options.overrides, process.env);
    await runFusion(options.inputPath, config);
    return 0;
  } catch (err) {
    if (err instanceof FusionError) {
      console.error(`[Fusion] ${err.code}: ${err.message}`);
      return 1;
    }
    console.error('[Fusion] Unexpected error:', err instanceof Error ? err.message : String(err));
    return 1;
  }
}
