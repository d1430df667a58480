import type { ParseResult } from '../pipeline.js';

/**
 * Where run summaries go; stdout unless a test passes its own
 */
export interface SummaryOutput {
  write(chunk: string): unknown;
}

/**
 * Final line of a parse run. Printed whatever the log level.
 */
export function printParseSummary(
  result: Pick<ParseResult, 'parsed' | 'failed'>,
  out: SummaryOutput = process.stdout
): void {
  out.write(`Parsed ${result.parsed + result.failed} articles, ${result.failed} with errors\n`);
}
