import { describe, it, expect } from 'vitest';
import { printParseSummary } from './summary.js';
import { logger, setLogLevel } from '../utils/logger.js';

class CapturedOutput {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

describe('printParseSummary', () => {
  it('counts every attempted document and the failures', () => {
    const out = new CapturedOutput();

    printParseSummary({ parsed: 4, failed: 1 }, out);

    expect(out.chunks).toEqual(['Parsed 5 articles, 1 with errors\n']);
  });

  it('is printed even when the log level hides info messages', () => {
    const previous = logger.level;
    setLogLevel('warn');
    const out = new CapturedOutput();

    try {
      printParseSummary({ parsed: 0, failed: 0 }, out);
    } finally {
      logger.level = previous;
    }

    expect(out.chunks).toEqual(['Parsed 0 articles, 0 with errors\n']);
  });
});
