import { describe, it, expect } from 'vitest';
import { ProgressReporter, renderProgress, type ReporterStream } from '../reporters/ProgressReporter.js';

const captureStream = (isTTY: boolean): ReporterStream & { chunks: string[] } => {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write: chunk => {
      chunks.push(chunk);
      return true;
    },
  };
};

describe('renderProgress', () => {
  it('draws a bar with the counter and current file', () => {
    expect(renderProgress({ phase: 'normalizing', current: 1, total: 4, currentFile: 'news/a.txt' })).toBe(
      'Normalizing to TXT [#####...............] 1/4 news/a.txt'
    );
  });

  it('shows only the label while the total is unknown', () => {
    expect(renderProgress({ phase: 'scanning', current: 0, total: 0 })).toBe('Scanning sources');
  });
});

describe('ProgressReporter', () => {
  it('redraws the status line in place on a terminal', () => {
    const stream = captureStream(true);
    const reporter = new ProgressReporter(stream);

    reporter.update({ phase: 'reconciling', current: 0, total: 0 });
    reporter.complete('done');

    const line = 'Reconciling source and destination trees';
    expect(stream.chunks).toEqual([line, `\r${' '.repeat(line.length)}\r`, '\x1b[32m✓\x1b[0m done\n']);
  });

  it('stays quiet off a terminal but keeps warnings and prints errors', () => {
    const stream = captureStream(false);
    const reporter = new ProgressReporter(stream);

    reporter.update({ phase: 'normalizing', current: 2, total: 4 });
    reporter.complete('done');
    reporter.warn('1 files were not reported by their tasks');
    reporter.error('boom');

    expect(reporter.warnings).toEqual(['1 files were not reported by their tasks']);
    expect(stream.chunks).toEqual(['\x1b[31m✗\x1b[0m boom\n']);
  });
});
