import { describe, it, expect } from 'vitest';
import { LineSplitter, OutputCollector } from './command.js';

describe('LineSplitter', () => {
  it('emits complete lines across chunk boundaries', () => {
    const lines: string[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push('Building seg');
    splitter.push('ment\nWriting');
    expect(lines).toEqual(['Building segment']);

    splitter.push(' audio\n');
    expect(lines).toEqual(['Building segment', 'Writing audio']);
  });

  it('treats carriage returns as line ends and skips blank lines', () => {
    const lines: string[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push('chunk:  10%\rchunk:  20%\r\n\n  \n');
    expect(lines).toEqual(['chunk:  10%', 'chunk:  20%']);
  });

  it('flushes a trailing partial line', () => {
    const lines: string[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push('Done.');
    expect(lines).toEqual([]);
    splitter.flush();
    expect(lines).toEqual(['Done.']);
  });
});

describe('OutputCollector', () => {
  it('keeps a multi-byte character split across chunks intact', () => {
    const lines: string[] = [];
    const collector = new OutputCollector(1024, (line) => lines.push(line));
    const bytes = Buffer.from('Café €5\n', 'utf8');

    collector.push(bytes.subarray(0, 4));
    collector.push(bytes.subarray(4, 8));
    collector.push(bytes.subarray(8));

    expect(lines).toEqual(['Café €5']);
    expect(collector.end()).toBe('Café €5\n');
  });

  it('stops capturing past the size limit but still streams lines', () => {
    const lines: string[] = [];
    const collector = new OutputCollector(4, (line) => lines.push(line));

    collector.push(Buffer.from('abcd\n'));
    collector.push(Buffer.from('efgh\n'));

    expect(collector.end()).toBe('abcd\n');
    expect(lines).toEqual(['abcd', 'efgh']);
  });
});
