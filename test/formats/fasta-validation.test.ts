/**
 * Tests for FASTA validation mode
 */

import { describe, expect, test, vi } from 'vitest';
import { FastaParser } from '../../src/formats/fasta';
import { linesFromString } from '../../src/io/stream-utils';

async function* asyncLines(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

describe('FastaParser validation', () => {
  test('should accept a well-formed file', () => {
    const result = new FastaParser().validateFormat(
      linesFromString('>id1 desc\nACGT\nACGT\n>id2\nGGGG\n')
    );

    expect(result).toEqual({ isValid: true, errors: [], warnings: [], recordCount: 2 });
  });

  test('should treat an empty input as valid with zero records', () => {
    expect(new FastaParser().validateFormat([])).toEqual({
      isValid: true,
      errors: [],
      warnings: [],
      recordCount: 0,
    });
  });

  test('should report sequence data before the first header with its line', () => {
    const result = new FastaParser().validateFormat(linesFromString('ACGT\n>a\nAC'));

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { lineNumber: 1, message: 'Sequence data found before the first header' },
    ]);
    expect(result.recordCount).toBe(0);
  });

  test('should stop at the first fatal error', () => {
    const result = new FastaParser().validateFormat(['>a', 'AC', '>', 'GT', '>b', 'TT']);

    expect(result.errors).toEqual([
      { lineNumber: 3, message: 'Header line has no sequence identifier' },
    ]);
    expect(result.recordCount).toBe(1);
  });

  test('should report binary content as a fatal error', () => {
    const result = new FastaParser().validateFormat(['>a', 'AC\u0000GT']);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { lineNumber: 2, message: 'Line contains binary data (NUL or undecodable bytes)' },
    ]);
  });

  test('should collect warnings without failing and without logging', () => {
    const onWarning = vi.fn();
    const result = new FastaParser({ onWarning }).validateFormat(['>a', '>a', 'AC']);

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      { lineNumber: 1, message: "Sequence 'a': empty sequence" },
      { lineNumber: 2, message: "Sequence 'a': duplicate id, first seen at line 1" },
    ]);
    expect(result.recordCount).toBe(2);
    expect(onWarning).not.toHaveBeenCalled();
  });

  test('should record escalated issues as errors and keep going', () => {
    const parser = new FastaParser({ emptySequencePolicy: 'error', duplicateIdPolicy: 'error' });
    const result = parser.validateFormat(['>a', '>b', 'AC', '>b', 'GT']);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { lineNumber: 1, message: "Sequence 'a': empty sequence" },
      { lineNumber: 4, message: "Sequence 'b': duplicate id, first seen at line 2" },
    ]);
    expect(result.warnings).toEqual([]);
    expect(result.recordCount).toBe(3);
  });

  test('should validate an async line source', async () => {
    const result = await new FastaParser().validateFormatAsync(
      asyncLines(['', '>a', 'ACGT', '', '>b', 'GG'])
    );

    expect(result).toEqual({ isValid: true, errors: [], warnings: [], recordCount: 2 });
  });

  test('should propagate cancellation instead of recording it', () => {
    const controller = new AbortController();
    controller.abort();
    const parser = new FastaParser({ signal: controller.signal });

    expect(() => parser.validateFormat(['>a', 'AC'])).toThrow('Operation was aborted');
  });
});
