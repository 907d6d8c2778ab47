/**
 * Tests for summary assembly and one-pass analysis
 */

import { describe, expect, test, vi } from 'vitest';
import { FormatError, SequenceError, ValidationError } from '../../src/errors';
import { linesFromString } from '../../src/io/stream-utils';
import { BasicStatsAccumulator } from '../../src/operations/stats';
import { analyzeFasta, analyzeLines, assembleSummary } from '../../src/operations/summary';

const TWO_RECORDS = '>id1 desc\nACGT\nACGT\n>id2\nGGGG\n';

async function* asyncLines(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

describe('assembleSummary', () => {
  test('should include only the requested blocks', () => {
    const accumulator = new BasicStatsAccumulator();
    accumulator.addSequence('ACGT', 'a');
    const basic = accumulator.getSummary();

    expect(Object.keys(assembleSummary({ basic }))).toEqual(['basic']);
    expect(Object.keys(assembleSummary({ basic, detailed: true }))).toEqual([
      'basic',
      'lengthStats',
      'gcStats',
      'nStats',
    ]);
  });

  test('should deep-freeze the result', () => {
    const accumulator = new BasicStatsAccumulator();
    accumulator.addSequence('ACGT', 'a');
    const summary = assembleSummary({ basic: accumulator.getSummary(), detailed: true });

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.basic)).toBe(true);
    expect(Object.isFrozen(summary.lengthStats?.histogram?.counts)).toBe(true);
  });

  test('should leave the input blocks mutable', () => {
    const accumulator = new BasicStatsAccumulator();
    accumulator.addSequence('ACGT', 'a');
    const basic = accumulator.getSummary();
    const summary = assembleSummary({ basic, detailed: true });

    expect(Object.isFrozen(basic.basic)).toBe(false);
    expect(Object.isFrozen(basic.lengthStats)).toBe(false);
    expect(Object.isFrozen(basic.lengthStats.histogram?.counts)).toBe(false);
    expect(summary.lengthStats).toEqual(basic.lengthStats);
    expect(summary.lengthStats).not.toBe(basic.lengthStats);
  });
});

describe('analyzeLines', () => {
  test('should report the basic block by default', () => {
    const summary = analyzeLines(linesFromString(TWO_RECORDS));

    expect(Object.keys(summary)).toEqual(['basic']);
    expect(summary.basic.sequenceCount).toBe(2);
    expect(summary.basic.totalLength).toBe(12);
    expect(summary.basic.gcCount).toBe(8);
  });

  test('should add every requested block', () => {
    const summary = analyzeLines(linesFromString(TWO_RECORDS), {
      detailed: true,
      assembly: true,
      geneSet: true,
      outliers: 'iqr',
    });

    expect(Object.keys(summary).sort()).toEqual([
      'assemblyStats',
      'basic',
      'gcStats',
      'geneSetStats',
      'lengthStats',
      'nStats',
      'outliers',
    ]);
    expect(summary.assemblyStats?.n50).toBe(8);
    expect(summary.assemblyStats?.l50).toBe(1);
    expect(summary.assemblyStats?.auN).toBeCloseTo(80 / 12, 10);
    expect(summary.outliers?.outliers).toEqual([]);
    expect(Object.isFrozen(summary.assemblyStats?.nx[0])).toBe(true);
  });

  test('should report null metrics for input without records', () => {
    const summary = analyzeLines([], { assembly: true, outliers: 'zscore' });

    expect(summary.basic.sequenceCount).toBe(0);
    expect(summary.basic.meanLength).toBeNull();
    expect(summary.basic.gcFraction).toBeNull();
    expect(summary.assemblyStats?.n50).toBeNull();
    expect(summary.assemblyStats?.auN).toBeNull();
    expect(summary.outliers?.outliers).toEqual([]);
  });

  test('should apply distribution overrides', () => {
    const summary = analyzeLines(linesFromString(TWO_RECORDS), {
      detailed: true,
      assembly: true,
      distribution: { nxValues: [90], histogramBins: 2 },
    });

    expect(summary.assemblyStats?.nx).toEqual([{ x: 90, nx: 4, lx: 2 }]);
    expect(summary.lengthStats?.histogram?.counts).toEqual([1, 1]);
  });

  test('should pass the GC denominator to the accumulator', () => {
    const summary = analyzeLines(['>a', 'GGNN'], { gcDenominator: 'unambiguous' });

    expect(summary.basic.gcFraction).toBe(1);
  });

  test('should forward parser options', () => {
    const onWarning = vi.fn();
    analyzeLines(['>a', '>b', 'AC'], { parser: { onWarning } });

    expect(onWarning).toHaveBeenCalledWith("Sequence 'a': empty sequence", 1);
    expect(() =>
      analyzeLines(['>a', '>b', 'AC'], { parser: { emptySequencePolicy: 'error' } })
    ).toThrow(SequenceError);
  });

  test('should propagate fatal format errors', () => {
    expect(() => analyzeLines(['ACGT', '>a', 'AC'])).toThrow(FormatError);
  });

  test('should reject invalid settings', () => {
    expect(() => analyzeLines(['>a', 'AC'], { distribution: { nxValues: [150] } })).toThrow(
      ValidationError
    );
  });
});

describe('analyzeFasta', () => {
  test('should match the synchronous analysis', async () => {
    const options = { detailed: true, assembly: true, geneSet: true } as const;
    const lines = linesFromString(TWO_RECORDS);

    await expect(analyzeFasta(asyncLines(lines), options)).resolves.toEqual(
      analyzeLines(lines, options)
    );
  });
});
