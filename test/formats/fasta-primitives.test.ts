/**
 * Tests for FASTA line primitives and the record state machine
 */

import { describe, expect, test } from 'vitest';
import {
  buildSymbolLookup,
  countSymbols,
  isBlankLine,
  isGarbledLine,
  parseHeaderLine,
  parseNcbiIdentifier,
} from '../../src/formats/fasta/primitives';
import { FastaParser } from '../../src/formats/fasta';
import { FastaRecordAssembler } from '../../src/formats/fasta/state-machine';
import type { RecordIssue } from '../../src/formats/fasta/types';

describe('FASTA primitives', () => {
  test('should parse id and trimmed description', () => {
    expect(parseHeaderLine('>seq1\tsample  one  ')).toEqual({
      id: 'seq1',
      description: 'sample  one',
      fullHeader: 'seq1\tsample  one',
    });
  });

  test('should return null for a header without an identifier', () => {
    expect(parseHeaderLine('>')).toBeNull();
    expect(parseHeaderLine('>   ')).toBeNull();
  });

  test('should require four pipe-delimited fields for NCBI ids', () => {
    expect(parseNcbiIdentifier('sp|P12345|NAME')).toBeUndefined();
    expect(parseNcbiIdentifier('plain_id')).toBeUndefined();
    expect(parseNcbiIdentifier('gb|AB000001|x|AB000001.1')?.accession).toBe('AB000001.1');
  });

  test('should classify blank and garbled lines', () => {
    expect(isBlankLine(' \t\r')).toBe(true);
    expect(isBlankLine('N')).toBe(false);
    expect(isGarbledLine('AC\u0000')).toBe(true);
    expect(isGarbledLine('AC\uFFFD')).toBe(true);
    expect(isGarbledLine('ACGT')).toBe(false);
  });

  test('should keep gc, ambiguous and other counts summing to length', () => {
    const counts = countSymbols('ACGTRYKM-*acgtn xX', buildSymbolLookup('NRYSWKMBDHV'));

    expect(counts).toEqual({ length: 17, gcCount: 4, nCount: 5, otherCount: 8 });
    expect(counts.gcCount + counts.nCount + counts.otherCount).toBe(counts.length);
  });

  test('should count a symbol outside the BMP once', () => {
    expect(countSymbols('\u{1F600}A', buildSymbolLookup('N'))).toEqual({
      length: 2,
      gcCount: 0,
      nCount: 0,
      otherCount: 2,
    });
    expect(countSymbols('\uD800A', buildSymbolLookup('N')).length).toBe(2);
  });

  test('should match ambiguity symbols by code point', () => {
    const lookup = buildSymbolLookup('\u{1F600}N');

    expect(lookup.has(0x1f600)).toBe(true);
    expect(lookup.has(0xd83d)).toBe(false);
    expect(countSymbols('\u{1F600}n', lookup)).toMatchObject({ length: 2, nCount: 2 });
  });

  test('should report record lengths in code points', () => {
    const [record] = [...new FastaParser().parseString('>s\n\u{1F600}A')];

    expect(record).toMatchObject({ id: 's', length: 2, otherCount: 2 });
  });
});

describe('FastaRecordAssembler', () => {
  const settings = {
    retainSequence: false,
    emptySequencePolicy: 'warning',
    duplicateIdPolicy: 'error',
    ambiguousSymbols: 'N',
  } as const;

  test('should emit a record when the next header arrives', () => {
    const assembler = new FastaRecordAssembler(settings, () => {});

    expect(assembler.push('>a', 1)).toBeUndefined();
    expect(assembler.push('ACNN', 2)).toBeUndefined();
    expect(assembler.push('>b', 3)).toMatchObject({ id: 'a', length: 4, nCount: 2 });
    expect(assembler.finish()).toMatchObject({ id: 'b', length: 0 });
    expect(assembler.recordCount).toBe(2);
  });

  test('should attach the configured policy to each issue', () => {
    const issues: RecordIssue[] = [];
    const assembler = new FastaRecordAssembler(settings, (issue) => issues.push(issue));

    for (const [index, line] of ['>a', '>a', 'AC'].entries()) {
      assembler.push(line, index + 1);
    }
    assembler.finish();

    expect(issues.map((issue) => [issue.kind, issue.policy, issue.lineNumber])).toEqual([
      ['empty-sequence', 'warning', 1],
      ['duplicate-id', 'error', 2],
    ]);
  });
});
