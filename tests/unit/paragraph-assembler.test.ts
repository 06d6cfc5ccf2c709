import { describe, it, expect } from 'vitest';
import {
  applyParagraphMarkers,
  assembleText,
  normalizeEmbeddedText
} from '../../src/core/layout/paragraph-assembler.js';
import type { SymbolRow } from '../../src/types/symbol.js';
import { symbolAt } from '../helpers/synthetic.js';

function rowOf(text: string, y: number): SymbolRow {
  return {
    symbols: Array.from(text).map((ch, i) => symbolAt(ch, i * 10, y)),
    yCenter: y
  };
}

describe('assembleText', () => {
  it('should turn the marker into a line break', () => {
    expect(assembleText([rowOf('Hi+', 0), rowOf('By', 20)])).toBe('Hi\nBy');
  });

  it('should not break between rows on its own', () => {
    expect(assembleText([rowOf('Hel', 0), rowOf('lo', 20)])).toBe('Hello');
  });

  it('should emit one break per marker', () => {
    expect(assembleText([rowOf('a++b', 0)])).toBe('a\n\nb');
  });

  it('should skip empty paragraphs when collapsing', () => {
    expect(assembleText([rowOf(' a ++', 0), rowOf('b ', 20)], { collapseEmptyParagraphs: true })).toBe('a\nb');
  });

  it('should use a custom marker and line break', () => {
    expect(assembleText([rowOf('one#two+three', 0)], { marker: '#', lineBreak: '\r\n' })).toBe('one\r\ntwo+three');
  });

  it('should return an empty string for no rows', () => {
    expect(assembleText([])).toBe('');
  });
});

describe('applyParagraphMarkers', () => {
  it('should never leave the marker in the output', () => {
    const out = applyParagraphMarkers('+start+middle++end+');
    expect(out).toBe('\nstart\nmiddle\n\nend\n');
    expect(out.includes('+')).toBe(false);
  });

  it('should reject an empty marker', () => {
    expect(() => applyParagraphMarkers('abc', { marker: '' })).toThrow('Paragraph marker must be a non-empty string');
  });
});

describe('normalizeEmbeddedText', () => {
  it('should drop layout whitespace and split paragraphs on the marker', () => {
    expect(normalizeEmbeddedText('Hel lo\nwor+ld +\n next')).toBe('Hellowor\nld\nnext');
  });

  it('should leave text without markers as one paragraph', () => {
    expect(normalizeEmbeddedText('  plain \n text ')).toBe('plaintext');
  });
});
