import { describe, it, expect } from 'vitest';
import { parseArgs, unescapeSeparator, DEFAULT_INPUT, DEFAULT_OUTPUT } from '../../src/cli/args.js';
import { DEFAULT_ZOOM } from '../../src/core/defaults.js';

describe('parseArgs', () => {
  it('should fall back to defaults with no arguments', () => {
    expect(parseArgs([])).toEqual({
      input: DEFAULT_INPUT,
      output: DEFAULT_OUTPUT,
      zoom: DEFAULT_ZOOM,
      marker: undefined,
      normalizeEmbedded: false,
      timestamp: true,
      help: false
    });
  });

  it('should read input and output paths in order', () => {
    const args = parseArgs(['scan.pdf', 'out/text.txt']);
    expect(args.input).toBe('scan.pdf');
    expect(args.output).toBe('out/text.txt');
  });

  it('should parse every option', () => {
    const args = parseArgs([
      'in.pdf',
      '--zoom',
      '6',
      '--marker',
      '#',
      '--page-separator',
      '\\n---\\n',
      '--concurrency',
      '3.7',
      '--timeout',
      '5000',
      '--normalize-embedded',
      '--no-timestamp'
    ]);

    expect(args).toMatchObject({
      input: 'in.pdf',
      output: DEFAULT_OUTPUT,
      zoom: 6,
      marker: '#',
      pageSeparator: '\n---\n',
      concurrency: 3,
      timeoutMs: 5000,
      normalizeEmbedded: true,
      timestamp: false
    });
  });

  it('should take zoom and marker from the environment', () => {
    const args = parseArgs([], { QRTEXT_ZOOM: '2.5', QRTEXT_MARKER: '|' });
    expect(args.zoom).toBe(2.5);
    expect(args.marker).toBe('|');
  });

  it('should let flags override the environment', () => {
    expect(parseArgs(['--zoom', '8'], { QRTEXT_ZOOM: '2' }).zoom).toBe(8);
  });

  it('should recognise help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('should reject bad numbers', () => {
    expect(() => parseArgs(['--zoom', '0'])).toThrow('--zoom expects a positive number, got "0"');
    expect(() => parseArgs(['--zoom', 'big'])).toThrow('--zoom expects a positive number, got "big"');
    expect(() => parseArgs(['--timeout'])).toThrow('--timeout expects a positive number, got nothing');
    expect(() => parseArgs([], { QRTEXT_ZOOM: '-1' })).toThrow('QRTEXT_ZOOM expects a positive number, got "-1"');
  });

  it('should reject unknown options and extra paths', () => {
    expect(() => parseArgs(['--dpi', '300'])).toThrow('Unknown option: --dpi');
    expect(() => parseArgs(['a.pdf', 'b.txt', 'c.txt'])).toThrow(
      'Expected at most an input and an output path, got 3 paths'
    );
  });

  it('should reject a missing or empty marker', () => {
    expect(() => parseArgs(['--marker'])).toThrow('--marker expects a value');
    expect(() => parseArgs(['--marker', ''])).toThrow('--marker expects a non-empty value');
  });
});

describe('unescapeSeparator', () => {
  it('should turn escape sequences into characters', () => {
    expect(unescapeSeparator('\\n\\t\\\\')).toBe('\n\t\\');
  });

  it('should leave other text alone', () => {
    expect(unescapeSeparator('--page--')).toBe('--page--');
  });
});
