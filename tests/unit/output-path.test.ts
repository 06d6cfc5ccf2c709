import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { formatTimestamp, timestampedPath } from '../../src/cli/output-path.js';

const when = new Date(2025, 9, 19, 8, 5, 3);

describe('formatTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatTimestamp(when)).toBe('251019_080503');
  });
});

describe('timestampedPath', () => {
  it('should insert the timestamp before the extension', () => {
    expect(timestampedPath('result.txt', when)).toBe('result_251019_080503.txt');
  });

  it('should keep the directory', () => {
    expect(timestampedPath(join('out', 'text.md'), when)).toBe(join('out', 'text_251019_080503.md'));
  });

  it('should add .txt when the path has no extension', () => {
    expect(timestampedPath('result', when)).toBe('result_251019_080503.txt');
  });
});
