import { DEFAULT_ZOOM } from '../core/defaults.js';

export interface CliArgs {
  input: string;
  output: string;
  zoom: number;
  marker?: string;
  pageSeparator?: string;
  concurrency?: number;
  timeoutMs?: number;
  normalizeEmbedded: boolean;
  timestamp: boolean;
  help: boolean;
}

export const DEFAULT_INPUT = 'document.pdf';
export const DEFAULT_OUTPUT = 'result.txt';

export const USAGE = `Usage: qrtext [input.pdf] [output.txt] [options]

Options:
  --zoom <n>               Render scale for QR decoding (default ${DEFAULT_ZOOM}, env QRTEXT_ZOOM)
  --marker <c>             Paragraph marker character (default "+", env QRTEXT_MARKER)
  --page-separator <s>     Text placed between pages; \\n and \\t are unescaped (default none)
  --concurrency <n>        Pages processed at once (default 1)
  --timeout <ms>           Per-page limit for rendering and detection (default none)
  --normalize-embedded     Strip whitespace from text layers and apply the marker
  --no-timestamp           Write to the output path as given
  -h, --help               Show this message`;

function parsePositiveNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${flag} expects a positive number, got ${raw === undefined ? 'nothing' : `"${raw}"`}`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined) {
    throw new Error(`${flag} expects a value`);
  }
  return raw;
}

export function unescapeSeparator(raw: string): string {
  return raw.replace(/\\([nt\\])/g, (_, ch: string) => (ch === 'n' ? '\n' : ch === 't' ? '\t' : '\\'));
}

/**
 * Flags win over environment variables, which win over built-in defaults.
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CliArgs {
  const out: CliArgs = {
    input: DEFAULT_INPUT,
    output: DEFAULT_OUTPUT,
    zoom: env.QRTEXT_ZOOM ? parsePositiveNumber('QRTEXT_ZOOM', env.QRTEXT_ZOOM) : DEFAULT_ZOOM,
    marker: env.QRTEXT_MARKER || undefined,
    normalizeEmbedded: false,
    timestamp: true,
    help: false
  };

  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--zoom') out.zoom = parsePositiveNumber(a, argv[++i]);
    else if (a === '--marker') out.marker = requireValue(a, argv[++i]);
    else if (a === '--page-separator') out.pageSeparator = unescapeSeparator(requireValue(a, argv[++i]));
    else if (a === '--concurrency') out.concurrency = Math.floor(parsePositiveNumber(a, argv[++i]));
    else if (a === '--timeout') out.timeoutMs = parsePositiveNumber(a, argv[++i]);
    else if (a === '--normalize-embedded') out.normalizeEmbedded = true;
    else if (a === '--no-timestamp') out.timestamp = false;
    else if (a === '-h' || a === '--help') out.help = true;
    else if (a.startsWith('--')) throw new Error(`Unknown option: ${a}`);
    else positional.push(a);
  }

  if (positional.length > 2) {
    throw new Error(`Expected at most an input and an output path, got ${positional.length} paths`);
  }
  if (positional[0]) out.input = positional[0];
  if (positional[1]) out.output = positional[1];
  if (out.marker === '') {
    throw new Error('--marker expects a non-empty value');
  }

  return out;
}
