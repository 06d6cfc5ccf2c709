#!/usr/bin/env node
/**
 * qrtext CLI
 *
 * Reads a PDF whose characters are printed as QR codes and writes the
 * recovered text, UTF-8, next to the requested output path.
 */

import 'dotenv/config';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { QRTextExtractor } from './index.js';
import { parseArgs, USAGE, type CliArgs } from './cli/args.js';
import { timestampedPath } from './cli/output-path.js';

const EXIT_MISSING_INPUT = 1;
const EXIT_EXTRACTION_FAILED = 2;

function buildExtractor(args: CliArgs): QRTextExtractor {
  const extractor = new QRTextExtractor({
    zoom: args.zoom,
    normalizeEmbeddedText: args.normalizeEmbedded
  });
  if (args.marker !== undefined) extractor.setMarker(args.marker);
  if (args.pageSeparator !== undefined) extractor.setPageSeparator(args.pageSeparator);
  if (args.concurrency !== undefined) extractor.setMaxConcurrentPages(args.concurrency);
  if (args.timeoutMs !== undefined) extractor.setPageTimeout(args.timeoutMs);
  return extractor;
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2), process.env);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return EXIT_MISSING_INPUT;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const inputPath = resolve(args.input);
  if (!existsSync(inputPath)) {
    console.error(`Input file not found: ${inputPath}`);
    return EXIT_MISSING_INPUT;
  }

  let text: string;
  try {
    const pdfBuffer = readFileSync(inputPath);
    const output = await buildExtractor(args).extract(new Uint8Array(pdfBuffer));
    text = output.text;
    console.log(
      `   Pages: ${output.metadata.pageCount} ` +
        `(text layer ${output.metadata.embeddedPages}, QR ${output.metadata.symbolPages}, ` +
        `empty ${output.metadata.emptyPages}, failed ${output.metadata.failedPages})`
    );
  } catch (error) {
    console.error(`Extraction failed: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_EXTRACTION_FAILED;
  }

  const requested = resolve(args.output);
  const outputPath = args.timestamp ? timestampedPath(requested) : requested;
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, text, 'utf-8');
  console.log(`Wrote result to: ${outputPath}`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_EXTRACTION_FAILED;
  });
