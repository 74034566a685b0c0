/**
 * Analyze a local document from the command line
 *
 * Usage:
 *   npm run analyze -- <path> [--format pdf|docx|plain]
 *
 * Prints the report as JSON on stdout. Aborts (unreadable file, unsupported
 * format, extraction failure, text too short) go to stderr with exit code 1.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { detectDocumentFormat } from '../extraction/formatDetection.js';
import type { AnalysisPipeline } from '../services/analysis/AnalysisPipeline.js';
import { toAnalysisResponse } from '../services/analysis/reportSerializer.js';
import type { AnalysisResponse } from '../services/analysis/types.js';
import { BadRequestError } from '../types/errors.js';

export interface AnalyzeFileOptions {
  filePath: string;
  format?: string;
}

export const USAGE = 'Usage: analyze-file <path> [--format pdf|docx|plain]';

/**
 * Parse command line arguments
 * @throws BadRequestError when the path is missing or an option is incomplete
 */
export function parseAnalyzeFileArgs(args: string[]): AnalyzeFileOptions {
  let filePath: string | undefined;
  let format: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--format') {
      format = args[++i];
      if (!format) {
        throw new BadRequestError(`--format requires a value. ${USAGE}`);
      }
    } else if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (!filePath) {
      filePath = arg;
    } else {
      throw new BadRequestError(`Unexpected argument '${arg}'. ${USAGE}`);
    }
  }

  if (!filePath) {
    throw new BadRequestError(USAGE);
  }
  return { filePath, format };
}

/**
 * Read a file, detect its format from the name and run the pipeline
 */
export async function analyzeFile(pipeline: AnalysisPipeline, options: AnalyzeFileOptions): Promise<AnalysisResponse> {
  const content = await readFile(options.filePath);
  const filename = basename(options.filePath);

  const report = await pipeline.analyze({
    kind: 'document',
    document: { content, format: options.format ?? detectDocumentFormat(filename), filename },
  });
  return toAnalysisResponse(report);
}
