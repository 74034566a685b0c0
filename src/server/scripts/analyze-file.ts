#!/usr/bin/env node
// Logs go to stderr so stdout carries only the JSON report; set before the logger loads
process.env.LOG_DESTINATION ??= 'stderr';

const { analyzeFile, parseAnalyzeFileArgs } = await import('../cli/analyzeFile.js');
const { validateEnv } = await import('../config/env.js');
const { createAnalysisPipeline } = await import('../services/analysis/index.js');
const { getErrorMessage } = await import('../types/errors.js');

try {
  const options = parseAnalyzeFileArgs(process.argv.slice(2));
  const pipeline = createAnalysisPipeline(validateEnv());
  const response = await analyzeFile(pipeline, options);
  console.log(JSON.stringify(response, null, 2));
} catch (error) {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(1);
}

export {};
