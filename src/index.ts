/**
 * @fileoverview .NET Test Visualizer
 *
 * Turns xUnit v2+ XML result files into a grouped summary: tests are grouped
 * per trait and per nested class, and identifiers are rendered as sentences.
 *
 * @example Basic Usage
 * ```typescript
 * import { DEFAULT_CONFIG, readTestRunFile, toNamingOptions } from 'dotnet-test-visualizer';
 *
 * const run = await readTestRunFile('TestResults/results.xml', toNamingOptions(DEFAULT_CONFIG));
 * for (const assembly of run.assemblies) {
 *   console.log(assembly.name, assembly.testGroups);
 * }
 * ```
 */

// Identifier helpers
export * from './utils/camelcase.js';
export * from './utils/words.js';

// xUnit results
export * from './xunit/types.js';
export * from './xunit/names.js';
export * from './xunit/hierarchy.js';
export { decodeResults, XunitDecodeError, type SourceLocation } from './xunit/decoder.js';
export * from './xunit/reader.js';

// Configuration and services
export * from './config.js';
export * from './types.js';
export * from './logger.js';
export * from './cli/summary-formatters.js';
