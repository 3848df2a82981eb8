import { readFile } from 'fs/promises';
import { decodeResults } from './decoder.js';
import { buildTestGroups, type GroupEntry } from './hierarchy.js';
import { friendlyName, groupPath, traitLabel } from './names.js';
import type { RawAssembly, RawFailure, RawResults, RawTest } from './schema.js';
import type { Assembly, NamingOptions, TestCase, TestFailure, TestRun } from './types.js';

/** The result file couldn't be read from disk. */
export class XunitReadError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'XunitReadError';
    this.path = path;
  }
}

/**
 * Build a TestRun from an xUnit v2+ XML document.
 * Throws XunitDecodeError when the document can't be decoded.
 */
export function loadTestRun(xml: string, naming: NamingOptions): TestRun {
  return readResults(decodeResults(xml), naming);
}

/** Read and load an xUnit v2+ result file. */
export async function readTestRunFile(path: string, naming: NamingOptions): Promise<TestRun> {
  let xml: string;
  try {
    xml = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new XunitReadError(`Unable to read ${path}: ${reason}`, path);
  }

  return loadTestRun(xml, naming);
}

export function readResults(results: RawResults, naming: NamingOptions): TestRun {
  const root = results.assemblies;

  return {
    computer: root['@_computer'],
    user: root['@_user'],
    startTimeRtf: root['@_start-rtf'],
    endTimeRtf: root['@_finish-rtf'],
    timestamp: root['@_timestamp'],
    assemblies: root.assembly.map((assembly) => readAssembly(assembly, naming)),
  };
}

/** File name of an assembly; result files produced on Windows use `\` as separator. */
export function assemblyName(fullName: string): string {
  const separator = fullName.includes('/') ? '/' : '\\';
  return fullName.slice(fullName.lastIndexOf(separator) + 1);
}

function readAssembly(assembly: RawAssembly, naming: NamingOptions): Assembly {
  const entries: GroupEntry[] = assembly.collection.flatMap((collection) =>
    collection.test.map((test) => ({
      test: readTestCase(test, naming),
      path: groupPath(test['@_name'], naming),
      traits: test.traits.trait.map((trait) =>
        traitLabel({ name: trait['@_name'], value: trait['@_value'] })
      ),
    }))
  );

  return {
    name: assemblyName(assembly['@_name']),
    fullName: assembly['@_name'],
    targetFramework: assembly['@_target-framework'],
    testFramework: assembly['@_test-framework'],
    errorCount: assembly['@_errors'],
    passedCount: assembly['@_passed'],
    failedCount: assembly['@_failed'],
    skippedCount: assembly['@_skipped'],
    notRunCount: assembly['@_not-run'],
    totalCount: assembly['@_total'],
    runDate: assembly['@_run-date'],
    runTime: assembly['@_run-time'],
    time: assembly['@_time'],
    timeRtf: assembly['@_time-rtf'],
    environmentErrors: assembly.errors.error.map((error) => ({
      name: error['@_name'],
      type: error['@_type'],
      message: error.failure?.message ?? '',
    })),
    testGroups: buildTestGroups(entries),
  };
}

function readFailure(failure: RawFailure): TestFailure {
  return {
    exceptionType: failure['@_exception-type'],
    message: failure.message,
    stackTrace: failure['stack-trace'],
  };
}

function readTestCase(test: RawTest, naming: NamingOptions): TestCase {
  return {
    name: friendlyName(test['@_name'], naming),
    result: test['@_result'],
    time: test['@_time'],
    ...(test.failure ? { failure: readFailure(test.failure) } : {}),
    ...(test.reason !== undefined ? { skipReason: test.reason } : {}),
  };
}
