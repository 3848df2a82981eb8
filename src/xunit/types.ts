// Typed summary of an xUnit v2+ result file, as consumed by the presentation layer.
// Format reference: https://xunit.net/docs/format-xml-v2

/**
 * Outcome recorded by xUnit. Anything else found in a result file is kept
 * verbatim and treated as a failure by the presentation layer.
 */
export type TestOutcome = 'Pass' | 'Fail' | 'Skip' | 'NotRun';

/** Casing/splitting rules applied while turning identifiers into sentences. */
export interface NamingOptions {
  noSplit: readonly string[];
  noTransform: readonly string[];
}

export interface TestFailure {
  exceptionType: string;
  message: string;
  stackTrace: string;
}

export interface TestCase {
  /** Human-readable name of the test. */
  readonly name: string;
  readonly result: TestOutcome | string;
  /** Seconds the test took to run. */
  readonly time: number;
  readonly failure?: TestFailure;
  readonly skipReason?: string;
}

export interface TestGroup {
  name: string;
  tests: TestCase[];
  groups: TestGroup[];
}

/** Failure that happened outside of a single test, e.g. while disposing a fixture. */
export interface EnvironmentError {
  name: string;
  type: string;
  message: string;
}

export interface Assembly {
  /** File name of the assembly, without its directory. */
  name: string;
  fullName: string;
  targetFramework: string;
  testFramework: string;
  errorCount: number;
  passedCount: number;
  failedCount: number;
  skippedCount: number;
  notRunCount: number;
  totalCount: number;
  runDate: string;
  runTime: string;
  /** Seconds the assembly took to run. */
  time: number;
  timeRtf: string;
  environmentErrors: EnvironmentError[];
  /** Tests of the assembly, one root group per trait. */
  testGroups: TestGroup[];
}

export interface TestRun {
  computer: string;
  user: string;
  startTimeRtf: string;
  endTimeRtf: string;
  timestamp: string;
  assemblies: Assembly[];
}
