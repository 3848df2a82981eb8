// Shape of an xUnit v2+ result document after fast-xml-parser is done with it.
// Attributes carry the `@_` prefix: `<assembly errors="1">` also has an `<errors>` child.
import { z } from 'zod';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Elements without attributes or children (`<traits />`) are parsed as an empty string.
const element = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === undefined || value === '' ? {} : value), schema);

const text = z.preprocess((value) => {
  if (isRecord(value)) return value['#text'] ?? '';
  return value ?? '';
}, z.string());

const attribute = z.string().default('');
const count = z.coerce.number().int().default(0);
const seconds = z.coerce.number().default(0);

export const FailureSchema = element(
  z.object({
    '@_exception-type': attribute,
    message: text,
    'stack-trace': text,
  })
);

export const TraitSchema = element(
  z.object({
    '@_name': attribute,
    '@_value': attribute,
  })
);

export const TestSchema = element(
  z.object({
    '@_id': attribute,
    '@_method': attribute,
    '@_name': attribute,
    '@_result': attribute,
    '@_source-file': attribute,
    '@_source-line': attribute,
    '@_time': seconds,
    '@_time-rtf': attribute,
    '@_type': attribute,
    failure: FailureSchema.optional(),
    output: text.optional(),
    reason: text.optional(),
    traits: element(z.object({ trait: z.array(TraitSchema).default([]) })),
    warnings: element(z.object({ warning: z.array(text).default([]) })),
  })
);

export const CollectionSchema = element(
  z.object({
    '@_id': attribute,
    '@_name': attribute,
    '@_total': count,
    '@_passed': count,
    '@_failed': count,
    '@_skipped': count,
    '@_not-run': count,
    '@_time': seconds,
    '@_time-rtf': attribute,
    test: z.array(TestSchema).default([]),
  })
);

export const EnvironmentErrorSchema = element(
  z.object({
    '@_name': attribute,
    '@_type': attribute,
    failure: FailureSchema.optional(),
  })
);

export const AssemblySchema = element(
  z.object({
    '@_id': attribute,
    '@_name': attribute,
    '@_config-file': attribute,
    '@_environment': attribute,
    '@_target-framework': attribute,
    '@_test-framework': attribute,
    '@_run-date': attribute,
    '@_run-time': attribute,
    '@_start-rtf': attribute,
    '@_finish-rtf': attribute,
    '@_time': seconds,
    '@_time-rtf': attribute,
    '@_total': count,
    '@_passed': count,
    '@_failed': count,
    '@_skipped': count,
    '@_not-run': count,
    '@_errors': count,
    collection: z.array(CollectionSchema).default([]),
    errors: element(z.object({ error: z.array(EnvironmentErrorSchema).default([]) })),
  })
);

export const ResultsSchema = z.object({
  assemblies: element(
    z.object({
      '@_id': attribute,
      '@_computer': attribute,
      '@_user': attribute,
      '@_schema-version': attribute,
      '@_start-rtf': attribute,
      '@_finish-rtf': attribute,
      '@_timestamp': attribute,
      assembly: z.array(AssemblySchema).default([]),
    })
  ),
});

export type RawResults = z.output<typeof ResultsSchema>;
export type RawAssembly = z.output<typeof AssemblySchema>;
export type RawTest = z.output<typeof TestSchema>;
export type RawFailure = z.output<typeof FailureSchema>;
