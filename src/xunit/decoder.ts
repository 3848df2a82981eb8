import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { type RawResults, ResultsSchema } from './schema.js';

export interface SourceLocation {
  line: number;
  column: number;
}

/** The document isn't well-formed XML, or isn't an xUnit v2+ result document. */
export class XunitDecodeError extends Error {
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation) {
    super(message);
    this.name = 'XunitDecodeError';
    this.location = location;
  }
}

// Elements that may repeat; fast-xml-parser would otherwise collapse a single occurrence into an object.
const REPEATED_ELEMENTS = new Set([
  'assemblies.assembly',
  'assemblies.assembly.collection',
  'assemblies.assembly.collection.test',
  'assemblies.assembly.collection.test.traits.trait',
  'assemblies.assembly.collection.test.warnings.warning',
  'assemblies.assembly.errors.error',
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (_tagName, jPath, _isLeafNode, isAttribute) =>
    !isAttribute && REPEATED_ELEMENTS.has(jPath),
});

const formatPath = (path: (string | number)[]): string =>
  path.map((segment) => String(segment).replace(/^@_/, '@')).join('.');

/**
 * Decode an xUnit v2+ XML document.
 * Throws XunitDecodeError when the document is malformed or has no `<assemblies>` root.
 */
export function decodeResults(xml: string): RawResults {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XunitDecodeError(`Invalid XML at line ${line}, column ${col}: ${msg}`, {
      line,
      column: col,
    });
  }

  const parsed: unknown = parser.parse(xml);
  if (typeof parsed !== 'object' || parsed === null || !('assemblies' in parsed)) {
    throw new XunitDecodeError('Not an xUnit v2+ result file: missing <assemblies> root element');
  }

  const result = ResultsSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${formatPath(issue.path)}: ${issue.message}`)
      .join('\n');
    throw new XunitDecodeError(`Unexpected xUnit v2+ content:\n${issues}`);
  }

  return result.data;
}
