import { splitCamelCase } from '../utils/camelcase.js';
import { toSentence } from '../utils/words.js';
import type { NamingOptions } from './types.js';

/**
 * C# identifiers can't contain spaces, and the default name of a test is the
 * `.`-joined chain of namespace, class(es) and method. A name with a space is
 * therefore a display name set by the author and is used as-is.
 */
export function hasDisplayName(name: string): boolean {
  return name.includes(' ');
}

/** Nested classes are joined with `+` in a test's fully-qualified name. */
export function isNested(name: string): boolean {
  return !hasDisplayName(name) && name.includes('+');
}

/** Turn a single identifier (`SubScenario`) into a sentence (`Sub scenario`). */
export function identifierToSentence(identifier: string, naming: NamingOptions): string {
  return toSentence(splitCamelCase(identifier, { noSplit: naming.noSplit }), {
    noTransform: naming.noTransform,
  });
}

/**
 * Human-readable name of a test: the display name when there is one,
 * otherwise the method name rendered as a sentence.
 */
export function friendlyName(name: string, naming: NamingOptions): string {
  if (hasDisplayName(name)) {
    return name;
  }

  return identifierToSentence(name.slice(name.lastIndexOf('.') + 1), naming);
}

/**
 * Labels of the groups a nested test belongs to, outermost first.
 *
 * `NS.Outer+Inner+Leaf.Method` yields the labels for `Outer`, `Inner` and
 * `Leaf`. Tests that aren't nested belong to no group.
 */
export function groupPath(name: string, naming: NamingOptions): string[] {
  if (!isNested(name)) {
    return [];
  }

  const chunks = name.split('+');
  const first = chunks[0];
  const last = chunks[chunks.length - 1];
  const identifiers = [
    first.slice(first.lastIndexOf('.') + 1),
    ...chunks.slice(1, -1),
    last.split('.')[0],
  ];

  return identifiers.map((identifier) => identifierToSentence(identifier, naming));
}

/** Label of the group collecting every test that declares the given trait. */
export function traitLabel(trait: { name: string; value: string }): string {
  return `${trait.name} - ${trait.value}`;
}
