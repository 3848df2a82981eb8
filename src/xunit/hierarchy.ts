import type { TestCase, TestGroup } from './types.js';

/** A decoded test, ready to be placed in the group tree. */
export interface GroupEntry {
  test: TestCase;
  /** Nested group labels, outermost first. Empty for tests that aren't nested. */
  path: readonly string[];
  /** Trait labels declared on the test. Empty means "no trait". */
  traits: readonly string[];
}

/** Label of the root that collects tests without any trait. */
export const NO_TRAIT = '';

const createGroup = (name: string): TestGroup => ({ name, tests: [], groups: [] });

/**
 * Merge tests into one tree per trait.
 *
 * Roots are ordered by the first time their trait is seen; children by the
 * first time their label is seen under the same parent; tests keep their
 * original order. A test declaring several traits is placed under each of them.
 */
export function buildTestGroups(entries: readonly GroupEntry[]): TestGroup[] {
  const byTrait = new Map<string, GroupEntry[]>();

  for (const entry of entries) {
    const traits = entry.traits.length > 0 ? entry.traits : [NO_TRAIT];
    for (const trait of traits) {
      const bucket = byTrait.get(trait);
      if (bucket) {
        bucket.push(entry);
      } else {
        byTrait.set(trait, [entry]);
      }
    }
  }

  return Array.from(byTrait.entries()).map(([trait, traitEntries]) => {
    const root = createGroup(trait);
    for (const entry of traitEntries) {
      attach(root, entry);
    }
    return root;
  });
}

function attach(root: TestGroup, entry: GroupEntry): void {
  let current = root;

  for (const label of entry.path) {
    let child = current.groups.find((group) => group.name === label);
    if (!child) {
      child = createGroup(label);
      current.groups.push(child);
    }
    current = child;
  }

  current.tests.push(entry.test);
}
