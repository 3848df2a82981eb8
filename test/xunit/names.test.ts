import { describe, expect, it } from 'vitest';
import {
  friendlyName,
  groupPath,
  hasDisplayName,
  isNested,
  traitLabel,
} from '../../src/xunit/names.js';
import type { NamingOptions } from '../../src/xunit/types.js';

const plain: NamingOptions = { noSplit: [], noTransform: [] };

describe('test name decoding', () => {
  describe('classification', () => {
    it('treats names with a space as display names', () => {
      expect(hasDisplayName('A test with a display name.')).toBe(true);
      expect(hasDisplayName('NS1.Class.TestMethod')).toBe(false);
    });

    it('treats `+` in a structured name as nesting', () => {
      expect(isNested('NS1.Outer+Inner.Method')).toBe(true);
      expect(isNested('NS1.Class.TestMethod')).toBe(false);
    });

    it('never treats a display name as nested', () => {
      expect(isNested('One + one equals two')).toBe(false);
    });
  });

  describe('friendlyName', () => {
    it('returns display names unchanged', () => {
      expect(friendlyName('A test with a display name.', plain)).toBe('A test with a display name.');
    });

    it('renders the method name as a sentence', () => {
      expect(friendlyName('NS1.Class.SubClass.TestClass.TestMethod', plain)).toBe('Test method');
    });

    it('uses the whole name when there is no namespace', () => {
      expect(friendlyName('NoNamespaceMethod', plain)).toBe('No namespace method');
    });

    it('uses the segment after the last dot of a nested name', () => {
      expect(
        friendlyName('NS1.Class.SubClass.TestClass+Method+Scenario+SubScenario.Result', plain)
      ).toBe('Result');
    });

    it('returns an empty name for a trailing dot', () => {
      expect(friendlyName('NS1.Class.', plain)).toBe('');
    });
  });

  describe('groupPath', () => {
    it('decodes the nested class chain outermost first', () => {
      expect(
        groupPath('NS1.Class.SubClass.TestClass+Method+Scenario+SubScenario.Result', plain)
      ).toEqual(['Test class', 'Method', 'Scenario', 'Sub scenario']);
    });

    it('is empty for tests that are not nested', () => {
      expect(groupPath('NS1.Class.TestMethod', plain)).toEqual([]);
      expect(groupPath('Display name + with a plus', plain)).toEqual([]);
    });

    it('handles a last chunk without a method name', () => {
      expect(groupPath('NS.Outer+Inner', plain)).toEqual(['Outer', 'Inner']);
    });

    it('applies no-split and no-transform rules to every label', () => {
      const naming: NamingOptions = {
        noSplit: ['DbSynchronizer'],
        noTransform: ['DbSynchronizer'],
      };
      expect(groupPath('NS.DbSynchronizerTests+WhenSyncing.Works', naming)).toEqual([
        'DbSynchronizer tests',
        'When syncing',
      ]);
    });

    it('degrades to empty labels for degenerate names', () => {
      expect(groupPath('+', plain)).toEqual(['', '']);
    });
  });

  describe('traitLabel', () => {
    it('joins name and value verbatim', () => {
      expect(traitLabel({ name: 'Category', value: 'Unit' })).toBe('Category - Unit');
      expect(traitLabel({ name: 'areaName', value: 'FooBar' })).toBe('areaName - FooBar');
    });
  });
});
