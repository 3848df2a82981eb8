import { describe, expect, it } from 'vitest';
import { splitCamelCase } from '../../src/utils/camelcase.js';

describe('splitCamelCase', () => {
  it('splits at every uppercase boundary', () => {
    expect(splitCamelCase('FullyQualifiedName')).toEqual(['Fully', 'Qualified', 'Name']);
  });

  it('keeps an acronym apart from the word that follows it', () => {
    expect(splitCamelCase('PDFLoader')).toEqual(['PDF', 'Loader']);
    expect(splitCamelCase('DBSyncerTest')).toEqual(['DB', 'Syncer', 'Test']);
  });

  it('keeps trailing digits with their word', () => {
    expect(splitCamelCase('Scenario2')).toEqual(['Scenario2']);
  });

  it('splits a lowercase prefix from the following word', () => {
    expect(splitCamelCase('iPhone')).toEqual(['i', 'Phone']);
  });

  it('returns empty input as a single segment', () => {
    expect(splitCamelCase('')).toEqual(['']);
  });

  it('returns malformed UTF-16 unchanged', () => {
    const input = 'Bad UTF-16 (\uD800)';
    expect(splitCamelCase(input)).toEqual([input]);
  });

  it('treats non-ASCII uppercase letters as boundaries', () => {
    expect(splitCamelCase('ÉcoleNormale')).toEqual(['École', 'Normale']);
  });

  it('never cuts a surrogate pair in half', () => {
    expect(splitCamelCase('Test😀Case')).toEqual(['Test😀', 'Case']);
  });

  describe('with no-split literals', () => {
    it('keeps a literal whole in the middle of an identifier', () => {
      const words = splitCamelCase('XHostBuilderY', { noSplit: ['HostBuilder'] });
      expect(words).toEqual(['X', 'HostBuilder', 'Y']);
      expect(splitCamelCase('XHostBuilderY')).toEqual(['X', 'Host', 'Builder', 'Y']);
    });

    it('keeps a literal whole after a lowercase word', () => {
      expect(splitCamelCase('UseHostBuilder', { noSplit: ['HostBuilder'] })).toEqual([
        'Use',
        'HostBuilder',
      ]);
    });

    it('keeps an acronym-led literal whole and splits what follows', () => {
      expect(splitCamelCase('DBSyncerTest', { noSplit: ['DBSyncer'] })).toEqual([
        'DBSyncer',
        'Test',
      ]);
    });
  });

  it('reproduces the input when the segments are concatenated', () => {
    const inputs = [
      'FullyQualifiedName',
      'PDFLoader',
      'XMLHttpRequestHandler',
      'already lower case',
      'Mixed_Snake_Case42',
      'ABC',
    ];

    for (const input of inputs) {
      expect(splitCamelCase(input, { noSplit: ['HttpRequest'] }).join('')).toBe(input);
    }
  });
});
