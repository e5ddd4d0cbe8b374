import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createLineMatcher,
  search,
  searchCaseInsensitive,
  searchCaseSensitive,
  searchLines,
  splitLines,
} from '../../lib/search.js';
import {
  CRLF_CONTENTS,
  SAMPLE_CONTENTS,
  SAMPLE_LINES,
} from './fixtures/text-fixture.js';

const [, TESTING_LINE, LINE_UPPER] = SAMPLE_LINES;
const sampleLines: readonly string[] = SAMPLE_LINES;

void describe('splitLines', () => {
  void it('returns no lines for empty contents', () => {
    assert.deepStrictEqual(splitLines(''), []);
  });

  void it('keeps an unterminated final line', () => {
    assert.deepStrictEqual(splitLines('one\ntwo'), ['one', 'two']);
  });

  void it('does not add a line for a trailing newline', () => {
    assert.deepStrictEqual(splitLines('one\ntwo\n'), ['one', 'two']);
  });

  void it('keeps blank lines between content', () => {
    assert.deepStrictEqual(splitLines('a\n\nb'), ['a', '', 'b']);
  });

  void it('treats a lone newline as one empty line', () => {
    assert.deepStrictEqual(splitLines('\n'), ['']);
  });

  void it('drops the carriage return of CRLF endings', () => {
    assert.deepStrictEqual(splitLines('a\r\nb\r\n'), ['a', 'b']);
  });

  void it('keeps a carriage return that does not precede a newline', () => {
    assert.deepStrictEqual(splitLines('a\rb\nc\r'), ['a\rb', 'c\r']);
  });
});

void describe('createLineMatcher', () => {
  void it('matches literally without pattern syntax', () => {
    const matches = createLineMatcher('a.c', true);
    assert.strictEqual(matches('xa.cx'), true);
    assert.strictEqual(matches('abc'), false);
  });

  void it('folds both sides when case-insensitive', () => {
    const matches = createLineMatcher('HeLLo', false);
    assert.strictEqual(matches('say hello'), true);
    assert.strictEqual(matches('SAY HELLO'), true);
    assert.strictEqual(matches('help'), false);
  });
});

void describe('search', () => {
  void it('finds one result', () => {
    assert.deepStrictEqual(search('Testing', SAMPLE_CONTENTS, true), [
      TESTING_LINE,
    ]);
  });

  void it('finds multiple results in file order', () => {
    assert.deepStrictEqual(search('contains', SAMPLE_CONTENTS, true), [
      TESTING_LINE,
      LINE_UPPER,
    ]);
  });

  void it('respects case when case-sensitive', () => {
    assert.deepStrictEqual(search('line', SAMPLE_CONTENTS, true), [
      TESTING_LINE,
    ]);
  });

  void it('ignores case when case-insensitive', () => {
    assert.deepStrictEqual(search('lInE', SAMPLE_CONTENTS, false), [
      TESTING_LINE,
      LINE_UPPER,
    ]);
  });

  void it('matches every line for an empty query', () => {
    assert.deepStrictEqual(search('', 'a\n\nb', true), ['a', '', 'b']);
  });

  void it('returns nothing for empty contents', () => {
    assert.deepStrictEqual(search('', '', true), []);
    assert.deepStrictEqual(search('x', '', false), []);
  });

  void it('returns nothing when the query is longer than every line', () => {
    assert.deepStrictEqual(
      search('This is a string that is longer', SAMPLE_CONTENTS, true),
      []
    );
  });

  void it('keeps duplicate lines', () => {
    assert.deepStrictEqual(search('dup', 'dup\nother\ndup', true), [
      'dup',
      'dup',
    ]);
  });

  void it('returns original text for case-insensitive matches', () => {
    assert.deepStrictEqual(search('rust', 'Rust:\nTrust me.\nsafe', false), [
      'Rust:',
      'Trust me.',
    ]);
  });

  void it('matches across CRLF contents without the carriage return', () => {
    assert.deepStrictEqual(search('alpha', CRLF_CONTENTS, false), [
      'alpha',
      'Alphabet',
    ]);
  });

  void it('returns identical results for identical inputs', () => {
    const first = search('contains', SAMPLE_CONTENTS, false);
    const second = search('contains', SAMPLE_CONTENTS, false);
    assert.deepStrictEqual(first, second);
  });

  void it('does not modify the input lines', () => {
    const lines = ['b', 'a', 'b'];
    searchLines('b', lines, true);
    assert.deepStrictEqual(lines, ['b', 'a', 'b']);
  });

  void it('returns a subsequence of the input lines', () => {
    for (const query of ['', 'a', 'contains', 'LINE', 'zzz']) {
      for (const caseSensitive of [true, false]) {
        const results = search(query, SAMPLE_CONTENTS, caseSensitive);
        let cursor = 0;
        for (const line of results) {
          cursor = sampleLines.indexOf(line, cursor) + 1;
          assert.ok(cursor > 0, `${line} not found in order`);
        }
      }
    }
  });

  void it('folds case like a sensitive search over lowercased text', () => {
    for (const query of ['lInE', 'IT', 'Testing', 'the above']) {
      const insensitive = search(query, SAMPLE_CONTENTS, false);
      const lowered = search(
        query.toLowerCase(),
        SAMPLE_CONTENTS.toLowerCase(),
        true
      );
      assert.deepStrictEqual(
        insensitive.map((line) => line.toLowerCase()),
        lowered
      );
    }
  });
});

void describe('named variants', () => {
  void it('searchCaseSensitive delegates with case respected', () => {
    assert.deepStrictEqual(searchCaseSensitive('line', SAMPLE_CONTENTS), [
      TESTING_LINE,
    ]);
  });

  void it('searchCaseInsensitive delegates with case folded', () => {
    assert.deepStrictEqual(searchCaseInsensitive('lInE', SAMPLE_CONTENTS), [
      TESTING_LINE,
      LINE_UPPER,
    ]);
  });
});
