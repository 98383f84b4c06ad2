import { TranscriptReconciler, longestSuffixPrefix } from '../../src/services/streaming/TranscriptReconciler';

describe('TranscriptReconciler', () => {
  const reconciler = new TranscriptReconciler();

  test('drops the restated overlap from a fragment', () => {
    const result = reconciler.reconcile('hello wor', 'world how are you');
    expect(result).toEqual({
      transcript: 'hello world how are you',
      delta: 'ld how are you',
      overlapChars: 3,
      discontinuity: false,
    });
  });

  test('matches overlap ignoring case', () => {
    const result = reconciler.reconcile('The quick brown', 'Brown fox jumps');
    expect(result.delta).toBe(' fox jumps');
    expect(result.transcript).toBe('The quick brown fox jumps');
  });

  test('matches overlap across differing whitespace and cuts in the original text', () => {
    const result = reconciler.reconcile('see you  later', 'you   later  alligator');
    expect(result.overlapChars).toBe(9);
    expect(result.delta).toBe('  alligator');
    expect(result.transcript).toBe('see you  later  alligator');
  });

  test('fragment fully contained in the committed tail adds nothing', () => {
    const result = reconciler.reconcile('one two three', 'two three');
    expect(result.delta).toBe('');
    expect(result.transcript).toBe('one two three');
    expect(result.discontinuity).toBe(false);
  });

  test('no overlap appends the fragment with a separator and flags a discontinuity', () => {
    const result = reconciler.reconcile('good morning', 'completely different');
    expect(result).toEqual({
      transcript: 'good morning completely different',
      delta: ' completely different',
      overlapChars: 0,
      discontinuity: true,
    });
  });

  test('overlap shorter than the minimum counts as a discontinuity', () => {
    const result = reconciler.reconcile('I saw a', 'a cat');
    expect(result.delta).toBe(' a cat');
    expect(result.transcript).toBe('I saw a a cat');
    expect(result.discontinuity).toBe(true);
  });

  test('no separator is added after trailing whitespace', () => {
    const result = reconciler.reconcile('hello ', 'xyz abc');
    expect(result.transcript).toBe('hello xyz abc');
    expect(result.delta).toBe('xyz abc');
  });

  test('first fragment becomes the transcript', () => {
    const result = reconciler.reconcile('', '  hello there ');
    expect(result.transcript).toBe('hello there');
    expect(result.delta).toBe('hello there');
    expect(result.discontinuity).toBe(false);
  });

  test('empty fragment leaves the transcript unchanged', () => {
    const result = reconciler.reconcile('kept text', '   ');
    expect(result).toEqual({ transcript: 'kept text', delta: '', overlapChars: 0, discontinuity: false });
  });

  test('only the configured tail of the transcript is compared', () => {
    const narrow = new TranscriptReconciler({ maxOverlapChars: 5 });
    const result = narrow.reconcile('abcdefghij', 'defghijk');
    expect(result.discontinuity).toBe(true);
    expect(result.delta).toBe(' defghijk');
  });

  test('case-sensitive mode treats differently cased text as new', () => {
    const strict = new TranscriptReconciler({ caseInsensitive: false });
    const result = strict.reconcile('The quick brown', 'Brown fox');
    expect(result.discontinuity).toBe(true);
    expect(result.transcript).toBe('The quick brown Brown fox');
  });
});

describe('longestSuffixPrefix', () => {
  test('finds the longest suffix that is also a prefix', () => {
    expect(longestSuffixPrefix('abcab', 'abx')).toBe(2);
    expect(longestSuffixPrefix('hello', 'hello')).toBe(5);
    expect(longestSuffixPrefix('abc', 'xyz')).toBe(0);
    expect(longestSuffixPrefix('', 'abc')).toBe(0);
  });
});
