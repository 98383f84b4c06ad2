export interface ReconcilerOptions {
  /** Shortest suffix/prefix match accepted as real overlap. */
  minOverlapChars: number;
  /** How much of the committed tail is compared against a new fragment. */
  maxOverlapChars: number;
  caseInsensitive: boolean;
  collapseWhitespace: boolean;
}

export interface ReconcileResult {
  transcript: string;
  delta: string;
  /** Normalized characters of the fragment matched against the committed tail. */
  overlapChars: number;
  discontinuity: boolean;
}

interface NormalizedText {
  text: string;
  /** `sourceIndex[i]` is the position in the original string of normalized char `i`. */
  sourceIndex: number[];
}

export const DEFAULT_RECONCILER_OPTIONS: ReconcilerOptions = {
  minOverlapChars: 3,
  maxOverlapChars: 200,
  caseInsensitive: true,
  collapseWhitespace: true,
};

/**
 * Stitches overlapping window transcriptions into one append-only transcript.
 *
 * Consecutive windows share audio, so a fragment usually restates the end of
 * the committed text. The longest committed suffix that is also a fragment
 * prefix is dropped from the fragment; when no such overlap of at least
 * `minOverlapChars` exists the whole fragment is appended and flagged as a
 * discontinuity.
 */
export class TranscriptReconciler {
  private readonly options: ReconcilerOptions;

  constructor(options: Partial<ReconcilerOptions> = {}) {
    this.options = { ...DEFAULT_RECONCILER_OPTIONS, ...options };
  }

  reconcile(committed: string, fragmentText: string): ReconcileResult {
    const fragment = fragmentText.trim();

    if (!fragment) {
      return { transcript: committed, delta: '', overlapChars: 0, discontinuity: false };
    }

    if (!committed.trim()) {
      return { transcript: fragment, delta: fragment, overlapChars: 0, discontinuity: false };
    }

    const tail = committed.slice(-this.options.maxOverlapChars);
    const normalizedTail = this.normalize(tail).text;
    const normalizedFragment = this.normalize(fragment);

    const overlap = longestSuffixPrefix(normalizedTail, normalizedFragment.text);

    if (overlap >= this.options.minOverlapChars) {
      const cut = normalizedFragment.sourceIndex[overlap - 1] + 1;
      const delta = fragment.slice(cut);
      return {
        transcript: committed + delta,
        delta,
        overlapChars: overlap,
        discontinuity: false,
      };
    }

    const delta = /\s$/.test(committed) ? fragment : ` ${fragment}`;
    return {
      transcript: committed + delta,
      delta,
      overlapChars: 0,
      discontinuity: true,
    };
  }

  private normalize(input: string): NormalizedText {
    let text = '';
    const sourceIndex: number[] = [];
    let previousWasSpace = false;

    for (let i = 0; i < input.length; i++) {
      let ch = input[i];
      const isSpace = /\s/.test(ch);

      if (this.options.collapseWhitespace && isSpace) {
        if (previousWasSpace) continue;
        ch = ' ';
      }
      previousWasSpace = isSpace;

      // lower-casing can lengthen a character; every output unit maps back to i
      const out = this.options.caseInsensitive ? ch.toLowerCase() : ch;
      text += out;
      for (let j = 0; j < out.length; j++) sourceIndex.push(i);
    }

    return { text, sourceIndex };
  }
}

/** Length of the longest suffix of `a` that is also a prefix of `b`. */
export function longestSuffixPrefix(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  for (let k = max; k > 0; k--) {
    if (a.endsWith(b.slice(0, k))) return k;
  }
  return 0;
}
