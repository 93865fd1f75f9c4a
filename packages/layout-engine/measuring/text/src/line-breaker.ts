import type { ResolvedStyle } from '@pagewright/contracts';
import { WIDTH_EPSILON } from '@pagewright/common';
import type { TextMeasurer } from './text-measurer.js';

/** Glyph appended to the fitted part of a hyphenated word. */
export const HYPHEN = '-';

export type StyledRun = {
  text: string;
  style: ResolvedStyle;
};

/** Position in the source runs: run index and UTF-16 offset inside that run. */
export type TextPosition = {
  run: number;
  offset: number;
};

export type LineSegment = {
  text: string;
  style: ResolvedStyle;
  /** Offset from the start of the line. */
  x: number;
  width: number;
  /** Index of the word this segment belongs to, counted from the start of the line. */
  word: number;
};

export type LaidOutLine = {
  segments: LineSegment[];
  /** Measured width, excluding trailing whitespace. */
  width: number;
  ascent: number;
  descent: number;
  lineHeight: number;
  /** Where the line's content starts in the source runs. */
  start: TextPosition;
  /** Where the line's content ends; the next line never starts before this. */
  end: TextPosition;
  /** The line ends with a hyphen glyph inserted at a hyphenation point. */
  hyphenated: boolean;
  /** The line is wider than the width it was broken at. */
  overflow: boolean;
  /** The line was ended by a newline in the text. */
  hardBreak: boolean;
};

type Fragment = {
  run: number;
  start: number;
  end: number;
  text: string;
  style: ResolvedStyle;
};

type SpanToken = { kind: 'word' | 'space'; fragments: Fragment[] };
type NewlineToken = { kind: 'newline'; run: number; offset: number; style: ResolvedStyle };
type Token = SpanToken | NewlineToken;

type WordPiece = {
  fragments: Fragment[];
  /** Break offsets relative to this piece, or null when not computed yet. */
  offsets: readonly number[] | null;
};

type OpenLine = {
  segments: LineSegment[];
  styles: ResolvedStyle[];
  width: number;
  words: number;
  start: TextPosition;
  end: TextPosition;
  hyphenated: boolean;
  overflow: boolean;
};

const classify = (char: string): Token['kind'] => {
  if (char === '\n') return 'newline';
  return /\s/.test(char) ? 'space' : 'word';
};

function tokenize(runs: readonly StyledRun[]): Token[] {
  const tokens: Token[] = [];
  runs.forEach((run, runIndex) => {
    const { text } = run;
    let index = 0;
    while (index < text.length) {
      const kind = classify(text[index]);
      if (kind === 'newline') {
        tokens.push({ kind, run: runIndex, offset: index, style: run.style });
        index += 1;
        continue;
      }
      let end = index + 1;
      while (end < text.length && classify(text[end]) === kind) end += 1;
      const fragment: Fragment = { run: runIndex, start: index, end, text: text.slice(index, end), style: run.style };

      // A word or space that continues across a run boundary stays one token.
      const last = tokens[tokens.length - 1];
      const lastFragment = last && last.kind !== 'newline' ? last.fragments[last.fragments.length - 1] : undefined;
      const continues =
        last !== undefined &&
        last.kind === kind &&
        index === 0 &&
        lastFragment !== undefined &&
        lastFragment.end === runs[lastFragment.run].text.length;
      if (continues) {
        last.fragments.push(fragment);
      } else {
        tokens.push({ kind, fragments: [fragment] });
      }
      index = end;
    }
  });
  return tokens;
}

const startOf = (fragments: readonly Fragment[]): TextPosition => ({
  run: fragments[0].run,
  offset: fragments[0].start,
});

const endOf = (fragments: readonly Fragment[]): TextPosition => {
  const last = fragments[fragments.length - 1];
  return { run: last.run, offset: last.end };
};

/** Splits fragments at an offset counted from the start of the first fragment's text. */
function splitFragments(fragments: readonly Fragment[], offset: number): [Fragment[], Fragment[]] {
  const head: Fragment[] = [];
  const tail: Fragment[] = [];
  let consumed = 0;
  for (const fragment of fragments) {
    const length = fragment.end - fragment.start;
    if (consumed + length <= offset) {
      head.push(fragment);
    } else if (consumed >= offset) {
      tail.push(fragment);
    } else {
      const local = offset - consumed;
      head.push({ ...fragment, end: fragment.start + local, text: fragment.text.slice(0, local) });
      tail.push({ ...fragment, start: fragment.start + local, text: fragment.text.slice(local) });
    }
    consumed += length;
  }
  return [head, tail];
}

/**
 * Greedy line filling.
 *
 * Words are maximal runs of non-whitespace and may cross run boundaries. A
 * word that does not fit after the words already on the line starts a new
 * line. A word wider than `maxWidth` on its own is hyphenated at the break
 * candidate that fits the most text (a prefix plus hyphen exactly as wide as
 * the line fits), or placed alone and flagged `overflow` when no candidate
 * fits. Newlines force a break; trailing whitespace never counts against the
 * width.
 */
export function breakLines(runs: readonly StyledRun[], maxWidth: number, measurer: TextMeasurer): LaidOutLine[] {
  const tokens = tokenize(runs);
  const lines: LaidOutLine[] = [];
  const limit = maxWidth + WIDTH_EPSILON;

  const measureFragments = (fragments: readonly Fragment[]): number =>
    fragments.reduce((width, fragment) => width + measurer.measure(fragment.text, fragment.style), 0);

  const openLine = (start: TextPosition): OpenLine => ({
    segments: [],
    styles: [],
    width: 0,
    words: 0,
    start,
    end: start,
    hyphenated: false,
    overflow: false,
  });

  const closeLine = (open: OpenLine, hardBreak: boolean, fallbackStyle: ResolvedStyle): LaidOutLine => {
    const styles = open.styles.length > 0 ? open.styles : [fallbackStyle];
    let ascent = 0;
    let descent = 0;
    let lineHeight = 0;
    for (const style of styles) {
      const metrics = measurer.lineMetrics(style);
      ascent = Math.max(ascent, metrics.ascent);
      descent = Math.max(descent, metrics.descent);
      lineHeight = Math.max(lineHeight, metrics.lineHeight);
    }
    return {
      segments: open.segments,
      width: open.width,
      ascent,
      descent,
      lineHeight,
      start: open.start,
      end: open.end,
      hyphenated: open.hyphenated,
      overflow: open.overflow || open.width > limit,
      hardBreak,
    };
  };

  const defaultStyle = runs[0]?.style;
  let line = openLine({ run: 0, offset: 0 });
  let pendingSpace = 0;
  let lastStyle: ResolvedStyle | undefined = defaultStyle;

  const append = (fragments: readonly Fragment[], x: number): void => {
    const wordIndex = line.words;
    let cursor = x;
    for (const fragment of fragments) {
      const width = measurer.measure(fragment.text, fragment.style);
      line.segments.push({ text: fragment.text, style: fragment.style, x: cursor, width, word: wordIndex });
      if (!line.styles.includes(fragment.style)) line.styles.push(fragment.style);
      cursor += width;
      lastStyle = fragment.style;
    }
    if (line.words === 0) line.start = startOf(fragments);
    line.width = cursor;
    line.words += 1;
    line.end = endOf(fragments);
    pendingSpace = 0;
  };

  const finishLine = (next: TextPosition): void => {
    lines.push(closeLine(line, false, lastStyle ?? line.styles[0]));
    line = openLine(next);
    pendingSpace = 0;
  };

  /** Picks the break offset that fits the widest prefix-plus-hyphen within the limit. */
  const hyphenate = (piece: WordPiece): { prefix: Fragment[]; rest: WordPiece } | null => {
    const offsets = piece.offsets ?? measurer.breakCandidates(piece.fragments.map((f) => f.text).join(''));
    let best: { offset: number; width: number } | null = null;
    for (const offset of offsets) {
      const [prefix] = splitFragments(piece.fragments, offset);
      const hyphenStyle = prefix[prefix.length - 1].style;
      const fitted = measureFragments(prefix) + measurer.measure(HYPHEN, hyphenStyle);
      if (fitted <= limit && (best === null || fitted > best.width)) {
        best = { offset, width: fitted };
      }
    }
    if (best === null) return null;
    const chosen = best.offset;
    const [prefix, tail] = splitFragments(piece.fragments, chosen);
    return {
      prefix,
      rest: { fragments: tail, offsets: offsets.filter((offset) => offset > chosen).map((offset) => offset - chosen) },
    };
  };

  const placeWord = (initial: WordPiece): void => {
    let piece = initial;
    for (;;) {
      const width = measureFragments(piece.fragments);
      if (line.words > 0) {
        if (line.width + pendingSpace + width <= limit) {
          append(piece.fragments, line.width + pendingSpace);
          return;
        }
        finishLine(startOf(piece.fragments));
      }
      if (width <= limit) {
        append(piece.fragments, 0);
        return;
      }
      const split = hyphenate(piece);
      if (!split) {
        append(piece.fragments, 0);
        line.overflow = true;
        return;
      }
      append(split.prefix, 0);
      const lastSegment = line.segments[line.segments.length - 1];
      const hyphenWidth = measurer.measure(HYPHEN, lastSegment.style);
      lastSegment.text += HYPHEN;
      lastSegment.width += hyphenWidth;
      line.width += hyphenWidth;
      line.hyphenated = true;
      finishLine(startOf(split.rest.fragments));
      piece = split.rest;
    }
  };

  for (const token of tokens) {
    if (token.kind === 'newline') {
      const next = { run: token.run, offset: token.offset + 1 };
      line.end = next;
      lines.push(closeLine(line, true, line.words > 0 ? (lastStyle ?? token.style) : token.style));
      line = openLine(next);
      pendingSpace = 0;
      lastStyle = token.style;
      continue;
    }
    if (token.kind === 'space') {
      if (line.words === 0) {
        // Leading whitespace is dropped; the line starts at the next word.
        line.start = endOf(token.fragments);
        line.end = line.start;
        continue;
      }
      pendingSpace = measureFragments(token.fragments);
      continue;
    }
    placeWord({ fragments: token.fragments, offsets: null });
  }

  if (line.words > 0) {
    lines.push(closeLine(line, false, lastStyle ?? line.styles[0]));
  }
  return lines;
}
