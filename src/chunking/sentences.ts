/** A trimmed sentence and the absolute offset of its first character. */
export interface SentenceSpan {
  readonly text: string;
  readonly start: number;
}

const SENTENCE_BREAK = /(?<=[.!?])\s+/g;

/**
 * Split on `.`, `!` or `?` followed by whitespace. Offsets are absolute:
 * `base` is the position of `text[0]` in the original document.
 */
export function splitSentences(text: string, base = 0): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  const push = (from: number, to: number) => {
    const raw = text.slice(from, to);
    const trimmed = raw.trim();
    if (!trimmed) return;
    spans.push({ text: trimmed, start: base + from + (raw.length - raw.trimStart().length) });
  };

  const re = new RegExp(SENTENCE_BREAK);
  let cursor = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    push(cursor, m.index);
    cursor = m.index + m[0].length;
  }
  push(cursor, text.length);
  return spans;
}

/**
 * Break a sentence longer than `maxSize` into pieces that fit, cutting at the
 * last whitespace inside the window or hard at `maxSize` when there is none.
 */
export function wrapSentence(span: SentenceSpan, maxSize: number): SentenceSpan[] {
  const { text } = span;
  if (text.length <= maxSize) return [span];

  const pieces: SentenceSpan[] = [];
  let offset = 0;
  while (text.length - offset > maxSize) {
    let cut = offset + maxSize;
    while (cut > offset && !/\s/.test(text[cut])) cut--;
    if (cut === offset) cut = offset + maxSize;
    const piece = text.slice(offset, cut).trimEnd();
    pieces.push({ text: piece, start: span.start + offset });
    offset = cut;
    while (offset < text.length && /\s/.test(text[offset])) offset++;
  }
  if (offset < text.length) pieces.push({ text: text.slice(offset), start: span.start + offset });
  return pieces;
}

function joinedLength(spans: readonly SentenceSpan[]): number {
  return spans.reduce((n, s, i) => n + s.text.length + (i > 0 ? 1 : 0), 0);
}

/**
 * Greedily pack sentences (joined by one space) into groups no longer than
 * `maxSize`. After each emitted group the next one is seeded with the last
 * `overlap` sentences, provided the emitted group held more than that and
 * the seed still leaves room for the incoming sentence.
 *
 * Every input sentence must already fit in `maxSize` (see {@link wrapSentence}).
 */
export function packSentences(
  spans: readonly SentenceSpan[],
  maxSize: number,
  overlap = 0,
): SentenceSpan[][] {
  const groups: SentenceSpan[][] = [];
  let current: SentenceSpan[] = [];
  let length = 0;

  for (const span of spans) {
    if (current.length > 0 && length + 1 + span.text.length > maxSize) {
      groups.push(current);
      let seed = overlap > 0 && current.length > overlap ? current.slice(-overlap) : [];
      while (seed.length > 0 && joinedLength(seed) + 1 + span.text.length > maxSize) {
        seed = seed.slice(1);
      }
      current = seed;
      length = joinedLength(current);
    }
    length += (current.length > 0 ? 1 : 0) + span.text.length;
    current.push(span);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Grow a last group shorter than `minSize` by moving trailing sentences of
 * the group before it, as long as the grown tail fits in `maxSize` and the
 * group it takes from stays at least `minSize` long.
 */
export function rebalanceTail(
  groups: readonly SentenceSpan[][],
  minSize: number,
  maxSize: number,
): SentenceSpan[][] {
  if (groups.length < 2) return [...groups];
  let prev = groups[groups.length - 2];
  let tail = groups[groups.length - 1];
  while (joinedLength(tail) < minSize && prev.length > 1) {
    const grown = [prev[prev.length - 1], ...tail];
    const kept = prev.slice(0, -1);
    if (joinedLength(grown) > maxSize || joinedLength(kept) < minSize) break;
    prev = kept;
    tail = grown;
  }
  return [...groups.slice(0, -2), prev, tail];
}

export function joinSentences(spans: readonly SentenceSpan[]): string {
  return spans.map((s) => s.text).join(" ");
}
