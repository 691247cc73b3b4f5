import type { TranscriptSegment, WordTimestamp } from "../types.js";
import { InvalidArgumentError, MissingWordTimestampsError } from "../errors.js";
import { createSegment, createWord } from "./model.js";

/**
 * Split segments into smaller segments of at most `maxWords` words each.
 *
 * Every input segment must carry word-level timestamps. Words that are blank
 * after trimming are dropped first; a segment left with no words produces no
 * output. Chunks never cross segment boundaries, and each new segment takes its
 * start/end from its first/last word and its text from the trimmed words joined
 * by single spaces. Inputs are not mutated.
 */
export function splitSegmentsByMaxWords(
  segments: readonly TranscriptSegment[],
  maxWords: number
): TranscriptSegment[] {
  if (!Number.isInteger(maxWords) || maxWords <= 0) {
    throw new InvalidArgumentError(`max_words must be a positive integer, got ${maxWords}`);
  }

  const split: TranscriptSegment[] = [];

  for (const segment of segments) {
    if (segment.words === undefined) {
      throw new MissingWordTimestampsError();
    }

    // An empty list counts as present: the segment is skipped, not rejected
    const words = segment.words.filter((w) => w.word.trim() !== "");
    if (words.length === 0) continue;

    for (let i = 0; i < words.length; i += maxWords) {
      const chunk = words.slice(i, i + maxWords).map(copyWord);
      const first = chunk[0];
      const last = chunk[chunk.length - 1];
      const text = chunk.map((w) => w.word.trim()).join(" ");
      split.push(createSegment(first.start, last.end, text, chunk));
    }
  }

  return split;
}

function copyWord(w: WordTimestamp): WordTimestamp {
  return createWord(w.start, w.end, w.word);
}
