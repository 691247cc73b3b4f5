import type {
  Transcript,
  TranscriptDict,
  TranscriptSegment,
  TranscriptSegmentDict,
  WordTimestamp,
  WordTimestampDict,
} from "../types.js";

export function createWord(start: number, end: number, word: string): WordTimestamp {
  return Object.freeze({ start, end, word });
}

export function createSegment(
  start: number,
  end: number,
  text: string,
  words?: readonly WordTimestamp[]
): TranscriptSegment {
  if (words === undefined) {
    return Object.freeze({ start, end, text });
  }
  return Object.freeze({ start, end, text, words: Object.freeze([...words]) });
}

export function createTranscript(
  segments: readonly TranscriptSegment[],
  language: string | null = null
): Transcript {
  return Object.freeze({ language, segments: Object.freeze([...segments]) });
}

export function wordToDict(word: WordTimestamp): WordTimestampDict {
  return { start: word.start, end: word.end, word: word.word };
}

/**
 * `words` is omitted entirely when the segment carries no word data,
 * so consumers can tell it apart from a segment with an empty word list.
 */
export function segmentToDict(segment: TranscriptSegment): TranscriptSegmentDict {
  const data: TranscriptSegmentDict = {
    start: segment.start,
    end: segment.end,
    text: segment.text,
  };
  if (segment.words !== undefined) {
    data.words = segment.words.map(wordToDict);
  }
  return data;
}

/**
 * Unlike `words`, an undetected `language` is always emitted, as null.
 */
export function transcriptToDict(transcript: Transcript): TranscriptDict {
  return {
    language: transcript.language,
    segments: transcript.segments.map(segmentToDict),
  };
}
