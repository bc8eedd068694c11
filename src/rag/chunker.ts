import { v5 as uuidv5 } from 'uuid';

import type { DocChunk, PageText } from './schema';

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export type TextSpan = {
  text: string;
  start: number;
  end: number;
};

const CHUNK_ID_NAMESPACE = '3f6c1d52-8a4e-4b0f-9d27-5e8b1c0a7f64';

// Preferred break points, strongest first. A break lands right after the separator.
const SEPARATOR_TIERS: string[][] = [['\n\n'], ['\n'], ['. ', '? ', '! '], [' ']];

const assertOptions = ({ chunkSize, chunkOverlap }: ChunkingOptions): void => {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, received ${chunkSize}.`);
  }

  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, chunkSize), received ${chunkOverlap} with chunkSize ${chunkSize}.`,
    );
  }
};

const findBreak = (text: string, start: number, hardEnd: number, minEnd: number): number => {
  const window = text.slice(start, hardEnd);

  for (const tier of SEPARATOR_TIERS) {
    let best = -1;

    for (const separator of tier) {
      const index = window.lastIndexOf(separator);
      if (index >= 0) {
        best = Math.max(best, start + index + separator.length);
      }
    }

    if (best > minEnd) {
      return best;
    }
  }

  return hardEnd;
};

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

const findNextStart = (text: string, start: number, end: number, overlap: number): number => {
  const lower = Math.max(end - overlap, start + 1);

  for (let position = lower; position <= end; position += 1) {
    if (/\s/.test(text[position - 1] ?? '') && !/\s/.test(text[position])) {
      return position;
    }
  }

  // Never start inside a surrogate pair.
  for (let position = lower; position < end; position += 1) {
    if (!isLowSurrogate(text.charCodeAt(position))) {
      return position;
    }
  }

  return end;
};

/**
 * Splits text into overlapping spans of at most `chunkSize` characters.
 * Consecutive spans share at most `chunkOverlap` characters and leave no gaps.
 * Lengths are in UTF-16 code units, and no span boundary splits a surrogate pair.
 */
export const splitText = (text: string, options: ChunkingOptions): TextSpan[] => {
  assertOptions(options);

  const { chunkSize, chunkOverlap } = options;
  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + chunkSize, text.length);
    const minEnd = start + Math.max(chunkOverlap, Math.floor(chunkSize / 2));
    let end = hardEnd === text.length ? hardEnd : findBreak(text, start, hardEnd, minEnd);

    // A cut must not split a surrogate pair; a lone astral character is kept whole.
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end = end - 1 > start ? end - 1 : end + 1;
    }

    spans.push({ text: text.slice(start, end), start, end });

    if (end >= text.length) {
      break;
    }

    start = findNextStart(text, start, end, chunkOverlap);
  }

  return spans;
};

export const createChunkId = (source: string, page: number, chunkIndex: number): string =>
  uuidv5(`${source}#${page}#${chunkIndex}`, CHUNK_ID_NAMESPACE);

export const chunkPage = (page: PageText, options: ChunkingOptions): DocChunk[] =>
  splitText(page.text, options).map<DocChunk>((span, chunkIndex) => ({
    id: createChunkId(page.source, page.page, chunkIndex),
    content: span.text,
    metadata: {
      source: page.source,
      page: page.page,
      chunkIndex,
      start: span.start,
      end: span.end,
    },
  }));

/** Inverse of {@link splitText}: drops each span's overlap with its predecessor. */
export const joinSpans = (spans: TextSpan[]): string =>
  spans
    .map((span, index) => (index === 0 ? span.text : span.text.slice(spans[index - 1].end - span.start)))
    .join('');
