import { TextTooLongError } from "../errors";

export type ChunkOptions = {
  /** preferred upper bound for a chunk; sentences are packed up to it */
  chunkChars: number;
  /** a single clause longer than this cannot be synthesised and is rejected */
  hardLimit: number;
};

const SENTENCE_MARKS: ReadonlySet<string> = new Set([".", "!", "?", "…", "。", "！", "？"]);
const CLAUSE_MARKS: ReadonlySet<string> = new Set([",", ";", ":", "，", "；", "：", "、"]);
const CLOSERS: ReadonlySet<string> = new Set(['"', "'", "”", "’", ")", "]", "」", "』", "）"]);
const SPEAKABLE = /[\p{L}\p{N}]/u;
const WHITESPACE = /\s/;

// full-width marks end a unit even without a following space
function isFullWidth(ch: string): boolean {
  return ch.charCodeAt(0) > 0x2fff;
}

// ASCII marks only split before whitespace or the end, so "3.14" stays whole
function splitAfter(text: string, marks: ReadonlySet<string>): string[] {
  const pieces: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === "\n") {
      pieces.push(text.slice(start, i + 1));
      start = i + 1;
      i++;
      continue;
    }

    if (marks.has(ch)) {
      let end = i + 1;
      while (end < text.length && (marks.has(text[end]) || CLOSERS.has(text[end]))) end++;

      if (end === text.length || WHITESPACE.test(text[end]) || isFullWidth(ch)) {
        pieces.push(text.slice(start, end));
        start = end;
      }
      i = end;
      continue;
    }

    i++;
  }

  if (start < text.length) pieces.push(text.slice(start));
  return pieces;
}

function pushChunk(chunks: string[], raw: string) {
  const chunk = raw.replace(/\s+/g, " ").trim();
  if (SPEAKABLE.test(chunk)) chunks.push(chunk);
}

export function splitIntoChunks(text: string, opts: ChunkOptions): string[] {
  const pieces: string[] = [];

  for (const sentence of splitAfter(text, SENTENCE_MARKS)) {
    if (sentence.trim().length <= opts.chunkChars) {
      pieces.push(sentence);
      continue;
    }
    for (const clause of splitAfter(sentence, CLAUSE_MARKS)) {
      const len = clause.trim().length;
      if (len > opts.hardLimit) throw new TextTooLongError(len, opts.hardLimit);
      pieces.push(clause);
    }
  }

  const chunks: string[] = [];
  let current = "";
  for (const piece of pieces) {
    if (current.trim() && (current + piece).trim().length > opts.chunkChars) {
      pushChunk(chunks, current);
      current = piece;
    } else {
      current += piece;
    }
  }
  pushChunk(chunks, current);

  return chunks;
}
