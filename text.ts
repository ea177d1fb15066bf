import natural from "natural";
import { InvalidArgumentError } from "./errors.js";
import type { Vocab } from "./vocab.js";

/** tokenized text, text[sentence][word] */
export type TText = number[][];

/** tokenizer output */
export type Tokenized = {
  text: TText;
  // null when the text has no sentences left
  maxSentenceLength: number | null;
  length: number;
};

export type Tokenizer = (raw: string) => Tokenized;

// clips were chosen as the 98% quantile of imdb reviews
export const SNT_CLIP = 100;
export const TXT_CLIP = 40;

/** abbreviations the sentence splitter keeps whole */
export const ABBREVIATIONS = ["mr.", "mrs.", "ms.", "dr.", "vs.", "etc."];

const TAG = /<.*?>/g;

/** replace markup tags with a space */
export const stripTags = (text: string): string => text.replace(TAG, " ");

/** keep the first `size` elements */
export const clip = <T>(items: T[], size: number): T[] => items.slice(0, size);

/**
 * create tokenizer over a vocabulary
 * pure for a given vocabulary and clip sizes
 */
export const tokenizer = (
  vocab: Vocab,
  opts: { sntClip?: number; txtClip?: number; abbreviations?: string[] } = {}
): Tokenizer => {
  const sntClip = opts.sntClip ?? SNT_CLIP;
  const txtClip = opts.txtClip ?? TXT_CLIP;
  assertClip("sntClip", sntClip);
  assertClip("txtClip", txtClip);

  const sentences = new natural.SentenceTokenizer(
    opts.abbreviations ?? ABBREVIATIONS
  );
  const words = new natural.WordPunctTokenizer();

  const ids = (sentence: string): number[] => {
    const out: number[] = [];
    for (const word of words.tokenize(sentence)) {
      const id = vocab.get(word);
      // out-of-vocabulary words are dropped
      if (id !== undefined) out.push(id);
    }
    return out;
  };

  return (raw) => {
    const plain = stripTags(raw.toLowerCase());
    const split = plain.trim() === "" ? [] : sentences.tokenize(plain);
    const text = clip(
      split.map((sentence) => clip(ids(sentence), sntClip)),
      txtClip
    );
    return {
      text,
      maxSentenceLength: text.length
        ? Math.max(...text.map((sentence) => sentence.length))
        : null,
      length: text.length,
    };
  };
};

const assertClip = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0)
    throw new InvalidArgumentError(
      `${name} must be a non-negative integer, got ${value}`,
      name
    );
};
