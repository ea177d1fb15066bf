import { LRUCache } from "lru-cache";
import * as FS from "node:fs";
import * as Path from "node:path";
import type { Logger } from "./data.js";
import {
  EmptyDocumentError,
  IndexOutOfRangeError,
  MissingResourceError,
} from "./errors.js";
import { tokenizer } from "./text.js";
import type { Vocab } from "./vocab.js";

export type Label = 0 | 1;

/** tokenized text as the corpus hands it out */
export type FrozenText = readonly (readonly number[])[];

/** tokenized review */
export type Item = Readonly<{
  text: FrozenText;
  label: Label;
  /** number of sentences */
  length: number;
  maxSentenceLength: number;
}>;

/**
 * what to do with a review that tokenizes to no sentences
 * - skip: leave it out of the corpus
 * - fail: abort the load
 * - zero: keep it with both lengths at 0
 */
export type EmptyDocuments = "skip" | "fail" | "zero";

export type CorpusOptions = {
  sntClip?: number;
  txtClip?: number;
  abbreviations?: string[];
  cacheSize?: number;
  emptyDocuments?: EmptyDocuments;
  logger?: Logger;
};

/** labeled review corpus of one split */
export type Corpus = {
  readonly root: string;
  readonly vocab: Vocab;
  readonly length: number;
  readonly paths: readonly string[];
  readonly labels: readonly Label[];
  /** sentence count per review, the sampler key */
  readonly lengths: readonly number[];
  readonly maxSentenceLengths: readonly number[];
  /** reviews left out for having no sentences */
  readonly skipped: readonly string[];
  /** memoized item at index */
  get: (index: number) => Item;
};

// number of reviews in imdb
export const CACHE_SIZE = 50_000;

/** review file name, <id>_<rating>.txt */
const REVIEW = /^.*_.*\.txt$/;

const CLASSES: ReadonlyArray<[directory: string, label: Label]> = [
  ["neg", 0],
  ["pos", 1],
];

/** load a corpus split from `root/{neg,pos}` */
export const load = (
  root: string,
  vocab: Vocab,
  opts: CorpusOptions = {}
): Corpus => {
  const {
    cacheSize = CACHE_SIZE,
    emptyDocuments = "skip",
    logger = console.log,
  } = opts;
  if (!FS.existsSync(root))
    throw new MissingResourceError(`corpus root not found: ${root}`, root);
  const tokenize = tokenizer(vocab, opts);
  const files = CLASSES.flatMap(([directory, label]) =>
    reviews(Path.join(root, directory)).map((path) => ({ path, label }))
  );

  const paths: string[] = [];
  const texts: FrozenText[] = [];
  const labels: Label[] = [];
  const lengths: number[] = [];
  const maxSentenceLengths: number[] = [];
  const skipped: string[] = [];

  logger(`dataset loading from ${root}`);
  for (const { path, label } of files) {
    const { text, maxSentenceLength, length } = tokenize(
      FS.readFileSync(path, { encoding: "utf-8" })
    );
    if (maxSentenceLength === null) {
      if (emptyDocuments === "fail") throw new EmptyDocumentError(path);
      if (emptyDocuments === "skip") {
        skipped.push(path);
        continue;
      }
    }
    paths.push(path);
    // frozen, every item shares these arrays
    texts.push(Object.freeze(text.map((sentence) => Object.freeze(sentence))));
    labels.push(label);
    lengths.push(length);
    maxSentenceLengths.push(maxSentenceLength ?? 0);
  }
  logger(
    `dataset loaded, ${paths.length} reviews` +
      (skipped.length ? `, ${skipped.length} empty reviews skipped` : "")
  );

  const cache = new LRUCache<number, Item>({ max: cacheSize });

  const get = (index: number): Item => {
    if (!Number.isInteger(index) || index < 0 || index >= texts.length)
      throw new IndexOutOfRangeError(index, texts.length);
    const cached = cache.get(index);
    if (cached) return cached;
    const item: Item = Object.freeze({
      text: texts[index],
      label: labels[index],
      length: lengths[index],
      maxSentenceLength: maxSentenceLengths[index],
    });
    cache.set(index, item);
    return item;
  };

  return {
    root,
    vocab,
    length: texts.length,
    paths,
    labels,
    lengths,
    maxSentenceLengths,
    skipped,
    get,
  };
};

/** review files of one class directory, sorted by name */
const reviews = (directory: string): string[] => {
  if (!FS.existsSync(directory) || !FS.statSync(directory).isDirectory())
    throw new MissingResourceError(
      `review directory not found: ${directory}`,
      directory
    );
  return FS.readdirSync(directory)
    .filter((name) => REVIEW.test(name))
    .sort()
    .map((name) => Path.join(directory, name));
};
