import * as Path from "node:path";
import { collate, type Batch } from "./collate.js";
import * as Corpus from "./corpus.js";
import * as Data from "./data.js";
import type { Random } from "./random.js";
import { lengthLocal, type Sampler } from "./sampler.js";
import * as Vocab from "./vocab.js";

/** batch loader over a corpus, one pass per call */
export type Loader = Data.Dataset<Batch> & {
  readonly corpus: Corpus.Corpus;
  readonly sampler: Sampler;
  readonly batchSize: number;
  /** expected number of batches per pass */
  readonly batches: number;
  /** one pass reading `numWorkers` batches ahead */
  stream: Data.AsyncDataset<Batch>;
};

export type LoaderOptions = {
  batchSize: number;
  diversity?: number;
  /** batches assembled ahead of the consumer in `stream` */
  numWorkers?: number;
  random?: Random;
};

/** loader batching similar-length reviews */
export const loader = (
  corpus: Corpus.Corpus,
  opts: LoaderOptions
): Loader => {
  const { batchSize, numWorkers = 0 } = opts;
  const sampler = lengthLocal(corpus.lengths, opts);
  const batches = Data.pipeline(
    sampler,
    Data.map(corpus.get),
    Data.batch(batchSize),
    Data.map(collate)
  );
  return Object.assign(batches, {
    corpus,
    sampler,
    batchSize,
    batches: sampler.batches,
    stream: Data.prefetch(Math.max(0, numWorkers))(batches),
  });
};

/** vocabulary file of the dataset root */
export const VOCAB_FILE = "imdb.vocab";

/** train and test splits sharing one vocabulary */
export const splits = (
  root: string,
  opts: Corpus.CorpusOptions = {}
): { train: Corpus.Corpus; test: Corpus.Corpus; vocab: Vocab.Vocab } => {
  const logger = opts.logger ?? console.log;
  const vocab = Vocab.fromFile(Path.join(root, VOCAB_FILE));
  const train = Corpus.load(Path.join(root, "train"), vocab, opts);
  const test = Corpus.load(Path.join(root, "test"), vocab, opts);
  logger(`train dataset was loaded, ${train.length} samples`);
  logger(`test dataset was loaded, ${test.length} samples`);
  return { train, test, vocab };
};

/** test split only */
export const testSplit = (
  root: string,
  opts: Corpus.CorpusOptions = {}
): Corpus.Corpus =>
  Corpus.load(
    Path.join(root, "test"),
    Vocab.fromFile(Path.join(root, VOCAB_FILE)),
    opts
  );

/** train and test loaders */
export const loaders = (
  root: string,
  opts: LoaderOptions & Corpus.CorpusOptions
): { train: Loader; test: Loader; vocab: Vocab.Vocab } => {
  const { train, test, vocab } = splits(root, opts);
  return {
    train: loader(train, opts),
    test: loader(test, opts),
    vocab,
  };
};
