export * as Collate from "./collate.js";
export * as Corpus from "./corpus.js";
export * as Data from "./data.js";
export * as Errors from "./errors.js";
export * as Loader from "./loader.js";
export * as Pool from "./pool.js";
export * as Random from "./random.js";
export * as Sampler from "./sampler.js";
export * as Text from "./text.js";
export * as Vocab from "./vocab.js";
