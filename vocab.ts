import * as FS from "node:fs";
import { MissingResourceError } from "./errors.js";

/** vocabulary, case-folded word to id */
// id 0 is never assigned, it is the padding id
export type Vocab = ReadonlyMap<string, number>;

/** build vocabulary from a word list, ids start at 1 */
export const fromWords = (words: Iterable<string>): Vocab => {
  const vocab = new Map<string, number>();
  let id = 1;
  for (const word of words) {
    vocab.set(word, id);
    id += 1;
  }
  return vocab;
};

/** read vocabulary file, one word per line */
export const fromFile = (path: string): Vocab => {
  let file: string;
  try {
    file = FS.readFileSync(path, { encoding: "utf-8" });
  } catch (error) {
    throw new MissingResourceError(
      `vocabulary not readable: ${path} (${String(error)})`,
      path
    );
  }
  const words = file.split(/\r\n|\r|\n/);
  // no empty word from the trailing newline
  if (words.at(-1) === "") words.pop();
  return fromWords(words);
};

/** largest id in the vocabulary */
export const size = (vocab: Vocab): number => {
  let max = 0;
  for (const id of vocab.values()) if (id > max) max = id;
  return max;
};
