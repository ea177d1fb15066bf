import { Tensor, type TypedTensor } from "onnxruntime-common";
import type { Item } from "./corpus.js";
import { InvalidArgumentError } from "./errors.js";

/** collated batch */
export type Batch = {
  /** word ids [n, maxTxt, maxSnt], zero padded */
  features: TypedTensor<"int32">;
  /** labels [n, 1] */
  targets: TypedTensor<"float32">;
};

/**
 * collate items into dense tensors
 * sized to the batch's own longest text and sentence
 */
export const collate = (items: readonly Item[]): Batch => {
  if (!items.length)
    throw new InvalidArgumentError("cannot collate an empty batch", "items");

  const maxTxt = Math.max(...items.map((item) => item.length));
  const maxSnt = Math.max(...items.map((item) => item.maxSentenceLength));

  const labels = new Float32Array(items.length);
  const docs = new Int32Array(items.length * maxTxt * maxSnt);
  items.forEach((item, i) => {
    labels[i] = item.label;
    item.text.forEach((sentence, j) =>
      docs.set(sentence, (i * maxTxt + j) * maxSnt)
    );
  });

  return {
    features: new Tensor("int32", docs, [items.length, maxTxt, maxSnt]),
    targets: new Tensor("float32", labels, [items.length, 1]),
  };
};
