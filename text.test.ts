import * as T from "vitest";
import { Errors, Text, Vocab } from "./lib.js";

const vocab = Vocab.fromWords(["good", "bad"]);

T.test("sentences of word ids", () => {
  const tokenize = Text.tokenizer(vocab);
  T.expect(tokenize("Good! Bad.")).toEqual({
    text: [[1], [2]],
    maxSentenceLength: 1,
    length: 2,
  });
});

T.test("deterministic", () => {
  const raw = "Good, bad and good. Bad? <i>Good</i> good.";
  T.expect(Text.tokenizer(vocab)(raw)).toEqual(Text.tokenizer(vocab)(raw));
});

T.test("out-of-vocabulary words are dropped", () => {
  const tokenize = Text.tokenizer(vocab);
  T.expect(tokenize("Great film. Good.")).toEqual({
    text: [[], [1]],
    maxSentenceLength: 1,
    length: 2,
  });
});

T.test("tags are replaced by spaces", () => {
  T.expect(Text.stripTags("good<br />bad")).toBe("good bad");
  T.expect(Text.stripTags("a<b>c</b>d")).toBe("a c d");
  T.expect(Text.tokenizer(vocab)("good<br /><br />bad").text).toEqual([
    [1, 2],
  ]);
});

T.test("clips", () => {
  const tokenize = Text.tokenizer(vocab, { sntClip: 2, txtClip: 2 });
  T.expect(tokenize("Good good good. Bad bad bad. Good.")).toEqual({
    text: [
      [1, 1],
      [2, 2],
    ],
    maxSentenceLength: 2,
    length: 2,
  });
});

T.test("clip bounds hold", () => {
  const tokenize = Text.tokenizer(vocab, { sntClip: 3, txtClip: 4 });
  const raw = Array.from({ length: 10 }, (_, i) =>
    "good bad ".repeat(i + 1).trim() + "."
  ).join(" ");
  const { text, length } = tokenize(raw);
  T.expect(length).toBe(4);
  T.expect(text.every((sentence) => sentence.length <= 3)).toBe(true);
});

T.test("no sentences", () => {
  const empty = { text: [], maxSentenceLength: null, length: 0 };
  T.expect(Text.tokenizer(vocab)("<p></p>")).toEqual(empty);
  T.expect(Text.tokenizer(vocab)("")).toEqual(empty);
  T.expect(Text.tokenizer(vocab, { txtClip: 0 })("Good.")).toEqual(empty);
});

T.test("invalid clips", () => {
  T.expect(() => Text.tokenizer(vocab, { sntClip: -1 })).toThrow(
    Errors.InvalidArgumentError
  );
  T.expect(() => Text.tokenizer(vocab, { txtClip: 1.5 })).toThrow(
    Errors.InvalidArgumentError
  );
});

T.test("clip", () => {
  T.expect(Text.clip([1, 2, 3], 2)).toEqual([1, 2]);
  T.expect(Text.clip([1], 2)).toEqual([1]);
});
