import * as FS from "node:fs";
import * as OS from "node:os";
import * as Path from "node:path";
import * as T from "vitest";
import { Errors, Vocab } from "./lib.js";

const write = (content: string): string => {
  const dir = FS.mkdtempSync(Path.join(OS.tmpdir(), "vocab-"));
  const path = Path.join(dir, "imdb.vocab");
  FS.writeFileSync(path, content);
  return path;
};

T.test("fromWords", () => {
  const vocab = Vocab.fromWords(["the", "and", "a"]);
  T.expect(Array.from(vocab)).toEqual([
    ["the", 1],
    ["and", 2],
    ["a", 3],
  ]);
});

T.test("ids are 1..N", () => {
  const words = Array.from({ length: 500 }, (_, i) => `w${i}`);
  const ids = Array.from(Vocab.fromWords(words).values());
  T.expect(ids).not.toContain(0);
  T.expect([...ids].sort((a, b) => a - b)).toEqual(
    Array.from({ length: 500 }, (_, i) => i + 1)
  );
});

T.test("fromFile", () => {
  const vocab = Vocab.fromFile(write("good\nbad\r\nfilm\n"));
  T.expect(Array.from(vocab)).toEqual([
    ["good", 1],
    ["bad", 2],
    ["film", 3],
  ]);
});

T.test("missing file", () => {
  const path = Path.join(OS.tmpdir(), "no-such-dir", "imdb.vocab");
  T.expect(() => Vocab.fromFile(path)).toThrow(Errors.MissingResourceError);
  try {
    Vocab.fromFile(path);
  } catch (error) {
    T.expect(error).toMatchObject({ path });
  }
});

T.test("size", () => {
  T.expect(Vocab.size(Vocab.fromWords(["a", "b", "c"]))).toBe(3);
  T.expect(Vocab.size(Vocab.fromWords([]))).toBe(0);
});
