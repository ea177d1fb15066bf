import { Data, Loader, Random, Vocab } from "../../lib.js";

// aclImdb root holding imdb.vocab, train/ and test/
const root = process.argv[2] ?? "data/aclImdb";

const { train, test, vocab } = Loader.loaders(root, {
  batchSize: 64,
  numWorkers: 4,
  random: Random.mulberry32(0),
});
console.log(`vocabulary: ${Vocab.size(vocab)} words`);

// padding left in the feature tensors, lower is better
const padding = (loader: Loader.Loader): number => {
  let cells = 0;
  let zeros = 0;
  for (const { features } of loader()) {
    cells += features.data.length;
    zeros += features.data.filter((id) => id === 0).length;
  }
  return zeros / cells;
};

console.log(`train padding: ${padding(train).toFixed(3)}`);
console.log(`test padding: ${padding(test).toFixed(3)}`);

// first batches as the training loop would see them
const shapes = Data.pipeline(
  test,
  Data.map(({ features, targets }) => [features.dims, targets.dims]),
  Data.log(console.log, (row) => JSON.stringify(row))
);
let shown = 0;
for (const _ of shapes()) if ((shown += 1) === 3) break;

for await (const { features } of train.stream())
  if (features.dims[0] < train.batchSize)
    console.log(`last train batch: ${features.dims.join("x")}`);
