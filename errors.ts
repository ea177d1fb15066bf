/** base error for everything the dataset layer throws */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/** a file or directory the dataset needs does not exist */
export class MissingResourceError extends DatasetError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = "MissingResourceError";
  }
}

export class InvalidArgumentError extends DatasetError {
  constructor(message: string, public readonly argument: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class IndexOutOfRangeError extends DatasetError {
  constructor(public readonly index: number, public readonly length: number) {
    super(`index ${index} out of range [0, ${length})`);
    this.name = "IndexOutOfRangeError";
  }
}

/** a document tokenized to zero sentences */
export class EmptyDocumentError extends DatasetError {
  constructor(public readonly path: string) {
    super(`document has no sentences after tokenization: ${path}`);
    this.name = "EmptyDocumentError";
  }
}
