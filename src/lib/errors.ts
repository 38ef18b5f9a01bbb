export type FlattenErrorCode = 'ERR_NOT_VALID_INPUT' | 'ERR_NOT_VALID_JSON_INPUT';

/**
 * Base class for errors raised while flattening.
 */
export class FlattenError extends Error {
  readonly code: FlattenErrorCode;

  constructor(code: FlattenErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A value that needed structural decomposition was not a mapping or sequence.
 */
export class NotValidInputError extends FlattenError {
  constructor() {
    super('ERR_NOT_VALID_INPUT', 'not a valid input: mapping or sequence');
  }
}

/**
 * Input text is empty, or does not start with an object literal.
 */
export class NotValidJsonInputError extends FlattenError {
  constructor() {
    super('ERR_NOT_VALID_JSON_INPUT', 'not a valid input, must be a mapping');
  }
}
