export type FeedbackErrorCode = 'InvalidLength' | 'InvalidSymbol'

export type GuessErrorCode =
  | 'InvalidGuessLength'
  | 'InvalidFeedbackLength'
  | 'GuessNotInDictionary'
  | 'DuplicateGuess'
  | 'HardModeViolation'
  | 'GameAlreadyComplete'

export type RankerErrorCode = 'EmptyCandidatePool'

export type ErrorCode =
  | FeedbackErrorCode
  | GuessErrorCode
  | RankerErrorCode
  | 'InvalidConfig'
  | 'WordlistUnavailable'

/** Base for every validation failure the solver reports. Switch on `code`. */
export abstract class WordleError extends Error {
  abstract readonly code: ErrorCode
}

export class FeedbackError extends WordleError {
  constructor(
    readonly code: FeedbackErrorCode,
    readonly text: string,
    message: string,
    readonly index?: number,
  ) {
    super(message)
    this.name = 'FeedbackError'
  }
}

export class GuessError extends WordleError {
  constructor(
    readonly code: GuessErrorCode,
    readonly guess: string,
    message: string,
  ) {
    super(message)
    this.name = 'GuessError'
  }
}

export class RankerError extends WordleError {
  readonly code: RankerErrorCode = 'EmptyCandidatePool'
  constructor(message = 'No candidates remain; the feedback given contradicts the dictionary') {
    super(message)
    this.name = 'RankerError'
  }
}

export class ConfigError extends WordleError {
  readonly code = 'InvalidConfig' as const
  constructor(
    readonly option: string,
    message: string,
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class WordlistError extends WordleError {
  readonly code = 'WordlistUnavailable' as const
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(message)
    this.name = 'WordlistError'
  }
}

export function isWordleError(err: unknown): err is WordleError {
  return err instanceof WordleError
}
