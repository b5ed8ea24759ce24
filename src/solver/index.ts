export {
  Judgement,
  type Feedback,
  type FeedbackAlphabet,
  DEFAULT_ALPHABET,
  DEFAULT_LENGTH,
  LEGACY_ALPHABET,
  TRIT_ALPHABET,
  feedbackEmoji,
  feedbackOf,
  isAllCorrect,
  parseFeedback,
  renderFeedback,
  scoreGuess,
} from './feedback'
export { filterCandidates, isConsistent, confirmedLetterCounts, CandidateSet } from './filter'
export {
  bestGuess,
  pairwiseScore,
  rankGuesses,
  rankLetterCoverage,
  rankUniqueLetters,
  type Suggestion,
} from './scoring'
export { mulberry32, pickIndex, type Rng } from './random'
export {
  WordleError,
  FeedbackError,
  GuessError,
  RankerError,
  ConfigError,
  WordlistError,
  isWordleError,
  type ErrorCode,
} from './errors'
