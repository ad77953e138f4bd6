// @choicetape/core entry point
//
// The high-level entry is runTest(): give it an executor that draws from a
// ConjectureData and it returns a RunSummary or throws the failure it found.
// Everything it is built from is exported too, for tooling and for callers
// that drive a ConjectureRunner or a Shrinker directly.

export { runTest, type RunSummary, type RunTestOptions } from './engine/check.js';
export {
  ConjectureRunner,
  ExitReason,
  RunIsComplete,
  CACHE_SIZE,
  type Executor,
  type Reporter,
  type RunnerOptions,
} from './engine/runner.js';

// Settings, results and errors
export {
  DEFAULT_SETTINGS,
  PHASES,
  VERBOSITY_LEVELS,
  parseSettings,
  resolveSettings,
  type EngineSettings,
  type Phase,
  type ResolvedSettings,
  type Verbosity,
} from './types/options.js';
export { ok, err, isOk, isErr, type Ok, type Err, type Result } from './types/result.js';
export {
  ChoicetapeError,
  ConfigError,
  DeadlineExceeded,
  FailedHealthCheck,
  Flaky,
  Frozen,
  InvalidArgument,
  InvalidState,
  MultipleFailures,
  PropertyFailed,
  Unsatisfiable,
  isChoicetapeError,
} from './types/errors.js';
export { ErrorCode, EXIT_CODES, getExitCode, type Severity } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';

// Data model
export {
  ConjectureData,
  DEFAULT_MAX_LENGTH,
  MAX_DEPTH,
  OVERRUN_RESULT,
  type ByteSource,
  type ConclusionOptions,
  type ConjectureDataOptions,
  type ConjectureResult,
} from './data/conjecture-data.js';
export {
  choiceKey,
  choicePermitted,
  choicesKey,
  choiceToString,
  isChoiceTemplate,
  type BooleanConstraints,
  type BytesConstraints,
  type ChoiceInput,
  type ChoiceKind,
  type ChoiceNode,
  type ChoiceTemplate,
  type ChoiceType,
  type ChoiceValue,
  type IntegerConstraints,
  type StringConstraints,
} from './data/choices.js';
export * from './data/origin.js';
export * from './data/signals.js';
export * from './data/spans.js';
export * from './data/status.js';

// Codec
export type { BitSource } from './codec/bit-source.js';
export * from './codec/floats.js';
export { IntervalSet } from './codec/intervals.js';
export { biasedCoin, integerRange } from './codec/primitives.js';
export { Many, type ManyOptions } from './codec/many.js';
export { Sampler } from './codec/sampler.js';

// Engine collaborators
export * from './engine/database.js';
export * from './engine/data-tree.js';
export * from './engine/health-check.js';
export { Mutator, STRATEGIES, STRATEGY_POOL, type StrategyName } from './engine/mutator.js';
export { Optimiser, type OptimiserHost } from './engine/optimiser.js';
export * from './engine/pareto.js';
export { TargetSelector, MUTATION_POOL_SIZE } from './engine/target-selector.js';

// Shrinking
export * from './shrinking/common.js';
export { IntegerShrinker } from './shrinking/integer.js';
export { Ordering, type SortKey } from './shrinking/ordering.js';
export { Length, type LengthOptions } from './shrinking/length.js';
export { FloatShrinker } from './shrinking/float.js';
export { Minimizer, minimizeInt, minimizeBigInt } from './shrinking/minimizer.js';
export {
  DEFAULT_STALL_LIMIT,
  ShrinkPass,
  Shrinker,
  type ShrinkPredicate,
  type ShrinkerHost,
  type ShrinkerOptions,
} from './shrinking/shrinker.js';
export {
  COARSE_PASSES,
  EMERGENCY_PASSES,
  FINE_PASSES,
  blockProgram,
  type ShrinkPassDefinition,
} from './shrinking/passes.js';

// Automata
export * from './dfa/dfa.js';
export { DfaIndexer } from './dfa/indexer.js';
export { IntegerNormalizer, LStar, LearnedDfa, type MembershipOracle } from './dfa/lstar.js';
export {
  learnShrinkDfa,
  type LearnShrinkDfaOptions,
  type ShrinkDfaRunner,
} from './dfa/shrink-dfas.js';

// Utilities
export * from './util/bytes.js';
export { LABELS, calcLabel, combineLabels } from './util/labels.js';
export { Random } from './util/rng.js';
export { EngineMetrics, METRIC_PHASES, type MetricPhase, type MetricsSnapshot } from './util/metrics.js';
