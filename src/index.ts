// Types
export * from './types/index.js';

// Captured event bindings
export {
  CapturedEventSequence,
  createEvent,
  type CapturedEventInput,
} from './core/captured-event-sequence.js';

// Evaluation
export * from './evaluation/index.js';

// Logging
export * from './logging/index.js';

// Scalars
export {
  toScalar,
  fromPlain,
  toPlain,
  scalarEquals,
  asNumber,
  formatScalar,
  describeType,
  numberScalar,
  stringScalar,
  booleanScalar,
  NULL_SCALAR,
} from './utils/scalar.js';

// Constants
export {
  OPERATORS,
  ORDERING_OPERATORS,
  OPERATOR_SYMBOLS,
  LOG_LEVELS,
  EVENT_META_FIELDS,
  type LogLevel,
} from './validation/constants.js';
