/**
 * Shared validation constants.
 *
 * Single source of truth for operators, their query-text symbols and log
 * levels.
 *
 * @module
 */

import type { Operator } from '../types/predicate.js';

export const OPERATORS = ['eq', 'neq', 'gt', 'lt', 'gte', 'lte'] as const satisfies readonly Operator[];

export const ORDERING_OPERATORS = ['gt', 'lt', 'gte', 'lte'] as const satisfies readonly Operator[];
export type OrderingOperator = (typeof ORDERING_OPERATORS)[number];

/** Canonical query-text symbol per operator */
export const OPERATOR_SYMBOLS: Readonly<Record<Operator, string>> = {
  eq: '==',
  neq: '!=',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Event metadata addressable from a field path with a `$` prefix (e.g. `a.$topic`) */
export const EVENT_META_FIELDS = ['id', 'topic', 'timestamp', 'source'] as const;
export type EventMetaField = (typeof EVENT_META_FIELDS)[number];
