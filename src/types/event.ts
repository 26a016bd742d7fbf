/** Event captured by the automaton and bound to an alias of a candidate match */
export interface CapturedEvent {
  id: string;               // Unique event ID
  topic: string;            // Topic: "order.created", "payment.received"
  data: Record<string, unknown>;  // Payload
  timestamp: number;        // When it happened (epoch ms)
  source: string;           // Producer
}

/**
 * Read-only view of the events bound so far in one candidate match.
 *
 * Owned by the automaton. Predicates read it during a single evaluation
 * call and never keep a reference to it.
 */
export interface CapturedEvents {
  /** Event bound to `alias`, or `undefined` when the alias has no binding yet */
  lookup(alias: string): CapturedEvent | undefined;

  has(alias: string): boolean;

  /** Bound aliases in binding order */
  aliases(): readonly string[];

  readonly size: number;
}
