/**
 * Selection loop.
 *
 * Reads whitespace-separated indices typed by the operator, resolves them
 * against the offer registry and hands valid entries to whoever consumes
 * `selections`. Bad input is logged and reading continues.
 *
 * @module engine/selection
 */

import { pushable, type Pushable } from 'it-pushable';
import type { ActivityLog } from './log.js';
import type { OfferLog } from './offer/registry.js';
import { UserInputError, type RegistryEntry } from './types.js';

// =============================================================================
// Parsing
// =============================================================================

export type ParsedSelection = { ok: true; index: number } | { ok: false; error: UserInputError };

const INTEGER = /^[+-]?\d+$/;

/**
 * Splits a line of input into tokens.
 */
export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Parses one token as a decimal integer.
 *
 * Negative values parse successfully; range checks belong to the registry.
 */
export function parseSelection(token: string): ParsedSelection {
  if (!INTEGER.test(token)) {
    return { ok: false, error: new UserInputError(`"${token}" is not a number`, token) };
  }
  const index = Number.parseInt(token, 10);
  if (!Number.isSafeInteger(index)) {
    return { ok: false, error: new UserInputError(`"${token}" is out of range`, token) };
  }
  return { ok: true, index };
}

// =============================================================================
// SelectionLoop
// =============================================================================

/**
 * Turns lines of operator input into registry entries.
 *
 * @example
 * ```typescript
 * const loop = new SelectionLoop(registry, log);
 * const reading = loop.run(lines);
 * for await (const entry of loop.selections) {
 *   // fetch entry, then loop.stop() to end reading
 * }
 * await reading;
 * ```
 */
export class SelectionLoop {
  /** Valid selections, in the order they were typed; ends when reading ends */
  readonly selections: Pushable<RegistryEntry>;

  private stopped = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly registry: OfferLog,
    private readonly log: ActivityLog
  ) {
    this.selections = pushable<RegistryEntry>({ objectMode: true });
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Reads `lines` until they end or `stop` is called.
   *
   * The input iterator is left open when stopped, since a terminal read
   * cannot be cancelled; the caller owns the input.
   */
  async run(lines: AsyncIterable<string>): Promise<void> {
    const iterator = lines[Symbol.asyncIterator]();
    const stopSignal = new Promise<null>((resolve) => {
      this.wake = () => resolve(null);
    });
    if (this.stopped) {
      this.wake?.();
    }

    try {
      while (!this.stopped) {
        const next = await Promise.race([iterator.next(), stopSignal]);
        if (next === null || next.done) {
          break;
        }
        this.handleLine(next.value);
      }
    } finally {
      this.selections.end();
    }
  }

  /**
   * Stops reading; `run` resolves and `selections` ends.
   */
  stop(): void {
    this.stopped = true;
    this.wake?.();
  }

  /**
   * Resolves every token on a line, pushing valid entries.
   */
  handleLine(line: string): void {
    for (const token of tokenize(line)) {
      if (this.stopped) {
        return;
      }

      const parsed = parseSelection(token);
      if (!parsed.ok) {
        this.log.warn(`input error: ${parsed.error.message}`);
        continue;
      }

      const lookup = this.registry.get(parsed.index);
      if (!lookup.ok) {
        this.log.warn(`input error: ${lookup.error.message}`);
        continue;
      }

      this.selections.push(lookup.entry);
    }
  }
}
