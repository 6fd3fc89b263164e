/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';

export type FormatterType = 'human' | 'json';

export const FORMATTER_TYPES: readonly FormatterType[] = ['human', 'json'];

export function isFormatterType(value: string): value is FormatterType {
  return FORMATTER_TYPES.some((type) => type === value);
}

/**
 * @example
 * ```ts
 * const formatter = createFormatter('json', { verbose: true });
 * ```
 */
export function createFormatter(type: FormatterType = 'human', options: FormatterOptions = {}): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);

    case 'json':
      return new JsonFormatter(options);

    default: {
      // TypeScript exhaustiveness check - should never reach here
      const exhaustiveCheck: never = type;
      throw new Error(`Unhandled formatter type: ${String(exhaustiveCheck)}`);
    }
  }
}
