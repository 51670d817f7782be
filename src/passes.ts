import { ValidationError } from './errors.js';
import { rangedInt } from './fields.js';

/** Every pass slot the reader knows */
export const ALL_PASSES: readonly number[] = [1, 2, 3, 4, 5, 6];

/**
 * Which pass slots the reader checks at startup.
 *
 * Shared by the VAS and Smart Tap variants, which differ only in their key
 * prefix. Pass numbers are kept sorted and unique.
 */
export abstract class DefaultPassesEnabled {
  readonly enabledPasses: readonly number[];

  protected abstract readonly prefix: 'VAS' | 'ST';

  constructor(enabledPasses: readonly number[] = ALL_PASSES) {
    if (enabledPasses.length === 0) {
      throw new ValidationError('enabledPasses', 'must enable at least one pass', enabledPasses);
    }
    const checked = enabledPasses.map((pass) => rangedInt('enabledPasses', pass, 1, 6));
    this.enabledPasses = [...new Set(checked)].sort((a, b) => a - b);
  }

  /**
   * config.txt key, e.g. "VASDefaultPassesEnabled"
   */
  get key(): string {
    return `${this.prefix}DefaultPassesEnabled`;
  }

  isEnabled(pass: number): boolean {
    return this.enabledPasses.includes(pass);
  }

  /**
   * Generate the config.txt line, e.g. "VASDefaultPassesEnabled=1,3,5"
   */
  toConfigLine(): string {
    return `${this.key}=${this.enabledPasses.join(',')}`;
  }
}
