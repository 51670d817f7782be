import { ALWAYS, WHEN_SET, emit, optional, rangedInt, required, text } from './fields.js';
import { DefaultPassesEnabled } from './passes.js';
import type { AppleVASInit } from './types.js';

export const VAS_MERCHANT_PREFIX = 'pass.';
export const MAX_VAS_CONFIGS = 6;

/**
 * A single Apple Wallet VAS pass type.
 *
 * @example
 * ```ts
 * const vas = new AppleVASConfig({ merchantId: 'pass.com.example.app', keySlot: 1 });
 * vas.toConfigLines(1);
 * // ['VAS1MerchantID=pass.com.example.app', 'VAS1KeySlot=1']
 * ```
 */
export class AppleVASConfig {
  readonly merchantId: string;
  readonly keySlot: number;
  readonly merchantUrl?: string;

  constructor(init: AppleVASInit) {
    this.merchantId = text('merchantId', init.merchantId, {
      minLength: 1,
      prefix: VAS_MERCHANT_PREFIX,
    });
    // The reader needs an explicit slot; there is no auto value for VAS.
    this.keySlot = rangedInt('keySlot', required('keySlot', init.keySlot), 1, 6);
    this.merchantUrl = optional(init.merchantUrl, (url) => text('merchantUrl', url));
  }

  /**
   * Copy with some fields replaced
   */
  with(changes: Partial<AppleVASInit>): AppleVASConfig {
    return new AppleVASConfig({ ...this.toInit(), ...changes });
  }

  toInit(): AppleVASInit {
    return {
      merchantId: this.merchantId,
      keySlot: this.keySlot,
      merchantUrl: this.merchantUrl,
    };
  }

  /**
   * Generate config.txt lines for this pass type
   * @param slotNumber - 1-based position used in the key names
   */
  toConfigLines(slotNumber: number): string[] {
    const prefix = `VAS${slotNumber}`;
    const lines: string[] = [];
    emit(lines, `${prefix}MerchantID`, this.merchantId, ALWAYS);
    emit(lines, `${prefix}KeySlot`, this.keySlot, ALWAYS);
    emit(lines, `${prefix}MerchantURL`, this.merchantUrl, WHEN_SET);
    return lines;
  }
}

/**
 * VAS pass slots checked at startup (`VASDefaultPassesEnabled`)
 */
export class VASDefaultPassesEnabled extends DefaultPassesEnabled {
  protected readonly prefix = 'VAS';
}
