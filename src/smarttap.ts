import { ALWAYS, emit, omitIfDefault, rangedInt, text } from './fields.js';
import { DefaultPassesEnabled } from './passes.js';
import type { GoogleSmartTapInit } from './types.js';

export const MAX_SMARTTAP_CONFIGS = 6;

/** Key slot value meaning "not yet assigned" */
export const UNASSIGNED_KEY_SLOT = 0;

/**
 * A single Google Wallet Smart Tap pass type.
 *
 * KeySlot is written once assigned; KeyVersion only when non-zero.
 */
export class GoogleSmartTapConfig {
  readonly collectorId: string;
  readonly keySlot: number;
  readonly keyVersion: number;

  constructor(init: GoogleSmartTapInit) {
    this.collectorId = text('collectorId', init.collectorId, { minLength: 1 });
    this.keySlot = rangedInt('keySlot', init.keySlot ?? UNASSIGNED_KEY_SLOT, 0, 6);
    this.keyVersion = rangedInt('keyVersion', init.keyVersion ?? 0, 0);
  }

  get hasKeySlot(): boolean {
    return this.keySlot !== UNASSIGNED_KEY_SLOT;
  }

  with(changes: Partial<GoogleSmartTapInit>): GoogleSmartTapConfig {
    return new GoogleSmartTapConfig({ ...this.toInit(), ...changes });
  }

  toInit(): GoogleSmartTapInit {
    return {
      collectorId: this.collectorId,
      keySlot: this.keySlot,
      keyVersion: this.keyVersion,
    };
  }

  /**
   * Generate config.txt lines for this pass type
   * @param slotNumber - 1-based position used in the key names
   */
  toConfigLines(slotNumber: number): string[] {
    const prefix = `ST${slotNumber}`;
    const lines: string[] = [];
    emit(lines, `${prefix}CollectorID`, this.collectorId, ALWAYS);
    emit(lines, `${prefix}KeySlot`, this.keySlot, omitIfDefault(UNASSIGNED_KEY_SLOT));
    emit(lines, `${prefix}KeyVersion`, this.keyVersion, omitIfDefault(0));
    return lines;
  }
}

/**
 * Smart Tap pass slots checked at startup (`STDefaultPassesEnabled`)
 */
export class STDefaultPassesEnabled extends DefaultPassesEnabled {
  protected readonly prefix = 'ST';
}
