import { ValidationError } from './errors.js';
import { checkIndex } from './fields.js';
import { DESFireConfig } from './desfire.js';
import type { DESFireAppConfig } from './desfire.js';
import type { FeedbackConfig } from './feedback.js';
import type { KeyboardConfig } from './keyboard.js';
import type { NFCTagConfig } from './nfc.js';
import { MAX_SMARTTAP_CONFIGS } from './smarttap.js';
import type { GoogleSmartTapConfig, STDefaultPassesEnabled } from './smarttap.js';
import { MAX_VAS_CONFIGS } from './vas.js';
import type { AppleVASConfig, VASDefaultPassesEnabled } from './vas.js';
import type { VTAPConfigInit } from './types.js';

function checkCap(field: string, count: number, max: number): void {
  if (count > max) {
    throw new ValidationError(field, `at most ${max} entries allowed`, count);
  }
}

function replaceAt<T>(list: readonly T[], index: number, item: T): T[] {
  checkIndex(index, list.length);
  return list.map((current, i) => (i === index ? item : current));
}

function removeAt<T>(list: readonly T[], index: number): T[] {
  checkIndex(index, list.length);
  return list.filter((_, i) => i !== index);
}

/**
 * A complete reader configuration.
 *
 * Immutable: every edit returns a new instance. Pass lists are numbered by
 * position when generated, so reordering a list renumbers its entries.
 *
 * @example
 * ```ts
 * const config = new VTAPConfig()
 *   .addVAS(new AppleVASConfig({ merchantId: 'pass.com.example.app', keySlot: 1 }))
 *   .with({ keyboard: new KeyboardConfig({ logMode: true }) });
 * ```
 */
export class VTAPConfig {
  readonly vasConfigs: readonly AppleVASConfig[];
  readonly vasDefaultPasses?: VASDefaultPassesEnabled;
  readonly smartTapConfigs: readonly GoogleSmartTapConfig[];
  readonly smartTapDefaultPasses?: STDefaultPassesEnabled;
  readonly keyboard?: KeyboardConfig;
  readonly nfc?: NFCTagConfig;
  readonly desfire?: DESFireConfig;
  readonly feedback?: FeedbackConfig;

  constructor(init: VTAPConfigInit = {}) {
    const vasConfigs = init.vasConfigs ?? [];
    const smartTapConfigs = init.smartTapConfigs ?? [];
    checkCap('vasConfigs', vasConfigs.length, MAX_VAS_CONFIGS);
    checkCap('smartTapConfigs', smartTapConfigs.length, MAX_SMARTTAP_CONFIGS);

    this.vasConfigs = [...vasConfigs];
    this.vasDefaultPasses = init.vasDefaultPasses;
    this.smartTapConfigs = [...smartTapConfigs];
    this.smartTapDefaultPasses = init.smartTapDefaultPasses;
    this.keyboard = init.keyboard;
    this.nfc = init.nfc;
    this.desfire = init.desfire;
    this.feedback = init.feedback;
  }

  /**
   * Copy with some parts replaced. Pass `undefined` for a part to remove it.
   */
  with(changes: Partial<VTAPConfigInit>): VTAPConfig {
    return new VTAPConfig({ ...this.toInit(), ...changes });
  }

  toInit(): VTAPConfigInit {
    return {
      vasConfigs: [...this.vasConfigs],
      vasDefaultPasses: this.vasDefaultPasses,
      smartTapConfigs: [...this.smartTapConfigs],
      smartTapDefaultPasses: this.smartTapDefaultPasses,
      keyboard: this.keyboard,
      nfc: this.nfc,
      desfire: this.desfire,
      feedback: this.feedback,
    };
  }

  // ==========================================================================
  // Apple VAS
  // ==========================================================================

  addVAS(vas: AppleVASConfig): VTAPConfig {
    return this.with({ vasConfigs: [...this.vasConfigs, vas] });
  }

  /**
   * @throws {RangeError} If index is out of range
   */
  replaceVAS(index: number, vas: AppleVASConfig): VTAPConfig {
    return this.with({ vasConfigs: replaceAt(this.vasConfigs, index, vas) });
  }

  /**
   * @throws {RangeError} If index is out of range
   */
  removeVAS(index: number): VTAPConfig {
    return this.with({ vasConfigs: removeAt(this.vasConfigs, index) });
  }

  // ==========================================================================
  // Google Smart Tap
  // ==========================================================================

  addSmartTap(smartTap: GoogleSmartTapConfig): VTAPConfig {
    return this.with({ smartTapConfigs: [...this.smartTapConfigs, smartTap] });
  }

  replaceSmartTap(index: number, smartTap: GoogleSmartTapConfig): VTAPConfig {
    return this.with({ smartTapConfigs: replaceAt(this.smartTapConfigs, index, smartTap) });
  }

  removeSmartTap(index: number): VTAPConfig {
    return this.with({ smartTapConfigs: removeAt(this.smartTapConfigs, index) });
  }

  // ==========================================================================
  // DESFire applications
  // ==========================================================================

  /**
   * Append an app, creating the DESFire section when absent
   */
  addDESFireApp(app: DESFireAppConfig): VTAPConfig {
    const desfire = this.desfire ?? new DESFireConfig();
    return this.with({ desfire: desfire.addApp(app) });
  }

  replaceDESFireApp(index: number, app: DESFireAppConfig): VTAPConfig {
    return this.with({ desfire: this.requireDESFire(index).replaceApp(index, app) });
  }

  removeDESFireApp(index: number): VTAPConfig {
    return this.with({ desfire: this.requireDESFire(index).removeApp(index) });
  }

  private requireDESFire(index: number): DESFireConfig {
    if (!this.desfire) {
      throw new RangeError(`Index ${index} out of range (no DESFire applications)`);
    }
    return this.desfire;
  }
}
