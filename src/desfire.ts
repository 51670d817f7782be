import { ValidationError } from './errors.js';
import {
  ALWAYS,
  WHEN_SET,
  checkIndex,
  emit,
  hexString,
  omitIfDefault,
  oneOf,
  optional,
  rangedInt,
  required,
  text,
} from './fields.js';
import { DESFIRE_CRYPTO_MODES, DESFIRE_DATA_FORMATS } from './types.js';
import type { DESFireAppInit, DESFireCryptoMode, DESFireDataFormat, DESFireInit } from './types.js';

export const MAX_DESFIRE_APPS = 9;
export const DEFAULT_DESFIRE_SEPARATOR = ',';
export const DEFAULT_READ_LENGTH = 3;
export const DEFAULT_READ_OFFSET = 0;

/**
 * A single MIFARE DESFire application to read
 */
export class DESFireAppConfig {
  readonly appId: string;
  readonly fileId?: number;
  readonly keyNum?: number;
  readonly keySlot?: number;
  readonly crypto?: DESFireCryptoMode;
  readonly format?: DESFireDataFormat;
  readonly readLength: number;
  readonly readOffset: number;
  readonly diversification?: boolean;
  readonly privacyKeyNum?: number;
  readonly privacyKeySlot?: number;
  readonly sysIdKeySlot?: number;
  readonly sysIdLength?: number;

  constructor(init: DESFireAppInit) {
    this.appId = hexString('appId', required('appId', init.appId), 6);
    this.fileId = optional(init.fileId, (v) => rangedInt('fileId', v, 1, 255));
    this.keyNum = optional(init.keyNum, (v) => rangedInt('keyNum', v, 0));
    this.keySlot = optional(init.keySlot, (v) => rangedInt('keySlot', v, 1, 9));
    this.crypto = optional(init.crypto, (v) => oneOf('crypto', v, DESFIRE_CRYPTO_MODES));
    this.format = optional(init.format, (v) => oneOf('format', v, DESFIRE_DATA_FORMATS));
    this.readLength = rangedInt('readLength', init.readLength ?? DEFAULT_READ_LENGTH, 1, 255);
    this.readOffset = rangedInt('readOffset', init.readOffset ?? DEFAULT_READ_OFFSET, 0, 255);
    this.diversification = init.diversification;
    this.privacyKeyNum = optional(init.privacyKeyNum, (v) => rangedInt('privacyKeyNum', v, 0));
    this.privacyKeySlot = optional(init.privacyKeySlot, (v) => rangedInt('privacyKeySlot', v, 0));
    this.sysIdKeySlot = optional(init.sysIdKeySlot, (v) => rangedInt('sysIdKeySlot', v, 0));
    this.sysIdLength = optional(init.sysIdLength, (v) => rangedInt('sysIdLength', v, 0, 16));
  }

  with(changes: Partial<DESFireAppInit>): DESFireAppConfig {
    return new DESFireAppConfig({ ...this.toInit(), ...changes });
  }

  toInit(): DESFireAppInit {
    return {
      appId: this.appId,
      fileId: this.fileId,
      keyNum: this.keyNum,
      keySlot: this.keySlot,
      crypto: this.crypto,
      format: this.format,
      readLength: this.readLength,
      readOffset: this.readOffset,
      diversification: this.diversification,
      privacyKeyNum: this.privacyKeyNum,
      privacyKeySlot: this.privacyKeySlot,
      sysIdKeySlot: this.sysIdKeySlot,
      sysIdLength: this.sysIdLength,
    };
  }

  /**
   * Generate config.txt lines for this application
   * @param slotNumber - 1-based position used in the key names
   */
  toConfigLines(slotNumber: number): string[] {
    const prefix = `DESFire${slotNumber}`;
    const lines: string[] = [];
    emit(lines, `${prefix}AppID`, this.appId, ALWAYS);
    emit(lines, `${prefix}FileID`, this.fileId, WHEN_SET);
    emit(lines, `${prefix}KeyNum`, this.keyNum, WHEN_SET);
    emit(lines, `${prefix}KeySlot`, this.keySlot, WHEN_SET);
    emit(lines, `${prefix}Crypto`, this.crypto, WHEN_SET);
    emit(lines, `${prefix}Format`, this.format, WHEN_SET);
    emit(lines, `${prefix}ReadLength`, this.readLength, omitIfDefault(DEFAULT_READ_LENGTH));
    emit(lines, `${prefix}ReadOffset`, this.readOffset, omitIfDefault(DEFAULT_READ_OFFSET));
    // Only an enabled diversification is written; the reader treats absence as off.
    if (this.diversification === true) {
      emit(lines, `${prefix}Diversification`, this.diversification, ALWAYS);
    }
    emit(lines, `${prefix}PrivacyKeyNum`, this.privacyKeyNum, WHEN_SET);
    emit(lines, `${prefix}PrivacyKeySlot`, this.privacyKeySlot, WHEN_SET);
    emit(lines, `${prefix}SysIDKeySlot`, this.sysIdKeySlot, WHEN_SET);
    emit(lines, `${prefix}SysIDLength`, this.sysIdLength, WHEN_SET);
    return lines;
  }
}

/**
 * Up to nine DESFire applications, read in order
 */
export class DESFireConfig {
  readonly apps: readonly DESFireAppConfig[];
  readonly separator: string;

  constructor(init: DESFireInit = {}) {
    const apps = init.apps ?? [];
    if (apps.length > MAX_DESFIRE_APPS) {
      throw new ValidationError(
        'apps',
        `at most ${MAX_DESFIRE_APPS} DESFire applications allowed`,
        apps.length
      );
    }
    this.apps = [...apps];
    this.separator = text('separator', init.separator ?? DEFAULT_DESFIRE_SEPARATOR, { length: 1 });
  }

  with(changes: Partial<DESFireInit>): DESFireConfig {
    return new DESFireConfig({ apps: [...this.apps], separator: this.separator, ...changes });
  }

  addApp(app: DESFireAppConfig): DESFireConfig {
    return this.with({ apps: [...this.apps, app] });
  }

  replaceApp(index: number, app: DESFireAppConfig): DESFireConfig {
    checkIndex(index, this.apps.length);
    return this.with({ apps: this.apps.map((current, i) => (i === index ? app : current)) });
  }

  removeApp(index: number): DESFireConfig {
    checkIndex(index, this.apps.length);
    return this.with({ apps: this.apps.filter((_, i) => i !== index) });
  }

  /**
   * Generate config.txt lines for every app, numbered by position.
   * An empty app list produces no lines.
   */
  toConfigLines(): string[] {
    if (this.apps.length === 0) {
      return [];
    }

    const lines = this.apps.flatMap((app, i) => app.toConfigLines(i + 1));
    emit(lines, 'DESFireSeparator', this.separator, omitIfDefault(DEFAULT_DESFIRE_SEPARATOR));
    return lines;
  }
}
