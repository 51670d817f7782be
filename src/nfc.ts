import { ValidationError } from './errors.js';
import { WHEN_SET, emit, omitIfDefault, oneOf, optional, rangedInt } from './fields.js';
import {
  BASIC_TAG_MODES,
  TAG_KEY_TYPES,
  TAG_READ_FORMATS,
  TYPE4_TAG_MODES,
} from './types.js';
import type { NFCTagInit, NFCTagMode, TagKeyType, TagReadFormat, TagReadInit } from './types.js';

/** TagReadMinDigits value asking the reader to pick the digit count */
export const AUTO_MIN_DIGITS = 'A';

function checkMinDigits(value: number | 'A'): number | 'A' {
  if (value === AUTO_MIN_DIGITS) {
    return value;
  }
  if (typeof value !== 'number') {
    throw new ValidationError('minDigits', `must be 1-20 or '${AUTO_MIN_DIGITS}'`, value);
  }
  return rangedInt('minDigits', value, 1, 20);
}

/**
 * Which block to read from a tag in block mode, and how to format it
 */
export class TagReadConfig {
  readonly blockNum?: number;
  readonly keySlot?: number;
  readonly keyType?: TagKeyType;
  readonly offset: number;
  readonly length?: number;
  readonly format?: TagReadFormat;
  readonly minDigits?: number | 'A';

  constructor(init: TagReadInit = {}) {
    this.blockNum = optional(init.blockNum, (v) => rangedInt('blockNum', v, 0, 255));
    this.keySlot = optional(init.keySlot, (v) => rangedInt('keySlot', v, 1, 9));
    this.keyType = optional(init.keyType, (v) => oneOf('keyType', v, TAG_KEY_TYPES));
    this.offset = rangedInt('offset', init.offset ?? 0, 0, 15);
    this.length = optional(init.length, (v) => rangedInt('length', v, 1, 16));
    this.format = optional(init.format, (v) => oneOf('format', v, TAG_READ_FORMATS));
    this.minDigits = optional(init.minDigits, checkMinDigits);
  }

  toInit(): TagReadInit {
    return {
      blockNum: this.blockNum,
      keySlot: this.keySlot,
      keyType: this.keyType,
      offset: this.offset,
      length: this.length,
      format: this.format,
      minDigits: this.minDigits,
    };
  }

  toConfigLines(): string[] {
    const lines: string[] = [];
    emit(lines, 'TagReadBlockNum', this.blockNum, WHEN_SET);
    emit(lines, 'TagReadKeySlot', this.keySlot, WHEN_SET);
    emit(lines, 'TagReadKeyType', this.keyType, WHEN_SET);
    emit(lines, 'TagReadOffset', this.offset, omitIfDefault(0));
    emit(lines, 'TagReadLength', this.length, WHEN_SET);
    emit(lines, 'TagReadFormat', this.format, WHEN_SET);
    emit(lines, 'TagReadMinDigits', this.minDigits, WHEN_SET);
    return lines;
  }
}

/**
 * NFC tag settings for Type 2 (NTAG, Ultralight), Type 4 (DESFire,
 * ISO 14443-4) and Type 5 (ICODE, ISO 15693) tags.
 *
 * Only Type 4 accepts the DESFire mode.
 */
export class NFCTagConfig {
  readonly type2?: NFCTagMode;
  readonly type4?: NFCTagMode;
  readonly type5?: NFCTagMode;
  readonly reportReadError: boolean;
  readonly ignoreRandomUid: boolean;
  readonly byteOrderReversed: boolean;
  readonly tagRead?: TagReadConfig;

  constructor(init: NFCTagInit = {}) {
    this.type2 = optional(init.type2, (v) => oneOf('type2', v, BASIC_TAG_MODES));
    this.type4 = optional(init.type4, (v) => oneOf('type4', v, TYPE4_TAG_MODES));
    this.type5 = optional(init.type5, (v) => oneOf('type5', v, BASIC_TAG_MODES));
    this.reportReadError = init.reportReadError ?? false;
    this.ignoreRandomUid = init.ignoreRandomUid ?? false;
    this.byteOrderReversed = init.byteOrderReversed ?? false;
    this.tagRead = init.tagRead;
  }

  with(changes: Partial<NFCTagInit>): NFCTagConfig {
    return new NFCTagConfig({ ...this.toInit(), ...changes });
  }

  toInit(): NFCTagInit {
    return {
      type2: this.type2,
      type4: this.type4,
      type5: this.type5,
      reportReadError: this.reportReadError,
      ignoreRandomUid: this.ignoreRandomUid,
      byteOrderReversed: this.byteOrderReversed,
      tagRead: this.tagRead,
    };
  }

  toConfigLines(): string[] {
    const lines: string[] = [];
    emit(lines, 'NFCType2', this.type2, WHEN_SET);
    emit(lines, 'NFCType4', this.type4, WHEN_SET);
    emit(lines, 'NFCType5', this.type5, WHEN_SET);
    emit(lines, 'NFCReportReadError', this.reportReadError, omitIfDefault(false));
    emit(lines, 'IgnoreRandomUID', this.ignoreRandomUid, omitIfDefault(false));
    emit(lines, 'TagByteOrder', this.byteOrderReversed, omitIfDefault(false));
    if (this.tagRead) {
      lines.push(...this.tagRead.toConfigLines());
    }
    return lines;
  }
}
