import { ALWAYS, WHEN_SET, emit, omitIfDefault, optional, rangedInt, text } from './fields.js';
import type { EmitRule } from './fields.js';
import type { KeyboardInit } from './types.js';

export const KEYBOARD_DEFAULTS = {
  logMode: false,
  enable: true,
  source: 'A5',
  postfix: '%0A',
  delayMs: 5,
  passMode: false,
  passSection: 0,
  passSeparator: '|',
  passStart: 0,
  passLength: 0,
} as const;

/**
 * Keyboard emulation: read data is typed into the host as keystrokes.
 */
export class KeyboardConfig {
  readonly logMode: boolean;
  readonly enable: boolean;
  readonly source: string;
  readonly prefix?: string;
  readonly postfix: string;
  readonly delayMs: number;
  readonly passMode: boolean;
  readonly passSection: number;
  readonly passSeparator: string;
  readonly passStart: number;
  readonly passLength: number;

  constructor(init: KeyboardInit = {}) {
    this.logMode = init.logMode ?? KEYBOARD_DEFAULTS.logMode;
    this.enable = init.enable ?? KEYBOARD_DEFAULTS.enable;
    this.source = text('source', init.source ?? KEYBOARD_DEFAULTS.source, { minLength: 1 });
    this.prefix = optional(init.prefix, (prefix) => text('prefix', prefix));
    this.postfix = text('postfix', init.postfix ?? KEYBOARD_DEFAULTS.postfix);
    this.delayMs = rangedInt('delayMs', init.delayMs ?? KEYBOARD_DEFAULTS.delayMs, 5, 255);
    this.passMode = init.passMode ?? KEYBOARD_DEFAULTS.passMode;
    this.passSection = rangedInt('passSection', init.passSection ?? KEYBOARD_DEFAULTS.passSection, 0);
    this.passSeparator = text('passSeparator', init.passSeparator ?? KEYBOARD_DEFAULTS.passSeparator, {
      length: 1,
    });
    this.passStart = rangedInt('passStart', init.passStart ?? KEYBOARD_DEFAULTS.passStart, 0);
    this.passLength = rangedInt('passLength', init.passLength ?? KEYBOARD_DEFAULTS.passLength, 0);
  }

  with(changes: Partial<KeyboardInit>): KeyboardConfig {
    return new KeyboardConfig({ ...this.toInit(), ...changes });
  }

  toInit(): KeyboardInit {
    return {
      logMode: this.logMode,
      enable: this.enable,
      source: this.source,
      prefix: this.prefix,
      postfix: this.postfix,
      delayMs: this.delayMs,
      passMode: this.passMode,
      passSection: this.passSection,
      passSeparator: this.passSeparator,
      passStart: this.passStart,
      passLength: this.passLength,
    };
  }

  /**
   * Generate config.txt lines for keyboard emulation
   */
  toConfigLines(): string[] {
    const lines: string[] = [];
    const d = KEYBOARD_DEFAULTS;

    emit(lines, 'KBLogMode', this.logMode, ALWAYS);
    emit(lines, 'KBEnable', this.enable, omitIfDefault(d.enable));
    // With log mode on the source decides what gets typed, so it is spelled out.
    const sourceRule: EmitRule<string> = this.logMode ? ALWAYS : omitIfDefault(d.source);
    emit(lines, 'KBSource', this.source, sourceRule);
    emit(lines, 'KBPrefix', this.prefix, WHEN_SET);
    emit(lines, 'KBPostfix', this.postfix, omitIfDefault(d.postfix));
    emit(lines, 'KBDelayMS', this.delayMs, omitIfDefault(d.delayMs));

    if (this.passMode) {
      emit(lines, 'KBPassMode', this.passMode, ALWAYS);
      emit(lines, 'KBPassSection', this.passSection, omitIfDefault(d.passSection));
      emit(lines, 'KBPassSeparator', this.passSeparator, omitIfDefault(d.passSeparator));
      emit(lines, 'KBPassStart', this.passStart, omitIfDefault(d.passStart));
      emit(lines, 'KBPassLength', this.passLength, omitIfDefault(d.passLength));
    }

    return lines;
  }
}

/**
 * Builder for the KBSource hex bitmask.
 *
 * | Bit | Source |
 * | --- | --- |
 * | 0x80 | Mobile pass (Apple VAS / Google Smart Tap) |
 * | 0x40 | STUID |
 * | 0x20 | Card emulation write mode |
 * | 0x04 | Scanners |
 * | 0x02 | Command interface messages |
 * | 0x01 | Card/tag UID |
 *
 * @example
 * ```ts
 * new KBSourceBuilder().mobilePass().cardTagUid().build(); // '81'
 * ```
 */
export class KBSourceBuilder {
  static readonly MOBILE_PASS = 0x80;
  static readonly STUID = 0x40;
  static readonly CARD_EMULATION = 0x20;
  static readonly SCANNERS = 0x04;
  static readonly COMMAND_INTERFACE = 0x02;
  static readonly CARD_TAG_UID = 0x01;

  private value = 0;

  mobilePass(): this {
    return this.set(KBSourceBuilder.MOBILE_PASS);
  }

  stuid(): this {
    return this.set(KBSourceBuilder.STUID);
  }

  cardEmulation(): this {
    return this.set(KBSourceBuilder.CARD_EMULATION);
  }

  scanners(): this {
    return this.set(KBSourceBuilder.SCANNERS);
  }

  commandInterface(): this {
    return this.set(KBSourceBuilder.COMMAND_INTERFACE);
  }

  cardTagUid(): this {
    return this.set(KBSourceBuilder.CARD_TAG_UID);
  }

  /**
   * @returns Two-digit uppercase hex string (e.g. "A5", "81")
   */
  build(): string {
    return this.value.toString(16).toUpperCase().padStart(2, '0');
  }

  private set(bit: number): this {
    this.value |= bit;
    return this;
  }
}
