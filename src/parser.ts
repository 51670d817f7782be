import { readFile } from 'node:fs/promises';
import { VTAPConfig } from './config.js';
import { DESFireAppConfig, DESFireConfig } from './desfire.js';
import { ConfigFileError, ConfigFormatError, withFieldPrefix } from './errors.js';
import { BeepConfig, BeepSequence, FeedbackConfig, LEDConfig, LEDSequence } from './feedback.js';
import { oneOf, optional, required } from './fields.js';
import { CONFIG_HEADER } from './generator.js';
import { KeyboardConfig } from './keyboard.js';
import { AUTO_MIN_DIGITS, NFCTagConfig, TagReadConfig } from './nfc.js';
import { GoogleSmartTapConfig, STDefaultPassesEnabled } from './smarttap.js';
import {
  DESFIRE_CRYPTO_MODES,
  DESFIRE_DATA_FORMATS,
  LED_MODES,
  LED_SELECTS,
  TAG_KEY_TYPES,
  TAG_READ_FORMATS,
  TYPE4_TAG_MODES,
} from './types.js';
import type { KeyboardInit, NFCTagMode, ParserOptions, TagReadInit } from './types.js';
import { AppleVASConfig, VASDefaultPassesEnabled } from './vas.js';

const BOM = '\uFEFF';

// ============================================================================
// Drafts
// ============================================================================

interface VASDraft {
  merchantId?: string;
  keySlot?: number;
  merchantUrl?: string;
}

interface SmartTapDraft {
  collectorId?: string;
  keySlot?: number;
  keyVersion?: number;
}

/** DESFire app fields as read, before their closed sets are checked */
interface DESFireAppDraft {
  appId?: string;
  fileId?: number;
  keyNum?: number;
  keySlot?: number;
  crypto?: number;
  format?: number;
  readLength?: number;
  readOffset?: number;
  diversification?: boolean;
  privacyKeyNum?: number;
  privacyKeySlot?: number;
  sysIdKeySlot?: number;
  sysIdLength?: number;
}

interface NFCDraft {
  type2?: NFCTagMode;
  type4?: NFCTagMode;
  type5?: NFCTagMode;
  reportReadError?: boolean;
  ignoreRandomUid?: boolean;
  byteOrderReversed?: boolean;
}

type LEDSequenceKey = 'passLed' | 'tagLed' | 'passErrorLed' | 'startLed';
type BeepSequenceKey = 'passBeep' | 'tagBeep' | 'passErrorBeep' | 'startBeep';

interface LEDDraft {
  mode?: number;
  select?: number;
  defaultRgb?: string;
  sequences: Partial<Record<LEDSequenceKey, string>>;
}

/**
 * Everything observed during the line scan. Sections stay undefined until
 * one of their lines shows up.
 */
interface ParseState {
  vas: Map<number, VASDraft>;
  smartTap: Map<number, SmartTapDraft>;
  desfireApps: Map<number, DESFireAppDraft>;
  vasDefaultPasses?: number[];
  smartTapDefaultPasses?: number[];
  keyboard?: KeyboardInit;
  nfc?: NFCDraft;
  tagRead?: TagReadInit;
  desfireSeparator?: string;
  led?: LEDDraft;
  beep?: Partial<Record<BeepSequenceKey, string>>;
}

function draftFor<T>(drafts: Map<number, T>, slot: string, create: () => T): T {
  const index = Number(slot);
  let draft = drafts.get(index);
  if (!draft) {
    draft = create();
    drafts.set(index, draft);
  }
  return draft;
}

const vasDraft = (state: ParseState, slot: string): VASDraft => draftFor(state.vas, slot, () => ({}));
const smartTapDraft = (state: ParseState, slot: string): SmartTapDraft =>
  draftFor(state.smartTap, slot, () => ({}));
const desfireDraft = (state: ParseState, slot: string): DESFireAppDraft =>
  draftFor(state.desfireApps, slot, () => ({}));

function keyboardDraft(state: ParseState): KeyboardInit {
  state.keyboard ??= {};
  return state.keyboard;
}

function nfcDraft(state: ParseState): NFCDraft {
  state.nfc ??= {};
  return state.nfc;
}

function tagReadDraft(state: ParseState): TagReadInit {
  nfcDraft(state);
  state.tagRead ??= {};
  return state.tagRead;
}

function ledDraft(state: ParseState): LEDDraft {
  state.led ??= { sequences: {} };
  return state.led;
}

function beepDraft(state: ParseState): Partial<Record<BeepSequenceKey, string>> {
  state.beep ??= {};
  return state.beep;
}

const flag = (value: string): boolean => value === '1';
const passList = (value: string): number[] => value.split(',').map(Number);

// ============================================================================
// Line rules
// ============================================================================

/**
 * A recognized key. The pattern covers the whole line; a line whose value
 * does not fit the pattern is not recognized.
 */
interface LineRule {
  pattern: RegExp;
  apply(state: ParseState, match: RegExpExecArray): void;
}

const INT = '(\\d+)';
const FLAG = '([01])';
const TEXT = '(.+)';
const LED_SEQUENCE = '([^,]+,\\d+,\\d+,\\d+)';
const BEEP_SEQUENCE = '(\\d+,\\d+,\\d+(?:,\\d+)?)';
const PASS_LIST = '(\\d+(?:,\\d+)*)';

function rule(pattern: string, apply: LineRule['apply']): LineRule {
  return { pattern: new RegExp(`^${pattern}$`), apply };
}

const LINE_RULES: readonly LineRule[] = [
  // Apple VAS
  rule(`VAS${INT}MerchantID=${TEXT}`, (s, m) => (vasDraft(s, m[1]).merchantId = m[2])),
  rule(`VAS${INT}KeySlot=${INT}`, (s, m) => (vasDraft(s, m[1]).keySlot = Number(m[2]))),
  rule(`VAS${INT}MerchantURL=${TEXT}`, (s, m) => (vasDraft(s, m[1]).merchantUrl = m[2])),
  rule(`VASDefaultPassesEnabled=${PASS_LIST}`, (s, m) => (s.vasDefaultPasses = passList(m[1]))),

  // Google Smart Tap
  rule(`ST${INT}CollectorID=${TEXT}`, (s, m) => (smartTapDraft(s, m[1]).collectorId = m[2])),
  rule(`ST${INT}KeySlot=${INT}`, (s, m) => (smartTapDraft(s, m[1]).keySlot = Number(m[2]))),
  rule(`ST${INT}KeyVersion=${INT}`, (s, m) => (smartTapDraft(s, m[1]).keyVersion = Number(m[2]))),
  rule(`STDefaultPassesEnabled=${PASS_LIST}`, (s, m) => (s.smartTapDefaultPasses = passList(m[1]))),

  // Keyboard emulation
  rule(`KBLogMode=${FLAG}`, (s, m) => (keyboardDraft(s).logMode = flag(m[1]))),
  rule(`KBEnable=${FLAG}`, (s, m) => (keyboardDraft(s).enable = flag(m[1]))),
  rule(`KBSource=${TEXT}`, (s, m) => (keyboardDraft(s).source = m[1])),
  rule('KBPrefix=(.*)', (s, m) => (keyboardDraft(s).prefix = m[1])),
  rule('KBPostfix=(.*)', (s, m) => (keyboardDraft(s).postfix = m[1])),
  rule(`KBDelayMS=${INT}`, (s, m) => (keyboardDraft(s).delayMs = Number(m[1]))),
  rule(`KBPassMode=${FLAG}`, (s, m) => (keyboardDraft(s).passMode = flag(m[1]))),
  rule(`KBPassSection=${INT}`, (s, m) => (keyboardDraft(s).passSection = Number(m[1]))),
  rule(`KBPassSeparator=${TEXT}`, (s, m) => (keyboardDraft(s).passSeparator = m[1])),
  rule(`KBPassStart=${INT}`, (s, m) => (keyboardDraft(s).passStart = Number(m[1]))),
  rule(`KBPassLength=${INT}`, (s, m) => (keyboardDraft(s).passLength = Number(m[1]))),

  // NFC tags
  ...(['type2', 'type4', 'type5'] as const).map((field) =>
    rule(`NFCType${field.slice(4)}=([0UNBD])`, (s, m) => {
      nfcDraft(s)[field] = oneOf(field, m[1], TYPE4_TAG_MODES);
    })
  ),
  rule(`NFCReportReadError=${FLAG}`, (s, m) => (nfcDraft(s).reportReadError = flag(m[1]))),
  rule(`IgnoreRandomUID=${FLAG}`, (s, m) => (nfcDraft(s).ignoreRandomUid = flag(m[1]))),
  rule(`TagByteOrder=${FLAG}`, (s, m) => (nfcDraft(s).byteOrderReversed = flag(m[1]))),
  rule(`TagReadBlockNum=${INT}`, (s, m) => (tagReadDraft(s).blockNum = Number(m[1]))),
  rule(`TagReadKeySlot=${INT}`, (s, m) => (tagReadDraft(s).keySlot = Number(m[1]))),
  rule('TagReadKeyType=([ABC])', (s, m) => {
    tagReadDraft(s).keyType = oneOf('keyType', m[1], TAG_KEY_TYPES);
  }),
  rule(`TagReadOffset=${INT}`, (s, m) => (tagReadDraft(s).offset = Number(m[1]))),
  rule(`TagReadLength=${INT}`, (s, m) => (tagReadDraft(s).length = Number(m[1]))),
  rule('TagReadFormat=([adh])', (s, m) => {
    tagReadDraft(s).format = oneOf('format', m[1], TAG_READ_FORMATS);
  }),
  rule('TagReadMinDigits=(\\d+|A)', (s, m) => {
    tagReadDraft(s).minDigits = m[1] === AUTO_MIN_DIGITS ? AUTO_MIN_DIGITS : Number(m[1]);
  }),

  // MIFARE DESFire
  rule(`DESFire${INT}AppID=([0-9A-Fa-f]{6})`, (s, m) => (desfireDraft(s, m[1]).appId = m[2])),
  rule(`DESFire${INT}FileID=${INT}`, (s, m) => (desfireDraft(s, m[1]).fileId = Number(m[2]))),
  rule(`DESFire${INT}KeyNum=${INT}`, (s, m) => (desfireDraft(s, m[1]).keyNum = Number(m[2]))),
  rule(`DESFire${INT}KeySlot=${INT}`, (s, m) => (desfireDraft(s, m[1]).keySlot = Number(m[2]))),
  rule(`DESFire${INT}Crypto=${INT}`, (s, m) => (desfireDraft(s, m[1]).crypto = Number(m[2]))),
  rule(`DESFire${INT}Format=${INT}`, (s, m) => (desfireDraft(s, m[1]).format = Number(m[2]))),
  rule(`DESFire${INT}ReadLength=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).readLength = Number(m[2]);
  }),
  rule(`DESFire${INT}ReadOffset=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).readOffset = Number(m[2]);
  }),
  rule(`DESFire${INT}Diversification=${FLAG}`, (s, m) => {
    desfireDraft(s, m[1]).diversification = flag(m[2]);
  }),
  rule(`DESFire${INT}PrivacyKeyNum=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).privacyKeyNum = Number(m[2]);
  }),
  rule(`DESFire${INT}PrivacyKeySlot=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).privacyKeySlot = Number(m[2]);
  }),
  rule(`DESFire${INT}SysIDKeySlot=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).sysIdKeySlot = Number(m[2]);
  }),
  rule(`DESFire${INT}SysIDLength=${INT}`, (s, m) => {
    desfireDraft(s, m[1]).sysIdLength = Number(m[2]);
  }),
  rule(`DESFireSeparator=${TEXT}`, (s, m) => (s.desfireSeparator = m[1])),

  // LED
  rule(`LEDMode=${INT}`, (s, m) => (ledDraft(s).mode = Number(m[1]))),
  rule(`LEDSelect=${INT}`, (s, m) => (ledDraft(s).select = Number(m[1]))),
  rule('LEDDefaultRGB=([0-9A-Fa-f]{6})', (s, m) => (ledDraft(s).defaultRgb = m[1])),
  ...(
    [
      ['PassLED', 'passLed'],
      ['TagLED', 'tagLed'],
      ['PassErrorLED', 'passErrorLed'],
      ['StartLED', 'startLed'],
    ] as const
  ).map(([key, field]) =>
    rule(`${key}=${LED_SEQUENCE}`, (s, m) => (ledDraft(s).sequences[field] = m[1]))
  ),

  // Beep
  ...(
    [
      ['PassBeep', 'passBeep'],
      ['TagBeep', 'tagBeep'],
      ['PassErrorBeep', 'passErrorBeep'],
      ['StartBeep', 'startBeep'],
    ] as const
  ).map(([key, field]) =>
    rule(`${key}=${BEEP_SEQUENCE}`, (s, m) => (beepDraft(s)[field] = m[1]))
  ),
];

// ============================================================================
// Promotion
// ============================================================================

/**
 * Drafts in ascending slot order, dropping those without their primary field
 */
function promote<T, R>(
  drafts: Map<number, T>,
  isComplete: (draft: T) => boolean,
  build: (draft: T, slot: number) => R
): R[] {
  return [...drafts.entries()]
    .sort(([a], [b]) => a - b)
    .filter(([, draft]) => isComplete(draft))
    .map(([slot, draft]) => build(draft, slot));
}

function buildVAS(draft: VASDraft, slot: number): AppleVASConfig {
  return withFieldPrefix(
    `VAS${slot}`,
    () =>
      new AppleVASConfig({
        merchantId: required('merchantId', draft.merchantId),
        keySlot: required('keySlot', draft.keySlot),
        merchantUrl: draft.merchantUrl,
      })
  );
}

function buildSmartTap(draft: SmartTapDraft, slot: number): GoogleSmartTapConfig {
  return withFieldPrefix(
    `ST${slot}`,
    () =>
      new GoogleSmartTapConfig({
        collectorId: required('collectorId', draft.collectorId),
        keySlot: draft.keySlot,
        keyVersion: draft.keyVersion,
      })
  );
}

function buildDESFireApp(draft: DESFireAppDraft, slot: number): DESFireAppConfig {
  return withFieldPrefix(
    `DESFire${slot}`,
    () =>
      new DESFireAppConfig({
        ...draft,
        appId: required('appId', draft.appId),
        crypto: optional(draft.crypto, (v) => oneOf('crypto', v, DESFIRE_CRYPTO_MODES)),
        format: optional(draft.format, (v) => oneOf('format', v, DESFIRE_DATA_FORMATS)),
      })
  );
}

function buildNFC(state: ParseState): NFCTagConfig | undefined {
  const { nfc, tagRead } = state;
  if (!nfc) {
    return undefined;
  }
  const tagReadConfig = optional(tagRead, (init) =>
    withFieldPrefix('nfc.tagRead', () => new TagReadConfig(init))
  );
  return withFieldPrefix('nfc', () => new NFCTagConfig({ ...nfc, tagRead: tagReadConfig }));
}

function buildDESFire(state: ParseState): DESFireConfig | undefined {
  const apps = promote(state.desfireApps, (d) => d.appId !== undefined, buildDESFireApp);
  if (apps.length === 0) {
    return undefined;
  }
  return withFieldPrefix('desfire', () => new DESFireConfig({ apps, separator: state.desfireSeparator }));
}

function buildFeedback(state: ParseState): FeedbackConfig | undefined {
  const { led, beep } = state;
  if (!led && !beep) {
    return undefined;
  }

  const ledSequence = (field: LEDSequenceKey): LEDSequence | undefined =>
    optional(led?.sequences[field], (value) =>
      withFieldPrefix(field, () => LEDSequence.fromConfigValue(value))
    );
  const beepSequence = (field: BeepSequenceKey): BeepSequence | undefined =>
    optional(beep?.[field], (value) =>
      withFieldPrefix(`beep.${field}`, () => BeepSequence.fromConfigValue(value))
    );

  const ledConfig = optional(led, (draft) =>
    withFieldPrefix(
      'led',
      () =>
        new LEDConfig({
          mode: optional(draft.mode, (v) => oneOf('mode', v, LED_MODES)),
          select: optional(draft.select, (v) => oneOf('select', v, LED_SELECTS)),
          defaultRgb: draft.defaultRgb,
          passLed: ledSequence('passLed'),
          tagLed: ledSequence('tagLed'),
          passErrorLed: ledSequence('passErrorLed'),
          startLed: ledSequence('startLed'),
        })
    )
  );
  const beepConfig = optional(
    beep,
    () =>
      new BeepConfig({
        passBeep: beepSequence('passBeep'),
        tagBeep: beepSequence('tagBeep'),
        passErrorBeep: beepSequence('passErrorBeep'),
        startBeep: beepSequence('startBeep'),
      })
  );
  return new FeedbackConfig({ led: ledConfig, beep: beepConfig });
}

function buildConfig(state: ParseState): VTAPConfig {
  return new VTAPConfig({
    vasConfigs: promote(state.vas, (d) => d.merchantId !== undefined, buildVAS),
    vasDefaultPasses: optional(state.vasDefaultPasses, (passes) =>
      withFieldPrefix('vasDefaultPasses', () => new VASDefaultPassesEnabled(passes))
    ),
    smartTapConfigs: promote(state.smartTap, (d) => d.collectorId !== undefined, buildSmartTap),
    smartTapDefaultPasses: optional(state.smartTapDefaultPasses, (passes) =>
      withFieldPrefix('smartTapDefaultPasses', () => new STDefaultPassesEnabled(passes))
    ),
    keyboard: optional(state.keyboard, (init) =>
      withFieldPrefix('keyboard', () => new KeyboardConfig(init))
    ),
    nfc: buildNFC(state),
    desfire: buildDESFire(state),
    feedback: buildFeedback(state),
  });
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Reads config.txt text back into a VTAPConfig.
 *
 * Unknown keys and values that do not fit a known key are skipped, so files
 * written for newer firmware still load.
 */
export class ConfigParser {
  private readonly onUnknownLine?: (line: string, lineNumber: number) => void;

  constructor(options: ParserOptions = {}) {
    this.onUnknownLine = options.onUnknownLine;
  }

  /**
   * Parse config.txt content
   * @throws {ConfigFormatError} If the first non-blank line is not the header
   * @throws {ValidationError} If a recognized value is out of range
   */
  parse(content: string): VTAPConfig {
    const lines = (content.startsWith(BOM) ? content.slice(1) : content).split(/\r?\n/);

    const headerIndex = lines.findIndex((line) => line.trim() !== '');
    if (headerIndex === -1) {
      throw new ConfigFormatError(`Missing ${CONFIG_HEADER} header: document is empty`);
    }
    if (lines[headerIndex].trim() !== CONFIG_HEADER) {
      throw new ConfigFormatError(
        `Missing ${CONFIG_HEADER} header: first line must be ${CONFIG_HEADER}`,
        headerIndex + 1
      );
    }

    const state: ParseState = { vas: new Map(), smartTap: new Map(), desfireApps: new Map() };
    lines.forEach((raw, index) => {
      if (index <= headerIndex) {
        return;
      }
      const line = raw.trim();
      if (line === '' || line.startsWith(';') || line.startsWith('!')) {
        return;
      }
      if (!this.applyLine(state, rawValueLine(raw)) && !this.applyLine(state, line)) {
        this.onUnknownLine?.(line, index + 1);
      }
    });

    return buildConfig(state);
  }

  /**
   * Read a file and parse it
   * @throws {ConfigFileError} If the file cannot be read
   */
  async parseFile(path: string): Promise<VTAPConfig> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigFileError(`Failed to read ${path}: ${reason}`, path, error);
    }
    return this.parse(content);
  }

  private applyLine(state: ParseState, line: string): boolean {
    for (const { pattern, apply } of LINE_RULES) {
      const match = pattern.exec(line);
      if (match) {
        apply(state, match);
        return true;
      }
    }
    return false;
  }
}

/**
 * The line with its key trimmed and the value after the first `=` kept as
 * written. Text values may carry meaningful spaces (`KBPassSeparator= `).
 */
function rawValueLine(raw: string): string {
  const eq = raw.indexOf('=');
  return eq === -1 ? raw.trim() : `${raw.slice(0, eq).trim()}=${raw.slice(eq + 1)}`;
}

/**
 * Parse config.txt content in one call
 */
export function parse(content: string, options?: ParserOptions): VTAPConfig {
  return new ConfigParser(options).parse(content);
}

/**
 * Read and parse a config.txt file in one call
 */
export function parseFile(path: string, options?: ParserOptions): Promise<VTAPConfig> {
  return new ConfigParser(options).parseFile(path);
}
