import type { AppleVASConfig, VASDefaultPassesEnabled } from './vas.js';
import type { GoogleSmartTapConfig, STDefaultPassesEnabled } from './smarttap.js';
import type { KeyboardConfig } from './keyboard.js';
import type { NFCTagConfig, TagReadConfig } from './nfc.js';
import type { DESFireAppConfig, DESFireConfig } from './desfire.js';
import type {
  BeepConfig,
  BeepSequence,
  FeedbackConfig,
  LEDConfig,
  LEDSequence,
} from './feedback.js';

// ============================================================================
// Enumerated codes
// ============================================================================

/**
 * NFC tag reading mode, written as a single character
 */
export const NFCTagMode = {
  DISABLED: '0',
  UID: 'U',
  NDEF: 'N',
  BLOCK: 'B',
  /** Type 4 only */
  DESFIRE: 'D',
} as const;
export type NFCTagMode = (typeof NFCTagMode)[keyof typeof NFCTagMode];

/** Modes accepted for Type 2 and Type 5 tags */
export const BASIC_TAG_MODES = ['0', 'U', 'N', 'B'] as const;
/** Modes accepted for Type 4 tags */
export const TYPE4_TAG_MODES = ['0', 'U', 'N', 'B', 'D'] as const;

/**
 * MIFARE key type used for block authentication
 */
export type TagKeyType = 'A' | 'B' | 'C';
export const TAG_KEY_TYPES: readonly TagKeyType[] = ['A', 'B', 'C'];

/**
 * Output format for tag block data: ASCII, decimal or hex
 */
export const TagReadFormat = {
  ASCII: 'a',
  DECIMAL: 'd',
  HEX: 'h',
} as const;
export type TagReadFormat = (typeof TagReadFormat)[keyof typeof TagReadFormat];
export const TAG_READ_FORMATS: readonly TagReadFormat[] = ['a', 'd', 'h'];

/**
 * DESFire cryptographic mode
 */
export const DESFireCryptoMode = {
  NONE: 0,
  DES3: 1,
  AES: 3,
} as const;
export type DESFireCryptoMode = (typeof DESFireCryptoMode)[keyof typeof DESFireCryptoMode];
export const DESFIRE_CRYPTO_MODES: readonly DESFireCryptoMode[] = [0, 1, 3];

/**
 * DESFire data output format
 */
export const DESFireDataFormat = {
  RAW: 0,
  KEYID_V1: 1,
  KEYID_V2: 2,
} as const;
export type DESFireDataFormat = (typeof DESFireDataFormat)[keyof typeof DESFireDataFormat];
export const DESFIRE_DATA_FORMATS: readonly DESFireDataFormat[] = [0, 1, 2];

/**
 * LED operating mode
 */
export const LEDMode = {
  OFF: 0,
  ON: 1,
  STATUS: 2,
  CUSTOM: 3,
} as const;
export type LEDMode = (typeof LEDMode)[keyof typeof LEDMode];
export const LED_MODES: readonly LEDMode[] = [0, 1, 2, 3];

/**
 * Physical LED selection
 */
export const LEDSelect = {
  /** External RGB LED (common cathode) */
  EXTERNAL: 0,
  /** On-board LED, compact case */
  ONBOARD_COMPACT: 1,
  /** On-board LED, square case */
  ONBOARD_SQUARE: 2,
  /** Serial LEDs */
  SERIAL: 3,
} as const;
export type LEDSelect = (typeof LEDSelect)[keyof typeof LEDSelect];
export const LED_SELECTS: readonly LEDSelect[] = [0, 1, 2, 3];

// ============================================================================
// Section init types
// ============================================================================

/**
 * Fields of a single Apple VAS pass type
 */
export interface AppleVASInit {
  /** Apple Pass Type ID, must start with "pass." */
  merchantId: string;
  /** Private key slot (1-6) holding the decryption key */
  keySlot: number;
  /** URL invoked when presenting a pass */
  merchantUrl?: string;
}

/**
 * Fields of a single Google Smart Tap pass type
 */
export interface GoogleSmartTapInit {
  /** Google Collector ID */
  collectorId: string;
  /** Private key slot (1-6), 0 while not yet assigned (default: 0) */
  keySlot?: number;
  /** Key version, must match the Google console (default: 0) */
  keyVersion?: number;
}

/**
 * Keyboard emulation settings
 */
export interface KeyboardInit {
  /** Send read data as keystrokes (default: false) */
  logMode?: boolean;
  /** USB keyboard device function (default: true) */
  enable?: boolean;
  /** Hex bitmask of sources that trigger output (default: "A5") */
  source?: string;
  /** Text sent before the data, e.g. "$t" for a timestamp */
  prefix?: string;
  /** Text sent after the data (default: "%0A") */
  postfix?: string;
  /** Delay between keystrokes in ms, 5-255 (default: 5) */
  delayMs?: number;
  /** Extract one section of the pass payload (default: false) */
  passMode?: boolean;
  passSection?: number;
  /** Single separator character between payload sections (default: "|") */
  passSeparator?: string;
  passStart?: number;
  /** Characters to extract, 0 for all (default: 0) */
  passLength?: number;
}

/**
 * Block read settings used by tags in block mode
 */
export interface TagReadInit {
  blockNum?: number;
  keySlot?: number;
  keyType?: TagKeyType;
  /** Start byte in the block, 0-15 (default: 0) */
  offset?: number;
  length?: number;
  format?: TagReadFormat;
  /** Minimum digits for UID output, 1-20 or "A" for auto */
  minDigits?: number | 'A';
}

/**
 * NFC tag settings
 */
export interface NFCTagInit {
  type2?: NFCTagMode;
  type4?: NFCTagMode;
  type5?: NFCTagMode;
  reportReadError?: boolean;
  ignoreRandomUid?: boolean;
  byteOrderReversed?: boolean;
  tagRead?: TagReadConfig;
}

/**
 * Fields of a single DESFire application
 */
export interface DESFireAppInit {
  /** Application ID, 6 hex characters */
  appId: string;
  fileId?: number;
  keyNum?: number;
  keySlot?: number;
  crypto?: DESFireCryptoMode;
  format?: DESFireDataFormat;
  /** Bytes to read, 1-255 (default: 3) */
  readLength?: number;
  /** Offset in the file, 0-255 (default: 0) */
  readOffset?: number;
  diversification?: boolean;
  privacyKeyNum?: number;
  privacyKeySlot?: number;
  sysIdKeySlot?: number;
  sysIdLength?: number;
}

/**
 * DESFire applications and their output separator
 */
export interface DESFireInit {
  apps?: DESFireAppConfig[];
  /** Separator between app outputs (default: ",") */
  separator?: string;
}

/**
 * LED blink sequence
 */
export interface LEDSequenceInit {
  /** RGB color, 6 hex characters */
  color: string;
  onMs?: number;
  offMs?: number;
  repeats?: number;
}

/**
 * Buzzer sequence
 */
export interface BeepSequenceInit {
  onMs?: number;
  offMs?: number;
  repeats?: number;
  /** Frequency in Hz, 100-20000 */
  frequency?: number;
}

export interface LEDInit {
  mode?: LEDMode;
  select?: LEDSelect;
  defaultRgb?: string;
  passLed?: LEDSequence;
  tagLed?: LEDSequence;
  passErrorLed?: LEDSequence;
  startLed?: LEDSequence;
}

export interface BeepInit {
  passBeep?: BeepSequence;
  tagBeep?: BeepSequence;
  passErrorBeep?: BeepSequence;
  startBeep?: BeepSequence;
}

export interface FeedbackInit {
  led?: LEDConfig;
  beep?: BeepConfig;
}

/**
 * Parts of a complete reader configuration. Absent parts are unconfigured.
 */
export interface VTAPConfigInit {
  vasConfigs?: AppleVASConfig[];
  vasDefaultPasses?: VASDefaultPassesEnabled;
  smartTapConfigs?: GoogleSmartTapConfig[];
  smartTapDefaultPasses?: STDefaultPassesEnabled;
  keyboard?: KeyboardConfig;
  nfc?: NFCTagConfig;
  desfire?: DESFireConfig;
  feedback?: FeedbackConfig;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Configuration options for the config.txt generator
 */
export interface GeneratorOptions {
  /** Line separator (default: "\n") */
  lineEnding?: '\n' | '\r\n';
  /** End the document with a line separator (default: false) */
  trailingNewline?: boolean;
}

/**
 * Configuration options for the config.txt parser
 */
export interface ParserOptions {
  /** Called for each line that matches no known key */
  onUnknownLine?: (line: string, lineNumber: number) => void;
}
