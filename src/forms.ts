import { VTAPConfig } from './config.js';
import { DESFireAppConfig } from './desfire.js';
import { ValidationError, withFieldPrefix } from './errors.js';
import { BeepConfig, BeepSequence, FeedbackConfig, LEDConfig, LEDSequence } from './feedback.js';
import { formatValue, oneOf, optional, required } from './fields.js';
import { KeyboardConfig } from './keyboard.js';
import { AUTO_MIN_DIGITS, NFCTagConfig, TagReadConfig } from './nfc.js';
import { GoogleSmartTapConfig } from './smarttap.js';
import {
  DESFIRE_CRYPTO_MODES,
  DESFIRE_DATA_FORMATS,
  LED_MODES,
  LED_SELECTS,
  TAG_KEY_TYPES,
  TAG_READ_FORMATS,
  TYPE4_TAG_MODES,
} from './types.js';
import { AppleVASConfig } from './vas.js';

/**
 * Editable parts of a configuration. List sections hold numbered entries.
 */
export type SectionId = 'vas' | 'smarttap' | 'desfire' | 'keyboard' | 'nfc' | 'feedback';

export const LIST_SECTIONS: readonly SectionId[] = ['vas', 'smarttap', 'desfire'];

/**
 * Form field values keyed by property path, e.g. "keySlot" or
 * "tagRead.blockNum". An empty string means unset.
 */
export type FormValues = Record<string, string>;

/**
 * Converts one section between its model and form values, and stores it
 * back into a configuration
 */
export interface SectionForm {
  readonly list: boolean;
  /** Values of a new entry, or of a section not yet configured */
  blank(): FormValues;
  /** Values of the stored entry; undefined when a list index does not exist */
  read(config: VTAPConfig, index?: number): FormValues | undefined;
  /** Number of stored entries (0 or 1 for single sections) */
  count(config: VTAPConfig): number;
  /**
   * Build the section from values and store it. A list form without index
   * appends a new entry.
   * @throws {ValidationError} If a value is invalid
   */
  store(config: VTAPConfig, values: FormValues, index?: number): { config: VTAPConfig; index?: number };
  /** Remove the entry, or clear a single section */
  remove(config: VTAPConfig, index?: number): VTAPConfig;
}

// ============================================================================
// Value conversion
// ============================================================================

function textValue(values: FormValues, key: string): string | undefined {
  const value = values[key] ?? '';
  return value === '' ? undefined : value;
}

function intValue(values: FormValues, key: string): number | undefined {
  const value = textValue(values, key);
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(key, 'must be an integer', value);
  }
  return Number(trimmed);
}

function flagValue(values: FormValues, key: string): boolean | undefined {
  const value = textValue(values, key);
  if (value === undefined) {
    return undefined;
  }
  if (value !== '0' && value !== '1') {
    throw new ValidationError(key, 'must be 0 or 1', value);
  }
  return value === '1';
}

function show(value: string | number | boolean | undefined): string {
  return value === undefined ? '' : formatValue(value);
}

function hasAny(values: FormValues, prefix: string): boolean {
  return Object.entries(values).some(([key, value]) => key.startsWith(prefix) && value !== '');
}

// ============================================================================
// Form factories
// ============================================================================

interface ListFormDef<T> {
  blank: FormValues;
  entries(config: VTAPConfig): readonly T[];
  toValues(item: T): FormValues;
  fromValues(values: FormValues): T;
  add(config: VTAPConfig, item: T): VTAPConfig;
  replace(config: VTAPConfig, index: number, item: T): VTAPConfig;
  remove(config: VTAPConfig, index: number): VTAPConfig;
}

function listForm<T>(def: ListFormDef<T>): SectionForm {
  return {
    list: true,
    blank: () => ({ ...def.blank }),
    read(config, index) {
      const item = index === undefined ? undefined : def.entries(config)[index];
      return item === undefined ? undefined : def.toValues(item);
    },
    count: (config) => def.entries(config).length,
    store(config, values, index) {
      const item = def.fromValues(values);
      if (index === undefined) {
        const updated = def.add(config, item);
        return { config: updated, index: def.entries(updated).length - 1 };
      }
      return { config: def.replace(config, index, item), index };
    },
    remove(config, index) {
      if (index === undefined) {
        throw new RangeError('An index is required to remove a list entry');
      }
      return def.remove(config, index);
    },
  };
}

interface SingleFormDef<T> {
  get(config: VTAPConfig): T | undefined;
  toValues(item: T | undefined): FormValues;
  /** undefined when the values describe an unconfigured section */
  fromValues(values: FormValues): T | undefined;
  set(config: VTAPConfig, item: T | undefined): VTAPConfig;
}

function singleForm<T>(def: SingleFormDef<T>): SectionForm {
  return {
    list: false,
    blank: () => def.toValues(undefined),
    read: (config) => def.toValues(def.get(config)),
    count: (config) => (def.get(config) === undefined ? 0 : 1),
    store: (config, values) => ({ config: def.set(config, def.fromValues(values)) }),
    remove: (config) => def.set(config, undefined),
  };
}

// ============================================================================
// Sections
// ============================================================================

const vasForm = listForm<AppleVASConfig>({
  blank: { merchantId: 'pass.', keySlot: '1', merchantUrl: '' },
  entries: (config) => config.vasConfigs,
  toValues: (vas) => ({
    merchantId: vas.merchantId,
    keySlot: show(vas.keySlot),
    merchantUrl: show(vas.merchantUrl),
  }),
  fromValues: (values) =>
    new AppleVASConfig({
      merchantId: values.merchantId ?? '',
      keySlot: required('keySlot', intValue(values, 'keySlot')),
      merchantUrl: textValue(values, 'merchantUrl'),
    }),
  add: (config, vas) => config.addVAS(vas),
  replace: (config, index, vas) => config.replaceVAS(index, vas),
  remove: (config, index) => config.removeVAS(index),
});

const smartTapForm = listForm<GoogleSmartTapConfig>({
  blank: { collectorId: '', keySlot: '0', keyVersion: '0' },
  entries: (config) => config.smartTapConfigs,
  toValues: (st) => ({
    collectorId: st.collectorId,
    keySlot: show(st.keySlot),
    keyVersion: show(st.keyVersion),
  }),
  fromValues: (values) =>
    new GoogleSmartTapConfig({
      collectorId: values.collectorId ?? '',
      keySlot: intValue(values, 'keySlot'),
      keyVersion: intValue(values, 'keyVersion'),
    }),
  add: (config, st) => config.addSmartTap(st),
  replace: (config, index, st) => config.replaceSmartTap(index, st),
  remove: (config, index) => config.removeSmartTap(index),
});

const DESFIRE_INT_FIELDS = [
  'fileId',
  'keyNum',
  'keySlot',
  'readLength',
  'readOffset',
  'privacyKeyNum',
  'privacyKeySlot',
  'sysIdKeySlot',
  'sysIdLength',
] as const;

const desfireForm = listForm<DESFireAppConfig>({
  blank: {
    appId: '',
    fileId: '',
    keyNum: '',
    keySlot: '',
    crypto: '',
    format: '',
    readLength: '3',
    readOffset: '0',
    diversification: '',
    privacyKeyNum: '',
    privacyKeySlot: '',
    sysIdKeySlot: '',
    sysIdLength: '',
  },
  entries: (config) => config.desfire?.apps ?? [],
  toValues: (app) => ({
    appId: app.appId,
    ...Object.fromEntries(DESFIRE_INT_FIELDS.map((field) => [field, show(app[field])])),
    crypto: show(app.crypto),
    format: show(app.format),
    diversification: show(app.diversification),
  }),
  fromValues: (values) =>
    new DESFireAppConfig({
      appId: required('appId', textValue(values, 'appId')),
      fileId: intValue(values, 'fileId'),
      keyNum: intValue(values, 'keyNum'),
      keySlot: intValue(values, 'keySlot'),
      crypto: optional(intValue(values, 'crypto'), (v) => oneOf('crypto', v, DESFIRE_CRYPTO_MODES)),
      format: optional(intValue(values, 'format'), (v) => oneOf('format', v, DESFIRE_DATA_FORMATS)),
      readLength: intValue(values, 'readLength'),
      readOffset: intValue(values, 'readOffset'),
      diversification: flagValue(values, 'diversification'),
      privacyKeyNum: intValue(values, 'privacyKeyNum'),
      privacyKeySlot: intValue(values, 'privacyKeySlot'),
      sysIdKeySlot: intValue(values, 'sysIdKeySlot'),
      sysIdLength: intValue(values, 'sysIdLength'),
    }),
  add: (config, app) => config.addDESFireApp(app),
  replace: (config, index, app) => config.replaceDESFireApp(index, app),
  remove: (config, index) => config.removeDESFireApp(index),
});

const keyboardForm = singleForm<KeyboardConfig>({
  get: (config) => config.keyboard,
  toValues: (keyboard = new KeyboardConfig()) => ({
    logMode: show(keyboard.logMode),
    enable: show(keyboard.enable),
    source: keyboard.source,
    prefix: show(keyboard.prefix),
    postfix: keyboard.postfix,
    delayMs: show(keyboard.delayMs),
    passMode: show(keyboard.passMode),
    passSection: show(keyboard.passSection),
    passSeparator: keyboard.passSeparator,
    passStart: show(keyboard.passStart),
    passLength: show(keyboard.passLength),
  }),
  fromValues: (values) =>
    new KeyboardConfig({
      logMode: flagValue(values, 'logMode'),
      enable: flagValue(values, 'enable'),
      source: textValue(values, 'source'),
      prefix: textValue(values, 'prefix'),
      // An empty postfix is a real setting: nothing is sent after the data.
      postfix: values.postfix,
      delayMs: intValue(values, 'delayMs'),
      passMode: flagValue(values, 'passMode'),
      passSection: intValue(values, 'passSection'),
      passSeparator: textValue(values, 'passSeparator'),
      passStart: intValue(values, 'passStart'),
      passLength: intValue(values, 'passLength'),
    }),
  set: (config, keyboard) => config.with({ keyboard }),
});

const nfcForm = singleForm<NFCTagConfig>({
  get: (config) => config.nfc,
  toValues: (nfc = new NFCTagConfig()) => {
    const tagRead = nfc.tagRead;
    return {
      type2: show(nfc.type2),
      type4: show(nfc.type4),
      type5: show(nfc.type5),
      reportReadError: show(nfc.reportReadError),
      ignoreRandomUid: show(nfc.ignoreRandomUid),
      byteOrderReversed: show(nfc.byteOrderReversed),
      'tagRead.blockNum': show(tagRead?.blockNum),
      'tagRead.keySlot': show(tagRead?.keySlot),
      'tagRead.keyType': show(tagRead?.keyType),
      'tagRead.offset': show(tagRead?.offset),
      'tagRead.length': show(tagRead?.length),
      'tagRead.format': show(tagRead?.format),
      'tagRead.minDigits': show(tagRead?.minDigits),
    };
  },
  fromValues: (values) => {
    const tagRead = hasAny(values, 'tagRead.')
      ? withFieldPrefix('tagRead', () => {
          const minDigits = textValue(values, 'tagRead.minDigits');
          return new TagReadConfig({
            blockNum: intValue(values, 'tagRead.blockNum'),
            keySlot: intValue(values, 'tagRead.keySlot'),
            keyType: optional(textValue(values, 'tagRead.keyType'), (v) =>
              oneOf('keyType', v, TAG_KEY_TYPES)
            ),
            offset: intValue(values, 'tagRead.offset'),
            length: intValue(values, 'tagRead.length'),
            format: optional(textValue(values, 'tagRead.format'), (v) =>
              oneOf('format', v, TAG_READ_FORMATS)
            ),
            minDigits:
              minDigits === AUTO_MIN_DIGITS ? AUTO_MIN_DIGITS : intValue(values, 'tagRead.minDigits'),
          });
        })
      : undefined;
    const mode = (key: 'type2' | 'type4' | 'type5') =>
      optional(textValue(values, key), (v) => oneOf(key, v, TYPE4_TAG_MODES));
    return new NFCTagConfig({
      type2: mode('type2'),
      type4: mode('type4'),
      type5: mode('type5'),
      reportReadError: flagValue(values, 'reportReadError'),
      ignoreRandomUid: flagValue(values, 'ignoreRandomUid'),
      byteOrderReversed: flagValue(values, 'byteOrderReversed'),
      tagRead,
    });
  },
  set: (config, nfc) => config.with({ nfc }),
});

const LED_SEQUENCE_FIELDS = ['passLed', 'tagLed', 'passErrorLed', 'startLed'] as const;
const BEEP_SEQUENCE_FIELDS = ['passBeep', 'tagBeep', 'passErrorBeep', 'startBeep'] as const;

function sequenceValue<T>(
  values: FormValues,
  key: string,
  shape: string,
  parse: (value: string) => T | undefined
): T | undefined {
  return optional(textValue(values, key), (value) =>
    withFieldPrefix(key, () => {
      const sequence = parse(value);
      if (sequence === undefined) {
        throw new ValidationError('value', `must be ${shape}`, value);
      }
      return sequence;
    })
  );
}

const feedbackForm = singleForm<FeedbackConfig>({
  get: (config) => config.feedback,
  toValues: (feedback) => {
    const led = feedback?.led;
    const beep = feedback?.beep;
    return {
      'led.mode': show(led?.mode),
      'led.select': show(led?.select),
      'led.defaultRgb': show(led?.defaultRgb),
      ...Object.fromEntries(
        LED_SEQUENCE_FIELDS.map((field) => [`led.${field}`, led?.[field]?.toConfigValue() ?? ''])
      ),
      ...Object.fromEntries(
        BEEP_SEQUENCE_FIELDS.map((field) => [`beep.${field}`, beep?.[field]?.toConfigValue() ?? ''])
      ),
    };
  },
  fromValues: (values) => {
    const ledSequence = (field: (typeof LED_SEQUENCE_FIELDS)[number]) =>
      sequenceValue(values, `led.${field}`, 'color,on,off,repeats', LEDSequence.fromConfigValue);
    const beepSequence = (field: (typeof BEEP_SEQUENCE_FIELDS)[number]) =>
      sequenceValue(values, `beep.${field}`, 'on,off,repeats[,frequency]', BeepSequence.fromConfigValue);

    let led: LEDConfig | undefined;
    if (hasAny(values, 'led.')) {
      const passLed = ledSequence('passLed');
      const tagLed = ledSequence('tagLed');
      const passErrorLed = ledSequence('passErrorLed');
      const startLed = ledSequence('startLed');
      led = withFieldPrefix(
        'led',
        () =>
          new LEDConfig({
            mode: optional(intValue(values, 'led.mode'), (v) => oneOf('mode', v, LED_MODES)),
            select: optional(intValue(values, 'led.select'), (v) => oneOf('select', v, LED_SELECTS)),
            defaultRgb: textValue(values, 'led.defaultRgb'),
            passLed,
            tagLed,
            passErrorLed,
            startLed,
          })
      );
    }
    const beep = hasAny(values, 'beep.')
      ? new BeepConfig({
          passBeep: beepSequence('passBeep'),
          tagBeep: beepSequence('tagBeep'),
          passErrorBeep: beepSequence('passErrorBeep'),
          startBeep: beepSequence('startBeep'),
        })
      : undefined;
    return led || beep ? new FeedbackConfig({ led, beep }) : undefined;
  },
  set: (config, feedback) => config.with({ feedback }),
});

/**
 * Form handling for every editable section
 */
export const SECTION_FORMS: Readonly<Record<SectionId, SectionForm>> = {
  vas: vasForm,
  smarttap: smartTapForm,
  desfire: desfireForm,
  keyboard: keyboardForm,
  nfc: nfcForm,
  feedback: feedbackForm,
};
