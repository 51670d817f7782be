// Configuration model
export { VTAPConfig } from './config.js';
export { AppleVASConfig, VASDefaultPassesEnabled, VAS_MERCHANT_PREFIX, MAX_VAS_CONFIGS } from './vas.js';
export {
  GoogleSmartTapConfig,
  STDefaultPassesEnabled,
  MAX_SMARTTAP_CONFIGS,
  UNASSIGNED_KEY_SLOT,
} from './smarttap.js';
export { ALL_PASSES, DefaultPassesEnabled } from './passes.js';
export { KeyboardConfig, KBSourceBuilder, KEYBOARD_DEFAULTS } from './keyboard.js';
export { NFCTagConfig, TagReadConfig, AUTO_MIN_DIGITS } from './nfc.js';
export {
  DESFireAppConfig,
  DESFireConfig,
  MAX_DESFIRE_APPS,
  DEFAULT_DESFIRE_SEPARATOR,
  DEFAULT_READ_LENGTH,
  DEFAULT_READ_OFFSET,
} from './desfire.js';
export {
  LEDSequence,
  BeepSequence,
  LEDConfig,
  BeepConfig,
  FeedbackConfig,
  DEFAULT_ON_MS,
  DEFAULT_OFF_MS,
  DEFAULT_REPEATS,
} from './feedback.js';

// Codes
export {
  NFCTagMode,
  TagReadFormat,
  DESFireCryptoMode,
  DESFireDataFormat,
  LEDMode,
  LEDSelect,
} from './types.js';

// Generator and parser
export {
  ConfigGenerator,
  generate,
  generateTemplate,
  CONFIG_HEADER,
  STATIC_MARKER,
  PASSES_TEMPLATE_LINES,
} from './generator.js';
export type { TextSink } from './generator.js';
export { ConfigParser, parse, parseFile } from './parser.js';

// Editor
export { EditorSession } from './editor.js';
export type { EditorOptions, FormTarget, NavigateResult, PendingChoice } from './editor.js';
export { SECTION_FORMS, LIST_SECTIONS } from './forms.js';
export type { FormValues, SectionForm, SectionId } from './forms.js';
export { usedSlots, slotConflicts, slotInfoText, KEY_SLOTS } from './slots.js';
export type { SlotExclusion } from './slots.js';

// Reference and CLI
export { PARAMETER_TABLES, renderDocs, renderTable } from './docs.js';
export type { ParameterTable } from './docs.js';
export { run, validateContent } from './cli.js';
export type { CliIO, ValidationReport } from './cli.js';

// Errors
export {
  VTAPConfigError,
  ValidationError,
  ConfigFormatError,
  ConfigFileError,
} from './errors.js';

// Types
export type {
  TagKeyType,
  AppleVASInit,
  GoogleSmartTapInit,
  KeyboardInit,
  TagReadInit,
  NFCTagInit,
  DESFireAppInit,
  DESFireInit,
  LEDSequenceInit,
  BeepSequenceInit,
  LEDInit,
  BeepInit,
  FeedbackInit,
  VTAPConfigInit,
  GeneratorOptions,
  ParserOptions,
} from './types.js';
