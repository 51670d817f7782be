import { WHEN_SET, emit, hexString, oneOf, optional, rangedInt, required } from './fields.js';
import { LED_MODES, LED_SELECTS } from './types.js';
import type {
  BeepInit,
  BeepSequenceInit,
  FeedbackInit,
  LEDInit,
  LEDMode,
  LEDSelect,
  LEDSequenceInit,
} from './types.js';

export const DEFAULT_ON_MS = 100;
export const DEFAULT_OFF_MS = 100;
export const DEFAULT_REPEATS = 1;

const MAX_DURATION_MS = 65535;
const NUMERIC = /^\d+$/;

/**
 * Split a comma-joined sequence value into integers.
 * @returns undefined when any part is not a plain unsigned integer
 */
function splitNumbers(parts: string[]): number[] | undefined {
  if (!parts.every((part) => NUMERIC.test(part.trim()))) {
    return undefined;
  }
  return parts.map((part) => Number(part.trim()));
}

/**
 * LED blink sequence, written as `color,on,off,repeats`
 */
export class LEDSequence {
  readonly color: string;
  readonly onMs: number;
  readonly offMs: number;
  readonly repeats: number;

  constructor(init: LEDSequenceInit) {
    this.color = hexString('color', required('color', init.color), 6);
    this.onMs = rangedInt('onMs', init.onMs ?? DEFAULT_ON_MS, 0, MAX_DURATION_MS);
    this.offMs = rangedInt('offMs', init.offMs ?? DEFAULT_OFF_MS, 0, MAX_DURATION_MS);
    this.repeats = rangedInt('repeats', init.repeats ?? DEFAULT_REPEATS, 1, 255);
  }

  /**
   * Read a sequence back from its config value.
   * @returns undefined when the value does not have the LED sequence shape
   * @throws {ValidationError} When the shape fits but a field is out of range
   */
  static fromConfigValue(value: string): LEDSequence | undefined {
    const [color, ...rest] = value.split(',');
    if (color === undefined || rest.length !== 3) {
      return undefined;
    }
    const numbers = splitNumbers(rest);
    if (!numbers) {
      return undefined;
    }
    const [onMs, offMs, repeats] = numbers;
    return new LEDSequence({ color: color.trim(), onMs, offMs, repeats });
  }

  toInit(): LEDSequenceInit {
    return { color: this.color, onMs: this.onMs, offMs: this.offMs, repeats: this.repeats };
  }

  toConfigValue(): string {
    return `${this.color},${this.onMs},${this.offMs},${this.repeats}`;
  }
}

/**
 * Buzzer sequence, written as `on,off,repeats[,frequency]`
 */
export class BeepSequence {
  readonly onMs: number;
  readonly offMs: number;
  readonly repeats: number;
  /** Tone in Hz; the reader's own tone when unset */
  readonly frequency?: number;

  constructor(init: BeepSequenceInit = {}) {
    this.onMs = rangedInt('onMs', init.onMs ?? DEFAULT_ON_MS, 0, MAX_DURATION_MS);
    this.offMs = rangedInt('offMs', init.offMs ?? DEFAULT_OFF_MS, 0, MAX_DURATION_MS);
    this.repeats = rangedInt('repeats', init.repeats ?? DEFAULT_REPEATS, 1, 255);
    this.frequency = optional(init.frequency, (v) => rangedInt('frequency', v, 100, 20000));
  }

  /**
   * Read a sequence back from its config value.
   * @returns undefined when the value does not have the beep sequence shape
   * @throws {ValidationError} When the shape fits but a field is out of range
   */
  static fromConfigValue(value: string): BeepSequence | undefined {
    const parts = value.split(',');
    if (parts.length < 3 || parts.length > 4) {
      return undefined;
    }
    const numbers = splitNumbers(parts);
    if (!numbers) {
      return undefined;
    }
    const [onMs, offMs, repeats, frequency] = numbers;
    return new BeepSequence({ onMs, offMs, repeats, frequency });
  }

  toInit(): BeepSequenceInit {
    return {
      onMs: this.onMs,
      offMs: this.offMs,
      repeats: this.repeats,
      frequency: this.frequency,
    };
  }

  toConfigValue(): string {
    const base = `${this.onMs},${this.offMs},${this.repeats}`;
    return this.frequency === undefined ? base : `${base},${this.frequency}`;
  }
}

/**
 * LED settings. Every field is optional; unset fields are not written.
 */
export class LEDConfig {
  readonly mode?: LEDMode;
  readonly select?: LEDSelect;
  readonly defaultRgb?: string;
  readonly passLed?: LEDSequence;
  readonly tagLed?: LEDSequence;
  readonly passErrorLed?: LEDSequence;
  readonly startLed?: LEDSequence;

  constructor(init: LEDInit = {}) {
    this.mode = optional(init.mode, (v) => oneOf('mode', v, LED_MODES));
    this.select = optional(init.select, (v) => oneOf('select', v, LED_SELECTS));
    this.defaultRgb = optional(init.defaultRgb, (v) => hexString('defaultRgb', v, 6));
    this.passLed = init.passLed;
    this.tagLed = init.tagLed;
    this.passErrorLed = init.passErrorLed;
    this.startLed = init.startLed;
  }

  with(changes: Partial<LEDInit>): LEDConfig {
    return new LEDConfig({ ...this.toInit(), ...changes });
  }

  toInit(): LEDInit {
    return {
      mode: this.mode,
      select: this.select,
      defaultRgb: this.defaultRgb,
      passLed: this.passLed,
      tagLed: this.tagLed,
      passErrorLed: this.passErrorLed,
      startLed: this.startLed,
    };
  }

  toConfigLines(): string[] {
    const lines: string[] = [];
    emit(lines, 'LEDMode', this.mode, WHEN_SET);
    emit(lines, 'LEDSelect', this.select, WHEN_SET);
    emit(lines, 'LEDDefaultRGB', this.defaultRgb, WHEN_SET);
    emitSequence(lines, 'PassLED', this.passLed);
    emitSequence(lines, 'TagLED', this.tagLed);
    emitSequence(lines, 'PassErrorLED', this.passErrorLed);
    emitSequence(lines, 'StartLED', this.startLed);
    return lines;
  }
}

/**
 * Buzzer settings per reader event
 */
export class BeepConfig {
  readonly passBeep?: BeepSequence;
  readonly tagBeep?: BeepSequence;
  readonly passErrorBeep?: BeepSequence;
  readonly startBeep?: BeepSequence;

  constructor(init: BeepInit = {}) {
    this.passBeep = init.passBeep;
    this.tagBeep = init.tagBeep;
    this.passErrorBeep = init.passErrorBeep;
    this.startBeep = init.startBeep;
  }

  with(changes: Partial<BeepInit>): BeepConfig {
    return new BeepConfig({ ...this.toInit(), ...changes });
  }

  toInit(): BeepInit {
    return {
      passBeep: this.passBeep,
      tagBeep: this.tagBeep,
      passErrorBeep: this.passErrorBeep,
      startBeep: this.startBeep,
    };
  }

  toConfigLines(): string[] {
    const lines: string[] = [];
    emitSequence(lines, 'PassBeep', this.passBeep);
    emitSequence(lines, 'TagBeep', this.tagBeep);
    emitSequence(lines, 'PassErrorBeep', this.passErrorBeep);
    emitSequence(lines, 'StartBeep', this.startBeep);
    return lines;
  }
}

/**
 * LED and buzzer feedback together
 */
export class FeedbackConfig {
  readonly led?: LEDConfig;
  readonly beep?: BeepConfig;

  constructor(init: FeedbackInit = {}) {
    this.led = init.led;
    this.beep = init.beep;
  }

  with(changes: Partial<FeedbackInit>): FeedbackConfig {
    return new FeedbackConfig({ led: this.led, beep: this.beep, ...changes });
  }

  toConfigLines(): string[] {
    return [...(this.led?.toConfigLines() ?? []), ...(this.beep?.toConfigLines() ?? [])];
  }
}

function emitSequence(
  lines: string[],
  key: string,
  sequence: LEDSequence | BeepSequence | undefined
): void {
  if (sequence) {
    lines.push(`${key}=${sequence.toConfigValue()}`);
  }
}
