import { VTAPConfig } from './config.js';
import { ValidationError } from './errors.js';
import { SECTION_FORMS } from './forms.js';
import type { FormValues, SectionForm, SectionId } from './forms.js';
import { ConfigGenerator } from './generator.js';
import { slotInfoText, usedSlots } from './slots.js';
import type { GeneratorOptions } from './types.js';

/**
 * The form being edited. A list section without index is a new entry.
 */
export interface FormTarget {
  section: SectionId;
  index?: number;
}

/** Answer to the unsaved-changes question */
export type PendingChoice = 'save' | 'discard' | 'cancel';

export type NavigateResult = 'navigated' | 'unchanged' | 'pending';

/**
 * Configuration options for an editor session
 */
export interface EditorOptions {
  /** Form opened first (default: keyboard) */
  initialTarget?: FormTarget;
  /** Formatting used by {@link EditorSession.preview} */
  generator?: GeneratorOptions;
}

interface EditorEvents {
  changed: [field: string, value: string];
  navigated: [target: FormTarget];
  saved: [target: FormTarget];
  invalid: [errors: ReadonlyMap<string, string>];
  pending: [target: FormTarget, isNew: boolean];
}

type EditorListeners = {
  [K in keyof EditorEvents]: Array<(...args: EditorEvents[K]) => void>;
};

const DEFAULT_TARGET: FormTarget = { section: 'keyboard' };

function sameValues(a: FormValues, b: FormValues): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  return [...keys].every((key) => a[key] === b[key]);
}

/**
 * Headless editing session over a VTAPConfig.
 *
 * One form is open at a time. Field edits are kept as strings until saved;
 * leaving a form with unsaved edits parks the navigation until the caller
 * answers with {@link resolvePending}.
 *
 * @example
 * ```ts
 * const session = new EditorSession(config, { initialTarget: { section: 'vas', index: 0 } });
 * session.setField('keySlot', '2');
 * if (session.navigate({ section: 'nfc' }) === 'pending') {
 *   session.resolvePending('save');
 * }
 * ```
 */
export class EditorSession {
  private current: VTAPConfig;
  private openTarget: FormTarget;
  private values: FormValues;
  private snapshot: FormValues;
  private fieldErrors = new Map<string, string>();
  private pendingTarget: FormTarget | null = null;
  private readonly generatorOptions: GeneratorOptions;

  private listeners: EditorListeners = {
    changed: [],
    navigated: [],
    saved: [],
    invalid: [],
    pending: [],
  };

  constructor(config: VTAPConfig = new VTAPConfig(), options: EditorOptions = {}) {
    this.current = config;
    this.generatorOptions = options.generator ?? {};
    this.openTarget = this.normalize(options.initialTarget ?? DEFAULT_TARGET);
    this.values = this.load(this.openTarget);
    this.snapshot = { ...this.values };
  }

  // ============================================================================
  // State
  // ============================================================================

  get config(): VTAPConfig {
    return this.current;
  }

  get target(): FormTarget {
    return { ...this.openTarget };
  }

  /** True for a form that adds a list entry rather than editing one */
  get isNew(): boolean {
    return this.form.list && this.openTarget.index === undefined;
  }

  get isDirty(): boolean {
    return !sameValues(this.values, this.snapshot);
  }

  get fields(): FormValues {
    return { ...this.values };
  }

  /** Validation messages from the last failed save, keyed by form field */
  get errors(): ReadonlyMap<string, string> {
    return this.fieldErrors;
  }

  get pending(): FormTarget | null {
    return this.pendingTarget && { ...this.pendingTarget };
  }

  getField(field: string): string {
    this.checkField(field);
    return this.values[field];
  }

  // ============================================================================
  // Editing
  // ============================================================================

  /**
   * Change one field of the open form
   * @throws {RangeError} If the form has no such field
   */
  setField(field: string, value: string): void {
    this.checkField(field);
    this.values[field] = value;
    this.fieldErrors.delete(field);
    this.emit('changed', field, value);
  }

  /**
   * Validate the open form and store it in the configuration.
   * A new entry is appended and the form then edits it.
   * @returns false when validation failed; see {@link errors}
   */
  save(): boolean {
    let result: { config: VTAPConfig; index?: number };
    try {
      result = this.form.store(this.current, this.values, this.openTarget.index);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.recordError(error);
        return false;
      }
      throw error;
    }

    this.current = result.config;
    this.openTarget = { section: this.openTarget.section, index: result.index };
    this.reopen();
    this.emit('saved', this.target);
    return true;
  }

  /**
   * Remove the open list entry, or clear the open section. A list form
   * switches to a new entry afterwards.
   */
  remove(): void {
    const { section, index } = this.openTarget;
    if (this.isNew) {
      throw new RangeError(`No stored ${section} entry to remove`);
    }
    this.current = this.form.remove(this.current, index);
    this.openTarget = { section };
    this.reopen();
    this.emit('navigated', this.target);
  }

  /**
   * Append a copy of the open form's values as a new list entry and open it
   * @returns false when the values do not validate
   */
  duplicate(): boolean {
    if (!this.form.list) {
      throw new RangeError(`Section ${this.openTarget.section} has no entries to duplicate`);
    }
    const source = this.openTarget;
    this.openTarget = { section: source.section };
    if (this.save()) {
      this.emit('navigated', this.target);
      return true;
    }
    this.openTarget = source;
    return false;
  }

  // ============================================================================
  // Navigation
  // ============================================================================

  /**
   * Open another form. With unsaved edits the move is parked and a
   * `pending` event asks for a {@link resolvePending} answer.
   * @throws {RangeError} If the target list entry does not exist
   */
  navigate(target: FormTarget): NavigateResult {
    const next = this.normalize(target);
    if (next.section === this.openTarget.section && next.index === this.openTarget.index) {
      return 'unchanged';
    }
    if (this.isDirty) {
      this.pendingTarget = next;
      this.emit('pending', { ...next }, this.isNew);
      return 'pending';
    }
    this.open(next);
    return 'navigated';
  }

  /**
   * Finish a parked navigation.
   *
   * - save: save, then move on; stays put when the save fails
   * - discard: drop the edits and move on
   * - cancel: stay on the form with the edits kept
   */
  resolvePending(choice: PendingChoice): NavigateResult {
    const next = this.pendingTarget;
    this.pendingTarget = null;
    if (!next || choice === 'cancel') {
      return 'unchanged';
    }
    if (choice === 'save' && !this.save()) {
      return 'unchanged';
    }
    this.open(this.normalize(next));
    return 'navigated';
  }

  // ============================================================================
  // Output
  // ============================================================================

  /**
   * Generated config.txt for the stored configuration (unsaved edits excluded)
   */
  preview(comment?: string): string {
    return new ConfigGenerator(this.current, this.generatorOptions).generate(comment);
  }

  /**
   * Key slot usage, leaving out the entry being edited
   */
  slotInfo(): string {
    const { section, index } = this.openTarget;
    const exclude =
      (section === 'vas' || section === 'smarttap') && index !== undefined
        ? { section, index }
        : undefined;
    return slotInfoText(usedSlots(this.current, exclude));
  }

  // ============================================================================
  // Event Listeners
  // ============================================================================

  /**
   * Register an event listener
   */
  on<K extends keyof EditorEvents>(event: K, callback: (...args: EditorEvents[K]) => void): this {
    this.listeners[event].push(callback);
    return this;
  }

  /**
   * Remove an event listener
   */
  off<K extends keyof EditorEvents>(event: K, callback: (...args: EditorEvents[K]) => void): this {
    const listeners = this.listeners[event];
    const index = listeners.indexOf(callback);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  private emit<K extends keyof EditorEvents>(event: K, ...args: EditorEvents[K]): void {
    for (const callback of [...this.listeners[event]]) {
      callback(...args);
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private get form(): SectionForm {
    return SECTION_FORMS[this.openTarget.section];
  }

  private normalize(target: FormTarget): FormTarget {
    const form = SECTION_FORMS[target.section];
    if (!form.list) {
      return { section: target.section };
    }
    if (target.index !== undefined) {
      const count = form.count(this.current);
      if (!Number.isInteger(target.index) || target.index < 0 || target.index >= count) {
        throw new RangeError(`No ${target.section} entry at index ${target.index}`);
      }
    }
    return { section: target.section, index: target.index };
  }

  private load(target: FormTarget): FormValues {
    const form = SECTION_FORMS[target.section];
    return form.read(this.current, target.index) ?? form.blank();
  }

  private open(target: FormTarget): void {
    this.openTarget = target;
    this.reopen();
    this.emit('navigated', this.target);
  }

  /** Reload the open form from the stored configuration and start clean */
  private reopen(): void {
    this.values = this.load(this.openTarget);
    this.snapshot = { ...this.values };
    this.fieldErrors.clear();
  }

  private checkField(field: string): void {
    if (!(field in this.values)) {
      throw new RangeError(`Unknown field ${field} for ${this.openTarget.section}`);
    }
  }

  /**
   * File the error under the form field it belongs to, e.g.
   * "led.passLed.color" under "led.passLed"
   */
  private recordError(error: ValidationError): void {
    const field =
      Object.keys(this.values).find(
        (key) => error.field === key || error.field.startsWith(`${key}.`)
      ) ?? error.field;
    this.fieldErrors.set(field, error.message);
    this.emit('invalid', this.fieldErrors);
  }
}
