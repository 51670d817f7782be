import { describe, it, expect, vi } from 'vitest';
import { EditorSession } from './editor.js';
import { VTAPConfig } from './config.js';
import { KeyboardConfig } from './keyboard.js';
import { GoogleSmartTapConfig } from './smarttap.js';
import { AppleVASConfig } from './vas.js';
import { testData } from './__tests__/fixtures.js';

const vas = (keySlot: number): AppleVASConfig =>
  new AppleVASConfig({ merchantId: `pass.com.example.slot${keySlot}`, keySlot });

describe('EditorSession', () => {
  describe('editing', () => {
    it('should open the keyboard form with defaults', () => {
      const session = new EditorSession();

      expect(session.target).toEqual({ section: 'keyboard' });
      expect(session.isNew).toBe(false);
      expect(session.isDirty).toBe(false);
      expect(session.getField('source')).toBe('A5');
      expect(session.getField('postfix')).toBe('%0A');
    });

    it('should track edits against the loaded values', () => {
      const session = new EditorSession();
      const changed = vi.fn();
      session.on('changed', changed);

      session.setField('logMode', '1');
      expect(session.isDirty).toBe(true);
      expect(changed).toHaveBeenCalledWith('logMode', '1');

      session.setField('logMode', '0');
      expect(session.isDirty).toBe(false);
    });

    it('should reject unknown fields', () => {
      expect(() => new EditorSession().setField('nope', '1')).toThrow('Unknown field nope for keyboard');
    });

    it('should store a saved form and start clean', () => {
      const session = new EditorSession();
      const saved = vi.fn();
      session.on('saved', saved);

      session.setField('logMode', '1');

      expect(session.save()).toBe(true);
      expect(session.isDirty).toBe(false);
      expect(session.config.keyboard?.logMode).toBe(true);
      expect(saved).toHaveBeenCalledWith({ section: 'keyboard' });
      expect(session.preview()).toBe('!VTAPconfig\n; Keyboard Emulation\nKBLogMode=1\nKBSource=A5');
    });

    it('should leave unsaved edits out of the preview', () => {
      const session = new EditorSession();
      session.setField('logMode', '1');

      expect(session.preview()).toBe('!VTAPconfig');
    });
  });

  describe('list entries', () => {
    it('should append a new entry and then edit it', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'vas' } });

      expect(session.isNew).toBe(true);
      expect(session.isDirty).toBe(false);
      expect(session.fields).toEqual({ merchantId: 'pass.', keySlot: '1', merchantUrl: '' });

      session.setField('merchantId', testData.merchantId);

      expect(session.save()).toBe(true);
      expect(session.target).toEqual({ section: 'vas', index: 0 });
      expect(session.isNew).toBe(false);
      expect(session.config.vasConfigs.map((v) => v.merchantId)).toEqual([testData.merchantId]);
    });

    it('should uppercase stored values when the form reloads', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'desfire' } });
      session.setField('appId', 'abcdef');

      expect(session.save()).toBe(true);
      expect(session.getField('appId')).toBe('ABCDEF');
      expect(session.getField('readLength')).toBe('3');
    });

    it('should remove the open entry and switch to a new one', () => {
      const config = new VTAPConfig({ vasConfigs: [vas(1), vas(2)] });
      const session = new EditorSession(config, { initialTarget: { section: 'vas', index: 0 } });

      session.remove();

      expect(session.config.vasConfigs.map((v) => v.keySlot)).toEqual([2]);
      expect(session.target).toEqual({ section: 'vas' });
      expect(() => session.remove()).toThrow('No stored vas entry to remove');
    });

    it('should clear a single section', () => {
      const config = new VTAPConfig({ keyboard: new KeyboardConfig({ logMode: true }) });
      const session = new EditorSession(config);

      session.remove();

      expect(session.config.keyboard).toBeUndefined();
      expect(session.getField('logMode')).toBe('0');
    });

    it('should duplicate the open entry', () => {
      const config = new VTAPConfig({ vasConfigs: [vas(1)] });
      const session = new EditorSession(config, { initialTarget: { section: 'vas', index: 0 } });

      expect(session.duplicate()).toBe(true);
      expect(session.target).toEqual({ section: 'vas', index: 1 });
      expect(session.config.vasConfigs.map((v) => v.keySlot)).toEqual([1, 1]);
    });

    it('should stay on the entry when a duplicate does not validate', () => {
      const config = new VTAPConfig({ vasConfigs: [vas(1)] });
      const session = new EditorSession(config, { initialTarget: { section: 'vas', index: 0 } });
      session.setField('keySlot', '9');

      expect(session.duplicate()).toBe(false);
      expect(session.target).toEqual({ section: 'vas', index: 0 });
      expect(session.config.vasConfigs).toHaveLength(1);
    });

    it('should only duplicate list entries', () => {
      expect(() => new EditorSession().duplicate()).toThrow('Section keyboard has no entries to duplicate');
    });
  });

  describe('validation', () => {
    it('should file errors under the field and keep the config', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'vas' } });
      const invalid = vi.fn();
      session.on('invalid', invalid);

      session.setField('keySlot', '9');

      expect(session.save()).toBe(false);
      expect(session.errors.get('keySlot')).toBe('keySlot: must be between 1 and 6');
      expect(invalid).toHaveBeenCalledTimes(1);
      expect(session.config.vasConfigs).toEqual([]);
      expect(session.isDirty).toBe(true);
    });

    it('should clear a field error when the field changes', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'vas' } });
      session.setField('keySlot', '');

      expect(session.save()).toBe(false);
      expect(session.errors.get('keySlot')).toBe('keySlot: is required');

      session.setField('keySlot', '2');
      expect(session.errors.size).toBe(0);
    });

    it('should file nested errors under their form field', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'feedback' } });
      session.setField('led.passLed', '00FF00,70000,100,1');

      expect(session.save()).toBe(false);
      expect(session.errors.get('led.passLed')).toBe('led.passLed.onMs: must be between 0 and 65535');
    });

    it('should file block read errors under the tag read field', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'nfc' } });
      session.setField('tagRead.blockNum', '300');

      expect(session.save()).toBe(false);
      expect(session.errors.get('tagRead.blockNum')).toBe('tagRead.blockNum: must be between 0 and 255');
    });

    it('should reject integer fields that are not plain digits', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'smarttap' } });
      session.setField('collectorId', '12345678');
      session.setField('keySlot', '  ');
      session.setField('keyVersion', '0x3');

      expect(session.save()).toBe(false);
      expect(session.errors.get('keySlot')).toBe('keySlot: must be an integer');
      expect(session.config.smartTapConfigs).toEqual([]);

      session.setField('keySlot', ' 2 ');
      session.setField('keyVersion', '1e1');
      expect(session.save()).toBe(false);
      expect(session.errors.get('keyVersion')).toBe('keyVersion: must be an integer');

      session.setField('keyVersion', '10');
      expect(session.save()).toBe(true);
      expect(session.config.smartTapConfigs[0].toInit()).toEqual({ collectorId: '12345678', keySlot: 2, keyVersion: 10 });
    });

    it('should reject a flag other than 0 or 1', () => {
      const session = new EditorSession();
      session.setField('enable', 'yes');

      expect(session.save()).toBe(false);
      expect(session.errors.get('enable')).toBe('enable: must be 0 or 1');
    });
  });

  describe('navigation', () => {
    it('should move freely from a clean form', () => {
      const session = new EditorSession();
      const navigated = vi.fn();
      session.on('navigated', navigated);

      expect(session.navigate({ section: 'nfc' })).toBe('navigated');
      expect(session.navigate({ section: 'nfc' })).toBe('unchanged');
      expect(navigated).toHaveBeenCalledTimes(1);
      expect(navigated).toHaveBeenCalledWith({ section: 'nfc' });
    });

    it('should reject a missing list entry', () => {
      expect(() => new EditorSession().navigate({ section: 'vas', index: 0 })).toThrow(
        'No vas entry at index 0'
      );
    });

    it('should park a move away from unsaved edits', () => {
      const session = new EditorSession(new VTAPConfig(), { initialTarget: { section: 'vas' } });
      const pending = vi.fn();
      session.on('pending', pending);
      session.setField('merchantId', testData.merchantId);

      expect(session.navigate({ section: 'keyboard' })).toBe('pending');
      expect(session.pending).toEqual({ section: 'keyboard' });
      expect(pending).toHaveBeenCalledWith({ section: 'keyboard' }, true);
      expect(session.target).toEqual({ section: 'vas' });
    });

    it('should stay with the edits on cancel', () => {
      const session = new EditorSession();
      session.setField('logMode', '1');
      session.navigate({ section: 'nfc' });

      expect(session.resolvePending('cancel')).toBe('unchanged');
      expect(session.pending).toBeNull();
      expect(session.target).toEqual({ section: 'keyboard' });
      expect(session.getField('logMode')).toBe('1');
    });

    it('should drop the edits on discard', () => {
      const session = new EditorSession();
      session.setField('logMode', '1');
      session.navigate({ section: 'nfc' });

      expect(session.resolvePending('discard')).toBe('navigated');
      expect(session.target).toEqual({ section: 'nfc' });
      expect(session.config.keyboard).toBeUndefined();
    });

    it('should save then move on save', () => {
      const session = new EditorSession();
      session.setField('logMode', '1');
      session.navigate({ section: 'nfc' });

      expect(session.resolvePending('save')).toBe('navigated');
      expect(session.target).toEqual({ section: 'nfc' });
      expect(session.config.keyboard?.logMode).toBe(true);
    });

    it('should stay put when the save fails', () => {
      const session = new EditorSession();
      session.setField('delayMs', '1');
      session.navigate({ section: 'nfc' });

      expect(session.resolvePending('save')).toBe('unchanged');
      expect(session.target).toEqual({ section: 'keyboard' });
      expect(session.errors.get('delayMs')).toBe('delayMs: must be between 5 and 255');
    });

    it('should do nothing without a parked move', () => {
      expect(new EditorSession().resolvePending('save')).toBe('unchanged');
    });
  });

  describe('slot info', () => {
    const config = new VTAPConfig({
      vasConfigs: [vas(1)],
      smartTapConfigs: [new GoogleSmartTapConfig({ collectorId: testData.collectorId, keySlot: 3 })],
    });

    it('should leave out the entry being edited', () => {
      const session = new EditorSession(config, { initialTarget: { section: 'vas', index: 0 } });

      expect(session.slotInfo()).toBe('Used: 3 (SmartTap #1) | Free: 1, 2, 4, 5, 6');
    });

    it('should count every entry from other forms', () => {
      expect(new EditorSession(config).slotInfo()).toBe('Used: 1 (VAS #1), 3 (SmartTap #1) | Free: 2, 4, 5, 6');
    });
  });

  describe('listeners', () => {
    it('should stop calling a removed listener', () => {
      const session = new EditorSession();
      const changed = vi.fn();
      session.on('changed', changed).off('changed', changed);

      session.setField('logMode', '1');

      expect(changed).not.toHaveBeenCalled();
    });
  });
});
