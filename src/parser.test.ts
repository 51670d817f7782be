import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigParser, parse, parseFile } from './parser.js';
import { generate } from './generator.js';
import { ConfigFileError, ConfigFormatError, ValidationError } from './errors.js';
import { VTAPConfig } from './config.js';
import { DESFireAppConfig, DESFireConfig } from './desfire.js';
import { KeyboardConfig } from './keyboard.js';
import { FULL_CONFIG_TEXT, catchError, fullConfig, testData } from './__tests__/fixtures.js';

const doc = (...lines: string[]): string => ['!VTAPconfig', ...lines].join('\n');

describe('ConfigParser', () => {
  describe('round trip', () => {
    it('should read back a generated config', () => {
      expect(parse(FULL_CONFIG_TEXT)).toEqual(fullConfig());
    });

    it('should regenerate the same text', () => {
      expect(generate(parse(FULL_CONFIG_TEXT), testData.comment)).toBe(FULL_CONFIG_TEXT);
    });

    it('should keep a space separator', () => {
      const config = new VTAPConfig({
        keyboard: new KeyboardConfig({ passMode: true, passSeparator: ' ' }),
        desfire: new DESFireConfig({ apps: [new DESFireAppConfig({ appId: 'F51230' })], separator: ' ' }),
      });

      const parsed = parse(generate(config));

      expect(parsed.keyboard?.passSeparator).toBe(' ');
      expect(parsed.desfire?.separator).toBe(' ');
      expect(parsed).toEqual(config);
    });

    it('should keep trailing spaces in text values', () => {
      const config = new VTAPConfig({ keyboard: new KeyboardConfig({ prefix: ' >', postfix: 'x ' }) });

      const keyboard = parse(generate(config)).keyboard;

      expect(keyboard?.prefix).toBe(' >');
      expect(keyboard?.postfix).toBe('x ');
    });

    it('should still trim around numbers and the key', () => {
      expect(parse(doc('  KBDelayMS=20  ')).keyboard?.delayMs).toBe(20);
    });
  });

  describe('header', () => {
    it('should reject a document without the header', () => {
      const error = catchError(() => parse('VAS1KeySlot=1'));

      expect(error).toBeInstanceOf(ConfigFormatError);
      expect(error).toMatchObject({
        message: 'Missing !VTAPconfig header: first line must be !VTAPconfig',
        line: 1,
      });
    });

    it('should reject an empty document', () => {
      expect(() => parse('')).toThrow('Missing !VTAPconfig header: document is empty');
      expect(() => parse('\n   \n')).toThrow(ConfigFormatError);
    });

    it('should accept a BOM, blank lines and CRLF endings', () => {
      const config = parse('\uFEFF\r\n!VTAPconfig\r\nKBLogMode=1\r\nKBDelayMS=20\r\n');

      expect(config.keyboard?.logMode).toBe(true);
      expect(config.keyboard?.delayMs).toBe(20);
    });
  });

  describe('tolerance', () => {
    it('should report unknown lines and keep going', () => {
      const unknown: Array<[string, number]> = [];
      const parser = new ConfigParser({ onUnknownLine: (line, lineNumber) => unknown.push([line, lineNumber]) });

      const config = parser.parse(
        doc('FooBar=1', 'PassLED=red', '; comment', '!other', 'NFCType2=X', 'VAS1KeySlot=abc', 'KBLogMode=1')
      );

      expect(unknown).toEqual([
        ['FooBar=1', 2],
        ['PassLED=red', 3],
        ['NFCType2=X', 6],
        ['VAS1KeySlot=abc', 7],
      ]);
      expect(config.keyboard?.logMode).toBe(true);
      expect(config.vasConfigs).toEqual([]);
      expect(config.feedback).toBeUndefined();
      expect(config.nfc).toBeUndefined();
    });

    it('should skip an unknown line between known ones', () => {
      const config = parse(doc('KBLogMode=1', 'FooBar=123', 'KBDelayMS=20'));

      expect(config.keyboard?.toConfigLines()).toEqual(['KBLogMode=1', 'KBSource=A5', 'KBDelayMS=20']);
    });

    it('should let a repeated key win', () => {
      expect(parse(doc('KBDelayMS=10', 'KBDelayMS=20')).keyboard?.delayMs).toBe(20);
    });

    it('should keep empty prefix and postfix values', () => {
      const keyboard = parse(doc('KBPrefix=$t', 'KBPostfix=')).keyboard;

      expect(keyboard?.prefix).toBe('$t');
      expect(keyboard?.postfix).toBe('');
    });
  });

  describe('pass lists', () => {
    it('should order entries by slot and drop incomplete ones', () => {
      const config = parse(
        doc(
          'VAS3MerchantID=pass.com.example.three',
          'VAS3KeySlot=3',
          'VAS1MerchantID=pass.com.example.one',
          'VAS1KeySlot=1',
          'VAS2KeySlot=2'
        )
      );

      expect(config.vasConfigs.map((vas) => vas.merchantId)).toEqual([
        'pass.com.example.one',
        'pass.com.example.three',
      ]);
      expect(generate(config)).toBe(
        doc(
          '; Apple VAS Configuration',
          'VAS1MerchantID=pass.com.example.one',
          'VAS1KeySlot=1',
          'VAS2MerchantID=pass.com.example.three',
          'VAS2KeySlot=3'
        )
      );
    });

    it('should name the slot of a missing key slot', () => {
      const error = catchError(() => parse(doc('VAS1MerchantID=pass.com.example.test')));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'VAS1.keySlot', message: 'VAS1.keySlot: is required' });
    });

    it('should name the slot of an out-of-range value', () => {
      const error = catchError(() => parse(doc('VAS2MerchantID=pass.com.example.test', 'VAS2KeySlot=9')));

      expect(error).toMatchObject({ field: 'VAS2.keySlot' });
    });

    it('should default Smart Tap key slot and version', () => {
      const [st] = parse(doc('ST1CollectorID=12345678')).smartTapConfigs;

      expect(st.toInit()).toEqual({ collectorId: '12345678', keySlot: 0, keyVersion: 0 });
    });

    it('should read default passes', () => {
      expect(parse(doc('VASDefaultPassesEnabled=3,1')).vasDefaultPasses?.enabledPasses).toEqual([1, 3]);
      expect(catchError(() => parse(doc('STDefaultPassesEnabled=7')))).toMatchObject({
        field: 'smartTapDefaultPasses.enabledPasses',
      });
    });
  });

  describe('static sections', () => {
    it('should build DESFire only when an app is present', () => {
      expect(parse(doc('DESFireSeparator=;')).desfire).toBeUndefined();

      const desfire = parse(doc('DESFire1AppID=abcdef', 'DESFire1ReadLength=8', 'DESFireSeparator=;')).desfire;
      expect(desfire?.separator).toBe(';');
      expect(desfire?.apps[0].toInit()).toMatchObject({ appId: 'ABCDEF', readLength: 8, readOffset: 0 });
    });

    it('should reject an unknown DESFire crypto mode', () => {
      expect(catchError(() => parse(doc('DESFire1AppID=ABCDEF', 'DESFire1Crypto=2')))).toMatchObject({
        field: 'DESFire1.crypto',
      });
    });

    it('should read tag settings and block reads', () => {
      const nfc = parse(doc('NFCType4=D', 'TagReadMinDigits=A', 'TagReadKeyType=B')).nfc;

      expect(nfc?.type4).toBe('D');
      expect(nfc?.tagRead?.minDigits).toBe('A');
      expect(nfc?.tagRead?.keyType).toBe('B');
      expect(parse(doc('TagReadMinDigits=8')).nfc?.tagRead?.minDigits).toBe(8);
    });

    it('should reject the DESFire mode outside Type 4', () => {
      expect(catchError(() => parse(doc('NFCType2=D')))).toMatchObject({ field: 'nfc.type2' });
    });

    it('should read LED and beep settings', () => {
      const feedback = parse(
        doc('LEDMode=2', 'LEDDefaultRGB=00ff00', 'TagLED=0000FF,50,50,3', 'StartBeep=200,0,1')
      ).feedback;

      expect(feedback?.led?.mode).toBe(2);
      expect(feedback?.led?.defaultRgb).toBe('00FF00');
      expect(feedback?.led?.tagLed?.toConfigValue()).toBe('0000FF,50,50,3');
      expect(feedback?.beep?.startBeep?.toConfigValue()).toBe('200,0,1');
    });

    it('should name the sequence of an out-of-range value', () => {
      expect(catchError(() => parse(doc('PassLED=00FF00,70000,100,1')))).toMatchObject({
        field: 'led.passLed.onMs',
      });
      expect(catchError(() => parse(doc('TagBeep=100,100,1,50')))).toMatchObject({
        field: 'beep.tagBeep.frequency',
      });
      expect(catchError(() => parse(doc('LEDMode=5')))).toMatchObject({ field: 'led.mode' });
    });
  });

  describe('parseFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'vtap100-parser-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read and parse a file', async () => {
      const path = join(dir, 'config.txt');
      await writeFile(path, FULL_CONFIG_TEXT, 'utf-8');

      const config = await parseFile(path);

      expect(generate(config, testData.comment)).toBe(FULL_CONFIG_TEXT);
    });

    it('should wrap read failures', async () => {
      const path = join(dir, 'missing.txt');

      const error = await new ConfigParser().parseFile(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigFileError);
      expect(error).toMatchObject({ path, code: 'ENOENT' });
    });
  });
});
