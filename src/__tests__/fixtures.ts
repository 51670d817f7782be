import { VTAPConfig } from '../config.js';
import { DESFireAppConfig, DESFireConfig } from '../desfire.js';
import { BeepConfig, BeepSequence, FeedbackConfig, LEDConfig, LEDSequence } from '../feedback.js';
import { KeyboardConfig } from '../keyboard.js';
import { NFCTagConfig, TagReadConfig } from '../nfc.js';
import { GoogleSmartTapConfig } from '../smarttap.js';
import { AppleVASConfig, VASDefaultPassesEnabled } from '../vas.js';

export const testData = {
  merchantId: 'pass.com.example.test',
  otherMerchantId: 'pass.com.example.other',
  merchantUrl: 'https://example.com/pass',
  collectorId: '12345678',
  comment: 'Test reader',
};

/**
 * Configuration touching every section
 */
export function fullConfig(): VTAPConfig {
  return new VTAPConfig({
    vasConfigs: [
      new AppleVASConfig({ merchantId: testData.merchantId, keySlot: 1, merchantUrl: testData.merchantUrl }),
      new AppleVASConfig({ merchantId: testData.otherMerchantId, keySlot: 2 }),
    ],
    vasDefaultPasses: new VASDefaultPassesEnabled([1, 2]),
    smartTapConfigs: [
      new GoogleSmartTapConfig({ collectorId: testData.collectorId, keySlot: 3, keyVersion: 1 }),
    ],
    keyboard: new KeyboardConfig({ logMode: true, source: '81', delayMs: 10 }),
    nfc: new NFCTagConfig({
      type2: 'U',
      type4: 'D',
      ignoreRandomUid: true,
      tagRead: new TagReadConfig({ blockNum: 4, format: 'h' }),
    }),
    desfire: new DESFireConfig({
      apps: [new DESFireAppConfig({ appId: 'f51230', fileId: 1, keySlot: 2, crypto: 3 })],
    }),
    feedback: new FeedbackConfig({
      led: new LEDConfig({
        mode: 3,
        passLed: new LEDSequence({ color: '00FF00', onMs: 200, offMs: 100, repeats: 2 }),
      }),
      beep: new BeepConfig({
        passBeep: new BeepSequence({ onMs: 50, offMs: 50, repeats: 1, frequency: 4000 }),
      }),
    }),
  });
}

/** {@link fullConfig} generated with the test comment */
export const FULL_CONFIG_TEXT = [
  '!VTAPconfig',
  '; Test reader',
  '; Apple VAS Configuration',
  'VAS1MerchantID=pass.com.example.test',
  'VAS1KeySlot=1',
  'VAS1MerchantURL=https://example.com/pass',
  'VAS2MerchantID=pass.com.example.other',
  'VAS2KeySlot=2',
  'VASDefaultPassesEnabled=1,2',
  '; Google Smart Tap Configuration',
  'ST1CollectorID=12345678',
  'ST1KeySlot=3',
  'ST1KeyVersion=1',
  '; Keyboard Emulation',
  'KBLogMode=1',
  'KBSource=81',
  'KBDelayMS=10',
  '; NFC Tag Settings',
  'NFCType2=U',
  'NFCType4=D',
  'IgnoreRandomUID=1',
  'TagReadBlockNum=4',
  'TagReadFormat=h',
  '; MIFARE DESFire Settings',
  'DESFire1AppID=F51230',
  'DESFire1FileID=1',
  'DESFire1KeySlot=2',
  'DESFire1Crypto=3',
  '; LED/Beep Settings',
  'LEDMode=3',
  'PassLED=00FF00,200,100,2',
  'PassBeep=50,50,1,4000',
].join('\n');

/**
 * Run a function and return the error it throws
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
