import { describe, it, expect } from 'vitest';
import { NFCTagConfig, TagReadConfig } from './nfc.js';
import { NFCTagMode, TagReadFormat } from './types.js';

describe('TagReadConfig', () => {
  it('should write nothing at defaults', () => {
    expect(new TagReadConfig().toConfigLines()).toEqual([]);
  });

  it('should write every set field in order', () => {
    const tagRead = new TagReadConfig({
      blockNum: 4,
      keySlot: 1,
      keyType: 'A',
      offset: 2,
      length: 4,
      format: TagReadFormat.ASCII,
      minDigits: 'A',
    });

    expect(tagRead.toConfigLines()).toEqual([
      'TagReadBlockNum=4',
      'TagReadKeySlot=1',
      'TagReadKeyType=A',
      'TagReadOffset=2',
      'TagReadLength=4',
      'TagReadFormat=a',
      'TagReadMinDigits=A',
    ]);
  });

  it('should validate ranges', () => {
    expect(() => new TagReadConfig({ blockNum: 256 })).toThrow('blockNum: must be between 0 and 255');
    expect(() => new TagReadConfig({ offset: 16 })).toThrow('offset: must be between 0 and 15');
    expect(() => new TagReadConfig({ minDigits: 21 })).toThrow('minDigits: must be between 1 and 20');
  });
});

describe('NFCTagConfig', () => {
  it('should write nothing at defaults', () => {
    expect(new NFCTagConfig().toConfigLines()).toEqual([]);
  });

  it('should write modes, flags and block read settings', () => {
    const nfc = new NFCTagConfig({
      type2: NFCTagMode.NDEF,
      type5: NFCTagMode.UID,
      reportReadError: true,
      byteOrderReversed: true,
      tagRead: new TagReadConfig({ blockNum: 8 }),
    });

    expect(nfc.toConfigLines()).toEqual([
      'NFCType2=N',
      'NFCType5=U',
      'NFCReportReadError=1',
      'TagByteOrder=1',
      'TagReadBlockNum=8',
    ]);
  });

  it('should allow the DESFire mode on Type 4 only', () => {
    expect(new NFCTagConfig({ type4: NFCTagMode.DESFIRE }).toConfigLines()).toEqual(['NFCType4=D']);
    expect(() => new NFCTagConfig({ type2: NFCTagMode.DESFIRE })).toThrow('type2: must be one of 0, U, N, B');
    expect(() => new NFCTagConfig({ type5: NFCTagMode.DESFIRE })).toThrow('type5');
  });

  it('should copy with changes', () => {
    const nfc = new NFCTagConfig({ type2: NFCTagMode.UID }).with({ ignoreRandomUid: true });

    expect(nfc.toConfigLines()).toEqual(['NFCType2=U', 'IgnoreRandomUID=1']);
  });
});
