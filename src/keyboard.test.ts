import { describe, it, expect } from 'vitest';
import { KBSourceBuilder, KeyboardConfig } from './keyboard.js';

describe('KeyboardConfig', () => {
  it('should write only the log mode at defaults', () => {
    expect(new KeyboardConfig().toConfigLines()).toEqual(['KBLogMode=0']);
  });

  it('should spell out the source when log mode is on', () => {
    expect(new KeyboardConfig({ logMode: true }).toConfigLines()).toEqual(['KBLogMode=1', 'KBSource=A5']);
  });

  it('should write non-default values', () => {
    const keyboard = new KeyboardConfig({
      enable: false,
      source: '81',
      prefix: '$t',
      postfix: '',
      delayMs: 20,
    });

    expect(keyboard.toConfigLines()).toEqual([
      'KBLogMode=0',
      'KBEnable=0',
      'KBSource=81',
      'KBPrefix=$t',
      'KBPostfix=',
      'KBDelayMS=20',
    ]);
  });

  it('should write pass extraction only in pass mode', () => {
    const inactive = new KeyboardConfig({ passSection: 2, passSeparator: ';' });
    const active = inactive.with({ passMode: true });

    expect(inactive.toConfigLines()).toEqual(['KBLogMode=0']);
    expect(active.toConfigLines()).toEqual([
      'KBLogMode=0',
      'KBPassMode=1',
      'KBPassSection=2',
      'KBPassSeparator=;',
    ]);
  });

  it('should validate delay and separator', () => {
    expect(() => new KeyboardConfig({ delayMs: 4 })).toThrow('delayMs: must be between 5 and 255');
    expect(() => new KeyboardConfig({ passSeparator: '||' })).toThrow(
      'passSeparator: must be exactly 1 character'
    );
    expect(() => new KeyboardConfig({ prefix: 'a\nb' })).toThrow('prefix: must not contain line breaks');
  });
});

describe('KBSourceBuilder', () => {
  it('should build two-digit uppercase hex', () => {
    expect(new KBSourceBuilder().build()).toBe('00');
    expect(new KBSourceBuilder().cardTagUid().build()).toBe('01');
    expect(new KBSourceBuilder().mobilePass().cardTagUid().build()).toBe('81');
  });

  it('should combine every source bit', () => {
    const source = new KBSourceBuilder()
      .mobilePass()
      .stuid()
      .cardEmulation()
      .scanners()
      .commandInterface()
      .cardTagUid()
      .build();

    expect(source).toBe('E7');
  });

  it('should set a bit once', () => {
    expect(new KBSourceBuilder().mobilePass().mobilePass().build()).toBe('80');
  });
});
