import { describe, it, expect } from 'vitest';
import { getBit, hi, lo, testBit, u12, u16, u4, u5, u8 } from '../../src/util/bit.js';

describe('bit helpers', (): void => {
  it('mask to their widths', (): void => {
    expect(u4(0x1f)).toBe(0x0f);
    expect(u5(0x3f)).toBe(0x1f);
    expect(u8(0x1ff)).toBe(0xff);
    expect(u12(0x1234)).toBe(0x234);
    expect(u16(0x12345)).toBe(0x2345);
    expect(u8(-1)).toBe(0xff);
  });

  it('split words into bytes', (): void => {
    expect(hi(0xabcd)).toBe(0xab);
    expect(lo(0xabcd)).toBe(0xcd);
  });

  it('read single bits', (): void => {
    expect(getBit(0b1010, 1)).toBe(1);
    expect(getBit(0b1010, 2)).toBe(0);
    expect(testBit(0x80, 7)).toBe(true);
    expect(testBit(0x80, 6)).toBe(false);
  });
});
