export const u4 = (n: number): number => n & 0x0f;
export const u5 = (n: number): number => n & 0x1f;
export const u8 = (n: number): number => (n & 0xff) >>> 0;
export const u12 = (n: number): number => n & 0x0fff;
export const u16 = (n: number): number => (n & 0xffff) >>> 0;
export const hi = (n: number): number => (n >>> 8) & 0xff;
export const lo = (n: number): number => n & 0xff;
export const getBit = (n: number, bit: number): number => ((n >>> bit) & 1) >>> 0;
export const testBit = (n: number, bit: number): boolean => getBit(n, bit) === 1;
