export function toHex32(h: number): string {
  return ('00000000' + (h >>> 0).toString(16)).slice(-8);
}

export function toHex64(h: bigint): string {
  return BigInt.asUintN(64, h).toString(16).padStart(16, '0');
}

export function toHex128(h: bigint): string {
  return BigInt.asUintN(128, h).toString(16).padStart(32, '0');
}
