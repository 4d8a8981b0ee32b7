import { PlatformClassifier, PlatformId } from './types.js';

// aarch64 PIE: the binary loads at 0x0000aaaa_xxxxxxxx, shared libs at 0x0000ffff_xxxxxxxx
const AARCH64_LIB_TOP_WORD = 0xffffn;
// armhf: shared libs are mapped at 0xf0000000 and above
const ARMHF_LIB_THRESHOLD = 0xf0000000n;
const U32_MAX = 0xffffffffn;

export function normalizePlatform(platform: string): PlatformId {
  return platform === 'rpi4_64bit' ? 'pi' : platform;
}

/**
 * Address-range heuristic for telling shared-library frames apart from
 * frames inside the main binary. Unknown platforms never report a library,
 * so their frames are still given a chance to resolve.
 */
export function isSharedLibraryAddress(address: bigint, platform: PlatformId): boolean {
  switch (platform) {
    case 'pi':
    case 'rpi4_64bit':
      return ((address >> 32n) & 0xffffn) >= AARCH64_LIB_TOP_WORD;
    case 'pi32':
      return address >= ARMHF_LIB_THRESHOLD;
    default:
      return false;
  }
}

export const defaultClassifier: PlatformClassifier = {
  isSharedLibrary: isSharedLibraryAddress,
};

/**
 * Best-effort guess when a device never reported its platform:
 * anything wider than 32 bits means the 64-bit layout.
 */
export function detectPlatformFromAddresses(addresses: bigint[]): PlatformId {
  return addresses.some((addr) => addr > U32_MAX) ? 'pi' : 'pi32';
}
