import { randomFillSync } from 'node:crypto';

export type RandomBytesResult = { ok: true; bytes: Uint8Array } | { ok: false; reason: string };

/**
 * Source of random bytes.
 * Reports unavailability as failed result instead of throwing.
 */
export type RandomBytesProvider = (size: number) => RandomBytesResult;

/**
 * High-resolution clock returning nanoseconds since the Unix epoch.
 */
export type NanoClock = () => bigint;

export interface GenerateRequestIdOptions {
    randomBytes?: RandomBytesProvider;
    nanoClock?: NanoClock;
}

export const UUID_BYTES = 16;

/**
 * Fills the bytes from the cryptographically secure random source of Node.js.
 */
export const secureRandomBytes: RandomBytesProvider = (size) => {
    try {
        return { ok: true, bytes: randomFillSync(new Uint8Array(size)) };
    } catch (e) {
        return { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
};

/**
 * Wall clock time in nanoseconds.
 * Sub-millisecond part comes from the monotonic clock.
 */
export const wallClockNanos: NanoClock = () => BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n);

/**
 * Derives bytes from the clock value, least significant byte first.
 * Bytes beyond the width of the value are zero.
 */
export function bytesFromNanos(nanos: bigint, size: number = UUID_BYTES): Uint8Array {
    const bytes = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
        bytes[i] = Number((nanos >> BigInt(i * 8)) & 0xffn);
    }
    return bytes;
}

/**
 * Formats 16 bytes as UUID v4 with RFC 4122 variant.
 * The version and variant bits are always forced, whatever the bytes are.
 */
export function formatUuidV4(source: Uint8Array): string {
    const bytes = Uint8Array.from(source.subarray(0, UUID_BYTES));
    bytes[6] = (bytes[6] & 0x0f) | 0x40;
    bytes[8] = (bytes[8] & 0x3f) | 0x80;

    const hex = Buffer.from(bytes).toString('hex');
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
}

/**
 * Generates the request ID in UUID v4 format.
 * When the secure random source is unavailable, the bytes are derived from the current time instead.
 * @example
 * generateRequestId() => '1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed'
 */
export function generateRequestId(options: GenerateRequestIdOptions = {}): string {
    const { randomBytes = secureRandomBytes, nanoClock = wallClockNanos } = options;
    const random = randomBytes(UUID_BYTES);
    if (random.ok && random.bytes.length >= UUID_BYTES) {
        return formatUuidV4(random.bytes);
    }
    return formatUuidV4(bytesFromNanos(nanoClock()));
}
