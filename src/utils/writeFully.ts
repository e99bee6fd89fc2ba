/**
 * Anything that accepts positional buffer writes, such as a `FileHandle`
 */
export interface WriteTarget {
    write(buffer: Uint8Array, offset: number, length: number): Promise<{ bytesWritten: number }>;
}

/**
 * Write all of `payload`, continuing after short writes. `onProgress` sees
 * every chunk that landed, including those before a failure.
 */
export async function writeFully(
    target: WriteTarget,
    payload: Uint8Array,
    onProgress: (bytes: number) => void = () => undefined,
): Promise<number> {
    let offset = 0;
    while (offset < payload.length) {
        const { bytesWritten } = await target.write(payload, offset, payload.length - offset);
        if (bytesWritten <= 0) {
            throw new Error(`write stalled after ${offset} of ${payload.length} bytes`);
        }
        offset += bytesWritten;
        onProgress(bytesWritten);
    }
    return offset;
}
