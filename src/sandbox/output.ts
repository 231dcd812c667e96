export function truncationMarker(capBytes: number): string {
  return `\n[... output truncated after ${capBytes} bytes ...]\n`;
}

/**
 * Collects one output stream up to `capBytes`. Bytes past the cap are counted
 * and dropped, and the decoded text gets a truncation marker appended.
 */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  dropped = 0;

  constructor(readonly capBytes: number) {}

  push(chunk: Buffer): void {
    const remaining = this.capBytes - this.size;
    if (remaining <= 0) {
      this.dropped += chunk.length;
      return;
    }
    if (chunk.length <= remaining) {
      this.chunks.push(chunk);
      this.size += chunk.length;
      return;
    }
    this.chunks.push(chunk.subarray(0, remaining));
    this.size = this.capBytes;
    this.dropped += chunk.length - remaining;
  }

  get truncated(): boolean {
    return this.dropped > 0;
  }

  text(): string {
    const body = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? body + truncationMarker(this.capBytes) : body;
  }
}
