/**
 * Memory Budget
 *
 * Process-wide count of bytes committed to in-flight jobs. Reservations are
 * made on admission and released when a job leaves the in-flight set.
 * Committed bytes never exceed the limit.
 */

/** Decoded frames an encoder keeps in memory per running segment */
export const FRAME_BUFFER_FRAMES = 8;

/** Fixed cost of an encoder process independent of frame size */
export const BASE_OVERHEAD_BYTES = 128 * 1024 * 1024;

const BYTES_PER_PIXEL = 4;

export interface MemoryEstimateOptions {
  width: number;
  height: number;
  concurrentSegments: number;
  headroom: number;
  frameBuffer?: number;
  baseOverhead?: number;
}

/**
 * (W x H x 4 x frameBuffer x concurrentSegments + baseOverhead) x headroom
 */
export function estimateJobMemory(options: MemoryEstimateOptions): number {
  const frameBuffer = options.frameBuffer ?? FRAME_BUFFER_FRAMES;
  const baseOverhead = options.baseOverhead ?? BASE_OVERHEAD_BYTES;
  const frames = options.width * options.height * BYTES_PER_PIXEL * frameBuffer * options.concurrentSegments;
  return Math.ceil((frames + baseOverhead) * options.headroom);
}

export class MemoryBudget {
  private readonly reservations = new Map<string, number>();
  private committedBytes = 0;

  constructor(readonly limit: number) {
    if (!(limit > 0)) {
      throw new RangeError(`Memory limit must be positive, got ${limit}`);
    }
  }

  get committed(): number {
    return this.committedBytes;
  }

  get available(): number {
    return this.limit - this.committedBytes;
  }

  reservationOf(jobId: string): number {
    return this.reservations.get(jobId) ?? 0;
  }

  /**
   * Reserve `bytes` for a job. A request larger than the whole limit is
   * granted only when nothing else is committed, and is capped to the limit.
   */
  tryReserve(jobId: string, bytes: number): boolean {
    if (this.reservations.has(jobId)) {
      throw new Error(`Job ${jobId} already holds a reservation`);
    }

    if (bytes > this.limit) {
      if (this.committedBytes > 0) return false;
      this.commit(jobId, this.limit);
      return true;
    }

    if (this.committedBytes + bytes > this.limit) {
      return false;
    }
    this.commit(jobId, bytes);
    return true;
  }

  /**
   * Replace a job's reservation with a fresh estimate, if it fits.
   * Returns false (reservation unchanged) otherwise.
   */
  adjust(jobId: string, bytes: number): boolean {
    const current = this.reservations.get(jobId);
    if (current === undefined) {
      return false;
    }

    const target = Math.min(bytes, this.limit);
    if (this.committedBytes - current + target > this.limit) {
      return false;
    }
    this.committedBytes += target - current;
    this.reservations.set(jobId, target);
    return true;
  }

  release(jobId: string): void {
    const current = this.reservations.get(jobId);
    if (current === undefined) return;
    this.reservations.delete(jobId);
    this.committedBytes -= current;
  }

  private commit(jobId: string, bytes: number): void {
    this.reservations.set(jobId, bytes);
    this.committedBytes += bytes;
  }
}
